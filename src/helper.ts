import type { Offset } from '@/mat3d/modules/Rect'
import { MATRIX_SIZE } from '@/mat3d/variables'

export const isArray = <T>(a: unknown | T[]): a is T[] => Array.isArray(a)

export function degreesToRadians (degrees: number): number {
  return Math.PI * degrees / 180
}

/**
 * Checks that every value passed to a transform operation is finite.
 * Logs a warning naming the operation otherwise, so the caller can leave the matrix untouched.
 */
export function areFinite (operation: string, values: number[], origin?: Offset): boolean {
  const all = origin ? [...values, ...origin] : values
  if (all.every(Number.isFinite)) return true
  console.warn(`Mat3D.${operation} received non-finite input (${all.join(', ')}). The matrix was left unchanged.`)
  return false
}

/** Parses a decimal string, ignoring surrounding spaces. Empty input and `NaN` give `fallback`. */
export function toNumber (value: string | undefined, fallback = 0): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isNaN(parsed) ? fallback : parsed
}

export function isNumberList (value: unknown, length: number): value is number[] {
  return isArray<unknown>(value) &&
    value.length === length &&
    value.every((item) => typeof item === 'number' && Number.isFinite(item))
}

export function assertMatrixSize (matrix: ArrayLike<number>): void {
  if (matrix.length !== MATRIX_SIZE) {
    throw new Error(`Matrix must be a ${MATRIX_SIZE}-element array (4x4 matrix), got ${matrix.length} elements`)
  }
}
