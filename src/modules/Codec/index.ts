import { mat4 } from 'gl-matrix'
import { Rect } from '@/mat3d/modules/Rect'
import type { Mat3DLike } from '@/mat3d/modules/Operations'
import { isNumberList, toNumber } from '@/mat3d/helper'
import { MAT3D_PREFIX, MATRIX_SIZE } from '@/mat3d/variables'

export type ParsedMat3D = { matrix: Float64Array; rect: Rect }

const BOUND = '([^,)]*)'
const MAT3D_PATTERN = new RegExp(
  `^${MAT3D_PREFIX}(\\[[^\\]]*\\])?\\(${BOUND},${BOUND},${BOUND},${BOUND},?\\s*\\)`
)

function identity (): Float64Array {
  const storage = new Float64Array(MATRIX_SIZE)
  mat4.identity(storage)
  return storage
}

function decodeStorage (source: string | undefined): Float64Array | undefined {
  if (source === undefined) return undefined
  let decoded: unknown
  try {
    decoded = JSON.parse(source)
  } catch {
    return undefined
  }
  return isNumberList(decoded, MATRIX_SIZE) ? Float64Array.from(decoded) : undefined
}

/**
 * Formats a state as `Mat3D[m0,...,m15](left, top, right, bottom)`.
 * Matrix values are listed in storage (column-major) order.
 */
export function formatMat3D ({ matrix, rect }: Mat3DLike): string {
  const storage = JSON.stringify(Array.from(matrix))
  return `${MAT3D_PREFIX}${storage}(${rect.left}, ${rect.top}, ${rect.right}, ${rect.bottom})`
}

/**
 * Reads the output of `formatMat3D` back. Never throws:
 * - a bound that is empty or not a number reads as `0`, `Infinity` and `-Infinity` are kept;
 * - a missing or malformed matrix list reads as the identity matrix;
 * - a string of any other shape reads as the identity matrix with `Rect.zero`.
 * Only the start of `source` has to match; trailing text is ignored.
 */
export function parseMat3D (source: string): ParsedMat3D {
  const match = MAT3D_PATTERN.exec(source)
  if (!match) return { matrix: identity(), rect: Rect.zero }

  const [, storage, left, top, right, bottom] = match
  const rect = Rect.fromLTRB(
    toNumber(left),
    toNumber(top),
    toNumber(right),
    toNumber(bottom)
  )
  return { matrix: decodeStorage(storage) ?? identity(), rect }
}
