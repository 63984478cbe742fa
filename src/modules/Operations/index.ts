import { mat4 } from 'gl-matrix'
import type { Rect, Offset } from '@/mat3d/modules/Rect'
import { areFinite, degreesToRadians } from '@/mat3d/helper'
import { FLIP_DEGREES, defaultTextDirection } from '@/mat3d/variables'
import type { TextDirection } from '@/mat3d/config'

/** Column-major 4x4 matrix storage, as `gl-matrix` types it. */
export type Matrix4 = ReturnType<typeof mat4.create>
export type ReadonlyMatrix4 = Parameters<typeof mat4.copy>[1]

/**
 * Anything that can be transformed: a bounding rectangle plus the 4x4 matrix it drives.
 * `matrix` is column-major, as `gl-matrix` stores it.
 */
export interface Mat3DLike {
  rect: Rect;
  readonly matrix: Matrix4;
}

const leftTranslation = new Float64Array(16)

/**
 * Returns the pivot used when no origin is supplied: the rectangle's center
 * expressed in the rectangle's own frame (`center - topLeft`).
 */
export function getPivot (target: Mat3DLike, origin?: Offset): Offset {
  if (origin) return origin
  const { rect } = target
  const [x, y] = rect.center
  return [x - rect.left, y - rect.top]
}

/** Runs `apply` between a translation to `pivot` and the translation back. */
function aroundPivot (matrix: Matrix4, pivot: Offset, apply: (m: Matrix4) => void): void {
  const [x, y] = pivot
  mat4.translate(matrix, matrix, [x, y, 0])
  apply(matrix)
  mat4.translate(matrix, matrix, [-x, -y, 0])
}

function leftTranslate (m: Matrix4, x: number, y: number, z: number): void {
  mat4.fromTranslation(leftTranslation, [x, y, z])
  mat4.multiply(m, leftTranslation, m)
}

/** Moves `target.rect` onto `other`'s center, then grows it to cover `other.rect`. */
function growRect (target: Mat3DLike, other: Mat3DLike): void {
  const [cx, cy] = target.rect.center
  const [ox, oy] = other.rect.center
  target.rect = target.rect.shift([ox - cx, oy - cy]).expandToInclude(other.rect)
}

export function translate (target: Mat3DLike, x: number, y = x, z = 0): void {
  if (!areFinite('translate', [x, y, z])) return
  aroundPivot(target.matrix, getPivot(target), (m) => leftTranslate(m, x, y, z))
}

export function shift (target: Mat3DLike, offset: Offset, origin?: Offset): void {
  if (!areFinite('shift', offset, origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => leftTranslate(m, offset[0], offset[1], 0))
}

export function translateX (target: Mat3DLike, offset: number, origin?: Offset): void {
  if (!areFinite('translateX', [offset], origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => leftTranslate(m, offset, 0, 0))
}

export function translateY (target: Mat3DLike, offset: number, origin?: Offset): void {
  if (!areFinite('translateY', [offset], origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => leftTranslate(m, 0, offset, 0))
}

export function translateZ (target: Mat3DLike, offset: number, origin?: Offset): void {
  if (!areFinite('translateZ', [offset], origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => leftTranslate(m, 0, 0, offset))
}

/** Negative Y is up. */
export function upward (target: Mat3DLike, offset: number, origin?: Offset): void {
  translateY(target, -offset, origin)
}

export function downward (target: Mat3DLike, offset: number, origin?: Offset): void {
  translateY(target, offset, origin)
}

export function forward (
  target: Mat3DLike,
  offset: number,
  origin?: Offset,
  direction: TextDirection = defaultTextDirection
): void {
  translateX(target, direction === 'ltr' ? offset : -offset, origin)
}

export function backward (
  target: Mat3DLike,
  offset: number,
  origin?: Offset,
  direction: TextDirection = defaultTextDirection
): void {
  translateX(target, direction === 'ltr' ? -offset : offset, origin)
}

export function inward (target: Mat3DLike, offset: number, origin?: Offset): void {
  translateZ(target, -offset, origin)
}

export function outward (target: Mat3DLike, offset: number, origin?: Offset): void {
  translateZ(target, offset, origin)
}

export function scale (target: Mat3DLike, x: number, y = x, z = 1): void {
  if (!areFinite('scale', [x, y, z])) return
  // Absolute center, unlike the other operations' rectangle-local pivot
  aroundPivot(target.matrix, target.rect.center, (m) => mat4.scale(m, m, [x, y, z]))
}

export function scaleX (target: Mat3DLike, ratio: number, origin?: Offset): void {
  if (!areFinite('scaleX', [ratio], origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => mat4.scale(m, m, [ratio, 1, 1]))
}

export function scaleY (target: Mat3DLike, ratio: number, origin?: Offset): void {
  if (!areFinite('scaleY', [ratio], origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => mat4.scale(m, m, [1, ratio, 1]))
}

export function scaleZ (target: Mat3DLike, ratio: number, origin?: Offset): void {
  if (!areFinite('scaleZ', [ratio], origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => mat4.scale(m, m, [1, 1, ratio]))
}

export function tiltX (target: Mat3DLike, degrees: number, origin?: Offset): void {
  if (!areFinite('tiltX', [degrees], origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => mat4.rotateX(m, m, degreesToRadians(degrees)))
}

export function tiltY (target: Mat3DLike, degrees: number, origin?: Offset): void {
  if (!areFinite('tiltY', [degrees], origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => mat4.rotateY(m, m, degreesToRadians(degrees)))
}

/** Rotation around the Z axis, the 2D rotation of screen content. */
export function rotate (target: Mat3DLike, degrees: number, origin?: Offset): void {
  if (!areFinite('rotate', [degrees], origin)) return
  aroundPivot(target.matrix, getPivot(target, origin), (m) => mat4.rotateZ(m, m, degreesToRadians(degrees)))
}

export function tiltZ (target: Mat3DLike, degrees: number, origin?: Offset): void {
  rotate(target, degrees, origin)
}

/** Each tilt resolves its own default pivot. */
export function tilt (target: Mat3DLike, x: number, y: number, z = 0): void {
  if (!areFinite('tilt', [x, y, z])) return
  tiltX(target, x)
  tiltY(target, y)
  tiltZ(target, z)
}

export function flipX (target: Mat3DLike, origin?: Offset): void {
  tiltX(target, FLIP_DEGREES, origin)
}

export function flipY (target: Mat3DLike, origin?: Offset): void {
  tiltY(target, FLIP_DEGREES, origin)
}

export function flipZ (target: Mat3DLike, origin?: Offset): void {
  tiltZ(target, FLIP_DEGREES, origin)
}

export function multiply (target: Mat3DLike, other: Mat3DLike): void {
  growRect(target, other)
  mat4.multiply(target.matrix, target.matrix, other.matrix)
}

export function add (target: Mat3DLike, other: Mat3DLike): void {
  growRect(target, other)
  mat4.add(target.matrix, target.matrix, other.matrix)
}

export function subtract (target: Mat3DLike, other: Mat3DLike): void {
  growRect(target, other)
  mat4.subtract(target.matrix, target.matrix, other.matrix)
}

/**
 * Transposes the matrix in place.
 * Named after the unary minus it replaces; it is not an arithmetic negation.
 */
export function negate (target: Mat3DLike): void {
  mat4.transpose(target.matrix, target.matrix)
}
