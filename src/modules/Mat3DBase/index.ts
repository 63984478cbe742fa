import { Rect } from '@/mat3d/modules/Rect'
import { Transformable } from '@/mat3d/modules/Transformable'
import type { Matrix4 } from '@/mat3d/modules/Operations'
import { assertMatrixSize } from '@/mat3d/helper'

/**
 * Base class for user types that carry their own matrix and bounds.
 * The matrix passed in is used as is, so operations write straight into it.
 *
 * ```ts
 * class Card extends Mat3DBase {
 *   public constructor (matrix: Matrix4, offset: Offset, size: [number, number]) {
 *     super(matrix, Rect.fromLTWH(...offset, ...size))
 *   }
 * }
 * ```
 */
export abstract class Mat3DBase extends Transformable {
  public rect: Rect
  public readonly matrix: Matrix4

  public constructor (matrix: Matrix4, rect: Rect = Rect.zero) {
    super()
    assertMatrixSize(matrix)
    this.matrix = matrix
    this.rect = rect
  }
}
