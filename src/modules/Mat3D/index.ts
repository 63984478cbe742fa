import { mat4 } from 'gl-matrix'
import { Rect } from '@/mat3d/modules/Rect'
import { Transformable } from '@/mat3d/modules/Transformable'
import { parseMat3D } from '@/mat3d/modules/Codec'
import type { Mat3DLike, Matrix4, ReadonlyMatrix4 } from '@/mat3d/modules/Operations'
import { assertMatrixSize } from '@/mat3d/helper'
import { MATRIX_SIZE } from '@/mat3d/variables'

/**
 * A 4x4 matrix paired with the rectangle it transforms.
 *
 * The constructor keeps its own copy of `matrix`, so the caller's array is never touched.
 * Use `Mat3D.raw` to operate directly on an existing matrix instead.
 *
 * ```ts
 * const mat3D = new Mat3D(undefined, Rect.fromLTWH(0, 0, 200, 100))
 * mat3D.scale(1.5).rotate(30).shift([20, 0])
 * element.style.transform = `matrix3d(${Array.from(mat3D.storage).join(',')})`
 * ```
 */
export class Mat3D extends Transformable {
  public rect: Rect
  private _matrix: Matrix4

  /**
   * @param matrix Copied into the new state. Defaults to the identity matrix.
   * @param rect Bounds of the transformed content. Default value: `Rect.zero`
   */
  public constructor (matrix?: ReadonlyMatrix4, rect: Rect = Rect.zero) {
    super()
    const storage = new Float64Array(MATRIX_SIZE)
    if (matrix) {
      assertMatrixSize(matrix)
      mat4.copy(storage, matrix)
    } else {
      mat4.identity(storage)
    }
    this._matrix = storage
    this.rect = rect
  }

  public get matrix (): Matrix4 {
    return this._matrix
  }

  /**
   * Wraps `matrix` without copying it: operations on the state change `matrix`,
   * and changes made to `matrix` elsewhere show through the state.
   */
  public static raw (matrix: Matrix4, rect: Rect = Rect.zero): Mat3D {
    assertMatrixSize(matrix)
    const mat3D = new Mat3D(undefined, rect)
    mat3D._matrix = matrix
    return mat3D
  }

  /** Wraps `other`'s matrix and rectangle. The two states share one matrix afterwards. */
  public static from (other: Mat3DLike): Mat3D {
    return Mat3D.raw(other.matrix, other.rect)
  }

  /** Reads the string produced by `toString`. Malformed input yields a default state. */
  public static parse (source: string): Mat3D {
    const { matrix, rect } = parseMat3D(source)
    return Mat3D.raw(matrix, rect)
  }

  /** Folds `states` into a new state with `multiply`, left to right, starting from identity. */
  public static combine (states: Mat3DLike[]): Mat3D {
    return states.reduce<Mat3D>((combined, state) => combined.multiply(state), new Mat3D())
  }
}
