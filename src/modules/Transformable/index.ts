import * as operations from '@/mat3d/modules/Operations'
import type { Mat3DLike, Matrix4 } from '@/mat3d/modules/Operations'
import type { Rect, Offset } from '@/mat3d/modules/Rect'
import { formatMat3D } from '@/mat3d/modules/Codec'
import type { TextDirection } from '@/mat3d/config'

/**
 * Gives any type the fluent Mat3D operation set. Subclasses only provide `rect` and `matrix`,
 * either as fields or as accessors. Every operation mutates `matrix` in place and returns `this`.
 *
 * ```ts
 * class Sprite extends Transformable {
 *   public rect = Rect.fromLTWH(0, 0, 64, 64)
 *   public readonly matrix = mat4.create()
 * }
 * new Sprite().rotate(45).scaleX(2)
 * ```
 */
export abstract class Transformable implements Mat3DLike {
  /**
   * Bounds of the object. Its size and offset define the default pivot of
   * scale, rotate and tilt operations. Assign it to move or resize the object.
   */
  public abstract rect: Rect
  public abstract readonly matrix: Matrix4

  /** Center of `rect`, recomputed on every access. */
  public get center (): Offset {
    return this.rect.center
  }

  /** The matrix's flat storage. An alias, not a copy. */
  public get storage (): Matrix4 {
    return this.matrix
  }

  /** Transposes the matrix in place. Despite the name, entries keep their sign. */
  public negate (): this {
    operations.negate(this)
    return this
  }

  /** Adds `other`'s matrix entry by entry and grows `rect` to cover `other.rect`. */
  public add (other: Mat3DLike): this {
    operations.add(this, other)
    return this
  }

  /** Subtracts `other`'s matrix entry by entry and grows `rect` to cover `other.rect`. */
  public subtract (other: Mat3DLike): this {
    operations.subtract(this, other)
    return this
  }

  /** Right-multiplies by `other`'s matrix and grows `rect` to cover `other.rect`. */
  public multiply (other: Mat3DLike): this {
    operations.multiply(this, other)
    return this
  }

  /**
   * Translates in three dimensions. `y` defaults to `x`, `z` to 0.
   *
   * ```ts
   * new Mat3D().translate(10.5).translate(10.5) // translated by 21
   * ```
   */
  public translate (x: number, y?: number, z?: number): this {
    operations.translate(this, x, y, z)
    return this
  }

  public shift (offset: Offset, origin?: Offset): this {
    operations.shift(this, offset, origin)
    return this
  }

  public translateX (offset: number, origin?: Offset): this {
    operations.translateX(this, offset, origin)
    return this
  }

  public translateY (offset: number, origin?: Offset): this {
    operations.translateY(this, offset, origin)
    return this
  }

  public translateZ (offset: number, origin?: Offset): this {
    operations.translateZ(this, offset, origin)
    return this
  }

  public upward (offset: number, origin?: Offset): this {
    operations.upward(this, offset, origin)
    return this
  }

  public downward (offset: number, origin?: Offset): this {
    operations.downward(this, offset, origin)
    return this
  }

  /** Moves along X in the reading direction: right for `'ltr'`, left for `'rtl'`. */
  public forward (offset: number, origin?: Offset, direction?: TextDirection): this {
    operations.forward(this, offset, origin, direction)
    return this
  }

  /** Moves along X against the reading direction. */
  public backward (offset: number, origin?: Offset, direction?: TextDirection): this {
    operations.backward(this, offset, origin, direction)
    return this
  }

  public inward (offset: number, origin?: Offset): this {
    operations.inward(this, offset, origin)
    return this
  }

  public outward (offset: number, origin?: Offset): this {
    operations.outward(this, offset, origin)
    return this
  }

  /**
   * Scales around `center`, in the same frame as `rect` rather than relative to its
   * top-left corner. `y` defaults to `x`, `z` to 1.
   * Use `scaleX`, `scaleY` or `scaleZ` to scale around a custom origin.
   */
  public scale (x: number, y?: number, z?: number): this {
    operations.scale(this, x, y, z)
    return this
  }

  public scaleX (ratio: number, origin?: Offset): this {
    operations.scaleX(this, ratio, origin)
    return this
  }

  public scaleY (ratio: number, origin?: Offset): this {
    operations.scaleY(this, ratio, origin)
    return this
  }

  public scaleZ (ratio: number, origin?: Offset): this {
    operations.scaleZ(this, ratio, origin)
    return this
  }

  /** Tilts around X, then Y, then Z. Angles are in degrees. */
  public tilt (x: number, y: number, z?: number): this {
    operations.tilt(this, x, y, z)
    return this
  }

  public tiltX (degrees: number, origin?: Offset): this {
    operations.tiltX(this, degrees, origin)
    return this
  }

  public tiltY (degrees: number, origin?: Offset): this {
    operations.tiltY(this, degrees, origin)
    return this
  }

  /** Same as `rotate`. */
  public tiltZ (degrees: number, origin?: Offset): this {
    operations.tiltZ(this, degrees, origin)
    return this
  }

  /**
   * Rotates in the screen plane (around Z) by `degrees`.
   * `origin` is the pivot and defaults to the center of `rect`.
   */
  public rotate (degrees: number, origin?: Offset): this {
    operations.rotate(this, degrees, origin)
    return this
  }

  public flipX (origin?: Offset): this {
    operations.flipX(this, origin)
    return this
  }

  public flipY (origin?: Offset): this {
    operations.flipY(this, origin)
    return this
  }

  public flipZ (origin?: Offset): this {
    operations.flipZ(this, origin)
    return this
  }

  public toString (): string {
    return formatMat3D(this)
  }
}
