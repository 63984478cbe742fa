import { interpolateNumberArray } from 'd3-interpolate'
import { Mat3D } from '@/mat3d/modules/Mat3D'
import type { Mat3DLike } from '@/mat3d/modules/Operations'
import { formatMat3D } from '@/mat3d/modules/Codec'
import type { EaseFunction, Mat3DTweenConfigInterface } from '@/mat3d/config'
import { defaultEase } from '@/mat3d/variables'
import { assertMatrixSize } from '@/mat3d/helper'

const describe = (state: Mat3DLike | undefined): string => (state ? formatMat3D(state) : 'unset')

/**
 * Interpolates every matrix entry of `begin` and `end` independently at `t`.
 * `t = 0` yields `begin`'s matrix, `t = 1` yields `end`'s, values outside [0, 1] extrapolate.
 * The rectangle is not interpolated: the result is a new state with `Rect.zero`.
 */
export function interpolate (begin: Mat3DLike, end: Mat3DLike, t: number): Mat3D {
  assertMatrixSize(begin.matrix)
  assertMatrixSize(end.matrix)
  const storage = interpolateNumberArray(Float64Array.from(begin.matrix), Float64Array.from(end.matrix))(t)
  return new Mat3D(storage)
}

/**
 * A linear interpolation between a beginning and an ending state.
 *
 * `begin` and `end` may be left unset at construction and filled in later,
 * but both must be set before the tween is evaluated.
 *
 * ```ts
 * const tween = new Mat3DTween({
 *   begin: new Mat3D().scale(0.3),
 *   end: new Mat3D().translate(50),
 *   ease: easeCubicInOut,
 * })
 * const frame = tween.transform(elapsed / duration)
 * ```
 */
export class Mat3DTween {
  public begin: Mat3DLike | undefined
  public end: Mat3DLike | undefined
  public ease: EaseFunction

  public constructor (config: Mat3DTweenConfigInterface = {}) {
    this.begin = config.begin
    this.end = config.end
    this.ease = config.ease ?? defaultEase
  }

  /** Interpolates at the raw fraction `t`, without easing. */
  public lerp (t: number): Mat3D {
    const { begin, end } = this
    if (!begin || !end) {
      throw new Error(`Mat3DTween needs both begin and end before it is evaluated (begin: ${describe(begin)}, end: ${describe(end)})`)
    }
    return interpolate(begin, end, t)
  }

  /** Eases `t` and interpolates at the eased fraction. */
  public transform (t: number): Mat3D {
    return this.lerp(this.ease(t))
  }

  public toString (): string {
    return `Mat3DTween(${describe(this.begin)} → ${describe(this.end)})`
  }
}
