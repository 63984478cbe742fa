import type { Mat3DLike } from '@/mat3d/modules/Operations'

/**
 * Reading direction used by `forward` and `backward` to decide which way along
 * the X axis counts as "forward".
 */
export type TextDirection = 'ltr' | 'rtl'

export type EaseFunction = (normalizedTime: number) => number

export interface Mat3DTweenConfigInterface {
  /**
   * State returned at `t = 0`. Can be left unset and filled in later,
   * but must be set before the tween is evaluated.
   */
  begin?: Mat3DLike;
  /**
   * State returned at `t = 1`. Can be left unset and filled in later,
   * but must be set before the tween is evaluated.
   */
  end?: Mat3DLike;
  /**
   * Easing applied by `transform` before interpolating.
   * Default value: `easeLinear` from `d3-ease`
   */
  ease?: EaseFunction;
}
