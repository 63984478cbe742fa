import { easeLinear } from 'd3-ease'
import type { TextDirection } from '@/mat3d/config'

export const MAT3D_PREFIX = 'Mat3D'
export const MATRIX_SIZE = 16

export const defaultTextDirection: TextDirection = 'ltr'
export const defaultEase = easeLinear

/** Degrees used by the flip operations. */
export const FLIP_DEGREES = 180
