export { Mat3D } from '@/mat3d/modules/Mat3D'
export { Mat3DBase } from '@/mat3d/modules/Mat3DBase'
export { Transformable } from '@/mat3d/modules/Transformable'
export { Rect } from '@/mat3d/modules/Rect'
export type { Offset } from '@/mat3d/modules/Rect'
export * as operations from '@/mat3d/modules/Operations'
export type { Mat3DLike, Matrix4, ReadonlyMatrix4 } from '@/mat3d/modules/Operations'
export { formatMat3D, parseMat3D } from '@/mat3d/modules/Codec'
export type { ParsedMat3D } from '@/mat3d/modules/Codec'
export { Mat3DTween, interpolate } from '@/mat3d/modules/Tween'
export type { EaseFunction, Mat3DTweenConfigInterface, TextDirection } from '@/mat3d/config'
export { MAT3D_PREFIX, defaultTextDirection } from '@/mat3d/variables'
