export * from './format'
export { PixelGrid } from './grid'
export { isOctet, pixelsEqual, wrap8 } from './pixel'
export type * from './types'
