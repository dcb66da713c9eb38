export { QoiPixelCache } from './cache'
export { QoiCodec } from './codec'
export { QoiChunkDecoder, classifyTag, decodeQoi, decodeQoiChunks } from './decoder'
export * from './errors'
export { readQoiHeader } from './header'
export * from './types'
