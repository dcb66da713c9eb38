export { PamCodec, PpmCodec } from './codec'
export { encodePam, encodePpm } from './encoder'
export * from './types'
