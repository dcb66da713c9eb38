/**
 * QOI decoder and Netpbm writers
 */

export * from './pnm'
export * from './qoi'
