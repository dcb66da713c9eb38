/**
 * qoippm - QOI to PPM/PAM conversion
 */

// Re-export core types and utilities
export * from '@qoippm/core'

// Re-export codecs
export * from '@qoippm/codecs'

// Main API
export { type ConvertOptions, convert } from './convert'
export { loadImage, saveImage } from './image'
