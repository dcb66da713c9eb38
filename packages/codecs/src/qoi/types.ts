/**
 * QOI (Quite OK Image) format types and constants
 * https://qoiformat.org/qoi-specification.pdf
 */

import type { Pixel } from '@qoippm/core'

// Magic bytes "qoif"
export const QOI_MAGIC = 0x716f6966

export const QOI_HEADER_SIZE = 14

// Largest image accepted, in pixels
export const QOI_PIXELS_MAX = 400_000_000

// Op codes
export const QOI_OP_RGB = 0xfe
export const QOI_OP_RGBA = 0xff
export const QOI_OP_INDEX = 0x00 // 00xxxxxx
export const QOI_OP_DIFF = 0x40 // 01xxxxxx
export const QOI_OP_LUMA = 0x80 // 10xxxxxx
export const QOI_OP_RUN = 0xc0 // 11xxxxxx

// Masks
export const QOI_MASK_2 = 0xc0
export const QOI_MASK_6 = 0x3f

// Biases
export const QOI_DIFF_BIAS = 2
export const QOI_LUMA_GREEN_BIAS = 32
export const QOI_LUMA_RB_BIAS = 8
export const QOI_RUN_BIAS = 1

export const QOI_CACHE_SIZE = 64

// Color space
export enum QoiColorSpace {
	SRGB = 0,
	Linear = 1,
}

// Channels
export enum QoiChannels {
	RGB = 3,
	RGBA = 4,
}

/**
 * QOI header structure (14 bytes)
 *
 * `channels` and `colorspace` are informative only and kept as read.
 */
export interface QoiHeader {
	magic: number // "qoif"
	width: number // 32-bit big-endian
	height: number // 32-bit big-endian
	channels: number // 3 = RGB, 4 = RGBA
	colorspace: number // 0 = sRGB, 1 = linear
}

/**
 * Chunk operations
 */
export type QoiOp = 'rgb' | 'rgba' | 'index' | 'diff' | 'luma' | 'run'

export const QOI_START_PIXEL: Pixel = { r: 0, g: 0, b: 0, a: 255 }

/**
 * Calculate hash index for pixel
 */
export function qoiHash(pixel: Pixel): number {
	return (pixel.r * 3 + pixel.g * 5 + pixel.b * 7 + pixel.a * 11) % QOI_CACHE_SIZE
}
