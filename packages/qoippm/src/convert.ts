import type { OutputFormat } from '@qoippm/core'
import { loadImage, saveImage } from './image'

/**
 * Conversion options
 */
export interface ConvertOptions {
	/** Output format, defaults to ppm */
	format?: OutputFormat
}

/**
 * Decode a QOI image and re-encode it as a Netpbm image
 */
export function convert(input: Uint8Array, options: ConvertOptions = {}): Uint8Array {
	const image = loadImage(input)
	return saveImage(image, options.format ?? 'ppm')
}
