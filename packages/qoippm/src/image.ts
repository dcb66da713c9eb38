import { PamCodec, PpmCodec, QoiCodec } from '@qoippm/codecs'
import type { Codec, ImageData, ImageEncoder, InputFormat, OutputFormat } from '@qoippm/core'
import { detectFormat, isInputFormat, isOutputFormat } from '@qoippm/core'

/**
 * Registry of available decoders
 */
const decoders: Record<InputFormat, Codec> = {
	qoi: QoiCodec,
}

/**
 * Registry of available encoders
 */
const encoders: Record<OutputFormat, ImageEncoder> = {
	ppm: PpmCodec,
	pam: PamCodec,
}

/**
 * Load image from binary data
 */
export function loadImage(data: Uint8Array): ImageData {
	const format = detectFormat(data)

	if (!format) {
		throw new Error('Unknown image format')
	}

	if (!isInputFormat(format)) {
		throw new Error(`Unsupported input format: ${format}`)
	}

	return decoders[format].decode(data)
}

/**
 * Save image to binary data
 */
export function saveImage(image: ImageData, format: string): Uint8Array {
	if (!isOutputFormat(format)) {
		throw new Error(`Unsupported output format: ${format}`)
	}

	return encoders[format].encode(image)
}
