/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * RGBA pixel, each channel an 8-bit unsigned value
 */
export interface Pixel {
	readonly r: number
	readonly g: number
	readonly b: number
	readonly a: number
}

/**
 * Formats this toolchain can decode
 */
export type InputFormat = 'qoi'

/**
 * Formats this toolchain can encode
 */
export type OutputFormat = 'ppm' | 'pam'

/**
 * Any recognized format
 */
export type Format = InputFormat | OutputFormat

/**
 * Codec interface for decoding and, where supported, encoding
 */
export interface Codec<T = ImageData> {
	decode(data: Uint8Array): T
	encode?(input: T): Uint8Array
}

/**
 * Image encoder (writers that have no decoder)
 */
export interface ImageEncoder {
	encode(image: ImageData): Uint8Array
}
