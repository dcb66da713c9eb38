import type { ImageData, ImageEncoder } from '@qoippm/core'
import { encodePam, encodePpm } from './encoder'

/**
 * PPM (Portable Pixmap) writer - RGB, alpha dropped
 */
export const PpmCodec: ImageEncoder = {
	encode(image: ImageData): Uint8Array {
		return encodePpm(image)
	},
}

/**
 * PAM (Portable Arbitrary Map) writer - RGBA
 */
export const PamCodec: ImageEncoder = {
	encode(image: ImageData): Uint8Array {
		return encodePam(image)
	},
}
