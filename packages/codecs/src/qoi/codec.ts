import type { Codec, ImageData } from '@qoippm/core'
import { decodeQoi } from './decoder'

/**
 * QOI (Quite OK Image) codec, decode only
 */
export const QoiCodec: Codec = {
	decode(data: Uint8Array): ImageData {
		return decodeQoi(data)
	},
}
