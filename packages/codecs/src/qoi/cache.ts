import type { Pixel } from '@qoippm/core'
import { QOI_CACHE_SIZE, qoiHash } from './types'

/**
 * Running array of previously seen pixels, indexed by `qoiHash`.
 * Collisions overwrite the slot.
 */
export class QoiPixelCache {
	private readonly slots = new Uint8Array(QOI_CACHE_SIZE * 4)

	get(index: number): Pixel {
		if (!Number.isInteger(index) || index < 0 || index >= QOI_CACHE_SIZE) {
			throw new RangeError(`Cache index out of range: ${index}`)
		}
		const i = index * 4
		return {
			r: this.slots[i] ?? 0,
			g: this.slots[i + 1] ?? 0,
			b: this.slots[i + 2] ?? 0,
			a: this.slots[i + 3] ?? 0,
		}
	}

	/**
	 * Store pixel in its hash slot and return the slot index
	 */
	record(pixel: Pixel): number {
		const index = qoiHash(pixel)
		const i = index * 4
		this.slots[i] = pixel.r
		this.slots[i + 1] = pixel.g
		this.slots[i + 2] = pixel.b
		this.slots[i + 3] = pixel.a
		return index
	}
}
