import type { ImageData, Pixel } from './types'

/**
 * Fixed-size row-major RGBA pixel grid over one contiguous buffer.
 *
 * Coordinates are (row, col); the pixel at (row, col) lives at byte offset
 * `(row * width + col) * 4`. Every access is bounds-checked.
 */
export class PixelGrid implements ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array

	constructor(width: number, height: number) {
		if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
			throw new RangeError(`Invalid grid dimensions: ${width}x${height}`)
		}
		this.width = width
		this.height = height
		this.data = new Uint8Array(width * height * 4)
	}

	get size(): number {
		return this.width * this.height
	}

	get(row: number, col: number): Pixel {
		const idx = this.offsetOf(row, col)
		const { data } = this
		return {
			r: data[idx] ?? 0,
			g: data[idx + 1] ?? 0,
			b: data[idx + 2] ?? 0,
			a: data[idx + 3] ?? 0,
		}
	}

	set(row: number, col: number, pixel: Pixel): void {
		const idx = this.offsetOf(row, col)
		// Uint8Array stores modulo 256
		this.data[idx] = pixel.r
		this.data[idx + 1] = pixel.g
		this.data[idx + 2] = pixel.b
		this.data[idx + 3] = pixel.a
	}

	private offsetOf(row: number, col: number): number {
		if (
			!Number.isInteger(row) ||
			!Number.isInteger(col) ||
			row < 0 ||
			col < 0 ||
			row >= this.height ||
			col >= this.width
		) {
			throw new RangeError(`Pixel (${row}, ${col}) is outside ${this.width}x${this.height} grid`)
		}
		return (row * this.width + col) * 4
	}
}
