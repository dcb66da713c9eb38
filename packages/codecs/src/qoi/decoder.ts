import { PixelGrid, type Pixel, isOctet, wrap8 } from '@qoippm/core'
import { QoiPixelCache } from './cache'
import { QoiDecodeError, QoiTruncatedError, QoiUnknownChunkError } from './errors'
import { readQoiHeader } from './header'
import {
	QOI_DIFF_BIAS,
	QOI_HEADER_SIZE,
	QOI_LUMA_GREEN_BIAS,
	QOI_LUMA_RB_BIAS,
	QOI_MASK_2,
	QOI_MASK_6,
	QOI_OP_DIFF,
	QOI_OP_INDEX,
	QOI_OP_LUMA,
	QOI_OP_RGB,
	QOI_OP_RGBA,
	QOI_OP_RUN,
	QOI_RUN_BIAS,
	QOI_START_PIXEL,
	type QoiOp,
} from './types'

/**
 * Classify a tag byte. Full-byte RGB/RGBA tags take priority over the
 * 2-bit prefixes; anything that is not an octet has no operation.
 */
export function classifyTag(byte: number): QoiOp | undefined {
	if (!isOctet(byte)) return undefined
	if (byte === QOI_OP_RGB) return 'rgb'
	if (byte === QOI_OP_RGBA) return 'rgba'

	switch (byte & QOI_MASK_2) {
		case QOI_OP_INDEX:
			return 'index'
		case QOI_OP_DIFF:
			return 'diff'
		case QOI_OP_LUMA:
			return 'luma'
		case QOI_OP_RUN:
			return 'run'
		default:
			return undefined
	}
}

/**
 * Chunk stream reader with truncation checks
 */
class QoiReader {
	constructor(
		private readonly data: ArrayLike<number>,
		public offset: number
	) {}

	readTag(row: number, col: number): number {
		this.require(1, row, col)
		return this.data[this.offset++] ?? 0
	}

	readOperands(count: number, row: number, col: number): number[] {
		this.require(count, row, col)
		const values: number[] = []
		for (let i = 0; i < count; i++) {
			const value = this.data[this.offset] ?? 0
			if (!isOctet(value)) {
				throw new QoiDecodeError(`non-octet value ${value} at offset ${this.offset}`)
			}
			values.push(value)
			this.offset++
		}
		return values
	}

	private require(count: number, row: number, col: number): void {
		const missing = this.offset + count - this.data.length
		if (missing > 0) {
			throw new QoiTruncatedError(this.offset, missing, row, col)
		}
	}
}

/**
 * Step-wise QOI chunk decoder.
 *
 * Each call to `next()` fills exactly one grid position in row-major order,
 * either from a pending run or from the next chunk in the stream.
 */
export class QoiChunkDecoder {
	readonly grid: PixelGrid
	readonly cache = new QoiPixelCache()

	private readonly reader: QoiReader
	private lastPixel: Pixel = QOI_START_PIXEL
	private run = 0
	private position = 0

	constructor(stream: ArrayLike<number>, width: number, height: number, offset = 0) {
		this.grid = new PixelGrid(width, height)
		this.reader = new QoiReader(stream, offset)
	}

	/** Most recently produced pixel */
	get last(): Pixel {
		return this.lastPixel
	}

	/** Read offset into the stream */
	get offset(): number {
		return this.reader.offset
	}

	/** Repeats still owed by the current run */
	get pendingRun(): number {
		return this.run
	}

	get done(): boolean {
		return this.position >= this.grid.size
	}

	get row(): number {
		return Math.floor(this.position / this.grid.width)
	}

	get col(): number {
		return this.position % this.grid.width
	}

	/**
	 * Decode the pixel at the current position and advance
	 */
	next(): Pixel {
		if (this.done) {
			throw new RangeError('QOI decode already complete')
		}

		const { row, col } = this
		let pixel: Pixel

		if (this.run > 0) {
			pixel = this.lastPixel
			this.run--
		} else {
			pixel = this.readChunk(row, col)
		}

		this.grid.set(row, col, pixel)
		this.lastPixel = pixel
		this.position++
		return pixel
	}

	/**
	 * Decode until every grid position is written
	 */
	decodeAll(): PixelGrid {
		while (!this.done) {
			this.next()
		}
		return this.grid
	}

	private readChunk(row: number, col: number): Pixel {
		const tagOffset = this.reader.offset
		const byte = this.reader.readTag(row, col)
		const prev = this.lastPixel

		switch (classifyTag(byte)) {
			case 'rgb': {
				const [r = 0, g = 0, b = 0] = this.reader.readOperands(3, row, col)
				return this.store({ r, g, b, a: prev.a })
			}
			case 'rgba': {
				const [r = 0, g = 0, b = 0, a = 0] = this.reader.readOperands(4, row, col)
				return this.store({ r, g, b, a })
			}
			case 'index':
				return this.cache.get(byte & QOI_MASK_6)
			case 'diff': {
				const dr = ((byte >> 4) & 0x03) - QOI_DIFF_BIAS
				const dg = ((byte >> 2) & 0x03) - QOI_DIFF_BIAS
				const db = (byte & 0x03) - QOI_DIFF_BIAS
				return this.store({
					r: wrap8(prev.r + dr),
					g: wrap8(prev.g + dg),
					b: wrap8(prev.b + db),
					a: prev.a,
				})
			}
			case 'luma': {
				const [byte2 = 0] = this.reader.readOperands(1, row, col)
				const dg = (byte & QOI_MASK_6) - QOI_LUMA_GREEN_BIAS
				const drDg = ((byte2 >> 4) & 0x0f) - QOI_LUMA_RB_BIAS
				const dbDg = (byte2 & 0x0f) - QOI_LUMA_RB_BIAS
				return this.store({
					r: wrap8(prev.r + drDg + dg),
					g: wrap8(prev.g + dg),
					b: wrap8(prev.b + dbDg + dg),
					a: prev.a,
				})
			}
			case 'run':
				// First repeat is emitted now
				this.run = (byte & QOI_MASK_6) + QOI_RUN_BIAS - 1
				return prev
			default:
				throw new QoiUnknownChunkError(byte, tagOffset, row, col)
		}
	}

	private store(pixel: Pixel): Pixel {
		this.cache.record(pixel)
		return pixel
	}
}

/**
 * Decode a headerless chunk stream into a width x height grid
 */
export function decodeQoiChunks(
	stream: ArrayLike<number>,
	width: number,
	height: number,
	offset = 0
): PixelGrid {
	return new QoiChunkDecoder(stream, width, height, offset).decodeAll()
}

/**
 * Decode a QOI file
 */
export function decodeQoi(data: Uint8Array): PixelGrid {
	const { width, height } = readQoiHeader(data)
	return decodeQoiChunks(data, width, height, QOI_HEADER_SIZE)
}
