import { QoiHeaderError } from './errors'
import { QOI_HEADER_SIZE, QOI_MAGIC, QOI_PIXELS_MAX, type QoiHeader } from './types'

/**
 * Read and validate the QOI header
 */
export function readQoiHeader(data: Uint8Array): QoiHeader {
	if (data.length < QOI_HEADER_SIZE) {
		throw new QoiHeaderError('too small')
	}

	const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	const magic = view.getUint32(0)

	if (magic !== QOI_MAGIC) {
		throw new QoiHeaderError('bad magic')
	}

	const header: QoiHeader = {
		magic,
		width: view.getUint32(4),
		height: view.getUint32(8),
		channels: view.getUint8(12),
		colorspace: view.getUint8(13),
	}

	if (header.width === 0 || header.height === 0) {
		throw new QoiHeaderError(`bad dimensions ${header.width}x${header.height}`)
	}

	if (header.width * header.height > QOI_PIXELS_MAX) {
		throw new QoiHeaderError(`image too large (${header.width}x${header.height})`)
	}

	return header
}
