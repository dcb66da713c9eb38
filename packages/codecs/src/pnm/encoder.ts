import type { ImageData } from '@qoippm/core'
import { PAM_TUPLTYPE, PNM_MAXVAL, PnmFormat } from './types'

/**
 * Encode ImageData to PPM (P6 binary format)
 */
export function encodePpm(image: ImageData): Uint8Array {
	const { width, height, data } = image

	// Create header
	const header = `${PnmFormat.PPM_BINARY}\n${width} ${height}\n${PNM_MAXVAL}\n`
	const headerBytes = new TextEncoder().encode(header)
	assertPixelData(data, width * height * 4)

	// RGB only, alpha dropped
	const output = new Uint8Array(headerBytes.length + width * height * 3)
	output.set(headerBytes, 0)

	let dstIdx = headerBytes.length
	for (let srcIdx = 0; srcIdx < width * height * 4; srcIdx += 4) {
		output[dstIdx++] = data[srcIdx] ?? 0 // R
		output[dstIdx++] = data[srcIdx + 1] ?? 0 // G
		output[dstIdx++] = data[srcIdx + 2] ?? 0 // B
	}

	return output
}

/**
 * Encode ImageData to PAM (P7, RGB_ALPHA)
 */
export function encodePam(image: ImageData): Uint8Array {
	const { width, height, data } = image

	const header = `${[
		PnmFormat.PAM,
		`WIDTH ${width}`,
		`HEIGHT ${height}`,
		'DEPTH 4',
		`MAXVAL ${PNM_MAXVAL}`,
		`TUPLTYPE ${PAM_TUPLTYPE}`,
		'ENDHDR',
	].join('\n')}\n`

	const headerBytes = new TextEncoder().encode(header)
	const pixelSize = width * height * 4
	assertPixelData(data, pixelSize)

	const output = new Uint8Array(headerBytes.length + pixelSize)
	output.set(headerBytes, 0)
	output.set(data.subarray(0, pixelSize), headerBytes.length)

	return output
}

function assertPixelData(data: Uint8Array, expected: number): void {
	if (data.length < expected) {
		throw new Error(`Image data too short: ${data.length} < ${expected}`)
	}
}
