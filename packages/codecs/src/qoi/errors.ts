/**
 * Base class for every QOI decode failure
 */
export class QoiDecodeError extends Error {
	constructor(message: string) {
		super(`Invalid QOI: ${message}`)
		this.name = 'QoiDecodeError'
	}
}

/**
 * Malformed 14-byte header
 */
export class QoiHeaderError extends QoiDecodeError {
	constructor(message: string) {
		super(message)
		this.name = 'QoiHeaderError'
	}
}

/**
 * Stream ended before the current chunk was complete
 */
export class QoiTruncatedError extends QoiDecodeError {
	constructor(
		readonly offset: number,
		readonly needed: number,
		readonly row: number,
		readonly col: number
	) {
		super(
			`stream truncated at offset ${offset} (${needed} more byte${needed === 1 ? '' : 's'} needed) at row ${row}, column ${col}`
		)
		this.name = 'QoiTruncatedError'
	}
}

/**
 * Tag byte outside the six chunk operations
 */
export class QoiUnknownChunkError extends QoiDecodeError {
	constructor(
		readonly byte: number,
		readonly offset: number,
		readonly row: number,
		readonly col: number
	) {
		super(`unknown chunk with starting byte ${byte} at row ${row}, column ${col}`)
		this.name = 'QoiUnknownChunkError'
	}
}
