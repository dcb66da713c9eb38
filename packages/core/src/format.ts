import type { Format, InputFormat, OutputFormat } from './types'

interface Magic {
	bytes: number[]
}

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES = {
	qoi: { bytes: [0x71, 0x6f, 0x69, 0x66] }, // "qoif"
	ppm_binary: { bytes: [0x50, 0x36] }, // "P6"
	ppm_ascii: { bytes: [0x50, 0x33] }, // "P3"
	pam: { bytes: [0x50, 0x37] }, // "P7"
} satisfies Record<string, Magic>

const INPUT_FORMATS: ReadonlySet<string> = new Set<InputFormat>(['qoi'])

const OUTPUT_FORMATS: ReadonlySet<string> = new Set<OutputFormat>(['ppm', 'pam'])

const MIME_TYPES: Record<Format, string> = {
	qoi: 'image/qoi',
	ppm: 'image/x-portable-pixmap',
	pam: 'image/x-portable-arbitrarymap',
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: Magic): boolean {
	if (data.length < magic.bytes.length) return false

	return magic.bytes.every((expected, i) => data[i] === expected)
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): Format | null {
	if (matchMagic(data, MAGIC_BYTES.qoi)) return 'qoi'
	if (matchMagic(data, MAGIC_BYTES.ppm_binary) || matchMagic(data, MAGIC_BYTES.ppm_ascii)) return 'ppm'
	if (matchMagic(data, MAGIC_BYTES.pam)) return 'pam'
	return null
}

/**
 * Check if format can be decoded
 */
export function isInputFormat(format: string): format is InputFormat {
	return INPUT_FORMATS.has(format)
}

/**
 * Check if format can be encoded
 */
export function isOutputFormat(format: string): format is OutputFormat {
	return OUTPUT_FORMATS.has(format)
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: Format): string {
	return MIME_TYPES[format]
}
