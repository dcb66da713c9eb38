import type { Pixel } from './types'

/**
 * Reduce an integer to its 8-bit unsigned value (two's complement modulo 256)
 */
export function wrap8(value: number): number {
	return value & 0xff
}

/**
 * Compare two pixels for equality
 */
export function pixelsEqual(a: Pixel, b: Pixel): boolean {
	return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a
}

/**
 * Check that a value is an integer in 0..255
 */
export function isOctet(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= 0xff
}
