import { describe, expect, test } from 'vitest'
import { PamCodec, PpmCodec } from './codec'
import { encodePam, encodePpm } from './encoder'

describe('PNM writers', () => {
	const image = {
		width: 2,
		height: 1,
		data: new Uint8Array([255, 128, 64, 10, 1, 2, 3, 0]),
	}

	describe('PPM', () => {
		test('writes P6 header and RGB bytes', () => {
			const encoded = encodePpm(image)
			const header = 'P6\n2 1\n255\n'
			expect(new TextDecoder().decode(encoded.slice(0, header.length))).toBe(header)
			expect(Array.from(encoded.slice(header.length))).toEqual([255, 128, 64, 1, 2, 3])
		})

		test('output length is header plus 3 bytes per pixel', () => {
			const big = { width: 16, height: 8, data: new Uint8Array(16 * 8 * 4) }
			const encoded = PpmCodec.encode(big)
			expect(encoded.length).toBe('P6\n16 8\n255\n'.length + 16 * 8 * 3)
		})

		test('rejects short data', () => {
			expect(() => encodePpm({ width: 1, height: 1, data: new Uint8Array(3) })).toThrow(
				'Image data too short: 3 < 4'
			)
		})
	})

	describe('PAM', () => {
		test('writes P7 header and RGBA bytes', () => {
			const encoded = encodePam(image)
			const header = 'P7\nWIDTH 2\nHEIGHT 1\nDEPTH 4\nMAXVAL 255\nTUPLTYPE RGB_ALPHA\nENDHDR\n'
			expect(new TextDecoder().decode(encoded.slice(0, header.length))).toBe(header)
			expect(Array.from(encoded.slice(header.length))).toEqual([255, 128, 64, 10, 1, 2, 3, 0])
		})

		test('PamCodec rejects short data', () => {
			expect(() => PamCodec.encode({ width: 2, height: 2, data: new Uint8Array(4) })).toThrow(
				'Image data too short: 4 < 16'
			)
		})
	})
})
