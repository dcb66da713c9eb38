/**
 * PNM (Portable Any Map) output types
 */

export enum PnmFormat {
	PPM_BINARY = 'P6', // Portable Pixmap Binary
	PAM = 'P7', // Portable Arbitrary Map
}

export const PNM_MAXVAL = 255

/**
 * Tuple type written to PAM headers
 */
export const PAM_TUPLTYPE = 'RGB_ALPHA'
