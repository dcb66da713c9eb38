import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { basename, dirname } from 'node:path'
import { QoiChannels, QoiColorSpace, readQoiHeader } from '@qoippm/codecs'
import { detectFormat, getMimeType } from '@qoippm/core'
import { loadImage, saveImage } from 'qoippm'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CliOptions {
	// Output
	out?: string
	pam?: boolean
	force?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean

	// Commands
	info?: boolean
	help?: boolean
	version?: boolean
}

/**
 * Process boundary, replaced in tests
 */
export interface CliIo {
	readonly stdoutIsTTY: boolean
	readFile(path: string): Uint8Array
	writeFile(path: string, data: Uint8Array): void
	writeStdout(data: Uint8Array): void
}

// Input path that reads from stdin
export const STDIN_PATH = '-'

export const nodeIo: CliIo = {
	get stdoutIsTTY() {
		return process.stdout.isTTY === true
	},
	readFile(path) {
		// fd 0 is stdin
		return new Uint8Array(path === STDIN_PATH ? readFileSync(0) : readFileSync(path))
	},
	writeFile(path, data) {
		const outDir = dirname(path)
		if (!existsSync(outDir)) {
			mkdirSync(outDir, { recursive: true })
		}
		writeFileSync(path, data)
	},
	writeStdout(data) {
		process.stdout.write(data)
	},
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_TERMINAL = 2

export const USAGE = 'Usage: qoippm [-f] [-o <file>] [--pam] <file.qoi | ->'

const HELP = `
qoippm - Decode QOI images to PPM/PAM

${USAGE}

OPTIONS:
  -f, --force           Write binary output even when stdout is a terminal
  -o, --out <file>      Write to a file instead of stdout
  --pam                 Write PAM (RGBA) instead of PPM (RGB)
  -i, --info            Show QOI header info
  -v, --verbose         Verbose output (stderr)
  --quiet               Suppress messages other than errors
  --help                Show this help
  --version             Show version

EXAMPLES:
  qoippm -f dice.qoi > dice.ppm
  qoippm dice.qoi -o dice.ppm
  qoippm --pam dice.qoi -o dice.pam
  qoippm --info dice.qoi
  cat dice.qoi | qoippm -o dice.ppm -
`

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

export function parseArgs(args: readonly string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i] ?? ''

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--info' || arg === '-i') {
			options.info = true
		} else if (arg === '--force' || arg === '-f') {
			options.force = true
		} else if (arg === '--pam') {
			options.pam = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--out' || arg === '-o') {
			const value = args[i + 1]
			if (value === undefined) {
				throw new Error(`Missing value for ${arg}`)
			}
			options.out = value
			i++
		} else if (!arg.startsWith('-') || arg === STDIN_PATH) {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

function describeChannels(channels: number): string {
	if (channels === QoiChannels.RGB) return 'RGB'
	if (channels === QoiChannels.RGBA) return 'RGBA'
	return 'unknown'
}

function describeColorSpace(colorspace: number): string {
	if (colorspace === QoiColorSpace.SRGB) return 'sRGB'
	if (colorspace === QoiColorSpace.Linear) return 'linear'
	return 'unknown'
}

function showInfo(input: string, data: Uint8Array): number {
	const format = detectFormat(data)

	console.log(`Source: ${input}`)
	console.log(`Size: ${formatBytes(data.length)}`)
	console.log(`Format: ${format ?? 'unknown'}`)

	if (format !== 'qoi') {
		return format ? EXIT_OK : EXIT_FAILURE
	}

	const header = readQoiHeader(data)
	console.log(`MIME: ${getMimeType(format)}`)
	console.log(`Dimensions: ${header.width} x ${header.height}`)
	console.log(`Channels: ${header.channels} (${describeChannels(header.channels)})`)
	console.log(`Colorspace: ${header.colorspace} (${describeColorSpace(header.colorspace)})`)
	return EXIT_OK
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and return its exit code
 */
export function run(args: readonly string[], io: CliIo = nodeIo): number {
	let parsed: { inputs: string[]; options: CliOptions }
	try {
		parsed = parseArgs(args)
	} catch (err) {
		console.error(errorMessage(err))
		console.error(USAGE)
		return EXIT_FAILURE
	}

	const { inputs, options } = parsed
	const log = (message: string): void => {
		if (!options.quiet) console.error(message)
	}
	const debug = (message: string): void => {
		if (options.verbose && !options.quiet) console.error(message)
	}

	if (options.help) {
		console.log(HELP)
		return EXIT_OK
	}

	if (options.version) {
		console.log(`qoippm v${VERSION}`)
		return EXIT_OK
	}

	// Last positional argument is the input
	const input = inputs[inputs.length - 1]
	if (input === undefined) {
		console.error(USAGE)
		return EXIT_FAILURE
	}

	if (!options.info && !options.out && io.stdoutIsTTY && !options.force) {
		console.error('Refusing to write binary image data to a terminal, pass -f to override!')
		return EXIT_TERMINAL
	}

	let data: Uint8Array
	try {
		data = io.readFile(input)
	} catch (err) {
		console.error(`Cannot read ${input}: ${errorMessage(err)}`)
		return EXIT_FAILURE
	}

	try {
		if (options.info) {
			return showInfo(input, data)
		}

		const format = options.pam ? 'pam' : 'ppm'
		debug(`Decoding: ${input} (${formatBytes(data.length)})`)

		const image = loadImage(data)
		debug(`Decoded: ${image.width} x ${image.height}`)

		const result = saveImage(image, format)

		if (options.out) {
			io.writeFile(options.out, result)
			log(`${basename(input)} → ${basename(options.out)}`)
		} else {
			io.writeStdout(result)
		}
		debug(`Wrote: ${formatBytes(result.length)} (${format})`)

		return EXIT_OK
	} catch (err) {
		console.error(`Error: ${errorMessage(err)}`)
		return EXIT_FAILURE
	}
}
