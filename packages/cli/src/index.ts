#!/usr/bin/env tsx
/**
 * qoippm CLI - QOI to PPM/PAM converter
 */

import { run } from './cli'

function main(): void {
	process.exitCode = run(process.argv.slice(2))
}

try {
	main()
} catch (err) {
	console.error('Fatal error:', err)
	process.exitCode = 1
}
