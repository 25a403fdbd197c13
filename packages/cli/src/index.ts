#!/usr/bin/env node
import { writeFileSync } from 'node:fs'
import { run } from './run'

try {
	process.exitCode = run(process.argv.slice(2), {
		stdout: (line) => console.log(line),
		stderr: (line) => console.error(line),
		writeFile: (path, data) => writeFileSync(path, data),
	})
} catch (err) {
	console.error('Fatal error:', err)
	process.exitCode = 1
}
