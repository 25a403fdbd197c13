/**
 * Command-line argument parsing
 */

export type OutputFormat = 'json' | 'preview'

export const FIELD_FLAGS = ['x1', 'y1', 'x2', 'y2', 'x3', 'y3', 'x4', 'y4', 'r'] as const

export type FieldFlag = (typeof FIELD_FLAGS)[number]

export interface CliOptions {
	// Geometry
	fields: Partial<Record<FieldFlag, number>>

	// Output
	format: OutputFormat
	out?: string

	// Flags
	time?: boolean
	quiet?: boolean

	// Commands
	list?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	algorithm?: string
	options: CliOptions
}

function isFieldFlag(name: string): name is FieldFlag {
	return FIELD_FLAGS.some((f) => f === name)
}

function parseInteger(flag: string, value: string | undefined): number {
	if (value === undefined) {
		throw new Error(`Missing value for ${flag}`)
	}
	if (!/^-?\d+$/.test(value)) {
		throw new Error(`Invalid integer for ${flag}: ${value}`)
	}
	return Number.parseInt(value, 10)
}

function requireValue(flag: string, value: string | undefined): string {
	if (value === undefined) {
		throw new Error(`Missing value for ${flag}`)
	}
	return value
}

/**
 * Parse argv (without the node and script entries).
 * Throws on unknown options and malformed numbers.
 */
export function parseArgs(args: string[]): ParsedArgs {
	const options: CliOptions = { fields: {}, format: 'json' }
	let algorithm: string | undefined

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? ''
		const field = arg.slice(2)

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--list' || arg === '-l') {
			options.list = true
		} else if (arg === '--time') {
			options.time = true
		} else if (arg === '--quiet' || arg === '-q') {
			options.quiet = true
		} else if (arg === '--preview' || arg === '-p') {
			options.format = 'preview'
		} else if (arg === '--format' || arg === '-f') {
			const value = requireValue(arg, args[++i])
			if (value !== 'json' && value !== 'preview') {
				throw new Error(`Unknown format: ${value} (expected json or preview)`)
			}
			options.format = value
		} else if (arg === '--out' || arg === '-o') {
			options.out = requireValue(arg, args[++i])
		} else if (arg.startsWith('--') && isFieldFlag(field)) {
			options.fields[field] = parseInteger(arg, args[++i])
		} else if (!arg.startsWith('-') && algorithm === undefined) {
			algorithm = arg
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}
	}

	return { algorithm, options }
}
