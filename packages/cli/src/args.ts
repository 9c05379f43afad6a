/**
 * mailguard-config - Argument Parsing
 *
 * Splits argv into a command, positional arguments and typed flags.
 */

import { Data, Either } from "effect"

/**
 * Error for malformed command lines: unknown options, missing or
 * non-numeric option values, unknown commands.
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly message: string
}> {}

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
	readonly command: string | undefined
	readonly positionalArgs: readonly string[]
	readonly flags: Flags
}

export interface Flags {
	readonly help: boolean
	readonly version: boolean
	readonly verbose: boolean
	readonly config: string | undefined
	readonly json: boolean
	// create
	readonly force: boolean
	readonly threshold: number | undefined
	// add
	readonly email: string | undefined
	readonly id: string | undefined
	readonly host: string | undefined
	readonly port: number | undefined
	readonly smtpHost: string | undefined
	readonly smtpPort: number | undefined
	readonly noSsl: boolean
	readonly smtpSsl: boolean
	readonly send: boolean
	readonly delete: boolean
	readonly move: boolean
	readonly createEnv: boolean
}

type BooleanFlag = {
	[K in keyof Flags]: Flags[K] extends boolean ? K : never
}[keyof Flags]

type StringFlag = "config" | "email" | "id" | "host" | "smtpHost"
type IntegerFlag = "port" | "smtpPort"

const BOOLEAN_FLAGS = new Map<string, BooleanFlag>([
	["--help", "help"],
	["-h", "help"],
	["--version", "version"],
	["-v", "version"],
	["--verbose", "verbose"],
	["--json", "json"],
	["--force", "force"],
	["-f", "force"],
	["--no-ssl", "noSsl"],
	["--smtp-ssl", "smtpSsl"],
	["--send", "send"],
	["--delete", "delete"],
	["--move", "move"],
	["--create-env", "createEnv"],
])

const STRING_FLAGS = new Map<string, StringFlag>([
	["--config", "config"],
	["-c", "config"],
	["--email", "email"],
	["--id", "id"],
	["--host", "host"],
	["--smtp-host", "smtpHost"],
])

const INTEGER_FLAGS = new Map<string, IntegerFlag>([
	["--port", "port"],
	["--smtp-port", "smtpPort"],
])

const emptyFlags = (): { -readonly [K in keyof Flags]: Flags[K] } => ({
	help: false,
	version: false,
	verbose: false,
	config: undefined,
	json: false,
	force: false,
	threshold: undefined,
	email: undefined,
	id: undefined,
	host: undefined,
	port: undefined,
	smtpHost: undefined,
	smtpPort: undefined,
	noSsl: false,
	smtpSsl: false,
	send: false,
	delete: false,
	move: false,
	createEnv: false,
})

/**
 * Parse command line arguments. The first two entries of `argv` (runtime
 * and script path) are skipped.
 */
export function parseArgs(
	argv: readonly string[],
): Either.Either<ParsedArgs, UsageError> {
	const args = argv.slice(2)
	const flags = emptyFlags()
	const positionalArgs: string[] = []
	let command: string | undefined = undefined

	const valueOf = (index: number): string | undefined => {
		const value = args[index + 1]
		return value === undefined || value.startsWith("--") ? undefined : value
	}

	let i = 0
	while (i < args.length) {
		const arg = args[i]

		const booleanFlag = BOOLEAN_FLAGS.get(arg)
		if (booleanFlag !== undefined) {
			flags[booleanFlag] = true
			i++
			continue
		}

		if (STRING_FLAGS.has(arg) || INTEGER_FLAGS.has(arg) || arg === "--threshold") {
			const value = valueOf(i)
			if (value === undefined) {
				return Either.left(new UsageError({ message: `Option ${arg} requires a value` }))
			}
			const stringFlag = STRING_FLAGS.get(arg)
			const integerFlag = INTEGER_FLAGS.get(arg)
			if (stringFlag !== undefined) {
				flags[stringFlag] = value
			} else if (integerFlag !== undefined) {
				if (!/^\d+$/.test(value)) {
					return Either.left(
						new UsageError({ message: `Option ${arg} expects an integer, got '${value}'` }),
					)
				}
				flags[integerFlag] = Number.parseInt(value, 10)
			} else {
				const threshold = Number(value)
				if (value.trim() === "" || !Number.isFinite(threshold)) {
					return Either.left(
						new UsageError({ message: `Option ${arg} expects a number, got '${value}'` }),
					)
				}
				flags.threshold = threshold
			}
			i += 2
			continue
		}

		if (arg.startsWith("-") && arg !== "-") {
			return Either.left(new UsageError({ message: `Unknown option: ${arg}` }))
		}

		if (command === undefined) {
			command = arg
		} else {
			positionalArgs.push(arg)
		}
		i++
	}

	return Either.right({ command, positionalArgs, flags })
}
