import { Data } from "effect"

// ============================================================================
// Effect TaggedError Config Error Types
// ============================================================================

export class ConfigNotFoundError extends Data.TaggedError("ConfigNotFoundError")<{
	readonly path: string
	readonly message: string
}> {}

export class ConfigIoError extends Data.TaggedError("ConfigIoError")<{
	readonly path: string
	readonly operation: "read" | "mkdir" | "create-temp" | "write" | "rename"
	readonly message: string
	readonly cause?: unknown
}> {}

/**
 * The reader met a line it could not place in the document tree.
 * `line` is 1-based and counts every line of the input, comments included.
 */
export class MalformedDocumentError extends Data.TaggedError("MalformedDocumentError")<{
	readonly line: number
	readonly content: string
	readonly reason: string
	readonly message: string
}> {}

/**
 * The writer (or `fromJs`) was handed a value the block format cannot
 * carry. `path` locates it, e.g. `accounts[1].permissions`.
 */
export class UnrepresentableValueError extends Data.TaggedError("UnrepresentableValueError")<{
	readonly path: string
	readonly reason: string
	readonly message: string
}> {}

// ============================================================================
// Config Error Union
// ============================================================================

export type ConfigError =
	| ConfigNotFoundError
	| ConfigIoError
	| MalformedDocumentError
	| UnrepresentableValueError
