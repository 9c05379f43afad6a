import { Data } from "effect"

// ============================================================================
// Account Command Errors
// ============================================================================

export class AccountValidationError extends Data.TaggedError("AccountValidationError")<{
	readonly field: string
	readonly reason: string
	readonly message: string
}> {}

export class DuplicateAccountError extends Data.TaggedError("DuplicateAccountError")<{
	readonly id: string
	readonly message: string
}> {}

export class AccountNotFoundError extends Data.TaggedError("AccountNotFoundError")<{
	readonly id: string
	readonly message: string
}> {}

/**
 * The document parsed, but a conventional key holds the wrong kind of value.
 */
export class ConfigShapeError extends Data.TaggedError("ConfigShapeError")<{
	readonly configPath: string
	readonly key: string
	readonly reason: string
	readonly message: string
}> {}

export class ConfigExistsError extends Data.TaggedError("ConfigExistsError")<{
	readonly configPath: string
	readonly message: string
}> {}
