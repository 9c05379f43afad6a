/**
 * Account entries of a config document: building new ones from command
 * flags and reading existing ones back out of the tree.
 */

import {
	formatScalar,
	type MappingValue,
	type SequenceValue,
	Value,
} from "@mailguard/core"
import { Effect } from "effect"
import {
	AccountValidationError,
	ConfigShapeError,
	DuplicateAccountError,
} from "./errors.js"

// ============================================================================
// Constants
// ============================================================================

export const ACCOUNT_ID_PATTERN = /^[a-z0-9][a-z0-9-]*$/

export const DEFAULT_IMAP_PORT = 993
export const DEFAULT_SMTP_PORT = 587
export const DEFAULT_THRESHOLD = 0.5

/** Highest numeric suffix tried when a suggested id is taken */
const MAX_ID_SUFFIX = 99

// ============================================================================
// Types
// ============================================================================

export interface AccountOptions {
	readonly email: string
	/** Derived from the email when omitted */
	readonly id?: string
	readonly host: string
	readonly port: number
	readonly ssl: boolean
	readonly smtpHost: string
	readonly smtpPort: number
	readonly smtpSsl: boolean
	readonly send: boolean
	readonly delete: boolean
	readonly move: boolean
	/** Per-account protection threshold; the global one applies when omitted */
	readonly threshold?: number
}

export interface AccountSummary {
	readonly id: string
	readonly username: string
	readonly host: string
}

// ============================================================================
// Naming
// ============================================================================

/**
 * Name of the environment variable holding an account's password.
 *
 * @example
 * ```typescript
 * passwordEnvVar("work-mail") // "MAILGUARD_ACCOUNT_WORK_MAIL_PASSWORD"
 * ```
 */
export const passwordEnvVar = (accountId: string): string =>
	`MAILGUARD_ACCOUNT_${accountId.toUpperCase().replace(/-/g, "_")}_PASSWORD`

/**
 * Suggests an account id from the local part of an email address, adding
 * a numeric suffix (2, 3, ...) when the plain candidate is taken.
 */
export const suggestAccountId = (
	email: string,
	existingIds: ReadonlySet<string>,
): string => {
	const local = email.split("@")[0] ?? ""
	const candidate = local.toLowerCase().replace(/[^a-z0-9-]/g, "") || "default"
	if (!existingIds.has(candidate)) {
		return candidate
	}
	for (let suffix = 2; suffix <= MAX_ID_SUFFIX; suffix++) {
		if (!existingIds.has(`${candidate}${suffix}`)) {
			return `${candidate}${suffix}`
		}
	}
	return candidate
}

const isValidEmail = (email: string): boolean => {
	const at = email.lastIndexOf("@")
	return at !== -1 && email.slice(at + 1).includes(".")
}

const isValidPort = (port: number): boolean =>
	Number.isInteger(port) && port >= 1 && port <= 65535

// ============================================================================
// Building
// ============================================================================

const invalid = (field: string, reason: string) =>
	new AccountValidationError({ field, reason, message: reason })

/**
 * Builds an account mapping from command options.
 *
 * Field order is fixed: connection fields, username, SMTP fields, then the
 * `permissions` block (read is always granted) and an optional
 * `protection` block.
 */
export const buildAccount = (
	options: AccountOptions,
	existingIds: ReadonlySet<string>,
): Effect.Effect<MappingValue, AccountValidationError | DuplicateAccountError> =>
	Effect.gen(function* () {
		if (!isValidEmail(options.email)) {
			return yield* invalid("email", `Invalid email address: ${options.email}`)
		}

		const id = (options.id ?? suggestAccountId(options.email, existingIds)).toLowerCase()
		if (existingIds.has(id)) {
			return yield* new DuplicateAccountError({
				id,
				message: `Account '${id}' already exists.`,
			})
		}
		if (!ACCOUNT_ID_PATTERN.test(id)) {
			return yield* invalid(
				"id",
				"Account ID must be lowercase alphanumeric with hyphens only.",
			)
		}

		for (const [field, port] of [
			["port", options.port],
			["smtp-port", options.smtpPort],
		] as const) {
			if (!isValidPort(port)) {
				return yield* invalid(field, `Invalid ${field}: ${port}`)
			}
		}
		if (options.threshold !== undefined && !Number.isFinite(options.threshold)) {
			return yield* invalid("threshold", `Invalid threshold: ${options.threshold}`)
		}

		const account = Value.Mapping([
			["id", Value.String(id)],
			["type", Value.String("imap")],
			["host", Value.String(options.host)],
			["port", Value.Int(options.port)],
			["ssl", Value.Bool(options.ssl)],
			["username", Value.String(options.email)],
			["smtp_host", Value.String(options.smtpHost)],
			["smtp_port", Value.Int(options.smtpPort)],
			["smtp_ssl", Value.Bool(options.smtpSsl)],
			[
				"permissions",
				Value.Mapping([
					["read", Value.Bool(true)],
					["send", Value.Bool(options.send)],
					["delete", Value.Bool(options.delete)],
					["move", Value.Bool(options.move)],
				]),
			],
		])

		if (options.threshold !== undefined) {
			account.entries.set(
				"protection",
				Value.Mapping([["threshold", Value.Float(options.threshold)]]),
			)
		}

		return account
	})

// ============================================================================
// Reading
// ============================================================================

/**
 * Returns the `accounts` sequence of a document, creating an empty one
 * when the key is missing or Null (how an empty list reads back).
 * The returned sequence is the one stored in the document.
 */
export const accountsOf = (
	document: MappingValue,
	configPath: string,
): Effect.Effect<SequenceValue, ConfigShapeError> =>
	Effect.gen(function* () {
		const accounts = document.entries.get("accounts")
		if (accounts === undefined || accounts._tag === "Null") {
			const empty = Value.Sequence()
			document.entries.set("accounts", empty)
			return empty
		}
		if (accounts._tag !== "Sequence") {
			return yield* new ConfigShapeError({
				configPath,
				key: "accounts",
				reason: `expected a list, got ${accounts._tag}`,
				message: `Invalid config in ${configPath}: 'accounts' must be a list, got ${accounts._tag}`,
			})
		}
		return accounts
	})

/**
 * Text of a scalar field for display; undefined when the field is
 * missing or a collection.
 */
export const fieldText = (
	account: MappingValue,
	field: string,
): string | undefined => {
	const value = account.entries.get(field)
	if (value === undefined) {
		return undefined
	}
	switch (value._tag) {
		case "String":
			return value.value
		case "Mapping":
		case "Sequence":
			return undefined
		default:
			return formatScalar(value)
	}
}

export const accountId = (item: Value): string | undefined =>
	item._tag === "Mapping" ? fieldText(item, "id") : undefined

export const summarizeAccount = (account: MappingValue): AccountSummary => ({
	id: fieldText(account, "id") ?? "?",
	username: fieldText(account, "username") ?? "?",
	host: fieldText(account, "host") ?? "?",
})
