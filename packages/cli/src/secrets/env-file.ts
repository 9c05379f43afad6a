/**
 * Companion secrets file: one `KEY=value` line per account password,
 * kept beside the config file and readable by the owner only.
 */

import * as path from "node:path"
import {
	type ConfigIoError,
	type FileOps,
	nodeFileOps,
	toIoError,
	writeFileAtomic,
} from "@mailguard/node"
import { Effect } from "effect"
import { passwordEnvVar } from "../accounts/account.js"

export const ENV_FILE_NAME = ".env"
export const PASSWORD_PLACEHOLDER = "your-app-password-here"

const HEADER = [
	"# mailguard credentials",
	"# Keep this file secret. Do not commit it to version control.",
]

export const envFilePath = (configPath: string): string =>
	path.join(path.dirname(configPath), ENV_FILE_NAME)

/**
 * Parses `KEY=value` lines. Blank lines, comments and lines without `=`
 * are skipped; only the first `=` separates key from value.
 */
export const parseEnvLines = (text: string): Map<string, string> => {
	const vars = new Map<string, string>()
	for (const raw of text.split(/\r?\n/)) {
		const line = raw.trim()
		if (line.length === 0 || line.startsWith("#")) {
			continue
		}
		const separator = line.indexOf("=")
		if (separator === -1) {
			continue
		}
		vars.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim())
	}
	return vars
}

/**
 * Renders the secrets file for the given accounts, keeping every value
 * already present in `existing` and a placeholder for new accounts.
 * Variables of accounts no longer configured are dropped.
 */
export const renderEnvFile = (
	accountIds: ReadonlyArray<string>,
	existing: ReadonlyMap<string, string>,
): string => {
	const lines = [...HEADER]
	for (const id of accountIds) {
		const name = passwordEnvVar(id)
		lines.push(`${name}=${existing.get(name) ?? PASSWORD_PLACEHOLDER}`)
	}
	return `${lines.join("\n")}\n`
}

/**
 * Writes `.env` beside the config file with mode 0600, preserving
 * existing passwords. Returns the path written.
 */
export const writeEnvFile = (
	configPath: string,
	accountIds: ReadonlyArray<string>,
	fileOps: FileOps = nodeFileOps,
): Effect.Effect<string, ConfigIoError> => {
	const target = envFilePath(configPath)
	return Effect.gen(function* () {
		const present = yield* Effect.sync(() => fileOps.exists(target))
		const existing = present
			? parseEnvLines(
					yield* Effect.try({
						try: () => fileOps.readFile(target),
						catch: (error) => toIoError(target, "read", error),
					}),
				)
			: new Map<string, string>()

		yield* writeFileAtomic(target, renderEnvFile(accountIds, existing), {
			fileMode: 0o600,
			fileOps,
		})
		return target
	})
}
