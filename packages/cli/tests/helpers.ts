import { ConfigStore, makeInMemoryConfigStoreLayer } from "@mailguard/core"
import { Effect } from "effect"
import type { AccountOptions } from "../src/accounts/account.js"

export const CONFIG_PATH = "/cfg/mailguard/config.yaml"

export const SKELETON = "protection:\n  threshold: 0.5\naccounts:\n"

export const accountOptions = (
	overrides: Partial<AccountOptions> = {},
): AccountOptions => ({
	email: "me@example.com",
	host: "imap.example.com",
	port: 993,
	ssl: true,
	smtpHost: "smtp.example.com",
	smtpPort: 587,
	smtpSsl: false,
	send: true,
	delete: false,
	move: false,
	...overrides,
})

/**
 * Runs a command against an in-memory store seeded with `files`.
 */
export const runWith = <A, E>(
	program: Effect.Effect<A, E, ConfigStore>,
	files: Map<string, string>,
): Promise<A> =>
	Effect.runPromise(Effect.provide(program, makeInMemoryConfigStoreLayer(files)))

export const failWith = <A, E>(
	program: Effect.Effect<A, E, ConfigStore>,
	files: Map<string, string>,
): Promise<E> => runWith(Effect.flip(program), files)
