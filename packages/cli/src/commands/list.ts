/**
 * mailguard-config - List Command
 *
 * Summarizes the configured accounts: id, username and IMAP host.
 */

import { type ConfigLoadError, ConfigStore } from "@mailguard/core";
import { Effect } from "effect";
import {
	type AccountSummary,
	accountsOf,
	summarizeAccount,
} from "../accounts/account.js";
import type { ConfigShapeError } from "../accounts/errors.js";

export interface ListOptions {
	readonly configPath: string;
}

export interface ListResult {
	readonly configPath: string;
	readonly accounts: ReadonlyArray<AccountSummary>;
}

export function runList(
	options: ListOptions,
): Effect.Effect<ListResult, ConfigLoadError | ConfigShapeError, ConfigStore> {
	return Effect.gen(function* () {
		const store = yield* ConfigStore;
		const document = yield* store.load(options.configPath);
		const accounts = yield* accountsOf(document, options.configPath);

		return {
			configPath: options.configPath,
			accounts: accounts.items.flatMap((item) =>
				item._tag === "Mapping" ? [summarizeAccount(item)] : [],
			),
		};
	});
}

/**
 * Renders a list result as text, one padded row per account.
 *
 * @example
 * ```
 * Accounts in /home/me/.config/mailguard/config.yaml:
 *   work         me@example.com                 imap.example.com
 * ```
 */
export function formatAccountList(result: ListResult): string {
	if (result.accounts.length === 0) {
		return "No accounts configured.";
	}
	const rows = result.accounts.map(
		(account) =>
			`  ${account.id.padEnd(12)} ${account.username.padEnd(30)} ${account.host}`,
	);
	return [`Accounts in ${result.configPath}:`, ...rows].join("\n");
}
