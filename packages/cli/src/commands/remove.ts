/**
 * mailguard-config - Remove Command
 *
 * Deletes one account, by id, from the config's account list.
 */

import {
	type ConfigLoadError,
	type ConfigSaveError,
	ConfigStore,
} from "@mailguard/core";
import { Effect } from "effect";
import { accountId, accountsOf } from "../accounts/account.js";
import { AccountNotFoundError, type ConfigShapeError } from "../accounts/errors.js";

/**
 * Options for the remove command.
 */
export interface RemoveOptions {
	readonly configPath: string;
	/** Id of the account to remove */
	readonly accountId: string;
}

export interface RemoveResult {
	readonly accountId: string;
	/** Accounts left in the config */
	readonly remaining: number;
}

/**
 * Execute the remove command. Every other account keeps its position.
 */
export function runRemove(
	options: RemoveOptions,
): Effect.Effect<
	RemoveResult,
	ConfigLoadError | ConfigSaveError | ConfigShapeError | AccountNotFoundError,
	ConfigStore
> {
	return Effect.gen(function* () {
		const { configPath } = options;
		const store = yield* ConfigStore;

		const document = yield* store.load(configPath);
		const accounts = yield* accountsOf(document, configPath);
		const kept = accounts.items.filter(
			(item) => accountId(item) !== options.accountId,
		);

		if (kept.length === accounts.items.length) {
			return yield* new AccountNotFoundError({
				id: options.accountId,
				message: `No account with ID '${options.accountId}'`,
			});
		}

		accounts.items.splice(0, accounts.items.length, ...kept);
		yield* store.save(configPath, document);

		return { accountId: options.accountId, remaining: kept.length };
	});
}
