/**
 * mailguard-config - Add Command
 *
 * Appends an account to an existing config and, on request, refreshes the
 * companion secrets file with a password placeholder for it.
 */

import {
	type ConfigIoError,
	type ConfigLoadError,
	type ConfigSaveError,
	ConfigStore,
} from "@mailguard/core";
import { Effect } from "effect";
import {
	type AccountOptions,
	accountId,
	accountsOf,
	buildAccount,
	passwordEnvVar,
} from "../accounts/account.js";
import type {
	AccountValidationError,
	ConfigShapeError,
	DuplicateAccountError,
} from "../accounts/errors.js";
import { writeEnvFile } from "../secrets/env-file.js";

/**
 * Options for the add command.
 */
export interface AddOptions {
	/** Absolute path of the config file to update */
	readonly configPath: string;
	/** The account to add */
	readonly account: AccountOptions;
	/** Write `.env` beside the config with placeholders for every account */
	readonly createEnv?: boolean;
}

/**
 * Result of the add command.
 */
export interface AddResult {
	readonly accountId: string;
	/** Environment variable the server reads the password from */
	readonly passwordVariable: string;
	/** Path of the secrets file, when one was written */
	readonly envFile?: string;
}

export type AddError =
	| ConfigLoadError
	| ConfigSaveError
	| ConfigShapeError
	| AccountValidationError
	| DuplicateAccountError
	| ConfigIoError;

/**
 * Execute the add command.
 *
 * @param options - Add command options
 * @returns Effect that resolves to the add result
 */
export function runAdd(
	options: AddOptions,
): Effect.Effect<AddResult, AddError, ConfigStore> {
	return Effect.gen(function* () {
		const { configPath, createEnv = false } = options;
		const store = yield* ConfigStore;

		const document = yield* store.load(configPath);
		const accounts = yield* accountsOf(document, configPath);
		const existingIds = new Set(
			accounts.items.flatMap((item) => accountId(item) ?? []),
		);

		const account = yield* buildAccount(options.account, existingIds);
		accounts.items.push(account);
		yield* store.save(configPath, document);

		const id = accountId(account) ?? "";
		yield* Effect.logDebug("Account added").pipe(
			Effect.annotateLogs({ configPath, accountId: id }),
		);

		const envFile = createEnv
			? yield* writeEnvFile(
					configPath,
					accounts.items.flatMap((item) => accountId(item) ?? []),
				)
			: undefined;

		return {
			accountId: id,
			passwordVariable: passwordEnvVar(id),
			...(envFile !== undefined ? { envFile } : {}),
		};
	});
}
