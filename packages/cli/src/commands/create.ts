/**
 * mailguard-config - Create Command
 *
 * Writes a config skeleton: a global protection threshold and an empty
 * account list. Refuses to replace an existing file unless forced.
 */

import { ConfigStore, type ConfigSaveError, Value } from "@mailguard/core";
import { Effect } from "effect";
import { DEFAULT_THRESHOLD } from "../accounts/account.js";
import { AccountValidationError, ConfigExistsError } from "../accounts/errors.js";

/**
 * Options for the create command.
 */
export interface CreateOptions {
	/** Absolute path of the config file to write */
	readonly configPath: string;
	/** Global protection threshold (default 0.5) */
	readonly threshold?: number;
	/** Overwrite an existing config file */
	readonly force?: boolean;
}

/**
 * Result of the create command.
 */
export interface CreateResult {
	readonly configPath: string;
	/** Whether an existing file was replaced */
	readonly replaced: boolean;
}

/**
 * Execute the create command.
 *
 * @param options - Create command options
 * @returns Effect that resolves to the create result
 */
export function runCreate(
	options: CreateOptions,
): Effect.Effect<
	CreateResult,
	ConfigExistsError | AccountValidationError | ConfigSaveError,
	ConfigStore
> {
	return Effect.gen(function* () {
		const { configPath, threshold = DEFAULT_THRESHOLD, force = false } = options;
		const store = yield* ConfigStore;

		if (!Number.isFinite(threshold)) {
			return yield* new AccountValidationError({
				field: "threshold",
				reason: `Invalid threshold: ${threshold}`,
				message: `Invalid threshold: ${threshold}`,
			});
		}

		const exists = yield* store.exists(configPath);
		if (exists && !force) {
			return yield* new ConfigExistsError({
				configPath,
				message: `Config file already exists: ${configPath}. Use --force to overwrite.`,
			});
		}

		yield* store.save(
			configPath,
			Value.Mapping([
				["protection", Value.Mapping([["threshold", Value.Float(threshold)]])],
				["accounts", Value.Sequence()],
			]),
		);

		return { configPath, replaced: exists };
	});
}
