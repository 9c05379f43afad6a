/**
 * mailguard-config - Show Command
 *
 * Prints the config file as stored, or the parsed document as JSON.
 */

import {
	type ConfigIoError,
	type ConfigLoadError,
	type ConfigNotFoundError,
	ConfigStore,
	toJs,
} from "@mailguard/core";
import { Effect } from "effect";

export interface ShowOptions {
	readonly configPath: string;
	/** Parse the file and print it as JSON instead of the raw text */
	readonly json?: boolean;
}

export function runShow(
	options: ShowOptions,
): Effect.Effect<
	string,
	ConfigLoadError | ConfigNotFoundError | ConfigIoError,
	ConfigStore
> {
	return Effect.gen(function* () {
		const store = yield* ConfigStore;
		if (options.json === true) {
			const document = yield* store.load(options.configPath);
			return `${JSON.stringify(toJs(document), null, 2)}\n`;
		}
		return yield* store.readText(options.configPath);
	});
}
