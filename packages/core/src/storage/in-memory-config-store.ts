/**
 * In-memory implementation of ConfigStore as an Effect Layer.
 * Intended for testing. Keeps document text in a Map<string, string>
 * instead of the filesystem, but runs the real codec on every load and save.
 */

import { Effect, Layer } from "effect"
import { decodeDocument } from "../codec/block-reader.js"
import { encodeDocument } from "../codec/block-writer.js"
import { ConfigNotFoundError } from "../errors/config-errors.js"
import { ConfigStore, type ConfigStoreShape } from "./config-store.js"

// ============================================================================
// In-memory config store
// ============================================================================

const makeInMemoryConfigStore = (
	files: Map<string, string>,
): ConfigStoreShape => {
	const readText = (path: string) =>
		Effect.suspend(() => {
			const content = files.get(path)
			if (content === undefined) {
				return Effect.fail(
					new ConfigNotFoundError({
						path,
						message: `Config file not found: ${path}`,
					}),
				)
			}
			return Effect.succeed(content)
		})

	return {
		readText,

		load: (path: string) =>
			readText(path).pipe(Effect.flatMap(decodeDocument)),

		save: (path, root) =>
			encodeDocument(root).pipe(
				Effect.tap((text) => Effect.sync(() => files.set(path, text))),
				Effect.asVoid,
			),

		exists: (path: string) => Effect.sync(() => files.has(path)),
	}
}

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates an in-memory ConfigStore layer backed by the provided Map.
 * Pass your own Map to seed files or inspect written text in tests.
 */
export const makeInMemoryConfigStoreLayer = (
	files: Map<string, string> = new Map(),
): Layer.Layer<ConfigStore> =>
	Layer.succeed(ConfigStore, makeInMemoryConfigStore(files))
