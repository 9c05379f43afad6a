/**
 * Node.js filesystem implementation of ConfigStore as an Effect Layer.
 * Loads with one blocking read; saves through writeFileAtomic.
 */

import {
	ConfigNotFoundError,
	ConfigStore,
	type ConfigStoreShape,
	decodeDocument,
	encodeDocument,
} from "@mailguard/core";
import { Effect, Layer } from "effect";
import { toIoError, writeFileAtomic } from "./atomic-write.js";
import { type FileOps, nodeFileOps } from "./file-ops.js";

// ============================================================================
// Configuration
// ============================================================================

export interface NodeConfigStoreConfig {
	/** Mode of newly written config files */
	readonly fileMode?: number;
	/** Mode of parent directories created on save */
	readonly dirMode?: number;
	readonly fileOps?: FileOps;
}

const defaultConfig: Required<NodeConfigStoreConfig> = {
	fileMode: 0o600,
	dirMode: 0o755,
	fileOps: nodeFileOps,
};

const isNotFound = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

// ============================================================================
// Store operations
// ============================================================================

const makeStore = (
	config: Required<NodeConfigStoreConfig>,
): ConfigStoreShape => {
	const readText = (path: string) =>
		Effect.try({
			try: () => config.fileOps.readFile(path),
			catch: (error) =>
				isNotFound(error)
					? new ConfigNotFoundError({
							path,
							message: `Config file not found: ${path}`,
						})
					: toIoError(path, "read", error),
		});

	return {
		readText,

		load: (path) =>
			readText(path).pipe(
				Effect.flatMap(decodeDocument),
				Effect.tap((root) =>
					Effect.logDebug("Loaded config").pipe(
						Effect.annotateLogs({ path, keys: root.entries.size }),
					),
				),
			),

		save: (path, root) =>
			encodeDocument(root).pipe(
				Effect.flatMap((text) => writeFileAtomic(path, text, config)),
				Effect.tap(() =>
					Effect.logDebug("Saved config").pipe(Effect.annotateLogs({ path })),
				),
			),

		exists: (path) => Effect.sync(() => config.fileOps.exists(path)),
	};
};

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates a ConfigStore layer on the Node.js filesystem.
 */
export const makeNodeConfigStoreLayer = (
	config: NodeConfigStoreConfig = {},
): Layer.Layer<ConfigStore> => {
	const resolved = { ...defaultConfig, ...config };
	return Layer.succeed(ConfigStore, makeStore(resolved));
};

/**
 * Default ConfigStore layer with standard configuration.
 */
export const NodeConfigStoreLayer: Layer.Layer<ConfigStore> =
	makeNodeConfigStoreLayer();
