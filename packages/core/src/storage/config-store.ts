import { Context, type Effect } from "effect";
import type {
	ConfigIoError,
	ConfigNotFoundError,
	MalformedDocumentError,
	UnrepresentableValueError,
} from "../errors/config-errors.js";
import type { MappingValue } from "../value.js";

// ============================================================================
// ConfigStore Effect Service
// ============================================================================

export type ConfigLoadError =
	| ConfigNotFoundError
	| ConfigIoError
	| MalformedDocumentError;

export type ConfigSaveError = ConfigIoError | UnrepresentableValueError;

export interface ConfigStoreShape {
	/** Reads and parses the document at `path`. */
	readonly load: (path: string) => Effect.Effect<MappingValue, ConfigLoadError>;
	/**
	 * Serializes `root` and replaces the file at `path` all at once. A
	 * failed save leaves the previous file as it was.
	 */
	readonly save: (
		path: string,
		root: MappingValue,
	) => Effect.Effect<void, ConfigSaveError>;
	readonly exists: (path: string) => Effect.Effect<boolean>;
	/** Raw file contents, unparsed. */
	readonly readText: (
		path: string,
	) => Effect.Effect<string, ConfigNotFoundError | ConfigIoError>;
}

export class ConfigStore extends Context.Tag("ConfigStore")<
	ConfigStore,
	ConfigStoreShape
>() {}
