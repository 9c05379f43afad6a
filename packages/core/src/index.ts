/**
 * Main entry point for @mailguard/core.
 *
 * Exports the Value tree, the scalar and block codecs, typed errors and
 * the ConfigStore service.
 */

// ============================================================================
// Value Tree
// ============================================================================

export {
	Value,
	fromJs,
	toJs,
	isMapping,
	isScalar,
	isSequence,
} from "./value.js";

export type {
	NullValue,
	BoolValue,
	IntValue,
	FloatValue,
	StringValue,
	MappingValue,
	SequenceValue,
	ScalarValue,
} from "./value.js";

// ============================================================================
// Codecs
// ============================================================================

export {
	formatScalar,
	parseScalar,
	parseFloatLiteral,
	quoteIfNeeded,
	unescapeQuoted,
} from "./codec/scalar.js";

export { dump, encodeDocument } from "./codec/block-writer.js";

export {
	load,
	decodeDocument,
	prepareLines,
	splitKeyValue,
} from "./codec/block-reader.js";

export type { KeyValue, SourceLine } from "./codec/block-reader.js";

export { blockCodec } from "./codec/format-codec.js";
export type { FormatCodec } from "./codec/format-codec.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	ConfigIoError,
	ConfigNotFoundError,
	MalformedDocumentError,
	UnrepresentableValueError,
} from "./errors/index.js";

export type { ConfigError } from "./errors/index.js";

// ============================================================================
// ConfigStore Service
// ============================================================================

export { ConfigStore } from "./storage/config-store.js";
export type {
	ConfigStoreShape,
	ConfigLoadError,
	ConfigSaveError,
} from "./storage/config-store.js";

export { makeInMemoryConfigStoreLayer } from "./storage/in-memory-config-store.js";
