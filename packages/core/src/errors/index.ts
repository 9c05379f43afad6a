// ============================================================================
// Config Errors (re-exported from config-errors.ts)
// ============================================================================

export type { ConfigError } from "./config-errors.js";
export {
	ConfigIoError,
	ConfigNotFoundError,
	MalformedDocumentError,
	UnrepresentableValueError,
} from "./config-errors.js";
