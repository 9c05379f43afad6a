import { UnrepresentableValueError } from "../errors/config-errors.js";
import { fromJs, isMapping, toJs } from "../value.js";
import { load } from "./block-reader.js";
import { dump } from "./block-writer.js";

// ============================================================================
// FormatCodec: plain-data view of a serialization format
// ============================================================================

/**
 * A FormatCodec defines a serialization format with:
 * - A human-readable name
 * - Supported file extensions without dots (e.g., ["yaml", "yml"])
 * - Synchronous encode/decode functions that throw on failure
 */
export interface FormatCodec {
	readonly name: string;
	readonly extensions: ReadonlyArray<string>;
	readonly encode: (data: unknown) => string;
	readonly decode: (raw: string) => unknown;
}

/**
 * Creates the block codec over plain JS data.
 *
 * @returns A FormatCodec for the indentation-structured config format
 *
 * @example
 * ```typescript
 * const codec = blockCodec()
 * codec.encode({ protection: { threshold: 0.5 } })
 * // "protection:\n  threshold: 0.5\n"
 * ```
 *
 * @remarks
 * - Only plain objects can be encoded at the top level
 * - Empty arrays and objects decode as null
 * - Whole numbers decode as numbers whatever tag they were written with
 */
export const blockCodec = (): FormatCodec => ({
	name: "block",
	extensions: ["yaml", "yml"],
	encode: (data: unknown): string => {
		const root = fromJs(data);
		if (!isMapping(root)) {
			throw new UnrepresentableValueError({
				path: "(root)",
				reason: `document root must be a mapping, got ${root._tag}`,
				message: `Cannot write (root): document root must be a mapping, got ${root._tag}`,
			});
		}
		return dump(root);
	},
	decode: (raw: string): unknown => toJs(load(raw)),
});
