import { Effect } from "effect";
import { UnrepresentableValueError } from "../errors/config-errors.js";
import type {
	MappingValue,
	ScalarValue,
	SequenceValue,
	Value,
} from "../value.js";
import { formatScalar } from "./scalar.js";

// ============================================================================
// Block Writer
// ============================================================================

const INDENT_UNIT = "  ";

const unrepresentable = (
	path: string,
	reason: string,
): UnrepresentableValueError =>
	new UnrepresentableValueError({
		path: path === "" ? "(root)" : path,
		reason,
		message: `Cannot write ${path === "" ? "(root)" : path}: ${reason}`,
	});

const keyPath = (parent: string, key: string): string =>
	parent === "" ? key : `${parent}.${key}`;

/**
 * Keys are always written bare, so a key must not look like anything else
 * the reader recognizes at the start of a line.
 */
const checkKey = (key: string, path: string): void => {
	let reason: string | undefined;
	if (key.length === 0) {
		reason = "empty key";
	} else if (key.trim() !== key) {
		reason = "key has surrounding whitespace";
	} else if (/[:\r\n]/.test(key)) {
		reason = "key contains ':' or a line break";
	} else if (/^(?:#|"|'|- )/.test(key)) {
		reason = "key starts with a comment, quote or sequence marker";
	}
	if (reason !== undefined) {
		throw unrepresentable(path, reason);
	}
};

const formatLeaf = (value: ScalarValue, path: string): string => {
	if (value._tag === "String" && /[\r\n]/.test(value.value)) {
		throw unrepresentable(path, "multi-line strings are not supported");
	}
	return formatScalar(value);
};

/**
 * Emits one `key: value` field. Collections go on the following lines at
 * `nestedIndent`; `linePrefix` carries the indentation (and the dash for
 * the first field of a sequence item).
 */
const emitField = (
	lines: Array<string>,
	linePrefix: string,
	key: string,
	value: Value,
	nestedIndent: number,
	path: string,
): void => {
	switch (value._tag) {
		case "Mapping":
			lines.push(`${linePrefix}${key}:`);
			emitMapping(lines, value, nestedIndent, path);
			return;
		case "Sequence":
			lines.push(`${linePrefix}${key}:`);
			emitSequence(lines, value, nestedIndent, path);
			return;
		default:
			lines.push(`${linePrefix}${key}: ${formatLeaf(value, path)}`);
	}
};

const emitMapping = (
	lines: Array<string>,
	mapping: MappingValue,
	indent: number,
	path: string,
): void => {
	const prefix = INDENT_UNIT.repeat(indent);
	for (const [key, value] of mapping.entries) {
		const childPath = keyPath(path, key);
		checkKey(key, childPath);
		emitField(lines, prefix, key, value, indent + 1, childPath);
	}
};

/**
 * Mapping items put their first field on the dash line and the rest two
 * spaces past the dash. Their nested blocks sit two levels deeper than the
 * dash, past the field column.
 */
const emitSequence = (
	lines: Array<string>,
	sequence: SequenceValue,
	indent: number,
	path: string,
): void => {
	const prefix = INDENT_UNIT.repeat(indent);
	sequence.items.forEach((item, index) => {
		const itemPath = `${path}[${index}]`;
		switch (item._tag) {
			case "Sequence":
				throw unrepresentable(itemPath, "sequence directly inside a sequence");
			case "Mapping": {
				if (item.entries.size === 0) {
					throw unrepresentable(itemPath, "empty mapping as a sequence item");
				}
				let first = true;
				for (const [key, value] of item.entries) {
					const fieldPath = keyPath(itemPath, key);
					checkKey(key, fieldPath);
					emitField(
						lines,
						first ? `${prefix}- ` : `${prefix}${INDENT_UNIT}`,
						key,
						value,
						indent + 2,
						fieldPath,
					);
					first = false;
				}
				return;
			}
			default:
				lines.push(`${prefix}- ${formatLeaf(item, itemPath)}`);
		}
	});
};

/**
 * Serializes a document root to block text with a trailing newline.
 * Output is byte-identical for equal trees.
 *
 * Empty collections are written as a bare `key:` and read back as Null.
 *
 * @throws UnrepresentableValueError when the tree holds something the
 * reader could not read back (nested sequences, empty mapping items,
 * multi-line strings, keys that would not survive a bare write)
 *
 * @example
 * ```typescript
 * dump(fromJs({ protection: { threshold: 0.5 }, accounts: [{ id: "work", port: 993 }] }))
 * // protection:
 * //   threshold: 0.5
 * // accounts:
 * //   - id: work
 * //     port: 993
 * ```
 */
export const dump = (root: MappingValue): string => {
	const lines: Array<string> = [];
	emitMapping(lines, root, 0, "");
	return `${lines.join("\n")}\n`;
};

/**
 * Effect wrapper around `dump`.
 */
export const encodeDocument = (
	root: MappingValue,
): Effect.Effect<string, UnrepresentableValueError> =>
	Effect.try({
		try: () => dump(root),
		catch: (error) =>
			error instanceof UnrepresentableValueError
				? error
				: unrepresentable(
						"",
						error instanceof Error ? error.message : "Unknown error",
					),
	});
