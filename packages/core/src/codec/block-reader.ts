import { Effect } from "effect";
import { MalformedDocumentError } from "../errors/config-errors.js";
import { isMapping, type MappingValue, Value } from "../value.js";
import { parseScalar, unescapeQuoted } from "./scalar.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A significant line: blank and comment lines are already dropped.
 */
export interface SourceLine {
	/** Number of leading spaces */
	readonly indent: number;
	/** Line content with surrounding whitespace trimmed */
	readonly content: string;
	/** 1-based position in the original text */
	readonly number: number;
}

/**
 * Result of splitting a `key: value` or `key:` line. `value` is undefined
 * when nothing follows the separator.
 */
export interface KeyValue {
	readonly key: string;
	readonly value: string | undefined;
}

interface Parsed<A> {
	readonly value: A;
	readonly next: number;
}

// ============================================================================
// Line preparation
// ============================================================================

const malformed = (line: SourceLine, reason: string): MalformedDocumentError =>
	new MalformedDocumentError({
		line: line.number,
		content: line.content,
		reason,
		message: `Malformed document at line ${line.number}: ${reason}: ${line.content}`,
	});

/**
 * Splits text into significant lines. Only whole-line `#` comments are
 * dropped; a `#` later in a line is content.
 *
 * @throws MalformedDocumentError when a line is indented with tabs
 */
export const prepareLines = (text: string): ReadonlyArray<SourceLine> => {
	const result: Array<SourceLine> = [];
	const rawLines = text.replace(/^\uFEFF/, "").split(/\r\n|\r|\n/);

	rawLines.forEach((raw, index) => {
		const content = raw.trim();
		if (content.length === 0 || content.startsWith("#")) {
			return;
		}
		const indent = raw.length - raw.trimStart().length;
		const line: SourceLine = { indent, content, number: index + 1 };
		if (raw.slice(0, indent) !== " ".repeat(indent)) {
			throw malformed(line, "indentation must use spaces only");
		}
		result.push(line);
	});

	return result;
};

// ============================================================================
// Key/value splitting
// ============================================================================

/**
 * Index of the double quote closing the string opened at index 0, honoring
 * backslash escapes. -1 when unterminated.
 */
const closingQuote = (content: string): number => {
	for (let i = 1; i < content.length; i++) {
		if (content[i] === "\\") {
			i++;
		} else if (content[i] === '"') {
			return i;
		}
	}
	return -1;
};

/**
 * Splits a line into key and value text.
 *
 * The separator is the first `:` that ends the line or is followed by a
 * space; a colon inside a token (`http://host`) does not split. A
 * double-quoted key is read up to its closing quote. Returns undefined
 * when the line holds no key.
 *
 * @example
 * ```typescript
 * splitKeyValue("host: imap.example.com") // { key: "host", value: "imap.example.com" }
 * splitKeyValue("permissions:")           // { key: "permissions", value: undefined }
 * splitKeyValue("http://example.com")     // undefined
 * ```
 */
export const splitKeyValue = (content: string): KeyValue | undefined => {
	if (content.startsWith('"')) {
		const end = closingQuote(content);
		if (end === -1) {
			return undefined;
		}
		const rest = content.slice(end + 1);
		if (!rest.startsWith(":")) {
			return undefined;
		}
		const value = rest.slice(1).trim();
		return {
			key: unescapeQuoted(content.slice(1, end)),
			value: value.length > 0 ? value : undefined,
		};
	}

	for (let i = content.indexOf(":"); i !== -1; i = content.indexOf(":", i + 1)) {
		const after = content[i + 1];
		if (after === undefined || after === " ") {
			const value = content.slice(i + 1).trim();
			return {
				key: content.slice(0, i),
				value: value.length > 0 ? value : undefined,
			};
		}
	}
	return undefined;
};

const isSequenceMarker = (content: string): boolean => content.startsWith("- ");

// ============================================================================
// Recursive descent
// ============================================================================

/**
 * Reads the block nested under a `key:` line at `lines[pos]`. A block is
 * nested only when the next line sits deeper than `keyColumn`; otherwise
 * the key has no value and reads as Null.
 */
const parseNested = (
	lines: ReadonlyArray<SourceLine>,
	pos: number,
	keyColumn: number,
): Parsed<Value> => {
	const following = lines[pos + 1];
	if (following !== undefined && following.indent > keyColumn) {
		return parseBlock(lines, pos + 1, following.indent);
	}
	return { value: Value.Null(), next: pos + 1 };
};

/**
 * Collects `key: value` / `key:` lines at exactly `indent` into `entries`.
 * Stops at the first line that is shallower, deeper, a sequence marker or
 * has no key, and returns its position.
 */
const collectFields = (
	lines: ReadonlyArray<SourceLine>,
	pos: number,
	indent: number,
	entries: Map<string, Value>,
): number => {
	let next = pos;
	while (next < lines.length) {
		const line = lines[next];
		if (line.indent !== indent || isSequenceMarker(line.content)) {
			break;
		}
		const field = splitKeyValue(line.content);
		if (field === undefined) {
			break;
		}
		if (entries.has(field.key)) {
			throw malformed(line, `duplicate key '${field.key}'`);
		}
		if (field.value !== undefined) {
			entries.set(field.key, parseScalar(field.value));
			next++;
		} else {
			const nested = parseNested(lines, next, indent);
			entries.set(field.key, nested.value);
			next = nested.next;
		}
	}
	return next;
};

const parseMapping = (
	lines: ReadonlyArray<SourceLine>,
	pos: number,
	baseIndent: number,
): Parsed<Value> => {
	const entries = new Map<string, Value>();
	const next = collectFields(lines, pos, baseIndent, entries);
	return { value: Value.Mapping(entries), next };
};

/**
 * Reads `- ` items at exactly `baseIndent`. A `- key: value` or `- key:`
 * item is a Mapping whose remaining fields sit at the child indent, two
 * spaces past the dash; anything else is a scalar item. The value of a
 * `- key:` first field is any block deeper than the dash.
 */
const parseSequence = (
	lines: ReadonlyArray<SourceLine>,
	pos: number,
	baseIndent: number,
): Parsed<Value> => {
	const items: Array<Value> = [];
	const childIndent = baseIndent + 2;
	let next = pos;

	while (next < lines.length) {
		const line = lines[next];
		if (line.indent !== baseIndent || !isSequenceMarker(line.content)) {
			break;
		}
		const itemContent = line.content.slice(2).trimStart();
		const first = splitKeyValue(itemContent);

		if (first === undefined) {
			items.push(parseScalar(itemContent));
			next++;
			continue;
		}

		const entries = new Map<string, Value>();
		if (first.value !== undefined) {
			entries.set(first.key, parseScalar(first.value));
			next++;
		} else {
			const nested = parseNested(lines, next, baseIndent);
			entries.set(first.key, nested.value);
			next = nested.next;
		}
		next = collectFields(lines, next, childIndent, entries);
		items.push(Value.Mapping(entries));
	}

	return { value: Value.Sequence(items), next };
};

const parseBlock = (
	lines: ReadonlyArray<SourceLine>,
	pos: number,
	baseIndent: number,
): Parsed<Value> =>
	isSequenceMarker(lines[pos].content)
		? parseSequence(lines, pos, baseIndent)
		: parseMapping(lines, pos, baseIndent);

/**
 * Explains why a line was left over once the root block ended.
 */
const leftoverReason = (line: SourceLine): string => {
	if (isSequenceMarker(line.content)) {
		return "sequence item outside any sequence at this indentation";
	}
	if (splitKeyValue(line.content) === undefined) {
		return "expected 'key: value' or 'key:'";
	}
	return "indentation does not match any open block";
};

// ============================================================================
// Public API
// ============================================================================

/**
 * Parses block text into a document root.
 *
 * Empty text (or text holding only comments) is an empty Mapping. A
 * `key:` with nothing nested under it reads as Null, so an empty
 * collection written by `dump` comes back as Null.
 *
 * @throws MalformedDocumentError when a line cannot be placed in the
 * tree: a line without a key, an indentation matching no open block, a
 * duplicate key, tab indentation or a root that is not a Mapping. No
 * line is ever dropped silently.
 */
export const load = (text: string): MappingValue => {
	const lines = prepareLines(text);
	if (lines.length === 0) {
		return Value.Mapping();
	}

	const root = parseBlock(lines, 0, 0);
	if (root.next < lines.length && (root.next === 0 || isMapping(root.value))) {
		const line = lines[root.next];
		throw malformed(line, leftoverReason(line));
	}
	if (!isMapping(root.value)) {
		throw malformed(lines[0], "document root must be a mapping");
	}
	return root.value;
};

/**
 * Effect wrapper around `load`.
 */
export const decodeDocument = (
	text: string,
): Effect.Effect<MappingValue, MalformedDocumentError> =>
	Effect.try({
		try: () => load(text),
		catch: (error) =>
			error instanceof MalformedDocumentError
				? error
				: new MalformedDocumentError({
						line: 0,
						content: "",
						reason: error instanceof Error ? error.message : "Unknown error",
						message: `Malformed document: ${error instanceof Error ? error.message : "Unknown error"}`,
					}),
	});
