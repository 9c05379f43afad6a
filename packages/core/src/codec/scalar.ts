import { type ScalarValue, Value } from "../value.js";

// ============================================================================
// Lexical rules
// ============================================================================

/**
 * Words that some readers take as booleans or null. Only true/false/null
 * are typed on read; the rest are still quoted on write.
 */
const RESERVED_WORDS = new Set([
	"true",
	"false",
	"null",
	"yes",
	"no",
	"on",
	"off",
]);

const SPECIAL_CHARACTERS = new Set(":#{}[]!&*?,|>'\"@`");

const INTEGER_PATTERN = /^[+-]?\d+$/;

const FLOAT_PATTERN =
	/^[+-]?(?:\d+\.?\d*(?:e[+-]?\d+)?|\.\d+(?:e[+-]?\d+)?|inf(?:inity)?|nan)$/i;

/**
 * Parses a floating-point literal: decimal and exponent forms plus
 * `inf`, `infinity` and `nan` (any case, optional sign).
 * Returns undefined when the text is not a float literal.
 */
export const parseFloatLiteral = (text: string): number | undefined => {
	if (!FLOAT_PATTERN.test(text)) {
		return undefined;
	}
	const lower = text.toLowerCase();
	const unsigned = lower.replace(/^[+-]/, "");
	if (unsigned === "nan") {
		return Number.NaN;
	}
	if (unsigned.startsWith("inf")) {
		return lower.startsWith("-")
			? Number.NEGATIVE_INFINITY
			: Number.POSITIVE_INFINITY;
	}
	return Number(text);
};

const formatFloat = (value: number): string => {
	if (Number.isNaN(value)) {
		return "nan";
	}
	if (!Number.isFinite(value)) {
		return value > 0 ? "inf" : "-inf";
	}
	if (Object.is(value, -0)) {
		return "-0.0";
	}
	const text = String(value);
	// Keep a decimal point (or exponent) so the text reads back as a Float
	return /^-?\d+$/.test(text) ? `${text}.0` : text;
};

// ============================================================================
// Quoting
// ============================================================================

const escapeQuoted = (text: string): string =>
	text.replace(/\\/g, "\\\\").replace(/"/g, '\\"');

/**
 * Reverses `escapeQuoted` left to right. A backslash before anything other
 * than `\` or `"` is kept literally.
 */
export const unescapeQuoted = (text: string): string => {
	let result = "";
	for (let i = 0; i < text.length; i++) {
		const char = text[i];
		const next = text[i + 1];
		if (char === "\\" && (next === "\\" || next === '"')) {
			result += next;
			i++;
		} else {
			result += char;
		}
	}
	return result;
};

const needsQuoting = (text: string): boolean => {
	if (text.length === 0 || text.trim() !== text) {
		return true;
	}
	if (RESERVED_WORDS.has(text.toLowerCase())) {
		return true;
	}
	for (const char of text) {
		if (SPECIAL_CHARACTERS.has(char)) {
			return true;
		}
	}
	return parseFloatLiteral(text) !== undefined;
};

/**
 * Returns the string bare when it reads back as the same string, otherwise
 * double-quoted with `\` and `"` escaped.
 *
 * @example
 * ```typescript
 * quoteIfNeeded("imap.example.com") // imap.example.com
 * quoteIfNeeded("true")             // "true"
 * quoteIfNeeded("587")              // "587"
 * quoteIfNeeded('say "hi"')         // "say \"hi\""
 * ```
 */
export const quoteIfNeeded = (text: string): string =>
	needsQuoting(text) ? `"${escapeQuoted(text)}"` : text;

// ============================================================================
// Scalar format / parse
// ============================================================================

export const formatScalar = (value: ScalarValue): string => {
	switch (value._tag) {
		case "Null":
			return "null";
		case "Bool":
			return value.value ? "true" : "false";
		case "Int":
			return String(value.value);
		case "Float":
			return formatFloat(value.value);
		case "String":
			return quoteIfNeeded(value.value);
	}
};

const isQuoted = (text: string): boolean =>
	text.length >= 2 &&
	((text.startsWith('"') && text.endsWith('"')) ||
		(text.startsWith("'") && text.endsWith("'")));

/**
 * Parses scalar text into a typed value. Never fails: text that is not a
 * quoted string, a keyword or a number stays a String.
 *
 * Order of detection:
 * 1. quoted (`"..."` or `'...'`) → String, escapes reversed
 * 2. `true` / `false` / `null`, any case
 * 3. integer → Int (outside the safe range → Float)
 * 4. float literal → Float
 * 5. anything else → String
 *
 * @example
 * ```typescript
 * parseScalar("587")    // Int 587
 * parseScalar("0.5")    // Float 0.5
 * parseScalar("TRUE")   // Bool true
 * parseScalar("yes")    // String "yes"
 * parseScalar('"true"') // String "true"
 * ```
 */
export const parseScalar = (raw: string): ScalarValue => {
	const text = raw.trim();

	if (isQuoted(text)) {
		return Value.String(unescapeQuoted(text.slice(1, -1)));
	}

	switch (text.toLowerCase()) {
		case "true":
			return Value.Bool(true);
		case "false":
			return Value.Bool(false);
		case "null":
			return Value.Null();
	}

	if (INTEGER_PATTERN.test(text)) {
		const parsed = Number(text);
		return Number.isSafeInteger(parsed)
			? Value.Int(parsed)
			: Value.Float(parsed);
	}

	const float = parseFloatLiteral(text);
	if (float !== undefined) {
		return Value.Float(float);
	}

	return Value.String(text);
};
