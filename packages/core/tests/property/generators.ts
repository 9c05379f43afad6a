/**
 * Shared constants and generators for property-based testing.
 *
 * The trees generated here stay inside what the block format can carry:
 * no empty collections, no sequence directly inside a sequence, no line
 * breaks in strings, keys the writer accepts.
 */

import * as fc from "fast-check";
import {
	type MappingValue,
	type ScalarValue,
	type SequenceValue,
	Value,
} from "../../src/value.js";

/**
 * Default number of runs per property test.
 */
export const DEFAULT_NUM_RUNS = 100;

/**
 * Get the number of runs for property tests.
 * Reads from FC_NUM_RUNS environment variable if set, otherwise returns DEFAULT_NUM_RUNS.
 *
 * @example
 * // In shell: FC_NUM_RUNS=1000 npm test
 * // In test: fc.assert(fc.property(...), { numRuns: getNumRuns() })
 */
export const getNumRuns = (): number => {
	const envValue = process.env.FC_NUM_RUNS;
	if (envValue === undefined || envValue === "") {
		return DEFAULT_NUM_RUNS;
	}
	const parsed = Number.parseInt(envValue, 10);
	if (Number.isNaN(parsed) || parsed <= 0) {
		return DEFAULT_NUM_RUNS;
	}
	return parsed;
};

// ============================================================================
// Text
// ============================================================================

const STRING_CHARACTERS = [
	..."abcxyzABC019",
	" ",
	"-",
	".",
	"_",
	"/",
	"\\",
	":",
	"#",
	'"',
	"'",
	"@",
	"[",
	"]",
	",",
	"\t",
	"é",
	"🙂",
];

const KEY_CHARACTERS = [..."abcdefxyz_019", "-", ".", " ", "#", "/"];

const textOf = (
	characters: ReadonlyArray<string>,
	constraints: { minLength?: number; maxLength?: number },
): fc.Arbitrary<string> =>
	fc
		.array(fc.constantFrom(...characters), constraints)
		.map((chars) => chars.join(""));

/**
 * Strings that may need quoting, including keyword and number look-alikes.
 */
export const stringArbitrary: fc.Arbitrary<string> = fc.oneof(
	textOf(STRING_CHARACTERS, { maxLength: 12 }),
	fc.constantFrom("true", "False", "null", "yes", "off", "587", "0.5", "1e3", "inf", "nan", "- item", ""),
);

/**
 * Keys the writer accepts: non-empty, no surrounding whitespace, no colon,
 * no leading comment marker or sequence marker.
 */
export const keyArbitrary: fc.Arbitrary<string> = textOf(KEY_CHARACTERS, {
	minLength: 1,
	maxLength: 8,
}).filter(
	(key) =>
		key.trim() === key && !key.startsWith("#") && !key.startsWith("- "),
);

// ============================================================================
// Values
// ============================================================================

export const scalarArbitrary: fc.Arbitrary<ScalarValue> = fc.oneof(
	fc.constant(Value.Null()),
	fc.boolean().map(Value.Bool),
	fc.maxSafeInteger().map(Value.Int),
	fc.double({ noNaN: true }).map(Value.Float),
	stringArbitrary.map(Value.String),
);

const mappingOf = (
	value: fc.Arbitrary<Value>,
	minLength: number,
): fc.Arbitrary<MappingValue> =>
	fc
		.uniqueArray(fc.tuple(keyArbitrary, value), {
			selector: ([key]) => key,
			minLength,
			maxLength: 4,
		})
		.map((entries) => Value.Mapping(entries));

const valueArbitrary = (depth: number): fc.Arbitrary<Value> =>
	depth <= 0
		? scalarArbitrary
		: fc.oneof(
				{ weight: 3, arbitrary: scalarArbitrary },
				{ weight: 1, arbitrary: mappingOf(valueArbitrary(depth - 1), 1) },
				{ weight: 1, arbitrary: sequenceArbitrary(depth - 1) },
			);

const sequenceArbitrary = (depth: number): fc.Arbitrary<SequenceValue> =>
	fc.oneof(
		fc
			.array(scalarArbitrary, { minLength: 1, maxLength: 4 })
			.map((items) => Value.Sequence(items)),
		fc
			.array(mappingOf(valueArbitrary(depth), 1), {
				minLength: 1,
				maxLength: 3,
			})
			.map((items) => Value.Sequence(items)),
	);

/**
 * Document roots up to three levels deep. The root itself may be empty.
 */
export const documentArbitrary: fc.Arbitrary<MappingValue> = mappingOf(
	valueArbitrary(2),
	0,
);

// ============================================================================
// Comparison
// ============================================================================

/**
 * Flattens a tree into arrays so that equality also checks key order,
 * which `toEqual` on a Map does not.
 */
export const ordered = (value: Value): unknown => {
	switch (value._tag) {
		case "Mapping":
			return Array.from(value.entries, ([key, item]) => [key, ordered(item)]);
		case "Sequence":
			return value.items.map(ordered);
		default:
			return value;
	}
};
