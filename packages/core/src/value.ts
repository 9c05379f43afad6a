import { UnrepresentableValueError } from "./errors/config-errors.js";

// ============================================================================
// Value: tagged union for one document tree
// ============================================================================

export interface NullValue {
	readonly _tag: "Null";
}

export interface BoolValue {
	readonly _tag: "Bool";
	readonly value: boolean;
}

export interface IntValue {
	readonly _tag: "Int";
	readonly value: number;
}

export interface FloatValue {
	readonly _tag: "Float";
	readonly value: number;
}

export interface StringValue {
	readonly _tag: "String";
	readonly value: string;
}

/**
 * Ordered key/value pairs. `Map` iterates in insertion order, which is the
 * order keys appeared in the file (and the persisted account order).
 */
export interface MappingValue {
	readonly _tag: "Mapping";
	readonly entries: Map<string, Value>;
}

export interface SequenceValue {
	readonly _tag: "Sequence";
	readonly items: Array<Value>;
}

export type ScalarValue =
	| NullValue
	| BoolValue
	| IntValue
	| FloatValue
	| StringValue;

export type Value = ScalarValue | MappingValue | SequenceValue;

// ============================================================================
// Constructors
// ============================================================================

const NULL: NullValue = { _tag: "Null" };

export const Value = {
	Null: (): NullValue => NULL,
	Bool: (value: boolean): BoolValue => ({ _tag: "Bool", value }),
	Int: (value: number): IntValue => ({ _tag: "Int", value }),
	Float: (value: number): FloatValue => ({ _tag: "Float", value }),
	String: (value: string): StringValue => ({ _tag: "String", value }),
	Mapping: (
		entries: Iterable<readonly [string, Value]> = [],
	): MappingValue => ({ _tag: "Mapping", entries: new Map(entries) }),
	Sequence: (items: Iterable<Value> = []): SequenceValue => ({
		_tag: "Sequence",
		items: Array.from(items),
	}),
} as const;

// ============================================================================
// Guards
// ============================================================================

export const isMapping = (value: Value): value is MappingValue =>
	value._tag === "Mapping";

export const isSequence = (value: Value): value is SequenceValue =>
	value._tag === "Sequence";

export const isScalar = (value: Value): value is ScalarValue =>
	value._tag !== "Mapping" && value._tag !== "Sequence";

// ============================================================================
// Plain JS conversion
// ============================================================================

const isPlainObject = (data: object): data is Record<string, unknown> => {
	const proto = Object.getPrototypeOf(data);
	return proto === Object.prototype || proto === null;
};

const describe = (data: unknown): string =>
	data === null
		? "null"
		: typeof data === "object"
			? (data.constructor?.name ?? "object")
			: typeof data;

const convert = (data: unknown, path: string): Value => {
	if (data === null || data === undefined) {
		return Value.Null();
	}
	switch (typeof data) {
		case "boolean":
			return Value.Bool(data);
		case "number":
			return Number.isSafeInteger(data) ? Value.Int(data) : Value.Float(data);
		case "string":
			return Value.String(data);
		case "object": {
			if (Array.isArray(data)) {
				return Value.Sequence(
					data.map((item, index) => convert(item, `${path}[${index}]`)),
				);
			}
			if (isPlainObject(data)) {
				return Value.Mapping(
					Object.entries(data).map(
						([key, item]): [string, Value] => [
							key,
							convert(item, path === "" ? key : `${path}.${key}`),
						],
					),
				);
			}
			break;
		}
	}
	throw new UnrepresentableValueError({
		path: path === "" ? "(root)" : path,
		reason: `unsupported ${describe(data)}`,
		message: `Cannot represent ${describe(data)} at ${path === "" ? "(root)" : path}`,
	});
};

/**
 * Converts plain JS data into a Value tree.
 *
 * Safe integers become Int, every other number Float. Objects must be
 * plain (`{}` literals or `Object.create(null)`); their key order is kept.
 *
 * @throws UnrepresentableValueError for functions, symbols, bigints,
 * class instances and other non-plain data
 */
export const fromJs = (data: unknown): Value => convert(data, "");

/**
 * Converts a Value tree back into plain JS data. Mappings become plain
 * objects, Int and Float both become numbers.
 */
export const toJs = (value: Value): unknown => {
	switch (value._tag) {
		case "Null":
			return null;
		case "Bool":
		case "Int":
		case "Float":
		case "String":
			return value.value;
		case "Sequence":
			return value.items.map(toJs);
		case "Mapping": {
			const result: Record<string, unknown> = {};
			for (const [key, item] of value.entries) {
				result[key] = toJs(item);
			}
			return result;
		}
	}
};
