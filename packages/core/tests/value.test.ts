import { describe, expect, it } from "vitest";
import { UnrepresentableValueError } from "../src/errors/config-errors.js";
import {
	fromJs,
	isMapping,
	isScalar,
	isSequence,
	toJs,
	Value,
} from "../src/value.js";

describe("fromJs", () => {
	it("maps plain data onto the tagged union", () => {
		expect(
			fromJs({ a: 1, b: 1.5, c: [true, null], d: "x", e: undefined }),
		).toEqual(
			Value.Mapping([
				["a", Value.Int(1)],
				["b", Value.Float(1.5)],
				["c", Value.Sequence([Value.Bool(true), Value.Null()])],
				["d", Value.String("x")],
				["e", Value.Null()],
			]),
		);
	});

	it("keeps object key order", () => {
		const value = fromJs({ zeta: 1, alpha: 2, mid: 3 });
		expect(isMapping(value) && Array.from(value.entries.keys())).toEqual([
			"zeta",
			"alpha",
			"mid",
		]);
	});

	it("tags numbers outside the safe integer range as Float", () => {
		expect(fromJs(2 ** 53)).toEqual(Value.Float(2 ** 53));
		expect(fromJs(-0.25)).toEqual(Value.Float(-0.25));
	});

	it("accepts objects without a prototype", () => {
		const bare: Record<string, unknown> = Object.create(null);
		bare.key = "value";
		expect(fromJs(bare)).toEqual(
			Value.Mapping([["key", Value.String("value")]]),
		);
	});

	it("rejects data without a representation and names where it sits", () => {
		expect(() => fromJs(new Date(0))).toThrow(UnrepresentableValueError);
		expect(() => fromJs(new Date(0))).toThrow(
			"Cannot represent Date at (root)",
		);
		expect(() => fromJs({ a: [1, () => 1] })).toThrow(
			"Cannot represent function at a[1]",
		);
		expect(() => fromJs({ outer: { n: 10n } })).toThrow(
			"Cannot represent bigint at outer.n",
		);
	});

	it("rejects an object whose prototype chain has no constructor", () => {
		const orphan = Object.create(Object.create(null));
		expect(() => fromJs({ a: orphan })).toThrow(UnrepresentableValueError);
		expect(() => fromJs({ a: orphan })).toThrow("Cannot represent object at a");
	});
});

describe("toJs", () => {
	it("converts a tree back to plain data", () => {
		const value = Value.Mapping([
			["port", Value.Int(993)],
			["threshold", Value.Float(0.5)],
			["tags", Value.Sequence([Value.String("a"), Value.Null()])],
		]);

		expect(toJs(value)).toEqual({
			port: 993,
			threshold: 0.5,
			tags: ["a", null],
		});
	});
});

describe("guards", () => {
	it("tell collections from scalars", () => {
		expect(isMapping(Value.Mapping())).toBe(true);
		expect(isSequence(Value.Sequence())).toBe(true);
		expect(isScalar(Value.Null())).toBe(true);
		expect(isScalar(Value.Sequence())).toBe(false);
	});
});
