import { describe, expect, it } from "vitest";
import {
	formatScalar,
	parseFloatLiteral,
	parseScalar,
	quoteIfNeeded,
	unescapeQuoted,
} from "../src/codec/scalar.js";
import { Value } from "../src/value.js";

// ============================================================================
// parseScalar
// ============================================================================

describe("parseScalar", () => {
	it("reads integers as Int", () => {
		expect(parseScalar("587")).toEqual(Value.Int(587));
		expect(parseScalar("-12")).toEqual(Value.Int(-12));
		expect(parseScalar("+5")).toEqual(Value.Int(5));
	});

	it("reads decimal and exponent forms as Float", () => {
		expect(parseScalar("0.5")).toEqual(Value.Float(0.5));
		expect(parseScalar(".5")).toEqual(Value.Float(0.5));
		expect(parseScalar("1e3")).toEqual(Value.Float(1000));
		expect(parseScalar("2.0")).toEqual(Value.Float(2));
		expect(parseScalar("-0.0")).toEqual(Value.Float(-0));
	});

	it("reads inf and nan in any case", () => {
		expect(parseScalar("inf")).toEqual(Value.Float(Number.POSITIVE_INFINITY));
		expect(parseScalar("-Infinity")).toEqual(
			Value.Float(Number.NEGATIVE_INFINITY),
		);
		const nan = parseScalar("NaN");
		expect(nan._tag).toBe("Float");
		expect(nan._tag === "Float" && Number.isNaN(nan.value)).toBe(true);
	});

	it("reads integers beyond the safe range as Float", () => {
		expect(parseScalar("9007199254740993")._tag).toBe("Float");
		expect(parseScalar("9007199254740991")).toEqual(
			Value.Int(9007199254740991),
		);
	});

	it("recognizes only true, false and null as keywords", () => {
		expect(parseScalar("true")).toEqual(Value.Bool(true));
		expect(parseScalar("FALSE")).toEqual(Value.Bool(false));
		expect(parseScalar("Null")).toEqual(Value.Null());
		expect(parseScalar("yes")).toEqual(Value.String("yes"));
		expect(parseScalar("off")).toEqual(Value.String("off"));
	});

	it("strips matching quotes and reverses escapes", () => {
		expect(parseScalar('"true"')).toEqual(Value.String("true"));
		expect(parseScalar("'587'")).toEqual(Value.String("587"));
		expect(parseScalar('"say \\"hi\\""')).toEqual(Value.String('say "hi"'));
		expect(parseScalar('"C:\\\\mail"')).toEqual(Value.String("C:\\mail"));
		expect(parseScalar('""')).toEqual(Value.String(""));
	});

	it("trims surrounding whitespace", () => {
		expect(parseScalar("  imap.example.com  ")).toEqual(
			Value.String("imap.example.com"),
		);
		expect(parseScalar(" 42 ")).toEqual(Value.Int(42));
	});

	it("leaves everything else as a String", () => {
		expect(parseScalar("1.2.3")).toEqual(Value.String("1.2.3"));
		expect(parseScalar("http://example.com")).toEqual(
			Value.String("http://example.com"),
		);
		expect(parseScalar(".")).toEqual(Value.String("."));
		expect(parseScalar('"unterminated')).toEqual(
			Value.String('"unterminated'),
		);
		expect(parseScalar("")).toEqual(Value.String(""));
	});
});

describe("parseFloatLiteral", () => {
	it("returns undefined for non-float text", () => {
		expect(parseFloatLiteral("abc")).toBeUndefined();
		expect(parseFloatLiteral("1_000")).toBeUndefined();
		expect(parseFloatLiteral("")).toBeUndefined();
	});

	it("accepts integer text as a float literal", () => {
		expect(parseFloatLiteral("587")).toBe(587);
		expect(parseFloatLiteral("-INF")).toBe(Number.NEGATIVE_INFINITY);
	});
});

describe("unescapeQuoted", () => {
	it("scans escapes left to right", () => {
		expect(unescapeQuoted("a\\\\\\\"b")).toBe('a\\"b');
	});

	it("keeps a backslash before any other character", () => {
		expect(unescapeQuoted("a\\nb")).toBe("a\\nb");
		expect(unescapeQuoted("end\\")).toBe("end\\");
	});
});

// ============================================================================
// formatScalar / quoteIfNeeded
// ============================================================================

describe("formatScalar", () => {
	it("formats keywords and integers", () => {
		expect(formatScalar(Value.Null())).toBe("null");
		expect(formatScalar(Value.Bool(true))).toBe("true");
		expect(formatScalar(Value.Bool(false))).toBe("false");
		expect(formatScalar(Value.Int(993))).toBe("993");
		expect(formatScalar(Value.Int(-7))).toBe("-7");
	});

	it("keeps a decimal point on integral floats", () => {
		expect(formatScalar(Value.Float(1))).toBe("1.0");
		expect(formatScalar(Value.Float(-3))).toBe("-3.0");
		expect(formatScalar(Value.Float(-0))).toBe("-0.0");
		expect(formatScalar(Value.Float(0.5))).toBe("0.5");
		expect(formatScalar(Value.Float(1e21))).toBe("1e+21");
		expect(formatScalar(Value.Float(1e-7))).toBe("1e-7");
	});

	it("writes non-finite floats as inf and nan", () => {
		expect(formatScalar(Value.Float(Number.POSITIVE_INFINITY))).toBe("inf");
		expect(formatScalar(Value.Float(Number.NEGATIVE_INFINITY))).toBe("-inf");
		expect(formatScalar(Value.Float(Number.NaN))).toBe("nan");
	});

	it("quotes a String only when it would read back as something else", () => {
		expect(formatScalar(Value.String("imap.example.com"))).toBe(
			"imap.example.com",
		);
		expect(formatScalar(Value.String("true"))).toBe('"true"');
		expect(formatScalar(Value.String("587"))).toBe('"587"');
	});
});

describe("quoteIfNeeded", () => {
	it("quotes empty and padded strings", () => {
		expect(quoteIfNeeded("")).toBe('""');
		expect(quoteIfNeeded(" lead")).toBe('" lead"');
		expect(quoteIfNeeded("trail ")).toBe('"trail "');
	});

	it("quotes reserved words in any case", () => {
		expect(quoteIfNeeded("Yes")).toBe('"Yes"');
		expect(quoteIfNeeded("ON")).toBe('"ON"');
		expect(quoteIfNeeded("null")).toBe('"null"');
	});

	it("quotes strings holding special characters", () => {
		expect(quoteIfNeeded("a: b")).toBe('"a: b"');
		expect(quoteIfNeeded("#tag")).toBe('"#tag"');
		expect(quoteIfNeeded("me@example.com")).toBe('"me@example.com"');
		expect(quoteIfNeeded("[x]")).toBe('"[x]"');
	});

	it("quotes float-like strings", () => {
		expect(quoteIfNeeded("1e3")).toBe('"1e3"');
		expect(quoteIfNeeded("nan")).toBe('"nan"');
		expect(quoteIfNeeded("-inf")).toBe('"-inf"');
	});

	it("escapes backslashes and double quotes", () => {
		expect(quoteIfNeeded('say "hi"')).toBe('"say \\"hi\\""');
		expect(quoteIfNeeded("C:\\mail")).toBe('"C:\\\\mail"');
	});

	it("leaves other text bare", () => {
		expect(quoteIfNeeded("hello world")).toBe("hello world");
		expect(quoteIfNeeded("a\\b")).toBe("a\\b");
		expect(quoteIfNeeded("- item")).toBe("- item");
	});

	it("protects reserved-word strings through a write and read", () => {
		expect(parseScalar(formatScalar(Value.String("true")))).toEqual(
			Value.String("true"),
		);
		expect(parseScalar(formatScalar(Value.String("C:\\mail")))).toEqual(
			Value.String("C:\\mail"),
		);
	});
});
