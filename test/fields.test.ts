import { describe, expect, test } from "vitest";
import {
	dropTrailingEmpty,
	parseFloatStrict,
	splitFields,
	stripQuotes,
} from "../src/io/numeric-csv/fields.ts";

describe("splitFields", () => {
	test("splits on multi-character delimiters", () => {
		expect(splitFields("1::2::3", "::")).toEqual(["1", "2", "3"]);
	});

	test("an empty line is a single empty field", () => {
		expect(splitFields("", ",")).toEqual([""]);
	});
});

describe("dropTrailingEmpty", () => {
	test("drops exactly one trailing empty field", () => {
		const fields = ["1", "2", "", ""];
		expect(dropTrailingEmpty(fields)).toBe(true);
		expect(fields).toEqual(["1", "2", ""]);
	});

	test("leaves fields alone without a trailing delimiter", () => {
		const fields = ["1", "2"];
		expect(dropTrailingEmpty(fields)).toBe(false);
		expect(fields).toEqual(["1", "2"]);
	});
});

describe("stripQuotes", () => {
	test("removes one surrounding pair", () => {
		expect(stripQuotes('"x"')).toBe("x");
		expect(stripQuotes('""x""')).toBe('"x"');
	});

	test("leaves unquoted labels unchanged", () => {
		expect(stripQuotes("x")).toBe("x");
		expect(stripQuotes('a"b')).toBe('a"b');
	});

	test("removes unpaired quotes at either end", () => {
		expect(stripQuotes('"x')).toBe("x");
		expect(stripQuotes('x"')).toBe("x");
		expect(stripQuotes('"')).toBe("");
		expect(stripQuotes('""')).toBe("");
	});
});

describe("parseFloatStrict", () => {
	test("accepts decimal and scientific literals", () => {
		expect(parseFloatStrict("42")).toEqual({ valid: true, value: 42 });
		expect(parseFloatStrict("-3.5")).toEqual({ valid: true, value: -3.5 });
		expect(parseFloatStrict("1.5e-3")).toEqual({ valid: true, value: 0.0015 });
		expect(parseFloatStrict(".25")).toEqual({ valid: true, value: 0.25 });
		expect(parseFloatStrict("7.")).toEqual({ valid: true, value: 7 });
	});

	test("accepts signed infinities and NaN in any case", () => {
		expect(parseFloatStrict("+INF")).toEqual({ valid: true, value: Number.POSITIVE_INFINITY });
		expect(parseFloatStrict("-infinity")).toEqual({
			valid: true,
			value: Number.NEGATIVE_INFINITY,
		});
		const nan = parseFloatStrict("nan");
		expect(nan.valid).toBe(true);
		if (nan.valid) expect(nan.value).toBeNaN();
	});

	test("rejects a signed nan", () => {
		for (const text of ["+nan", "-NaN"]) {
			expect(parseFloatStrict(text)).toEqual({ valid: false, reason: "invalid syntax" });
		}
	});

	test("rejects text that Number() would coerce", () => {
		for (const text of [" 1", "1 ", "0x10", "1_000", ".", "1e", "e5", "--1"]) {
			expect(parseFloatStrict(text)).toEqual({ valid: false, reason: "invalid syntax" });
		}
	});

	test("rejects an empty field", () => {
		expect(parseFloatStrict("")).toEqual({ valid: false, reason: "empty field" });
	});

	test("rejects finite literals beyond float64 range", () => {
		expect(parseFloatStrict("1e400")).toEqual({ valid: false, reason: "value out of range" });
		expect(parseFloatStrict("1e-400")).toEqual({ valid: true, value: 0 });
	});
});
