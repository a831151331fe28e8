import { describe, expect, test } from "vitest";
import { OptionsError } from "../src/errors/index.ts";
import { TolerantRecordReader } from "../src/io/numeric-csv/reader.ts";
import { DEFAULT_NUMERIC_CSV_OPTIONS, resolveOptions } from "../src/io/numeric-csv/options.ts";

describe("resolveOptions", () => {
	test("applies defaults", () => {
		expect(resolveOptions()).toEqual({
			fieldDelimiter: ",",
			headingDelimiter: ",",
			allowTrailingDelimiter: false,
			commentPrefix: "",
			expectedFieldCount: 0,
			skipHeading: false,
		});
		expect(DEFAULT_NUMERIC_CSV_OPTIONS.headingDelimiter).toBe("");
	});

	test("headingDelimiter falls back to fieldDelimiter", () => {
		expect(resolveOptions({ fieldDelimiter: "|" }).headingDelimiter).toBe("|");
		expect(resolveOptions({ fieldDelimiter: "|", headingDelimiter: "" }).headingDelimiter).toBe("|");
		expect(resolveOptions({ fieldDelimiter: "|", headingDelimiter: ";" }).headingDelimiter).toBe(";");
	});

	test("resolved options are frozen", () => {
		expect(Object.isFrozen(resolveOptions({ commentPrefix: "#" }))).toBe(true);
	});

	test("rejects an empty fieldDelimiter", () => {
		expect(() => resolveOptions({ fieldDelimiter: "" })).toThrow(OptionsError);
	});

	test("rejects a negative or fractional expectedFieldCount", () => {
		expect(() => resolveOptions({ expectedFieldCount: -1 })).toThrow(OptionsError);
		expect(() => resolveOptions({ expectedFieldCount: 1.5 })).toThrow(OptionsError);
	});

	test("the reader constructor validates options", () => {
		expect(() => TolerantRecordReader.fromString("1\n", { fieldDelimiter: "" })).toThrow(
			OptionsError,
		);
	});

	test("a configured field count is visible before reading", () => {
		const reader = TolerantRecordReader.fromString("1,2\n", { expectedFieldCount: 2 });
		expect(reader.fieldCount).toBe(2);
		expect(reader.state).toBe("fresh");
	});
});
