import { describe, expect, test } from "vitest";
import { LineCursor, sourceFromString } from "../src/io/numeric-csv/line-cursor.ts";
import { unwrap } from "../src/types/result.ts";

async function drain(cursor: LineCursor): Promise<string[]> {
	const lines: string[] = [];
	while (true) {
		const line = unwrap(await cursor.next());
		if (line === null) return lines;
		lines.push(line);
	}
}

describe("LineCursor", () => {
	test("yields a final line without a terminator", async () => {
		const cursor = new LineCursor(sourceFromString("a\nb"));
		expect(await drain(cursor)).toEqual(["a", "b"]);
		expect(cursor.lineNumber).toBe(2);
	});

	test("keeps blank lines but not an empty tail", async () => {
		expect(await drain(new LineCursor(sourceFromString("a\n\n")))).toEqual(["a", ""]);
		expect(await drain(new LineCursor(sourceFromString("\n")))).toEqual([""]);
		expect(await drain(new LineCursor(sourceFromString("")))).toEqual([]);
	});

	test("joins lines split across chunks", async () => {
		const cursor = new LineCursor(["1,", "2\n3", ",4\r", "\n"]);
		expect(await drain(cursor)).toEqual(["1,2", "3,4"]);
	});

	test("flushes pending bytes before a string chunk", async () => {
		const bytes = new TextEncoder().encode("é\n");
		const cursor = new LineCursor([bytes.subarray(0, 1), "x\n"]);
		expect(await drain(cursor)).toEqual(["\uFFFDx"]);
	});

	test("removes only one carriage return", async () => {
		const cursor = new LineCursor(sourceFromString("a\r\r\n"));
		expect(await drain(cursor)).toEqual(["a\r"]);
	});

	test("reports null again after the end", async () => {
		const cursor = new LineCursor(sourceFromString("x\n"));
		await drain(cursor);
		expect(unwrap(await cursor.next())).toBeNull();
	});
});
