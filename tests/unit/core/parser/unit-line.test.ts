import { describe, it, expect } from "vitest";
import { scanUnitLine } from "../../../../src/core/parser/unit-line.js";

describe("scanUnitLine", () => {
	it("should read key, version and value", () => {
		expect(scanUnitLine('harbour.1.t:0 "A Quiet Harbour"')).toStrictEqual({
			ok: true,
			unit: { key: "harbour.1.t", version: 0, value: "A Quiet Harbour" },
		});
	});

	it("should leave the version out when no digits follow the colon", () => {
		expect(scanUnitLine('harbour.1.a: "Buy the nets"')).toStrictEqual({
			ok: true,
			unit: { key: "harbour.1.a", value: "Buy the nets" },
		});
	});

	it("should split on the colon directly in front of the version", () => {
		expect(scanUnitLine('event:option:1 "x"')).toEqual({
			ok: true,
			unit: { key: "event:option", version: 1, value: "x" },
		});
	});

	it("should accept a tab as separator", () => {
		expect(scanUnitLine('k:1\t"x"')).toEqual({
			ok: true,
			unit: { key: "k", version: 1, value: "x" },
		});
	});

	it("should close the value at the last quote of the line", () => {
		expect(scanUnitLine('k: "say "hi""')).toEqual({
			ok: true,
			unit: { key: "k", value: 'say "hi"' },
		});
	});

	it("should skip quotes that cannot open a value", () => {
		expect(scanUnitLine('a"b: "x"')).toEqual({
			ok: true,
			unit: { key: 'a"b', value: "x" },
		});
	});

	it("should accept the largest 32-bit version", () => {
		expect(scanUnitLine('k:2147483647 "x"')).toEqual({
			ok: true,
			unit: { key: "k", version: 2147483647, value: "x" },
		});
	});

	it.each([
		['key: "unterminated', "missing-closing-quote"],
		['key: value"', "missing-opening-quote"],
		['key:abc "x"', "missing-key-separator"],
		['key "x"', "missing-key-separator"],
		['key:"x"', "missing-key-separator"],
		[': "x"', "empty-key"],
		['key:99999999999 "x"', "version-out-of-range"],
	])("should reject %s as %s", (line, reason) => {
		expect(scanUnitLine(line)).toEqual({ ok: false, reason });
	});
});
