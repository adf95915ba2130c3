import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { parseFile } from "../../../src/commands/parse.js";

const fixturesDir = fileURLToPath(new URL("../../fixtures", import.meta.url));
const englishFile = path.join(fixturesDir, "localisation", "events_l_english.yml");
const brokenFile = path.join(fixturesDir, "broken", "broken_l_english.yml");

describe("parseFile", () => {
	beforeEach(() => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should parse a file and serialize it as JSON by default", async () => {
		const result = await parseFile(englishFile);

		expect(result.format).toBe("json");
		expect(result.issues).toEqual([]);
		expect(result.localizations).toHaveLength(1);
		expect(result.localizations[0].lang).toBe("english");
		expect(result.localizations[0].units).toHaveLength(6);
		expect(result.localizations[0].units[1]).toEqual({
			key: "harbour.1.d",
			version: 0,
			value: "The fishing fleet returns early.\\nThe captain asks for new nets.",
		});
		expect(result.output).toBe(`${JSON.stringify(result.localizations, null, 2)}\n`);
	});

	it("should fall back to the default format without an output file", async () => {
		const result = await parseFile(englishFile, { defaultFormat: "yaml" });

		expect(result.format).toBe("yaml");
		expect(result.output.startsWith("- lang: english\n")).toBe(true);
	});

	it("should fail on the first malformed line in strict mode", async () => {
		await expect(parseFile(brokenFile)).rejects.toMatchObject({
			code: "ERR_MALFORMED_UNIT_LINE",
			details: { line: 3, lang: "english", reason: "missing-closing-quote" },
		});
	});

	it("should report skipped lines in lenient mode", async () => {
		const result = await parseFile(brokenFile, { mode: "lenient" });

		expect(result.localizations).toEqual([
			{ lang: "english", units: [{ key: "fine.key", value: "Fine" }] },
		]);
		expect(result.issues.map((issue) => [issue.line, issue.reason])).toEqual([
			[3, "missing-closing-quote"],
			[4, "missing-key-separator"],
		]);
		expect(console.warn).toHaveBeenCalledTimes(2);
	});

	it("should reject an unknown format before reading the file", async () => {
		const missing = path.join(fixturesDir, "missing.yml");

		await expect(parseFile(missing, { format: "xml" })).rejects.toMatchObject({
			code: "ERR_UNSUPPORTED_FORMAT",
		});
	});

	describe("with an output file", () => {
		let dir: string;

		beforeEach(async () => {
			dir = await fs.mkdtemp(path.join(os.tmpdir(), "hoi-loc-parse-"));
		});

		afterEach(async () => {
			await fs.rm(dir, { recursive: true, force: true });
		});

		it("should pick the format from the extension and write the output", async () => {
			const outFile = path.join(dir, "english.yaml");
			const result = await parseFile(englishFile, { outFile });

			expect(result.format).toBe("yaml");
			expect(result.output).toContain("- lang: english");
			expect(await fs.readFile(outFile, "utf8")).toBe(result.output);
		});

		it("should prefer an explicit format over the extension", async () => {
			const outFile = path.join(dir, "english.yaml");
			const result = await parseFile(englishFile, { outFile, format: "json" });

			expect(result.format).toBe("json");
			expect(await fs.readFile(outFile, "utf8")).toBe(
				`${JSON.stringify(result.localizations, null, 2)}\n`
			);
		});

		it("should use the default format for an unknown extension", async () => {
			const outFile = path.join(dir, "english.txt");
			const result = await parseFile(englishFile, { outFile, defaultFormat: "yaml" });

			expect(result.format).toBe("yaml");
			expect(await fs.readFile(outFile, "utf8")).toContain("- lang: english");
		});
	});
});
