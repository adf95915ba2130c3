import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import path from "path";
import { fileURLToPath } from "url";
import { formatValidationReport, validateFiles, ValidationReport } from "../../../src/commands/validate.js";

const fixturesDir = fileURLToPath(new URL("../../fixtures", import.meta.url));
const englishFile = path.join(fixturesDir, "localisation", "events_l_english.yml");
const germanFile = path.join(fixturesDir, "localisation", "events_l_german.yml");
const brokenFile = path.join(fixturesDir, "broken", "broken_l_english.yml");
const missingFile = path.join(fixturesDir, "missing_l_english.yml");

describe("validateFiles", () => {
	beforeEach(() => {
		vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should collect every issue and keep going after unreadable files", async () => {
		const report = await validateFiles([englishFile, brokenFile, missingFile], { concurrency: 2 });

		expect(report.valid).toBe(false);
		expect(report.totalIssues).toBe(2);
		expect(report.files.map((file) => file.filePath)).toEqual([englishFile, brokenFile, missingFile]);

		expect(report.files[0]).toEqual({
			filePath: englishFile,
			valid: true,
			languages: ["english"],
			units: 6,
			issues: [],
		});
		expect(report.files[1].valid).toBe(false);
		expect(report.files[1].units).toBe(1);
		expect(report.files[1].issues.map((issue) => issue.line)).toEqual([3, 4]);
		expect(report.files[2].valid).toBe(false);
		expect(report.files[2].error).toBe(`Localisation file not found: ${missingFile}`);
		expect(console.error).toHaveBeenCalledWith(`ERROR: Localisation file not found: ${missingFile}`);
	});

	it("should pass clean files", async () => {
		const report = await validateFiles([englishFile, germanFile]);

		expect(report.valid).toBe(true);
		expect(report.files[1].languages).toEqual(["german"]);
		expect(report.files[1].units).toBe(3);
	});

	it("should count repeated headers separately when asked", async () => {
		const report = await validateFiles([germanFile], { duplicateHeaders: "separate" });

		expect(report.files[0].languages).toEqual(["german", "german"]);
	});
});

describe("formatValidationReport", () => {
	it("should list files and their malformed lines", () => {
		const report: ValidationReport = {
			valid: false,
			totalIssues: 1,
			files: [
				{ filePath: "a.yml", valid: true, languages: ["english"], units: 2, issues: [] },
				{
					filePath: "b.yml",
					valid: false,
					languages: ["english"],
					units: 0,
					issues: [{ line: 4, lang: "english", text: "oops", reason: "missing-closing-quote" }],
				},
				{ filePath: "c.yml", valid: false, languages: [], units: 0, issues: [], error: "unreadable" },
			],
		};

		expect(formatValidationReport(report)).toEqual([
			"OK   a.yml (2 units, english)",
			"FAIL b.yml",
			"  line 4 [l_english] missing-closing-quote: oops",
			"FAIL c.yml: unreadable",
			"",
			"3 file(s) checked, 2 invalid, 1 malformed line(s)",
		]);
	});
});
