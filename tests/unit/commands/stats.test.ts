import { describe, it, expect } from "vitest";
import path from "path";
import { fileURLToPath } from "url";
import { collectStats, formatStats } from "../../../src/commands/stats.js";

const localisationDir = fileURLToPath(new URL("../../fixtures/localisation", import.meta.url));
const files = ["events_l_english.yml", "events_l_german.yml", "misc_l_polish.yml"].map((name) =>
	path.join(localisationDir, name)
);

describe("collectStats", () => {
	it("should summarise each language in order of appearance", async () => {
		const report = await collectStats(files, { concurrency: 2 });

		expect(report).toEqual({
			files: 3,
			languages: [
				{
					lang: "english",
					files: 1,
					units: 6,
					versioned: 3,
					emptyGroups: 0,
					duplicateKeys: ["harbour.1.a"],
				},
				{ lang: "german", files: 1, units: 3, versioned: 2, emptyGroups: 0, duplicateKeys: [] },
				{ lang: "polish", files: 1, units: 0, versioned: 0, emptyGroups: 1, duplicateKeys: [] },
			],
		});
	});

	it("should find duplicate keys across files of the same language", async () => {
		const report = await collectStats([files[0], files[0]]);

		expect(report.languages).toHaveLength(1);
		expect(report.languages[0].files).toBe(1);
		expect(report.languages[0].units).toBe(12);
		expect(report.languages[0].duplicateKeys).toEqual([
			"harbour.1.a",
			"harbour.1.t",
			"harbour.1.d",
			"market.2.t",
			"market.2.a",
		]);
	});

	it("should fail on malformed files in strict mode", async () => {
		const broken = fileURLToPath(new URL("../../fixtures/broken/broken_l_english.yml", import.meta.url));

		await expect(collectStats([broken])).rejects.toMatchObject({ code: "ERR_MALFORMED_UNIT_LINE" });
	});
});

describe("formatStats", () => {
	it("should render an aligned table", () => {
		const lines = formatStats({
			files: 2,
			languages: [
				{ lang: "english", files: 2, units: 12, versioned: 3, emptyGroups: 0, duplicateKeys: ["a"] },
				{ lang: "polish", files: 1, units: 0, versioned: 0, emptyGroups: 1, duplicateKeys: [] },
			],
		});

		expect(lines).toEqual([
			"2 file(s), 2 language(s)",
			"language  files  units  versioned  empty  duplicates",
			"english   2      12     3          0      1",
			"polish    1      0      0          1      0",
		]);
	});
});
