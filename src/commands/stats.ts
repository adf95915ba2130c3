import pLimit from "p-limit";
import { LocalisationParser } from "../core/parser/localisation-parser.js";
import { FileManager } from "../utils/file-manager.js";
import { Localization, ParserOptions } from "../types/index.js";

export interface StatsOptions extends ParserOptions {
	concurrency?: number;
}

export interface LanguageStats {
	lang: string;
	files: number;
	units: number;
	versioned: number;
	emptyGroups: number;
	/** Keys defined more than once for this language across the scanned files */
	duplicateKeys: string[];
}

export interface StatsReport {
	files: number;
	languages: LanguageStats[];
}

interface LanguageAccumulator extends LanguageStats {
	seenKeys: Set<string>;
	fileSet: Set<string>;
}

/**
 * Summarise parsed files per language. Languages are listed in the order
 * they first appear across the given files.
 */
export async function collectStats(
	filePaths: string[],
	options: StatsOptions = {}
): Promise<StatsReport> {
	const limit = pLimit(options.concurrency || 4);
	const parser = new LocalisationParser({
		mode: options.mode,
		duplicateHeaders: options.duplicateHeaders,
	});

	const parsed = await Promise.all(
		filePaths.map((filePath) =>
			limit(async (): Promise<[string, Localization[]]> => {
				const content = await FileManager.readLocalisationFile(filePath);
				return [filePath, parser.parse(content).localizations];
			})
		)
	);

	const byLang = new Map<string, LanguageAccumulator>();

	for (const [filePath, localizations] of parsed) {
		for (const { lang, units } of localizations) {
			let acc = byLang.get(lang);
			if (!acc) {
				acc = {
					lang,
					files: 0,
					units: 0,
					versioned: 0,
					emptyGroups: 0,
					duplicateKeys: [],
					seenKeys: new Set(),
					fileSet: new Set(),
				};
				byLang.set(lang, acc);
			}

			acc.fileSet.add(filePath);
			acc.units += units.length;
			if (units.length === 0) acc.emptyGroups++;

			for (const unit of units) {
				if (unit.version !== undefined) acc.versioned++;
				if (acc.seenKeys.has(unit.key)) {
					if (!acc.duplicateKeys.includes(unit.key)) acc.duplicateKeys.push(unit.key);
				} else {
					acc.seenKeys.add(unit.key);
				}
			}
		}
	}

	const languages = [...byLang.values()].map(({ seenKeys, fileSet, ...stats }) => ({
		...stats,
		files: fileSet.size,
	}));

	return { files: filePaths.length, languages };
}

/**
 * Render a stats report as an aligned table.
 */
export function formatStats(report: StatsReport): string[] {
	const header = ["language", "files", "units", "versioned", "empty", "duplicates"];
	const rows = report.languages.map((l) => [
		l.lang,
		String(l.files),
		String(l.units),
		String(l.versioned),
		String(l.emptyGroups),
		String(l.duplicateKeys.length),
	]);
	const widths = header.map((title, i) =>
		Math.max(title.length, ...rows.map((row) => row[i].length))
	);
	const render = (row: string[]) =>
		row
			.map((cell, i) => cell.padEnd(widths[i]))
			.join("  ")
			.trimEnd();

	return [
		`${report.files} file(s), ${report.languages.length} language(s)`,
		render(header),
		...rows.map(render),
	];
}
