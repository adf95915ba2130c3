import {
	DuplicateHeaderStrategy,
	Localization,
	LocalizationUnit,
	ParseIssue,
	ParseMode,
	ParseResult,
	ParserOptions,
} from "../../types/index.js";
import ErrorHelper from "../../utils/error-helper.js";
import { scanUnitLine } from "./unit-line.js";

export const HEADER_PREFIX = "l_";
const COMMENT_PREFIX = "#";

interface LanguageGroup {
	lang: string;
	units: LocalizationUnit[];
}

/**
 * Split content into lines. A trailing `\r` is stripped from every line and a
 * trailing newline does not produce a final empty line.
 */
export function splitLines(content: string): string[] {
	if (content.length === 0) return [];

	const lines = content
		.split("\n")
		.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
	if (content.endsWith("\n")) {
		lines.pop();
	}
	return lines;
}

export function isHeaderLine(line: string): boolean {
	return line.startsWith(HEADER_PREFIX);
}

/**
 * `l_english:` -> `english`
 */
export function headerLanguage(line: string): string {
	const name = line.slice(HEADER_PREFIX.length).trimEnd();
	return name.endsWith(":") ? name.slice(0, -1) : name;
}

/**
 * Parser for `l_<language>:` localisation files.
 *
 * Lines before the first header are ignored. Every other line belongs to the
 * closest header above it. Results keep the order in which languages first appear.
 */
export class LocalisationParser {
	private readonly mode: ParseMode;
	private readonly duplicateHeaders: DuplicateHeaderStrategy;

	constructor(options: ParserOptions = {}) {
		this.mode = options.mode || "strict";
		this.duplicateHeaders = options.duplicateHeaders || "merge";
	}

	/**
	 * Parse the full file content.
	 * In strict mode the first malformed unit line throws ERR_MALFORMED_UNIT_LINE;
	 * in lenient mode it is skipped and reported in `issues`.
	 */
	parse(content: string): ParseResult {
		const lines = splitLines(content);
		const headers: number[] = [];
		lines.forEach((line, index) => {
			if (isHeaderLine(line)) headers.push(index);
		});

		const groups: LanguageGroup[] = [];
		const byLang = new Map<string, LanguageGroup>();
		const issues: ParseIssue[] = [];

		headers.forEach((headerIndex, i) => {
			const end = i === headers.length - 1 ? lines.length : headers[i + 1];
			const lang = headerLanguage(lines[headerIndex]);

			let group = this.duplicateHeaders === "merge" ? byLang.get(lang) : undefined;
			if (!group) {
				group = { lang, units: [] };
				groups.push(group);
				byLang.set(lang, group);
			}

			for (let index = headerIndex + 1; index < end; index++) {
				const issue = this.parseLine(lines[index], index + 1, group);
				if (issue) issues.push(issue);
			}
		});

		return {
			localizations: groups.map(({ lang, units }) => ({ lang, units })),
			issues,
		};
	}

	private parseLine(raw: string, lineNumber: number, group: LanguageGroup): ParseIssue | null {
		const text = raw.trim();
		if (text.length === 0 || text.startsWith(COMMENT_PREFIX)) {
			return null;
		}

		const result = scanUnitLine(text);
		if (result.ok) {
			group.units.push(result.unit);
			return null;
		}

		if (this.mode === "strict") {
			throw ErrorHelper.malformedLineError(lineNumber, group.lang, text, result.reason);
		}
		return { line: lineNumber, lang: group.lang, text, reason: result.reason };
	}
}

/**
 * Parse localisation content into one Localization per language.
 * Throws on the first malformed unit line unless `mode: "lenient"` is given.
 */
export function parse(content: string, options: ParserOptions = {}): Localization[] {
	return new LocalisationParser(options).parse(content).localizations;
}
