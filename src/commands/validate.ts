import pLimit from "p-limit";
import { LocalisationParser } from "../core/parser/localisation-parser.js";
import { FileManager } from "../utils/file-manager.js";
import { getLogger } from "../utils/logger.js";
import { DuplicateHeaderStrategy, ParseIssue } from "../types/index.js";

export interface ValidateOptions {
	concurrency?: number;
	duplicateHeaders?: DuplicateHeaderStrategy;
}

export interface FileValidationResult {
	filePath: string;
	valid: boolean;
	languages: string[];
	units: number;
	issues: ParseIssue[];
	/** Set when the file could not be read at all */
	error?: string;
}

export interface ValidationReport {
	valid: boolean;
	files: FileValidationResult[];
	totalIssues: number;
}

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

async function validateFile(
	filePath: string,
	parser: LocalisationParser
): Promise<FileValidationResult> {
	try {
		const content = await FileManager.readLocalisationFile(filePath);
		const { localizations, issues } = parser.parse(content);
		return {
			filePath,
			valid: issues.length === 0,
			languages: localizations.map((l) => l.lang),
			units: localizations.reduce((sum, l) => sum + l.units.length, 0),
			issues,
		};
	} catch (error: unknown) {
		return {
			filePath,
			valid: false,
			languages: [],
			units: 0,
			issues: [],
			error: errorMessage(error),
		};
	}
}

/**
 * Parse every file leniently and collect all malformed lines.
 * Unreadable files are reported per file and do not stop the run.
 */
export async function validateFiles(
	filePaths: string[],
	options: ValidateOptions = {}
): Promise<ValidationReport> {
	const logger = getLogger();
	const limit = pLimit(options.concurrency || 4);
	const parser = new LocalisationParser({
		mode: "lenient",
		duplicateHeaders: options.duplicateHeaders,
	});

	const files = await Promise.all(
		filePaths.map((filePath) => limit(() => validateFile(filePath, parser)))
	);

	for (const file of files) {
		if (file.error) {
			await logger.error(file.error);
		}
	}

	const totalIssues = files.reduce((sum, file) => sum + file.issues.length, 0);
	await logger.debug(`Validated ${files.length} file(s), ${totalIssues} issue(s)`);

	return {
		valid: files.every((file) => file.valid),
		files,
		totalIssues,
	};
}

/**
 * Render a validation report as console lines.
 */
export function formatValidationReport(report: ValidationReport): string[] {
	const lines: string[] = [];

	for (const file of report.files) {
		if (file.error) {
			lines.push(`FAIL ${file.filePath}: ${file.error}`);
			continue;
		}
		if (file.valid) {
			const languages = file.languages.join(", ") || "no languages";
			lines.push(`OK   ${file.filePath} (${file.units} units, ${languages})`);
			continue;
		}
		lines.push(`FAIL ${file.filePath}`);
		for (const issue of file.issues) {
			lines.push(`  line ${issue.line} [l_${issue.lang}] ${issue.reason}: ${issue.text}`);
		}
	}

	const failed = report.files.filter((file) => !file.valid).length;
	lines.push("");
	lines.push(
		`${report.files.length} file(s) checked, ${failed} invalid, ` +
			`${report.totalIssues} malformed line(s)`
	);
	return lines;
}
