import { LocalisationParser } from "../core/parser/localisation-parser.js";
import { FormatFactory } from "../core/adapters/factory.js";
import { FileFormatAdapter } from "../core/adapters/base-adapter.js";
import { FileManager } from "../utils/file-manager.js";
import { getLogger } from "../utils/logger.js";
import { ParseResult, ParserOptions } from "../types/index.js";

export interface ParseCommandOptions extends ParserOptions {
	/**
	 * Output format; defaults to the extension of `outFile`, then `defaultFormat`
	 */
	format?: string;
	/**
	 * Used when neither `format` nor the `outFile` extension names a format
	 * @default "json"
	 */
	defaultFormat?: string;
	indent?: number;
	outFile?: string;
}

export interface ParseFileResult extends ParseResult {
	filePath: string;
	format: string;
	output: string;
}

const selectAdapter = (options: ParseCommandOptions): FileFormatAdapter => {
	if (options.format) return FormatFactory.getAdapterByFormat(options.format);
	const byExtension = options.outFile ? FormatFactory.findAdapter(options.outFile) : undefined;
	if (byExtension) return byExtension;
	return FormatFactory.getAdapterByFormat(options.defaultFormat || "json");
};

/**
 * Read one localisation file, parse it and serialize the result.
 * Writes the output to `outFile` when given.
 */
export async function parseFile(
	filePath: string,
	options: ParseCommandOptions = {}
): Promise<ParseFileResult> {
	const logger = getLogger();
	const adapter = selectAdapter(options);

	const content = await FileManager.readLocalisationFile(filePath);
	const parser = new LocalisationParser({
		mode: options.mode,
		duplicateHeaders: options.duplicateHeaders,
	});
	const { localizations, issues } = parser.parse(content);

	for (const issue of issues) {
		await logger.warn(`${filePath}:${issue.line} skipped (${issue.reason}): ${issue.text}`);
	}

	const output = await adapter.serialize(localizations, { indent: options.indent });
	await logger.debug(
		`Parsed ${localizations.length} language(s) from ${filePath} as ${adapter.format}`
	);

	if (options.outFile) {
		await FileManager.writeOutput(options.outFile, output);
		await logger.info(`Wrote ${options.outFile}`);
	}

	return { filePath, format: adapter.format, output, localizations, issues };
}
