import { HoiLocConfig } from "../config/index.js";
import { FileManager } from "../utils/file-manager.js";
import ErrorHelper from "../utils/error-helper.js";
import { ParseCommandOptions } from "../commands/parse.js";
import { DuplicateHeaderStrategy, ParseMode } from "../types/index.js";

export interface CliParserFlags {
	lenient?: boolean;
	separateHeaders?: boolean;
}

export interface CliParseFlags extends CliParserFlags {
	format?: string;
	out?: string;
	indent?: number;
}

export interface CliParserSettings {
	mode: ParseMode;
	duplicateHeaders: DuplicateHeaderStrategy;
}

/**
 * Command line flags win over the configured parser settings.
 */
export const resolveParserSettings = (
	config: HoiLocConfig,
	flags: CliParserFlags = {}
): CliParserSettings => ({
	mode: flags.lenient ? "lenient" : config.parser?.mode || "strict",
	duplicateHeaders: flags.separateHeaders
		? "separate"
		: config.parser?.duplicateHeaders || "merge",
});

/**
 * Options for the parse command. The output format is taken from `--format`,
 * then the `--out` extension, then `output.format`.
 */
export const resolveParseOptions = (
	config: HoiLocConfig,
	flags: CliParseFlags = {}
): ParseCommandOptions => ({
	...resolveParserSettings(config, flags),
	format: flags.format,
	defaultFormat: config.output?.format,
	indent: flags.indent ?? config.output?.indent,
	outFile: flags.out,
});

/**
 * Expand command line paths into files; falls back to the configured localisation directory.
 */
export const resolveInputs = async (paths: string[], config: HoiLocConfig): Promise<string[]> => {
	const inputs = paths.length > 0 ? paths : [config.localisationDir || "./localisation"];
	return FileManager.resolveInputFiles(inputs, config.fileExtensions);
};

export const parseConcurrency = (value: string): number => {
	const concurrency = parseInt(value, 10);
	if (isNaN(concurrency) || concurrency < 1 || concurrency > 64) {
		throw new Error("Concurrency must be a number between 1 and 64");
	}
	return concurrency;
};

export const parseIndent = (value: string): number => {
	const indent = parseInt(value, 10);
	if (isNaN(indent) || indent < 1) {
		throw new Error("Indent must be a positive integer");
	}
	return indent;
};

/**
 * Turn an error into the text printed by the CLI.
 */
export const formatCliError = (error: unknown, debug = false): string => {
	if (ErrorHelper.isLocalisationError(error)) {
		return ErrorHelper.formatError(error, {
			showDebug: debug,
			showSolutions: true,
			showContext: true,
		});
	}

	const message = error instanceof Error ? error.message : String(error);
	const stack = debug && error instanceof Error && error.stack ? `\n${error.stack}` : "";
	return `\nError: ${message}${stack}`;
};

/**
 * Run a command action, printing failures and exiting with status 1.
 */
export const runAction = async (action: () => Promise<void>): Promise<void> => {
	try {
		await action();
	} catch (error: unknown) {
		console.error(formatCliError(error, process.env.DEBUG === "true"));
		process.exit(1);
	}
};
