/**
 * Structured errors with explanations and suggested fixes.
 */

export type ErrorDetails = Record<string, unknown>;

interface ErrorTemplate {
	code: string;
	message: (details: ErrorDetails) => string;
	causes: string[];
	solutions: string[];
}

export interface FormatErrorOptions {
	showDebug?: boolean;
	showSolutions?: boolean;
	showContext?: boolean;
}

export class LocalisationError extends Error {
	readonly type: string;
	readonly code: string;
	readonly details: ErrorDetails;

	constructor(type: string, code: string, message: string, details: ErrorDetails = {}) {
		super(message);
		this.name = "LocalisationError";
		this.type = type;
		this.code = code;
		this.details = details;
	}
}

export const ErrorCodes = {
	MALFORMED_UNIT_LINE: "ERR_MALFORMED_UNIT_LINE",
	FILE_NOT_FOUND: "ERR_FILE_NOT_FOUND",
	FILE_READ_FAILED: "ERR_FILE_READ_FAILED",
	UNSUPPORTED_FORMAT: "ERR_UNSUPPORTED_FORMAT",
	INVALID_CONFIG: "ERR_INVALID_CONFIG",
	UNKNOWN: "ERR_UNKNOWN",
} as const;

const describeValue = (value: unknown): string =>
	typeof value === "string" ? value : JSON.stringify(value);

const TEMPLATES: Record<string, ErrorTemplate> = {
	MALFORMED_UNIT_LINE: {
		code: ErrorCodes.MALFORMED_UNIT_LINE,
		message: (d) =>
			`Malformed localisation line ${describeValue(d.line)} in l_${describeValue(d.lang)}: ` +
			`${describeValue(d.text)}${d.reason ? ` (${describeValue(d.reason)})` : ""}`,
		causes: [
			"The line is not of the form key:version \"value\"",
			"The value is missing its opening or closing double quote",
			"The colon after the key is missing or followed by something other than digits",
		],
		solutions: [
			'Rewrite the line as key:0 "value" (the version digits are optional)',
			"Comment the line out with a leading #",
			"Run with --lenient to skip malformed lines and list them instead",
		],
	},
	FILE_NOT_FOUND: {
		code: ErrorCodes.FILE_NOT_FOUND,
		message: (d) => `Localisation file not found: ${describeValue(d.filePath)}`,
		causes: ["The path is misspelled", "The localisation directory is not configured"],
		solutions: [
			"Check the path passed on the command line",
			"Set localisationDir in hoiloc.config.ts",
		],
	},
	FILE_READ_FAILED: {
		code: ErrorCodes.FILE_READ_FAILED,
		message: (d) =>
			`Could not read ${describeValue(d.filePath)}: ${describeValue(d.reason ?? "unknown error")}`,
		causes: ["Missing read permission", "The path points to a directory or special file"],
		solutions: ["Check file permissions", "Pass a regular file or a directory to scan"],
	},
	UNSUPPORTED_FORMAT: {
		code: ErrorCodes.UNSUPPORTED_FORMAT,
		message: (d) => `Unsupported output format: ${describeValue(d.format)}`,
		causes: ["Only json and yaml output are available"],
		solutions: ["Use --format json or --format yaml"],
	},
	INVALID_CONFIG: {
		code: ErrorCodes.INVALID_CONFIG,
		message: (d) =>
			`Invalid configuration value for ${describeValue(d.field)}: ${describeValue(d.value)}`,
		causes: ["A value in hoiloc.config.ts or .hoilocrc has the wrong type or is out of range"],
		solutions: [
			"Compare the value with the allowed options listed in the config type",
			"Remove the field to fall back to its default",
		],
	},
};

class ErrorHelper {
	static readonly ErrorCodes = ErrorCodes;

	/**
	 * Create an error from a template. Unknown types fall back to ERR_UNKNOWN
	 * with `details.message` as the message.
	 */
	static createError(type: string, details: ErrorDetails = {}): LocalisationError {
		const template = TEMPLATES[type];
		if (!template) {
			const message =
				typeof details.message === "string" ? details.message : "An unknown error occurred";
			return new LocalisationError("UNKNOWN", ErrorCodes.UNKNOWN, message, details);
		}
		return new LocalisationError(type, template.code, template.message(details), details);
	}

	static formatError(error: LocalisationError, options: FormatErrorOptions = {}): string {
		const { showDebug = false, showSolutions = true, showContext = true } = options;
		const template = TEMPLATES[error.type];
		const lines: string[] = [
			`\n[${error.type}] ${error.code}`,
			"",
			"Problem:",
			`  ${error.message}`,
		];

		if (template && showContext) {
			lines.push("", "Why This Happened:");
			for (const cause of template.causes) {
				lines.push(`  - ${cause}`);
			}
		}

		if (template && showSolutions) {
			lines.push("", "How to Fix:");
			template.solutions.forEach((solution, index) => {
				lines.push(`  ${index + 1}. ${solution}`);
			});
		}

		if (showDebug) {
			lines.push("", "Debug Info:");
			for (const [key, value] of Object.entries(error.details)) {
				lines.push(`  ${key}: ${describeValue(value)}`);
			}
			if (error.stack) {
				lines.push("", error.stack);
			}
		}

		return lines.join("\n");
	}

	static isLocalisationError(error: unknown): error is LocalisationError {
		return error instanceof LocalisationError;
	}

	static malformedLineError(
		line: number,
		lang: string,
		text: string,
		reason: string
	): LocalisationError {
		return this.createError("MALFORMED_UNIT_LINE", { line, lang, text, reason });
	}

	static fileNotFoundError(filePath: string): LocalisationError {
		return this.createError("FILE_NOT_FOUND", { filePath });
	}

	static fileReadError(filePath: string, reason: string): LocalisationError {
		return this.createError("FILE_READ_FAILED", { filePath, reason });
	}

	static unsupportedFormatError(format: string): LocalisationError {
		return this.createError("UNSUPPORTED_FORMAT", { format });
	}

	static invalidConfigError(field: string, value: unknown): LocalisationError {
		return this.createError("INVALID_CONFIG", { field, value });
	}
}

export default ErrorHelper;
