export {
	LocalisationParser,
	parse,
	splitLines,
	isHeaderLine,
	headerLanguage,
	HEADER_PREFIX,
} from "./core/parser/localisation-parser.js";
export { scanUnitLine } from "./core/parser/unit-line.js";
export type { UnitLineResult } from "./core/parser/unit-line.js";
export { FormatFactory } from "./core/adapters/factory.js";
export type { FileFormatAdapter, SerializeOptions } from "./core/adapters/base-adapter.js";
export { default as ErrorHelper, ErrorCodes, LocalisationError } from "./utils/error-helper.js";
export { defineConfig, loadConfig, validateConfig } from "./config/index.js";
export type { HoiLocConfig } from "./config/index.js";
export type {
	DuplicateHeaderStrategy,
	Localization,
	LocalizationUnit,
	MalformedLineReason,
	OutputFormat,
	ParseIssue,
	ParseMode,
	ParseResult,
	ParserOptions,
} from "./types/index.js";
