import { loadConfig as c12LoadConfig } from "c12";
import { DuplicateHeaderStrategy, OutputFormat, ParseMode } from "../types/index.js";
import { LoggerConfig } from "../utils/logger.js";
import ErrorHelper from "../utils/error-helper.js";

export interface HoiLocConfig {
	/**
	 * Directory scanned when no paths are given on the command line
	 * @default "./localisation"
	 */
	localisationDir?: string;

	/**
	 * Extensions picked up when scanning a directory
	 * @default [".yml", ".yaml"]
	 */
	fileExtensions?: string[];

	parser?: {
		/**
		 * strict aborts on the first malformed line, lenient skips and reports it
		 * @default "strict"
		 */
		mode?: ParseMode;

		/**
		 * How repeated language headers are grouped
		 * @default "merge"
		 */
		duplicateHeaders?: DuplicateHeaderStrategy;
	};

	output?: {
		/**
		 * @default "json"
		 */
		format?: OutputFormat;

		/**
		 * @default 2
		 */
		indent?: number;
	};

	/**
	 * Number of files read and parsed in parallel
	 * @default 4
	 */
	concurrencyLimit?: number;

	fileOperations?: {
		atomic?: boolean;
		createMissingDirs?: boolean;
	};

	logging?: LoggerConfig;

	debug?: boolean;
}

/**
 * Type-safe configuration helper
 */
export function defineConfig(config: HoiLocConfig): HoiLocConfig {
	return config;
}

export const DEFAULT_CONFIG: HoiLocConfig = {
	localisationDir: "./localisation",
	fileExtensions: [".yml", ".yaml"],
	parser: {
		mode: "strict",
		duplicateHeaders: "merge",
	},
	output: {
		format: "json",
		indent: 2,
	},
	concurrencyLimit: 4,
	fileOperations: {
		atomic: true,
		createMissingDirs: true,
	},
	logging: {
		saveErrorLogs: false,
		outputFormat: "pretty",
	},
};

/**
 * Load configuration using c12
 */
export async function loadConfig(cwd: string = process.cwd()) {
	const { config, configFile, layers } = await c12LoadConfig<HoiLocConfig>({
		name: "hoiloc",
		configFile: "hoiloc.config",
		rcFile: ".hoilocrc",
		dotenv: true,
		cwd,
		defaults: DEFAULT_CONFIG,
	});

	return {
		config: config || {},
		configFile,
		layers,
	};
}

const PARSE_MODES: readonly ParseMode[] = ["strict", "lenient"];
const DUPLICATE_STRATEGIES: readonly DuplicateHeaderStrategy[] = ["merge", "separate"];
const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "yaml"];

const isPositiveInteger = (value: unknown): boolean =>
	typeof value === "number" && Number.isInteger(value) && value > 0;

/**
 * Check enumerations and numeric limits. Throws ERR_INVALID_CONFIG on the first bad field.
 */
export function validateConfig(config: HoiLocConfig): HoiLocConfig {
	const mode = config.parser?.mode;
	if (mode !== undefined && !PARSE_MODES.includes(mode)) {
		throw ErrorHelper.invalidConfigError("parser.mode", mode);
	}

	const duplicateHeaders = config.parser?.duplicateHeaders;
	if (duplicateHeaders !== undefined && !DUPLICATE_STRATEGIES.includes(duplicateHeaders)) {
		throw ErrorHelper.invalidConfigError("parser.duplicateHeaders", duplicateHeaders);
	}

	const format = config.output?.format;
	if (format !== undefined && !OUTPUT_FORMATS.includes(format)) {
		throw ErrorHelper.invalidConfigError("output.format", format);
	}

	if (config.output?.indent !== undefined && !isPositiveInteger(config.output.indent)) {
		throw ErrorHelper.invalidConfigError("output.indent", config.output.indent);
	}

	if (config.concurrencyLimit !== undefined && !isPositiveInteger(config.concurrencyLimit)) {
		throw ErrorHelper.invalidConfigError("concurrencyLimit", config.concurrencyLimit);
	}

	if (
		config.fileExtensions !== undefined &&
		(!Array.isArray(config.fileExtensions) ||
			config.fileExtensions.some((ext) => typeof ext !== "string" || !ext.startsWith(".")))
	) {
		throw ErrorHelper.invalidConfigError("fileExtensions", config.fileExtensions);
	}

	return config;
}
