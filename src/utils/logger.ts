/**
 * Console logger with optional per-level log files.
 */

import path from "path";
import { promises as fsPromises } from "fs";

export type DiagnosticsLevel = "minimal" | "normal" | "detailed";
export type LogOutputFormat = "pretty" | "json" | "simple";
export type LogLevel = "error" | "warning" | "info" | "debug";

export interface LoggerConfig {
	verbose?: boolean;
	diagnosticsLevel?: DiagnosticsLevel;
	outputFormat?: LogOutputFormat;
	saveErrorLogs?: boolean;
	logDirectory?: string;
	includeTimestamps?: boolean;
}

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

class Logger {
	public config: Required<LoggerConfig>;
	public logFiles: Record<LogLevel, string>;
	private initialized: boolean;

	/**
	 * Create a new Logger instance.
	 * @param config - Logger configuration.
	 */
	constructor(config: LoggerConfig = {}) {
		this.config = {
			verbose: config.verbose || false,
			diagnosticsLevel: config.diagnosticsLevel || "minimal",
			outputFormat: config.outputFormat || "pretty",
			saveErrorLogs: config.saveErrorLogs === true,
			logDirectory: config.logDirectory || "./logs",
			includeTimestamps: config.includeTimestamps !== false,
		};

		this.logFiles = {
			error: path.join(this.config.logDirectory, "errors.log"),
			warning: path.join(this.config.logDirectory, "warnings.log"),
			info: path.join(this.config.logDirectory, "info.log"),
			debug: path.join(this.config.logDirectory, "debug.log"),
		};

		this.initialized = false;
	}

	/**
	 * Create the log directory when file logging is enabled.
	 */
	async initialize(): Promise<void> {
		if (this.initialized) return;

		try {
			if (this.config.saveErrorLogs) {
				await fsPromises.mkdir(this.config.logDirectory, { recursive: true });
			}
			this.initialized = true;
		} catch (error: unknown) {
			console.warn(`Logger initialization warning: ${errorMessage(error)}`);
		}
	}

	formatMessage(level: LogLevel, message: string, data: unknown = null): string {
		const timestamp = this.config.includeTimestamps ? new Date().toISOString() : null;

		switch (this.config.outputFormat) {
			case "json":
				return JSON.stringify({
					timestamp,
					level,
					message,
					data,
				});

			case "simple":
				return `[${level.toUpperCase()}] ${message}`;

			case "pretty":
			default: {
				const timeStr = timestamp ? `[${timestamp}] ` : "";
				const levelStr = `[${level.toUpperCase()}]`;
				const dataStr = data ? `\n${JSON.stringify(data, null, 2)}` : "";
				return `${timeStr}${levelStr} ${message}${dataStr}`;
			}
		}
	}

	/**
	 * Append an entry to the level's log file.
	 */
	async writeToFile(level: LogLevel, message: string, data: unknown = null): Promise<void> {
		if (!this.config.saveErrorLogs) return;

		await this.initialize();

		try {
			const entry = `${this.formatMessage(level, message, data)}\n`;
			await fsPromises.appendFile(this.logFiles[level], entry, "utf8");
		} catch (error: unknown) {
			console.warn(`Failed to write to log file: ${errorMessage(error)}`);
		}
	}

	async error(message: string, data: unknown = null): Promise<void> {
		console.error(`ERROR: ${message}`);
		if (data && this.config.verbose) {
			console.error(data);
		}
		await this.writeToFile("error", message, data);
	}

	async warn(message: string, data: unknown = null): Promise<void> {
		console.warn(`WARNING: ${message}`);
		if (data && this.config.verbose) {
			console.warn(data);
		}
		await this.writeToFile("warning", message, data);
	}

	async info(message: string, data: unknown = null): Promise<void> {
		if (this.config.diagnosticsLevel !== "minimal" || this.config.verbose) {
			console.log(`INFO: ${message}`);
			if (data && this.config.verbose) {
				console.log(data);
			}
		}
		await this.writeToFile("info", message, data);
	}

	async debug(message: string, data: unknown = null): Promise<void> {
		if (this.config.verbose || this.config.diagnosticsLevel === "detailed") {
			console.log(`DEBUG: ${message}`);
			if (data) {
				console.log(data);
			}
		}
		await this.writeToFile("debug", message, data);
	}
}

let loggerInstance: Logger | null = null;

export function getLogger(config: LoggerConfig | null = null): Logger {
	if (!loggerInstance || config) {
		loggerInstance = new Logger(config || {});
	}
	return loggerInstance;
}

export default Logger;
