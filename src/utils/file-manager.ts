import { promises as fs } from "fs";
import path from "path";
import ErrorHelper, { LocalisationError } from "./error-helper.js";

export interface FileOptions {
	atomic?: boolean;
	createMissingDirs?: boolean;
	encoding?: BufferEncoding;
	extensions?: string[];
}

const BYTE_ORDER_MARK = "\uFEFF";

const errorCode = (error: unknown): string | undefined =>
	typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
		? error.code
		: undefined;

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * FileManager - asynchronous file access for localisation sources and parser output
 */
class FileManager {
	/**
	 * Default options for file operations
	 */
	static defaultOptions: Required<FileOptions> = {
		atomic: true,
		createMissingDirs: true,
		encoding: "utf8",
		extensions: [".yml", ".yaml"],
	};

	private static options: Required<FileOptions> | null = null;

	/**
	 * Configure global options for file operations
	 * @param options - File operation options
	 */
	static configure(options: FileOptions): void {
		this.options = {
			...this.defaultOptions,
			...options,
		};
	}

	static getConfig(): Required<FileOptions> {
		return this.options || this.defaultOptions;
	}

	/**
	 * Read a localisation file as text. The game writes these files with a
	 * UTF-8 byte order mark, which is stripped so the first header is recognised.
	 * @param filePath - Path to the file
	 */
	static async readLocalisationFile(filePath: string, options: FileOptions = {}): Promise<string> {
		const config = { ...this.getConfig(), ...options };

		try {
			const content = await fs.readFile(filePath, config.encoding);
			return content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content;
		} catch (err: unknown) {
			throw this.toReadError(filePath, err);
		}
	}

	/**
	 * Recursively find localisation files below a directory, sorted by path
	 * @param dir - Directory to scan
	 * @param extensions - Accepted extensions (including dot)
	 */
	static async findLocalisationFiles(
		dir: string,
		extensions: string[] = this.getConfig().extensions
	): Promise<string[]> {
		const accepted = extensions.map((ext) => ext.toLowerCase());
		const entries = await fs.readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
			throw this.toReadError(dir, err);
		});

		const files: string[] = [];
		for (const entry of entries) {
			const entryPath = path.join(dir, entry.name);
			if (entry.isDirectory()) {
				files.push(...(await this.findLocalisationFiles(entryPath, accepted)));
			} else if (entry.isFile() && accepted.includes(path.extname(entry.name).toLowerCase())) {
				files.push(entryPath);
			}
		}

		return files.sort();
	}

	/**
	 * Expand a mix of file and directory paths into a de-duplicated list of files.
	 * Explicit file paths are kept whatever their extension.
	 */
	static async resolveInputFiles(
		inputs: string[],
		extensions: string[] = this.getConfig().extensions
	): Promise<string[]> {
		const resolved: string[] = [];

		for (const input of inputs) {
			const stats = await fs.stat(input).catch((err: unknown) => {
				throw this.toReadError(input, err);
			});

			if (stats.isDirectory()) {
				resolved.push(...(await this.findLocalisationFiles(input, extensions)));
			} else {
				resolved.push(input);
			}
		}

		return [...new Set(resolved)];
	}

	/**
	 * Write text output, creating directories and writing atomically when configured
	 * @param filePath - Path to write the file
	 * @param content - Text to write
	 */
	static async writeOutput(
		filePath: string,
		content: string,
		options: FileOptions = {}
	): Promise<void> {
		const config = { ...this.getConfig(), ...options };

		try {
			if (config.createMissingDirs) {
				await fs.mkdir(path.dirname(filePath), { recursive: true });
			}

			if (!config.atomic) {
				await fs.writeFile(filePath, content, config.encoding);
				return;
			}

			const tempFile = this._generateTempFilePath(filePath);
			try {
				await fs.writeFile(tempFile, content, config.encoding);
				await fs.rename(tempFile, filePath);
			} catch (writeError: unknown) {
				await fs.rm(tempFile, { force: true });
				throw writeError;
			}
		} catch (err: unknown) {
			throw new Error(`File write error (${filePath}): ${errorMessage(err)}`);
		}
	}

	static toReadError(filePath: string, err: unknown): LocalisationError {
		return errorCode(err) === "ENOENT"
			? ErrorHelper.fileNotFoundError(filePath)
			: ErrorHelper.fileReadError(filePath, errorMessage(err));
	}

	/**
	 * Generate a unique temporary file path
	 */
	static _generateTempFilePath(filePath: string): string {
		const timestamp = Date.now();
		const random = Math.random().toString(36).substring(2, 8);
		return `${filePath}.tmp.${timestamp}.${random}`;
	}
}

export { FileManager };
