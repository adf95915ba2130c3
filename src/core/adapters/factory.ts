import path from "path";
import { FileFormatAdapter } from "./base-adapter.js";
import { JsonAdapter } from "./json-adapter.js";
import { YamlAdapter } from "./yaml-adapter.js";
import ErrorHelper from "../../utils/error-helper.js";

/**
 * Factory class to manage output format adapters
 */
export class FormatFactory {
	private static adapters: FileFormatAdapter[] = [new JsonAdapter(), new YamlAdapter()];

	/**
	 * Find the adapter registered for the extension of a file path
	 */
	static findAdapter(filePath: string): FileFormatAdapter | undefined {
		const ext = path.extname(filePath).toLowerCase();
		return this.adapters.find((a) => a.extensions.includes(ext));
	}

	/**
	 * Get adapter for an output file path. Unknown extensions fall back to JSON.
	 * @param filePath - Path to file
	 */
	static getAdapter(filePath: string): FileFormatAdapter {
		return this.findAdapter(filePath) || new JsonAdapter();
	}

	/**
	 * Get adapter by format name (json, yaml, yml), with or without a leading dot
	 */
	static getAdapterByFormat(format: string): FileFormatAdapter {
		const formatted = format.startsWith(".") ? format.toLowerCase() : `.${format.toLowerCase()}`;
		const adapter = this.adapters.find((a) => a.extensions.includes(formatted));
		if (!adapter) {
			throw ErrorHelper.unsupportedFormatError(format);
		}
		return adapter;
	}
}
