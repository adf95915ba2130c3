import { FileFormatAdapter, SerializeOptions } from "./base-adapter.js";
import { Localization } from "../../types/index.js";

/**
 * Adapter for JSON output
 */
export class JsonAdapter implements FileFormatAdapter {
	format = "json";
	extensions = [".json"];

	async serialize(data: readonly Localization[], options: SerializeOptions = {}): Promise<string> {
		const indent = options.indent || 2;
		return `${JSON.stringify(data, null, indent)}\n`;
	}
}
