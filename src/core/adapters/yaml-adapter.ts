import { FileFormatAdapter, SerializeOptions } from "./base-adapter.js";
import { Localization } from "../../types/index.js";
import yaml from "js-yaml";

/**
 * Adapter for YAML output
 */
export class YamlAdapter implements FileFormatAdapter {
	format = "yaml";
	extensions = [".yaml", ".yml"];

	async serialize(data: readonly Localization[], options: SerializeOptions = {}): Promise<string> {
		return yaml.dump(data, {
			indent: options.indent || 2,
			lineWidth: -1, // Disable line wrapping
			noRefs: true,
		});
	}
}
