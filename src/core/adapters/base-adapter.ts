import { Localization } from "../../types/index.js";

export interface SerializeOptions {
	/**
	 * Indentation width
	 */
	indent?: number;
}

/**
 * Interface for output format adapters
 */
export interface FileFormatAdapter {
	/**
	 * Format name as accepted on the command line (e.g. "json")
	 */
	format: string;

	/**
	 * File extensions produced by this adapter (including dot, e.g. ".json")
	 */
	extensions: string[];

	/**
	 * Serialize parsed localisations into text
	 * @param data - Parsed localisations
	 * @param options - Serialization options
	 */
	serialize(data: readonly Localization[], options?: SerializeOptions): Promise<string>;
}
