import { FileManager } from "../utils/file-manager.js";
import Logger, { getLogger } from "../utils/logger.js";
import { HoiLocConfig } from "./index.js";

/**
 * Configure global components (file manager, logger) from the loaded config.
 */
export const configureComponents = (config: HoiLocConfig): Logger => {
	FileManager.configure({
		...config.fileOperations,
		...(config.fileExtensions ? { extensions: config.fileExtensions } : {}),
	});

	const verbose = Boolean(config.logging?.verbose || config.debug || process.env.VERBOSE);
	const logger = getLogger({ ...config.logging, verbose });

	if (config.debug) {
		process.env.DEBUG = "true";
	}

	return logger;
};
