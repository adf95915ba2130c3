/**
 * hoi-loc configuration
 * Loaded by c12 together with .hoilocrc and .env
 */

import { defineConfig } from "./src/config/index.js";

export default defineConfig({
	localisationDir: "./localisation",
	fileExtensions: [".yml"],

	parser: {
		mode: "strict", // "lenient" skips malformed lines and reports them
		duplicateHeaders: "merge", // "separate" keeps one entry per l_<language> header
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
		verbose: false,
		diagnosticsLevel: "minimal",
		outputFormat: "pretty",
		saveErrorLogs: false,
		logDirectory: "./logs",
		includeTimestamps: true,
	},
});
