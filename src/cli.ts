#!/usr/bin/env node
import { createRequire } from "module";
import { program } from "commander";
import { loadConfig, validateConfig } from "./config/index.js";
import { configureComponents } from "./config/setup.js";
import {
	CliParseFlags,
	formatCliError,
	parseConcurrency,
	parseIndent,
	resolveInputs,
	resolveParseOptions,
	resolveParserSettings,
	runAction,
} from "./cli/helpers.js";
import { parseFile } from "./commands/parse.js";
import { formatValidationReport, validateFiles } from "./commands/validate.js";
import { collectStats, formatStats } from "./commands/stats.js";

// Use createRequire to load package.json in ESM context
const require = createRequire(import.meta.url);
const { version } = require("../package.json");

interface ValidateCliOptions {
	concurrency?: number;
	separateHeaders?: boolean;
}

interface StatsCliOptions extends ValidateCliOptions {
	lenient?: boolean;
	json?: boolean;
}

const main = async () => {
	const loaded = await loadConfig();
	const config = validateConfig(loaded.config);

	program
		.name("hoi-loc")
		.description("Parse and check game localisation (l_<language>) files")
		.version(String(version));

	program
		.option("--debug", "Enable debug mode with verbose logging", false)
		.option("--verbose", "Enable detailed diagnostic output", false);

	program.on("option:debug", function () {
		config.debug = true;
		process.env.DEBUG = "true";
	});

	program.on("option:verbose", function () {
		process.env.VERBOSE = "true";
	});

	program.hook("preAction", async () => {
		const logger = configureComponents(config);
		await logger.debug("Configuration loaded", { configFile: loaded.configFile });
	});

	program
		.command("parse")
		.description("Parse a localisation file and print it as JSON or YAML")
		.argument("<file>", "Localisation file to parse")
		.option("-f, --format <format>", "Output format (json|yaml)")
		.option("-o, --out <file>", "Write the output to a file instead of stdout")
		.option("--indent <number>", "Indentation width", parseIndent)
		.option("--lenient", "Skip malformed lines instead of failing", false)
		.option("--separate-headers", "Keep repeated language headers as separate entries", false)
		.action((file: string, options: CliParseFlags) =>
			runAction(async () => {
				const result = await parseFile(file, resolveParseOptions(config, options));
				if (!options.out) {
					process.stdout.write(result.output);
				}
			})
		);

	program
		.command("validate")
		.description("Report malformed lines in localisation files")
		.argument("[paths...]", "Files or directories (default: configured localisationDir)")
		.option(
			"--concurrency <number>",
			"Files parsed in parallel",
			parseConcurrency,
			config.concurrencyLimit
		)
		.option("--separate-headers", "Keep repeated language headers as separate entries", false)
		.action((paths: string[], options: ValidateCliOptions) =>
			runAction(async () => {
				const files = await resolveInputs(paths, config);
				const report = await validateFiles(files, {
					concurrency: options.concurrency,
					duplicateHeaders: resolveParserSettings(config, options).duplicateHeaders,
				});
				console.log(formatValidationReport(report).join("\n"));
				if (!report.valid) {
					process.exit(1);
				}
			})
		);

	program
		.command("stats")
		.description("Summarise languages, units and duplicate keys")
		.argument("[paths...]", "Files or directories (default: configured localisationDir)")
		.option(
			"--concurrency <number>",
			"Files parsed in parallel",
			parseConcurrency,
			config.concurrencyLimit
		)
		.option("--lenient", "Skip malformed lines instead of failing", false)
		.option("--separate-headers", "Keep repeated language headers as separate entries", false)
		.option("--json", "Print the report as JSON", false)
		.action((paths: string[], options: StatsCliOptions) =>
			runAction(async () => {
				const files = await resolveInputs(paths, config);
				const report = await collectStats(files, {
					...resolveParserSettings(config, options),
					concurrency: options.concurrency,
				});
				console.log(
					options.json ? JSON.stringify(report, null, 2) : formatStats(report).join("\n")
				);
			})
		);

	await program.parseAsync(process.argv);
};

main().catch((err: unknown) => {
	console.error(formatCliError(err, process.env.DEBUG === "true"));
	process.exit(1);
});
