/**
 * A single localisation entry, e.g. `greeting.1.d:0 "World"`.
 */
export interface LocalizationUnit {
	readonly key: string;
	/**
	 * Present only when the source line carried explicit digits after the key's colon.
	 */
	readonly version?: number;
	/**
	 * Raw value between the quotes. Escape sequences such as `\n` are kept verbatim.
	 */
	readonly value: string;
}

/**
 * All units owned by one language header (`l_english:` yields `lang: "english"`).
 */
export interface Localization {
	readonly lang: string;
	readonly units: readonly LocalizationUnit[];
}

export type ParseMode = "strict" | "lenient";

/**
 * How repeated headers for the same language are grouped.
 * - merge: units of later occurrences are appended to the first group
 * - separate: every header occurrence yields its own Localization
 */
export type DuplicateHeaderStrategy = "merge" | "separate";

export interface ParserOptions {
	mode?: ParseMode;
	duplicateHeaders?: DuplicateHeaderStrategy;
}

export type MalformedLineReason =
	| "missing-closing-quote"
	| "missing-opening-quote"
	| "missing-key-separator"
	| "empty-key"
	| "version-out-of-range";

export interface ParseIssue {
	/** 1-based line number in the input */
	line: number;
	lang: string;
	text: string;
	reason: MalformedLineReason;
}

export interface ParseResult {
	localizations: Localization[];
	issues: ParseIssue[];
}

export type OutputFormat = "json" | "yaml";
