import { LocalizationUnit, MalformedLineReason } from "../../types/index.js";

const QUOTE = '"';
const COLON = ":";
const MAX_VERSION = 2 ** 31 - 1;

export type UnitLineResult =
	| { ok: true; unit: LocalizationUnit }
	| { ok: false; reason: MalformedLineReason };

const isWhitespace = (ch: string): boolean => /\s/.test(ch);
const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";

/**
 * Split the text in front of an opening quote into key and version.
 * The prefix must read `<key>:<digits>?<whitespace>+`.
 */
function scanPrefix(
	line: string,
	quoteIndex: number
): { ok: true; key: string; version?: number } | { ok: false; reason: MalformedLineReason } {
	let pos = quoteIndex - 1;

	const whitespaceEnd = pos;
	while (pos >= 0 && isWhitespace(line[pos])) {
		pos--;
	}
	if (pos === whitespaceEnd) {
		return { ok: false, reason: "missing-key-separator" };
	}

	const digitsEnd = pos + 1;
	while (pos >= 0 && isDigit(line[pos])) {
		pos--;
	}
	const digits = line.slice(pos + 1, digitsEnd);

	if (pos < 0 || line[pos] !== COLON) {
		return { ok: false, reason: "missing-key-separator" };
	}

	const key = line.slice(0, pos);
	if (key.length === 0) {
		return { ok: false, reason: "empty-key" };
	}

	if (digits.length === 0) {
		return { ok: true, key };
	}

	const version = Number.parseInt(digits, 10);
	if (version > MAX_VERSION) {
		return { ok: false, reason: "version-out-of-range" };
	}
	return { ok: true, key, version };
}

/**
 * Scan one trimmed unit line of the form `key:version "value"`.
 *
 * The closing quote is the last character of the line. The opening quote is the
 * leftmost quote whose prefix forms a valid key/version pair, so keys may contain
 * further colons and values may contain colons.
 */
export function scanUnitLine(line: string): UnitLineResult {
	const closing = line.length - 1;
	if (closing < 0 || line[closing] !== QUOTE) {
		return { ok: false, reason: "missing-closing-quote" };
	}

	let firstFailure: MalformedLineReason | null = null;
	let quote = line.indexOf(QUOTE);

	while (quote !== -1 && quote < closing) {
		const prefix = scanPrefix(line, quote);
		if (prefix.ok) {
			const value = line.slice(quote + 1, closing);
			const unit: LocalizationUnit =
				prefix.version === undefined
					? { key: prefix.key, value }
					: { key: prefix.key, version: prefix.version, value };
			return { ok: true, unit };
		}
		if (firstFailure === null) {
			firstFailure = prefix.reason;
		}
		quote = line.indexOf(QUOTE, quote + 1);
	}

	return { ok: false, reason: firstFailure ?? "missing-opening-quote" };
}

