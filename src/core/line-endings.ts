// CHANGE: Pure byte-level line splitting, CR+LF detection and CR+LF → LF rewriting
// WHY: SHELL only reads/writes bytes; every decision about line endings lives here
// FORMAT THEOREM: ∀b: concat(splitLines(b)) = b ∧ ∀l ∈ splitLines(normalizeLineEndings(b)): ¬endsWithCrlf(l)
// PURITY: CORE
// INVARIANT: Inputs are never mutated; lines are subarray views
// COMPLEXITY: O(n) where n = byte length

import type { CrLine, ScanResult } from "./models.js";

const CR = 0x0d;
const LF = 0x0a;

/**
 * Lazily split bytes into lines, each keeping its `\n` terminator.
 *
 * The last line has no terminator when the input does not end in `\n`.
 * Empty input yields nothing.
 *
 * @pure true (generator over immutable input)
 * @complexity O(n) total, O(1) per step beyond the scanned line
 */
export function* splitLines(bytes: Uint8Array): Generator<Uint8Array, void, undefined> {
	let start = 0;
	while (start < bytes.length) {
		const newline = bytes.indexOf(LF, start);
		const end = newline === -1 ? bytes.length : newline + 1;
		yield bytes.subarray(start, end);
		start = end;
	}
}

/**
 * @pure true
 */
export function endsWithCrlf(line: Uint8Array): boolean {
	const n = line.length;
	return n >= 2 && line[n - 2] === CR && line[n - 1] === LF;
}

/**
 * Scan lines for CR+LF terminators.
 *
 * Non-verbose: returns on the first match, leaving the rest of the iterator
 * unconsumed. Verbose: consumes every line and records each match.
 *
 * @pure true
 * @postcondition !verbose → result.offending.length ≤ 1
 * @complexity O(k) lines pulled, k ≤ total
 */
export function scanLines(lines: Iterable<Uint8Array>, verbose: boolean): ScanResult {
	const offending: CrLine[] = [];
	let index = 0;
	for (const line of lines) {
		if (endsWithCrlf(line)) {
			offending.push({ index, bytes: line });
			if (!verbose) break;
		}
		index++;
	}
	return { hasCr: offending.length > 0, offending };
}

/**
 * Replace every CR+LF inside one line by LF.
 *
 * Returns the same instance when there is nothing to replace.
 *
 * @pure true
 */
export function stripCrlf(line: Uint8Array): Uint8Array {
	let pairs = 0;
	for (let i = 0; i + 1 < line.length; i++) {
		if (line[i] === CR && line[i + 1] === LF) pairs++;
	}
	if (pairs === 0) return line;

	const out = new Uint8Array(line.length - pairs);
	let j = 0;
	for (let i = 0; i < line.length; i++) {
		const byte = line[i] ?? 0;
		if (byte === CR && line[i + 1] === LF) continue;
		out[j++] = byte;
	}
	return out;
}

/**
 * Rewrite every CR+LF line terminator to LF; every other byte is kept.
 *
 * @pure true
 * @postcondition result.length ≤ bytes.length
 * @invariant normalizeLineEndings(normalizeLineEndings(b)) ≡ normalizeLineEndings(b)
 */
export function normalizeLineEndings(bytes: Uint8Array): Uint8Array {
	const lines = Array.from(splitLines(bytes), stripCrlf);
	const total = lines.reduce((sum, line) => sum + line.length, 0);
	const out = new Uint8Array(total);
	let offset = 0;
	for (const line of lines) {
		out.set(line, offset);
		offset += line.length;
	}
	return out;
}

/**
 * Render raw line bytes as a quoted, escaped literal for diagnostics.
 *
 * Bytes map one-to-one onto latin1 code points, so nothing is lost.
 *
 * @pure true
 * @example
 * ```ts
 * renderLine(new TextEncoder().encode("x\r\n")); // "\"x\\r\\n\""
 * ```
 */
export function renderLine(bytes: Uint8Array): string {
	let text = "";
	for (const byte of bytes) text += String.fromCharCode(byte);
	return JSON.stringify(text);
}
