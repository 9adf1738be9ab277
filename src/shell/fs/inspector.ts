// CHANGE: CR+LF inspection of a single file
// WHY: Reads raw bytes (SHELL) and delegates the scan to CORE
// FORMAT THEOREM: inspectFile(p, v) = scanLines(splitLines(read(p)), v)
// PURITY: SHELL
// EFFECT: Effect<ScanResult, IOFailure>
// INVARIANT: Unreadable file → IOFailure; hasCarriageReturns degrades it to false
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { describeCause, IOFailure } from "../../core/errors.js";
import { renderLine, scanLines, splitLines } from "../../core/line-endings.js";
import type { ScanResult } from "../../core/models.js";
import { fs } from "../utils/node-mods.js";

/**
 * Read a file's raw bytes; the descriptor is closed before returning.
 *
 * @effect Effect<Uint8Array, IOFailure>
 */
export function readBytes(filePath: string): Effect.Effect<Uint8Array, IOFailure> {
	return Effect.try({
		try: () => fs.readFileSync(filePath),
		catch: (error) =>
			new IOFailure({
				path: filePath,
				operation: "read",
				detail: describeCause(error),
			}),
	});
}

/**
 * Scan `filePath` for CR+LF lines.
 *
 * In verbose mode every offending line is printed as
 * `Win32 style file: <path>. LINE #<index>: <line>`.
 *
 * @param filePath - File to read
 * @param verbose - Scan the whole file and report each match; otherwise stop at the first
 *
 * @effect Effect<ScanResult, IOFailure>
 */
export function inspectFile(
	filePath: string,
	verbose: boolean,
): Effect.Effect<ScanResult, IOFailure> {
	return Effect.gen(function* () {
		const bytes = yield* readBytes(filePath);
		const result = scanLines(splitLines(bytes), verbose);
		if (verbose) {
			for (const line of result.offending) {
				console.log(
					`Win32 style file: ${filePath}. LINE #${line.index}: ${renderLine(line.bytes)}`,
				);
			}
		}
		return result;
	});
}

/**
 * Whether `filePath` has at least one CR+LF line.
 *
 * A read failure is printed and reported as "no CR found".
 *
 * @effect Effect<boolean, never>
 */
export function hasCarriageReturns(
	filePath: string,
	verbose: boolean,
): Effect.Effect<boolean> {
	return inspectFile(filePath, verbose).pipe(
		Effect.map((result) => result.hasCr),
		Effect.catchTag("IOFailure", (error) =>
			Effect.sync(() => {
				console.log(`Cant read file: ${error.path}. ${error.detail}`);
				return false;
			}),
		),
	);
}
