// CHANGE: In-place CR+LF → LF rewrite of a single file
// WHY: Same descriptor for read and write, then truncate to the bytes written; no temp file
// FORMAT THEOREM: rewrite(p) ⇒ content(p) = normalizeLineEndings(content₀(p))
// PURITY: SHELL
// EFFECT: Effect<RewriteOutcome, IOFailure>
// INVARIANT: Descriptor closed on every path; safe mode refusal leaves the file untouched
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { describeCause, IOFailure } from "../../core/errors.js";
import { normalizeLineEndings } from "../../core/line-endings.js";
import { type Ask, isAffirmative } from "../prompt/confirm.js";
import { fs } from "../utils/node-mods.js";

export interface RewriteOptions {
	readonly safeMode: boolean;
	readonly ask: Ask;
}

export type RewriteOutcome =
	| { readonly _tag: "Skipped" }
	| {
			readonly _tag: "Rewritten";
			readonly bytesBefore: number;
			readonly bytesAfter: number;
	  };

const toFailure =
	(filePath: string, operation: "read" | "write") =>
	(error: unknown): IOFailure =>
		new IOFailure({ path: filePath, operation, detail: describeCause(error) });

function readAll(fd: number): Uint8Array {
	const size = fs.fstatSync(fd).size;
	const buffer = Buffer.alloc(size);
	let offset = 0;
	while (offset < size) {
		const read = fs.readSync(fd, buffer, offset, size - offset, offset);
		if (read === 0) break;
		offset += read;
	}
	return buffer.subarray(0, offset);
}

function writeAll(fd: number, bytes: Uint8Array): number {
	let offset = 0;
	while (offset < bytes.length) {
		offset += fs.writeSync(fd, bytes, offset, bytes.length - offset, offset);
	}
	return offset;
}

/**
 * Rewrite lines of an already opened descriptor and truncate to the new length.
 *
 * @pure false (descriptor I/O)
 */
function rewriteDescriptor(
	fd: number,
	filePath: string,
): Effect.Effect<RewriteOutcome, IOFailure> {
	return Effect.gen(function* () {
		const original = yield* Effect.try({
			try: () => readAll(fd),
			catch: toFailure(filePath, "read"),
		});
		const normalized = normalizeLineEndings(original);
		const written = yield* Effect.try({
			try: () => {
				const count = writeAll(fd, normalized);
				fs.ftruncateSync(fd, count);
				return count;
			},
			catch: toFailure(filePath, "write"),
		});
		return {
			_tag: "Rewritten" as const,
			bytesBefore: original.length,
			bytesAfter: written,
		};
	});
}

/**
 * Replace every CR+LF in `filePath` with LF, in place.
 *
 * In safe mode the user is asked first; any answer not starting with "y"
 * skips the file.
 *
 * @effect Effect<RewriteOutcome, IOFailure>
 */
export function rewriteFile(
	filePath: string,
	options: RewriteOptions,
): Effect.Effect<RewriteOutcome, IOFailure> {
	return Effect.gen(function* () {
		if (options.safeMode) {
			const answer = yield* options.ask(`Clear CR from: ${filePath}? [Y / N] `);
			if (!isAffirmative(answer)) return { _tag: "Skipped" as const };
		}
		return yield* Effect.acquireUseRelease(
			Effect.try({
				try: () => fs.openSync(filePath, "r+"),
				catch: toFailure(filePath, "read"),
			}),
			(fd) => rewriteDescriptor(fd, filePath),
			(fd) =>
				Effect.sync(() => {
					fs.closeSync(fd);
				}),
		);
	});
}

/**
 * Rewrite `filePath`, printing a write failure instead of propagating it.
 *
 * @effect Effect<void, never>
 */
export function cleanFile(
	filePath: string,
	options: RewriteOptions,
): Effect.Effect<void> {
	return rewriteFile(filePath, options).pipe(
		Effect.asVoid,
		Effect.catchTag("IOFailure", (error) =>
			Effect.sync(() => {
				console.log(`Cant rewrite file: ${error.path}. ${error.detail}`);
			}),
		),
	);
}
