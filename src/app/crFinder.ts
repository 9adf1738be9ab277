// CHANGE: Orchestrator composing walker, inspector and rewriter
// WHY: One linear pass per root; each file's outcome is independent of the others
// FORMAT THEOREM: ∀p ∈ walk(root): hasCr(p) ∧ ¬onlyInspect → rewrite(p)
// PURITY: APP
// EFFECT: Effect<void, never>
// INVARIANT: A failure on one file never aborts the run; files are handled one at a time
// COMPLEXITY: O(Σ size(p)) over yielded paths

import { Effect } from "effect";

import { DEFAULT_EXCLUSION_CONFIG, makePathFilter } from "../core/filter.js";
import type { PathFilter } from "../core/models.js";
import { hasCarriageReturns } from "../shell/fs/inspector.js";
import { cleanFile } from "../shell/fs/rewriter.js";
import { walk } from "../shell/fs/walker.js";
import { type Ask, withAsk } from "../shell/prompt/confirm.js";

export interface FinderOptions {
	readonly onlyInspect: boolean;
	readonly verbose: boolean;
	readonly safeMode: boolean;
	/** Defaults to the built-in exclusion lists with no self file. */
	readonly filter?: PathFilter;
	/** Defaults to a stdin/stdout prompt opened for the run in safe mode. */
	readonly ask?: Ask;
}

/**
 * Inspect every candidate under `rootPath` and clean those with CR+LF.
 *
 * @param rootPath - Directory to walk; a missing directory is a no-op
 * @param options - Inspect/verbose/safe-mode policy
 *
 * @effect Effect<void, never>
 *
 * @example
 * ```ts
 * await Effect.runPromise(
 *   crFinder("./scripts", { onlyInspect: true, verbose: true, safeMode: false }),
 * );
 * ```
 */
export function crFinder(
	rootPath: string,
	options: FinderOptions,
): Effect.Effect<void> {
	const filter = options.filter ?? makePathFilter(DEFAULT_EXCLUSION_CONFIG, "");

	return withAsk(options.safeMode, options.ask, (ask) =>
		Effect.gen(function* () {
			for (const filePath of walk(rootPath, filter)) {
				const hasCr = yield* hasCarriageReturns(filePath, options.verbose);
				if (hasCr && !options.onlyInspect) {
					yield* cleanFile(filePath, { safeMode: options.safeMode, ask });
				}
			}
		}),
	);
}
