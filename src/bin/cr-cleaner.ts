#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode or a fatal error value; BIN prints and exits
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { Effect } from "effect";

import { formatFatalError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import { main } from "../main.js";

const selfPath = fileURLToPath(import.meta.url);

const program = main(process.argv.slice(2), {
	installDir: path.dirname(selfPath),
	selfFileName: path.basename(selfPath),
}).pipe(
	Effect.catchAll((error) =>
		Effect.sync((): ExitCode => {
			console.error(`cr-cleaner: ${formatFatalError(error)}`);
			return 1;
		}),
	),
);

/**
 * CLI entry point for cr-cleaner.
 *
 * @remarks
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(program);
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
