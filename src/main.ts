// CHANGE: Thin APP delegator: parse arguments, then run
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value; fatal errors stay in the error channel
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { type RunContext, runCleaner } from "./app/runCleaner.js";
import type { FatalError } from "./core/errors.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/cli.js";

/**
 * Entry for programmatic usage (without terminating the process).
 *
 * @param args - Arguments after the script name
 * @param context - Install directory and self file name of the running tool
 * @returns Effect<ExitCode, FatalError>
 *
 * @invariant ExitCode ∈ {0,1}
 */
export function main(
	args: readonly string[],
	context: RunContext,
): Effect.Effect<ExitCode, FatalError> {
	return parseCLIArgs(args, context.installDir).pipe(
		Effect.flatMap((command) => runCleaner(command, context)),
	);
}
