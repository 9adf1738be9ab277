// CHANGE: Application entry composing CLI parsing, root resolution and the orchestrator
// WHY: BIN only derives its own location and exits; everything else returns values
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode, FatalError>
// INVARIANT: Missing root → PathNotFoundError; single file bypasses walker and filters
// COMPLEXITY: O(1) orchestration + O(Σ size) scanning

import { Effect } from "effect";
import { match } from "ts-pattern";

import { PathNotFoundError } from "../core/errors.js";
import { DEFAULT_EXCLUSION_CONFIG, makePathFilter } from "../core/filter.js";
import type { CLIOptions, CliCommand, ExclusionConfig, ExitCode } from "../core/models.js";
import { hasCarriageReturns } from "../shell/fs/inspector.js";
import { cleanFile } from "../shell/fs/rewriter.js";
import { printUsage } from "../shell/output/usage.js";
import { type Ask, withAsk } from "../shell/prompt/confirm.js";
import { fs } from "../shell/utils/node-mods.js";
import { crFinder } from "./crFinder.js";

/**
 * Where the tool lives; `-a` walks `installDir` and never touches `selfFileName`.
 * Without `ask`, safe mode prompts on stdin/stdout through one reader per run.
 */
export interface RunContext {
	readonly installDir: string;
	readonly selfFileName: string;
	readonly exclusions?: ExclusionConfig;
	readonly ask?: Ask;
}

type RootKind = "directory" | "file";

function resolveRoot(rootPath: string): Effect.Effect<RootKind, PathNotFoundError> {
	return Effect.try({
		try: () => fs.statSync(rootPath),
		catch: () => new PathNotFoundError({ path: rootPath }),
	}).pipe(
		Effect.map((stats): RootKind => (stats.isDirectory() ? "directory" : "file")),
	);
}

/**
 * Single-file mode: inspect when verbose, then clean unless inspect-only.
 * The rewrite does not depend on the inspection result.
 */
function runOnFile(options: CLIOptions, ask: Ask): Effect.Effect<void> {
	return Effect.gen(function* () {
		if (options.verbose) {
			yield* hasCarriageReturns(options.rootPath, true);
		}
		if (!options.onlyInspect) {
			yield* cleanFile(options.rootPath, { safeMode: options.safeMode, ask });
		}
	});
}

function runOnRoot(
	options: CLIOptions,
	context: RunContext,
): Effect.Effect<void, PathNotFoundError> {
	return Effect.gen(function* () {
		const kind = yield* resolveRoot(options.rootPath);
		return yield* withAsk(options.safeMode, context.ask, (ask) => {
			if (kind === "file") return runOnFile(options, ask);
			const filter = makePathFilter(
				context.exclusions ?? DEFAULT_EXCLUSION_CONFIG,
				context.selfFileName,
			);
			return crFinder(options.rootPath, { ...options, filter, ask });
		});
	});
}

/**
 * Execute a parsed command.
 *
 * @returns 0 once usage is printed or the run completes
 *
 * @effect Effect<ExitCode, PathNotFoundError>
 */
export function runCleaner(
	command: CliCommand,
	context: RunContext,
): Effect.Effect<ExitCode, PathNotFoundError> {
	return match<CliCommand, Effect.Effect<ExitCode, PathNotFoundError>>(command)
		.with({ _tag: "Usage" }, () =>
			Effect.sync((): ExitCode => {
				printUsage();
				return 0;
			}),
		)
		.with({ _tag: "Run" }, (run) =>
			runOnRoot(run, context).pipe(Effect.map((): ExitCode => 0)),
		)
		.exhaustive();
}
