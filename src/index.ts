// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, CORE utilities and the SHELL file operations callers compose
// PURITY: Re-exports only (meta-module)
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Walk a directory, inspect candidates and clean the ones with CR+LF.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { crFinder } from "cr-cleaner";
 *
 * await Effect.runPromise(
 *   crFinder("./scripts", { onlyInspect: false, verbose: true, safeMode: false }),
 * );
 * ```
 */
export { crFinder, type FinderOptions } from "./app/crFinder.js";
export { type RunContext, runCleaner } from "./app/runCleaner.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CLIOptions,
	CliCommand,
	CrLine,
	ExclusionConfig,
	ExitCode,
	PathFilter,
	ScanResult,
} from "./core/models.js";
export {
	ConflictingFlags,
	type CliError,
	type FatalError,
	formatFatalError,
	IOFailure,
	MissingFlagValue,
	PathNotFoundError,
} from "./core/errors.js";
export {
	DEFAULT_EXCLUSION_CONFIG,
	extensionOf,
	isFileAllowed,
	isPathAllowed,
	makePathFilter,
} from "./core/filter.js";
export {
	endsWithCrlf,
	normalizeLineEndings,
	renderLine,
	scanLines,
	splitLines,
	stripCrlf,
} from "./core/line-endings.js";

// ═══════════════════════════════════════════════════════════════════════════════
// FILE OPERATIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { parseCLIArgs } from "./shell/config/cli.js";
export { hasCarriageReturns, inspectFile } from "./shell/fs/inspector.js";
export {
	cleanFile,
	type RewriteOptions,
	type RewriteOutcome,
	rewriteFile,
} from "./shell/fs/rewriter.js";
export { walk } from "./shell/fs/walker.js";
export {
	type Ask,
	declineAll,
	isAffirmative,
	makeTerminalAsk,
	type PromptIO,
	withAsk,
} from "./shell/prompt/confirm.js";
