// CHANGE: Typed domain error ADT for the cleaner using Effect.Data
// WHY: Errors travel in Effect error channels instead of thrown exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Root given with `-f` does not exist. Fatal.
 *
 * @invariant path.length > 0
 */
export class PathNotFoundError extends Data.TaggedError("PathNotFound")<{
	readonly path: string;
}> {}

/**
 * Open/read/write failure on one file. Non-fatal: reported and skipped.
 *
 * @invariant detail.length > 0
 */
export class IOFailure extends Data.TaggedError("IOFailure")<{
	readonly path: string;
	readonly operation: "read" | "write";
	readonly detail: string;
}> {}

/**
 * `-a` and `-f` were both given.
 */
export class ConflictingFlags extends Data.TaggedError("ConflictingFlags")<{
	readonly flags: readonly string[];
}> {}

/**
 * A flag that takes a value was the last argument.
 */
export class MissingFlagValue extends Data.TaggedError("MissingFlagValue")<{
	readonly flag: string;
}> {}

export type CliError = ConflictingFlags | MissingFlagValue;

/**
 * Every error that may terminate a run.
 */
export type FatalError = PathNotFoundError | CliError;

/**
 * Extract a printable message from a caught value.
 *
 * @pure true
 */
export function describeCause(cause: unknown): string {
	if (cause instanceof Error) return cause.message;
	return String(cause);
}

/**
 * Human-readable line for a fatal error, printed at the binary boundary.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatFatalError = (error: FatalError): string =>
	match(error)
		.with({ _tag: "PathNotFound" }, (e) => `Can't find path: ${e.path}.`)
		.with(
			{ _tag: "ConflictingFlags" },
			(e) => `Can not set up ${e.flags.join(" and ")} flags for one command`,
		)
		.with(
			{ _tag: "MissingFlagValue" },
			(e) => `Flag ${e.flag} requires a path argument`,
		)
		.exhaustive();
