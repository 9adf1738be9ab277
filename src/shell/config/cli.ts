// CHANGE: Command line parsing into a CliCommand value
// WHY: Flags are decoded without touching the filesystem; existence of the root is checked by APP
// FORMAT THEOREM: parse(args) = Usage ∨ Run(options) ∨ CliError
// PURITY: SHELL boundary, pure body
// EFFECT: Effect<CliCommand, CliError>
// INVARIANT: `-a` and `-f` are mutually exclusive; `-i` ⇒ verbose
// COMPLEXITY: O(n) where n = |args|

import { Effect } from "effect";

import { type CliError, ConflictingFlags, MissingFlagValue } from "../../core/errors.js";
import type { CliCommand } from "../../core/models.js";

type RootSource = "all" | "file";

interface ParseState {
	readonly root: { readonly source: RootSource; readonly path: string } | null;
	readonly verbose: boolean;
	readonly safeMode: boolean;
	readonly onlyInspect: boolean;
	readonly help: boolean;
	readonly skipNext: boolean;
}

interface FlagContext {
	readonly args: readonly string[];
	readonly index: number;
	readonly installDir: string;
}

type FlagHandler = (
	state: ParseState,
	context: FlagContext,
) => Effect.Effect<ParseState, CliError>;

const INITIAL_STATE: ParseState = {
	root: null,
	verbose: false,
	safeMode: false,
	onlyInspect: false,
	help: false,
	skipNext: false,
};

const setFlag =
	(patch: Partial<Pick<ParseState, "verbose" | "safeMode" | "onlyInspect" | "help">>): FlagHandler =>
	(state) =>
		Effect.succeed({ ...state, ...patch, skipNext: false });

function conflictIfRootSet(
	state: ParseState,
	flag: string,
): Effect.Effect<void, CliError> {
	if (state.root === null) return Effect.void;
	const previous = state.root.source === "all" ? "-a" : "-f";
	return Effect.fail(new ConflictingFlags({ flags: [previous, flag] }));
}

const handleAll: FlagHandler = (state, { args, index, installDir }) =>
	conflictIfRootSet(state, args[index] ?? "-a").pipe(
		Effect.as({
			...state,
			root: { source: "all" as const, path: installDir },
			skipNext: false,
		}),
	);

const handleFile: FlagHandler = (state, { args, index }) =>
	Effect.gen(function* () {
		const flag = args[index] ?? "-f";
		yield* conflictIfRootSet(state, flag);
		const value = args[index + 1];
		if (value === undefined) {
			return yield* Effect.fail(new MissingFlagValue({ flag }));
		}
		return {
			...state,
			root: { source: "file" as const, path: value },
			skipNext: true,
		};
	});

// Short flags are matched case-insensitively, long flags exactly.
const handlers: Readonly<Record<string, FlagHandler>> = {
	"-a": handleAll,
	"--all": handleAll,
	"-f": handleFile,
	"--file": handleFile,
	"-v": setFlag({ verbose: true }),
	"--verbose": setFlag({ verbose: true }),
	"-s": setFlag({ safeMode: true }),
	"--safe_mode": setFlag({ safeMode: true }),
	"-i": setFlag({ onlyInspect: true, verbose: true }),
	"--inspect": setFlag({ onlyInspect: true, verbose: true }),
	"-h": setFlag({ help: true }),
	"--help": setFlag({ help: true }),
};

function lookupHandler(arg: string): FlagHandler | undefined {
	const key = arg.startsWith("--") ? arg : arg.toLowerCase();
	return Object.hasOwn(handlers, key) ? handlers[key] : undefined;
}

function toCommand(state: ParseState): CliCommand {
	if (state.help || state.root === null) return { _tag: "Usage" };
	return {
		_tag: "Run",
		rootPath: state.root.path,
		onlyInspect: state.onlyInspect,
		verbose: state.verbose,
		safeMode: state.safeMode,
	};
}

/**
 * Parse command line arguments.
 *
 * Unknown arguments are ignored. No arguments, `-h`, or options without a
 * root all produce `Usage`.
 *
 * @param args - Arguments after the script name
 * @param installDir - Root used by `-a`
 *
 * @effect Effect<CliCommand, ConflictingFlags | MissingFlagValue>
 *
 * @example
 * ```ts
 * // cr-cleaner -f ./scripts -i
 * Effect.runSync(parseCLIArgs(["-f", "./scripts", "-i"], "/opt/cr-cleaner"));
 * // { _tag: "Run", rootPath: "./scripts", onlyInspect: true, verbose: true, safeMode: false }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[],
	installDir: string,
): Effect.Effect<CliCommand, CliError> {
	return Effect.gen(function* () {
		let state = INITIAL_STATE;
		for (let index = 0; index < args.length; index++) {
			const arg = args[index] ?? "";
			if (arg.length === 0) continue;
			const handler = lookupHandler(arg);
			if (handler === undefined) continue;

			state = yield* handler(state, { args, index, installDir });
			if (state.skipNext) index++;
		}
		return toCommand(state);
	});
}
