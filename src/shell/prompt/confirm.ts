// CHANGE: Interactive yes/no confirmation for safe mode
// WHY: One line reader per run; each question consumes exactly one input line
// PURITY: SHELL
// EFFECT: Effect<Ask, never, Scope>
// INVARIANT: Lines buffered before a question are kept for the next one; end of input reads as ""

import * as readline from "node:readline";

import { Effect, type Scope } from "effect";

/**
 * Ask a question and yield the raw answer line.
 */
export type Ask = (question: string) => Effect.Effect<string>;

/**
 * Streams the prompt reads from and writes to.
 */
export interface PromptIO {
	readonly input: NodeJS.ReadableStream;
	readonly output: NodeJS.WritableStream;
}

const STDIO: PromptIO = { input: process.stdin, output: process.stdout };

/**
 * Answers "no" without reading anything; handed to runs that never prompt.
 */
export const declineAll: Ask = () => Effect.succeed("");

/**
 * Build an Ask over one readline interface, closed when the scope ends.
 *
 * The line iterator is created together with the interface so that lines
 * arriving before the first question are not dropped.
 *
 * @effect Effect<Ask, never, Scope>
 */
export function makeTerminalAsk(io: PromptIO = STDIO): Effect.Effect<Ask, never, Scope.Scope> {
	return Effect.acquireRelease(
		Effect.sync(() => {
			const rl = readline.createInterface({ input: io.input, crlfDelay: Infinity });
			return { rl, lines: rl[Symbol.asyncIterator]() };
		}),
		({ rl }) =>
			Effect.sync(() => {
				rl.close();
			}),
	).pipe(
		Effect.map(
			({ lines }): Ask =>
				(question) =>
					Effect.sync(() => io.output.write(question)).pipe(
						Effect.zipRight(Effect.tryPromise(() => lines.next())),
						Effect.map((next) => (next.done === true ? "" : String(next.value))),
						// a failed read counts as a refusal
						Effect.orElseSucceed(() => ""),
					),
		),
	);
}

/**
 * Run `use` with the given Ask, or with a terminal prompt scoped to the run
 * when safe mode needs one.
 *
 * @effect Effect<A, E>
 */
export function withAsk<A, E>(
	safeMode: boolean,
	given: Ask | undefined,
	use: (ask: Ask) => Effect.Effect<A, E>,
	io: PromptIO = STDIO,
): Effect.Effect<A, E> {
	if (given !== undefined) return use(given);
	if (!safeMode) return use(declineAll);
	return Effect.scoped(Effect.flatMap(makeTerminalAsk(io), use));
}

/**
 * Only an answer whose first character is "y" or "Y" confirms.
 *
 * @pure true
 * @example
 * ```ts
 * isAffirmative("Yes"); // true
 * isAffirmative(" y");  // false
 * ```
 */
export function isAffirmative(answer: string): boolean {
	return answer.slice(0, 1).toLowerCase() === "y";
}
