// CHANGE: End-to-end orchestrator tests over a temp tree
// INVARIANT: Inspect-only never writes; clean rewrites only target files with CR+LF
// PURITY: APP

import * as fs from "node:fs";
import { PassThrough } from "node:stream";

import { Effect } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import { crFinder } from "../../src/app/crFinder.js";
import { DEFAULT_EXCLUSION_CONFIG, makePathFilter } from "../../src/core/filter.js";
import { type Ask, makeTerminalAsk } from "../../src/shell/prompt/confirm.js";
import { captureLog } from "../utils/console.js";
import { createTempTree, type TempTree } from "../utils/tempTree.js";

const filter = makePathFilter(DEFAULT_EXCLUSION_CONFIG, "cr-cleaner.js");
const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const neverAsked: Ask = () => Effect.die(new Error("prompt must not be shown"));

describe("crFinder", () => {
	let tree: TempTree | undefined;

	afterEach(() => {
		tree?.cleanup();
		tree = undefined;
	});

	const scenario = (): TempTree =>
		createTempTree({ "a.py": "print(1)\r\nprint(2)\n", "b.txt": "ok\r\n" });

	it("inspect-only + verbose reports a.py line 0 only and writes nothing", async () => {
		tree = scenario();
		const log = captureLog();

		await Effect.runPromise(
			crFinder(tree.root, {
				onlyInspect: true,
				verbose: true,
				safeMode: false,
				filter,
				ask: neverAsked,
			}),
		);

		expect(log.lines()).toEqual([
			`Win32 style file: ${tree.file("a.py")}. LINE #0: "print(1)\\r\\n"`,
		]);
		expect(tree.read("a.py")).toBe("print(1)\r\nprint(2)\n");
		expect(tree.read("b.txt")).toBe("ok\r\n");
	});

	it("clean mode rewrites a.py and leaves b.txt untouched", async () => {
		tree = scenario();
		captureLog();

		await Effect.runPromise(
			crFinder(tree.root, {
				onlyInspect: false,
				verbose: false,
				safeMode: false,
				filter,
				ask: neverAsked,
			}),
		);

		expect(tree.read("a.py")).toBe("print(1)\nprint(2)\n");
		expect(tree.read("b.txt")).toBe("ok\r\n");
	});

	it("does not rewrite files without CR+LF and skips ignored folders", async () => {
		tree = createTempTree({
			"clean.py": "x\n",
			"venv/dirty.py": "y\r\n",
			"src/dirty.py": "z\r\n",
		});
		const ask = vi.fn<Ask>(() => Effect.succeed("y"));

		await Effect.runPromise(
			crFinder(tree.root, { onlyInspect: false, verbose: false, safeMode: true, filter, ask }),
		);

		expect(ask).toHaveBeenCalledTimes(1);
		expect(ask).toHaveBeenCalledWith(`Clear CR from: ${tree.file("src/dirty.py")}? [Y / N] `);
		expect(tree.read("src/dirty.py")).toBe("z\n");
		expect(tree.read("venv/dirty.py")).toBe("y\r\n");
		expect(tree.read("clean.py")).toBe("x\n");
	});

	it("continues past a file declined in safe mode", async () => {
		tree = createTempTree({ "a.py": "1\r\n", "b.py": "2\r\n" });
		const answers = ["n", "y"];
		const ask: Ask = () => Effect.succeed(answers.shift() ?? "n");

		await Effect.runPromise(
			crFinder(tree.root, { onlyInspect: false, verbose: false, safeMode: true, filter, ask }),
		);

		expect(tree.read("a.py")).toBe("1\r\n");
		expect(tree.read("b.py")).toBe("2\n");
	});

	it("answers every safe-mode prompt from piped input", async () => {
		tree = createTempTree({ "a.py": "1\r\n", "b.py": "2\r\n", "c.py": "3\r\n" });
		const t = tree;
		const input = new PassThrough();
		input.end("y\nn\ny\n");
		const output = new PassThrough();

		await Effect.runPromise(
			Effect.scoped(
				Effect.flatMap(makeTerminalAsk({ input, output }), (ask) =>
					crFinder(t.root, { onlyInspect: false, verbose: false, safeMode: true, filter, ask }),
				),
			),
		);

		expect(t.read("a.py")).toBe("1\n");
		expect(t.read("b.py")).toBe("2\r\n");
		expect(t.read("c.py")).toBe("3\n");
		expect(String(output.read())).toBe(
			[t.file("a.py"), t.file("b.py"), t.file("c.py")]
				.map((file) => `Clear CR from: ${file}? [Y / N] `)
				.join(""),
		);
	});

	it("reports an unreadable candidate and still cleans the next one", async () => {
		tree = createTempTree({ "ok.py": "fine\r\n" });
		fs.symlinkSync(tree.file("missing-target.py"), tree.file("broken.py"));
		const log = captureLog();

		await Effect.runPromise(
			crFinder(tree.root, {
				onlyInspect: false,
				verbose: false,
				safeMode: false,
				filter,
				ask: neverAsked,
			}),
		);

		expect(log.lines()).toHaveLength(1);
		expect(log.lines()[0]).toMatch(
			new RegExp(`^Cant read file: ${escapeRegExp(tree.file("broken.py"))}\\. ENOENT`),
		);
		expect(tree.read("ok.py")).toBe("fine\n");
	});

	it("reports a failed rewrite and still cleans the next file", async () => {
		tree = createTempTree({ "a.py": "1\r\n", "b.py": "2\r\n" });
		const t = tree;
		const log = captureLog();
		// the first file disappears between inspection and rewrite
		const ask: Ask = (question) =>
			Effect.sync(() => {
				if (question.includes(t.file("a.py"))) fs.rmSync(t.file("a.py"));
				return "y";
			});

		await Effect.runPromise(
			crFinder(t.root, { onlyInspect: false, verbose: false, safeMode: true, filter, ask }),
		);

		expect(log.lines()).toHaveLength(1);
		expect(log.lines()[0]).toMatch(
			new RegExp(`^Cant rewrite file: ${escapeRegExp(t.file("a.py"))}\\. ENOENT`),
		);
		expect(t.read("b.py")).toBe("2\n");
	});

	it("is a no-op for a missing root", async () => {
		const log = captureLog();
		await Effect.runPromise(
			crFinder("/definitely/not/here/cr-cleaner", {
				onlyInspect: false,
				verbose: true,
				safeMode: false,
				filter,
				ask: neverAsked,
			}),
		);
		expect(log.lines()).toEqual([]);
	});
});
