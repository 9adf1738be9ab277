// CHANGE: Tests for the application entry (usage, root resolution, single-file mode)
// INVARIANT: Single file bypasses the extension filter; missing root is fatal
// PURITY: APP

import { Effect, Either } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { runCleaner } from "../../src/app/runCleaner.js";
import { formatFatalError } from "../../src/core/errors.js";
import type { CliCommand } from "../../src/core/models.js";
import { main } from "../../src/main.js";
import type { Ask } from "../../src/shell/prompt/confirm.js";
import { USAGE } from "../../src/shell/output/usage.js";
import { captureLog } from "../utils/console.js";
import { createTempTree, type TempTree } from "../utils/tempTree.js";

const neverAsked: Ask = () => Effect.die(new Error("prompt must not be shown"));

const run = (
	rootPath: string,
	flags: { onlyInspect?: boolean; verbose?: boolean } = {},
): CliCommand => ({
	_tag: "Run",
	rootPath,
	onlyInspect: flags.onlyInspect ?? false,
	verbose: flags.verbose ?? false,
	safeMode: false,
});

describe("runCleaner", () => {
	let tree: TempTree | undefined;

	afterEach(() => {
		tree?.cleanup();
		tree = undefined;
	});

	it("prints usage and returns 0", async () => {
		const log = captureLog();
		const code = await Effect.runPromise(
			runCleaner({ _tag: "Usage" }, { installDir: "/", selfFileName: "x", ask: neverAsked }),
		);
		expect(code).toBe(0);
		expect(log.lines()).toEqual([USAGE]);
	});

	it("cleans a single file regardless of its extension", async () => {
		tree = createTempTree({ "b.txt": "ok\r\n" });
		captureLog();
		const code = await Effect.runPromise(
			runCleaner(run(tree.file("b.txt")), {
				installDir: tree.root,
				selfFileName: "cr-cleaner.js",
				ask: neverAsked,
			}),
		);
		expect(code).toBe(0);
		expect(tree.read("b.txt")).toBe("ok\n");
	});

	it("only reports a single file in inspect mode", async () => {
		tree = createTempTree({ "b.txt": "ok\r\n" });
		const log = captureLog();
		await Effect.runPromise(
			runCleaner(run(tree.file("b.txt"), { onlyInspect: true, verbose: true }), {
				installDir: tree.root,
				selfFileName: "cr-cleaner.js",
				ask: neverAsked,
			}),
		);
		expect(log.lines()).toEqual([`Win32 style file: ${tree.file("b.txt")}. LINE #0: "ok\\r\\n"`]);
		expect(tree.read("b.txt")).toBe("ok\r\n");
	});

	it("walks a directory with the configured filter and self file name", async () => {
		tree = createTempTree({ "tool.py": "t\r\n", "job.py": "j\r\n", "job.sh": "s\r\n" });
		captureLog();
		await Effect.runPromise(
			runCleaner(run(tree.root), {
				installDir: tree.root,
				selfFileName: "tool.py",
				exclusions: { targetExtensions: [".py", ".sh"], ignoreFolderNames: [] },
				ask: neverAsked,
			}),
		);
		expect(tree.read("tool.py")).toBe("t\r\n");
		expect(tree.read("job.py")).toBe("j\n");
		expect(tree.read("job.sh")).toBe("s\n");
	});

	it("fails with PathNotFoundError for a missing root", () => {
		const outcome = Effect.runSync(
			Effect.either(
				runCleaner(run("/no/such/root"), {
					installDir: "/",
					selfFileName: "x",
					ask: neverAsked,
				}),
			),
		);
		expect(Either.isLeft(outcome)).toBe(true);
		if (Either.isLeft(outcome)) {
			expect(formatFatalError(outcome.left)).toBe("Can't find path: /no/such/root.");
		}
	});
});

describe("main", () => {
	it("walks the install directory for -a", async () => {
		const tree = createTempTree({ "a.py": "x\r\n", "cr-cleaner.py": "self\r\n" });
		try {
			captureLog();
			const code = await Effect.runPromise(
				main(["-a"], { installDir: tree.root, selfFileName: "cr-cleaner.py", ask: neverAsked }),
			);
			expect(code).toBe(0);
			expect(tree.read("a.py")).toBe("x\n");
			expect(tree.read("cr-cleaner.py")).toBe("self\r\n");
		} finally {
			tree.cleanup();
		}
	});

	it("surfaces conflicting flags as a fatal error", () => {
		const outcome = Effect.runSync(
			Effect.either(main(["-a", "-f", "x"], { installDir: "/", selfFileName: "x" })),
		);
		expect(Either.isLeft(outcome)).toBe(true);
		if (Either.isLeft(outcome)) {
			expect(formatFatalError(outcome.left)).toBe(
				"Can not set up -a and -f flags for one command",
			);
		}
	});
});
