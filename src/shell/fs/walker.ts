// CHANGE: Lazy depth-first traversal yielding candidate files
// WHY: Consumers pull one path at a time and may stop early; pruning decisions come from CORE
// FORMAT THEOREM: walk(root) = files(root) ++ Σ walk(sub) for allowed dirs, ∅ for pruned dirs
// PURITY: SHELL
// INVARIANT: Pruned directories contribute no files and are never descended into
// COMPLEXITY: O(n) where n = entries under non-pruned directories

import type { Dirent } from "node:fs";

import type { PathFilter } from "../../core/models.js";
import { fs, path } from "../utils/node-mods.js";

interface DirectoryListing {
	readonly files: readonly string[];
	readonly directories: readonly string[];
}

const EMPTY_LISTING: DirectoryListing = { files: [], directories: [] };

/**
 * A symlink counts as a directory when its target is one; such links are
 * neither followed nor yielded.
 *
 * @pure false (stat)
 */
function isLinkToDirectory(fullPath: string): boolean {
	try {
		return fs.statSync(fullPath).isDirectory();
	} catch {
		// dangling or looping link: listed as a file
		return false;
	}
}

/**
 * Split directory entries into file names and subdirectory names,
 * each sorted lexicographically.
 *
 * @pure false (reads directory)
 * @invariant unreadable or missing directory → empty listing
 */
function listDirectory(dir: string): DirectoryListing {
	let entries: Dirent[];
	try {
		entries = fs.readdirSync(dir, { withFileTypes: true });
	} catch {
		// missing root or unreadable directory: nothing beneath it is visited
		return EMPTY_LISTING;
	}

	const files: string[] = [];
	const directories: string[] = [];
	const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));
	for (const entry of sorted) {
		if (entry.isDirectory()) {
			directories.push(entry.name);
		} else if (!entry.isSymbolicLink() || !isLinkToDirectory(path.join(dir, entry.name))) {
			files.push(entry.name);
		}
	}
	return { files, directories };
}

/**
 * Walk `rootPath` top-down, yielding every allowed file as `dir/name`.
 *
 * @param rootPath - Directory to start from; a missing root yields nothing
 * @param filter - Decides which directories are visited and which files are yielded
 *
 * @pure false (filesystem reads happen as the sequence is consumed)
 * @invariant Finite, forward-only; a new call re-walks from scratch
 *
 * @example
 * ```ts
 * for (const file of walk("/proj", makePathFilter(DEFAULT_EXCLUSION_CONFIG, "cr-cleaner.js"))) {
 *   console.log(file);
 * }
 * ```
 */
export function* walk(
	rootPath: string,
	filter: PathFilter,
): Generator<string, void, undefined> {
	if (!filter.isPathAllowed(rootPath)) return;

	const { files, directories } = listDirectory(rootPath);
	for (const name of files) {
		if (filter.isFileAllowed(name)) {
			yield path.join(rootPath, name);
		}
	}
	for (const name of directories) {
		yield* walk(path.join(rootPath, name), filter);
	}
}
