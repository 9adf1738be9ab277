// CHANGE: Pure path/file eligibility rules for directory traversal
// WHY: Traversal (SHELL) asks CORE whether to descend or scan; lists come from an explicit config value
// FORMAT THEOREM: ∀d: isPathAllowed(c, d) ↔ ¬∃ n ∈ c.ignoreFolderNames: d.includes(n)
// PURITY: CORE
// INVARIANT: No I/O, no global state
// COMPLEXITY: O(k·|d|) where k = |ignoreFolderNames|

import type { ExclusionConfig, PathFilter } from "./models.js";

/**
 * Defaults used by the command line tool.
 */
export const DEFAULT_EXCLUSION_CONFIG: ExclusionConfig = {
	targetExtensions: [".py"],
	ignoreFolderNames: [
		"site-packages",
		"node_modules",
		".git",
		"venv",
		".env",
		".vscode",
		".idea",
	],
};

/**
 * Extension of a bare file name, leading dot included.
 *
 * Leading dots belong to the name: ".bashrc" and "..py" have no extension.
 *
 * @pure true
 * @example
 * ```ts
 * extensionOf("run.py");     // ".py"
 * extensionOf("a.tar.gz");   // ".gz"
 * extensionOf(".bashrc");    // ""
 * ```
 */
export function extensionOf(fileName: string): string {
	const stem = fileName.replace(/^\.+/, "");
	const dot = stem.lastIndexOf(".");
	return dot <= 0 ? "" : stem.slice(dot);
}

/**
 * False iff any ignored folder name occurs anywhere in `dirPath`.
 *
 * @pure true
 * @complexity O(k·n)
 */
export function isPathAllowed(config: ExclusionConfig, dirPath: string): boolean {
	return !config.ignoreFolderNames.some((name) => dirPath.includes(name));
}

/**
 * False for the tool's own file and for names outside `targetExtensions`.
 *
 * @pure true
 * @invariant fileName === selfFileName → false
 */
export function isFileAllowed(
	config: ExclusionConfig,
	fileName: string,
	selfFileName: string,
): boolean {
	if (fileName === selfFileName) return false;
	return config.targetExtensions.includes(extensionOf(fileName));
}

/**
 * Bind a configuration and the tool's own file name into a PathFilter.
 *
 * @pure true
 */
export function makePathFilter(
	config: ExclusionConfig,
	selfFileName: string,
): PathFilter {
	return {
		isPathAllowed: (dirPath) => isPathAllowed(config, dirPath),
		isFileAllowed: (fileName) => isFileAllowed(config, fileName, selfFileName),
	};
}
