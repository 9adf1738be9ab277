// CHANGE: Functional Core domain models for the CR cleaner (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the cleaner process.
 *
 * @remarks
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Static inclusion/exclusion lists consulted by the path filter.
 *
 * @remarks
 * - `targetExtensions` are compared exactly, leading dot included (".py")
 * - `ignoreFolderNames` are matched as substrings of a directory path
 */
export interface ExclusionConfig {
	readonly targetExtensions: readonly string[];
	readonly ignoreFolderNames: readonly string[];
}

/**
 * Filter bound to one configuration and one self file name.
 */
export interface PathFilter {
	readonly isPathAllowed: (dirPath: string) => boolean;
	readonly isFileAllowed: (fileName: string) => boolean;
}

/**
 * A line that ends with CR+LF.
 *
 * @invariant index >= 0; bytes ends with 0x0d 0x0a
 */
export interface CrLine {
	readonly index: number;
	readonly bytes: Uint8Array;
}

/**
 * Outcome of scanning one file.
 *
 * @invariant hasCr ⇔ offending.length > 0
 */
export interface ScanResult {
	readonly hasCr: boolean;
	readonly offending: readonly CrLine[];
}

/**
 * Policy flags handed from the command line to the core.
 */
export interface CLIOptions {
	readonly rootPath: string;
	readonly onlyInspect: boolean;
	readonly verbose: boolean;
	readonly safeMode: boolean;
}

/**
 * Parsed command: either print usage or run over a root.
 */
export type CliCommand =
	| { readonly _tag: "Usage" }
	| ({ readonly _tag: "Run" } & CLIOptions);
