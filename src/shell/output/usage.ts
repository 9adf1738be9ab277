// CHANGE: Usage banner printed when no root is given
// PURITY: SHELL (console output)

export const USAGE = `Find text files with Windows line endings (CR+LF) and rewrite them to LF,
so interpreters stop failing with errors such as:
  /usr/bin/env: 'python\\r': No such file or directory

Files are found by walking the start directory. Only files whose extension is
in the target list are scanned, and folders such as .git, node_modules or venv
are skipped.

Usage: cr-cleaner (-a | -f <path>) [-v] [-s] [-i]

  -a, --all            scan all files and sub-directories of the tool's location
  -f, --file <dir>     scan all files and sub-directories of <dir>
  -f, --file <file>    scan this single file, whatever its extension

Extra options:
  -v, --verbose        print every line where CR+LF is found
  -s, --safe_mode      ask before rewriting each file
  -i, --inspect        only search for CR+LF, never rewrite (implies -v)
  -h, --help           print this text
`;

export function printUsage(): void {
	console.log(USAGE);
}
