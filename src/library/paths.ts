import fs from "fs";
import path from "path";

/** Options file looked up in the working directory and its parents */
export const LIBRARY_FILENAME = "tunebase.yml";

/** Album document for songs whose metadata path cannot be rendered */
export const UNSORTED_FILENAME = "unsorted.yml";

export const WORK_DIRNAME = "work";

export interface LibraryPaths {
	root: string;
	optionsFile: string;
	unsortedFile: string;
	workDir: string;
	lastIdFile: string;
	lockFile: string;
}

export function libraryPaths(optionsFile: string): LibraryPaths {
	const absolute = path.resolve(optionsFile);
	const root = path.dirname(absolute);
	const workDir = path.join(root, WORK_DIRNAME);
	return {
		root,
		optionsFile: absolute,
		unsortedFile: path.join(root, UNSORTED_FILENAME),
		workDir,
		lastIdFile: path.join(workDir, "last-id"),
		lockFile: path.join(workDir, "lock"),
	};
}

/**
 * Find the options file in the given directory or one of its parents
 */
export function locateLibraryFile(start: string = process.cwd()): string | null {
	let last: string | null = null;
	let directory = path.resolve(start);

	while (directory !== last) {
		const candidate = path.join(directory, LIBRARY_FILENAME);
		if (fs.existsSync(candidate)) {
			return candidate;
		}
		last = directory;
		directory = path.dirname(directory);
	}

	return null;
}

/**
 * Accept either the options file or the directory holding it
 */
export function resolveLibraryFile(candidate: string): string {
	const absolute = path.resolve(candidate);
	if (fs.existsSync(absolute) && fs.statSync(absolute).isDirectory()) {
		return path.join(absolute, LIBRARY_FILENAME);
	}
	return absolute;
}

/**
 * Library-relative path with forward slashes
 */
export function relativeToRoot(paths: LibraryPaths, file: string): string {
	return path.relative(paths.root, path.resolve(paths.root, file)).split(path.sep).join("/");
}
