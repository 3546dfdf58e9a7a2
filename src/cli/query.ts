import fs from "fs/promises";
import type { Readable } from "stream";
import { config, type Config } from "../config/index.js";
import { TransactionManager, type QueryResponse } from "../engine/transaction.js";
import { GitRepository, type VersionControl } from "../library/git.js";
import { LIBRARY_FILENAME, libraryPaths, locateLibraryFile, resolveLibraryFile } from "../library/paths.js";
import { log } from "../logger.js";

async function readStream(stream: Readable): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Request text from a command-line argument: "-" reads stdin, "@file" reads
 * the file, anything else is the JSON itself
 */
export async function readQuerySource(source: string, stdin: Readable = process.stdin): Promise<string> {
	if (source === "-") {
		return readStream(stdin);
	}
	if (source.startsWith("@")) {
		return fs.readFile(source.slice(1), "utf-8");
	}
	return source;
}

/**
 * Options file to use: the --library flag, then TUNEBASE_LIBRARY, then the
 * nearest tunebase.yml above the working directory
 */
export function findLibrary(flag: string | undefined, configured: string | undefined, cwd?: string): string {
	const explicit = flag ?? configured;
	if (explicit) {
		return resolveLibraryFile(explicit);
	}
	const located = locateLibraryFile(cwd);
	if (!located) {
		throw new Error(`no ${LIBRARY_FILENAME} found in the current directory or its parents`);
	}
	return located;
}

/** Version control for a library root under the configured git mode */
export async function versionControlFor(root: string, mode: Config["git"]["mode"]): Promise<VersionControl | undefined> {
	if (mode === "never") return undefined;
	if (mode === "auto" && !(await GitRepository.detect(root))) {
		log.debug(`${root} is not under git; queries will not be committed`);
		return undefined;
	}
	return new GitRepository(root);
}

export async function queryCommand(source: string, opts: { library?: string }): Promise<QueryResponse> {
	const libraryFile = findLibrary(opts.library, config.library.path);
	log.debug(`using library ${libraryFile}`);

	const paths = libraryPaths(libraryFile);
	const manager = new TransactionManager({
		paths,
		lock: { retries: config.lock.retries, staleMs: config.lock.staleMs },
		vcs: await versionControlFor(paths.root, config.git.mode),
	});
	const response = await manager.executeText(await readQuerySource(source));
	console.log(JSON.stringify(response, null, 2));
	return response;
}
