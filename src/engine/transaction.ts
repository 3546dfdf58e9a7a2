import { performance } from "perf_hooks";
import { QueryError, errorMessage, type ResponseError } from "../errors.js";
import { importFiles, type ImportResult } from "../import/importer.js";
import type { Library } from "../library/library.js";
import { UNNAMED_QUERY, type VersionControl } from "../library/git.js";
import { acquireCommitLock, type LockOptions } from "../library/lock.js";
import type { LibraryPaths } from "../library/paths.js";
import { loadLibrary, saveLibrary, writeTransactionId } from "../library/store.js";
import { log, logRequestComplete } from "../logger.js";
import { compileQuery, parseQueryText } from "../query/compiler.js";
import type { CompiledQuery } from "../query/types.js";
import { NodeFileSystem, type FileSystem } from "../sync/files.js";
import { DefaultTagCodec, type TagCodec } from "../sync/tags.js";
import { generateId } from "../utils/index.js";
import { DiskEffects, executeSongOperation, type SongResult } from "./mutation.js";
import { executeOptionOperation, type OptionResult } from "./options.js";

export interface QueryResponse {
	success: boolean;
	id?: string;
	"in-progress"?: boolean;
	errors?: ResponseError[];
	options?: OptionResult[];
	import?: ImportResult[];
	songs?: SongResult[];
}

export interface TransactionManagerOptions {
	paths: LibraryPaths;
	files?: FileSystem;
	tags?: TagCodec;
	lock?: LockOptions;
	/** When given, requests refuse to run on an unclean tree and are committed on success */
	vcs?: VersionControl;
}

interface Results {
	options: OptionResult[];
	import: ImportResult[];
	songs: SongResult[];
}

/**
 * Runs requests against one library. Each request loads the library,
 * checks its last-id, applies every operation to a working copy and
 * either persists the copy under a new id or discards it.
 */
export class TransactionManager {
	readonly paths: LibraryPaths;
	private files: FileSystem;
	private tags: TagCodec;
	private lock: LockOptions;
	private vcs: VersionControl | undefined;
	private chain: Promise<void> = Promise.resolve();

	constructor(options: TransactionManagerOptions) {
		this.paths = options.paths;
		this.files = options.files ?? new NodeFileSystem();
		this.tags = options.tags ?? new DefaultTagCodec();
		this.lock = options.lock ?? { retries: 5, staleMs: 10000 };
		this.vcs = options.vcs;
	}

	/** Run a request given as JSON text */
	async executeText(text: string): Promise<QueryResponse> {
		let request: unknown;
		try {
			request = parseQueryText(text);
		} catch (error) {
			if (error instanceof QueryError) return failure([error], false);
			throw error;
		}
		return this.execute(request);
	}

	/** Run a parsed request document. Requests are committed one at a time. */
	async execute(request: unknown): Promise<QueryResponse> {
		const previous = this.chain;
		let release = (): void => {};
		const gate = new Promise<void>((resolve) => {
			release = () => resolve();
		});
		this.chain = previous.then(() => gate);

		await previous;
		const started = performance.now();
		try {
			const response = await this.run(request);
			logRequestComplete({
				success: response.success,
				id: response.id,
				inProgress: response["in-progress"],
				errors: response.errors?.length ?? 0,
				duration: performance.now() - started,
			});
			return response;
		} finally {
			release();
		}
	}

	private async run(request: unknown): Promise<QueryResponse> {
		let query: CompiledQuery;
		try {
			query = compileQuery(request);
		} catch (error) {
			if (error instanceof QueryError) return failure([error], false);
			throw error;
		}

		let unlock: () => Promise<void>;
		try {
			unlock = await acquireCommitLock(this.paths, this.lock);
		} catch (error) {
			if (error instanceof QueryError) return failure([error], false);
			throw error;
		}

		try {
			return await this.commit(query);
		} finally {
			await unlock();
		}
	}

	private async commit(query: CompiledQuery): Promise<QueryResponse> {
		let library: Library;
		try {
			await this.vcs?.ensureClean();
			library = await loadLibrary(this.paths);
		} catch (error) {
			if (error instanceof QueryError) return failure([error], false);
			throw error;
		}

		if (query.lastId !== null && query.lastId !== library.currentId) {
			const current = library.currentId;
			return failure(
				[
					new QueryError(
						"intervening-transaction",
						`the library changed since ${query.lastId}; the current transaction is ${current ?? "none"}`,
						{ "last-id": current }
					),
				],
				false
			);
		}

		if (query.description) {
			log.info(`running: ${query.description}`);
		}

		const working = library.clone();
		const effects = new DiskEffects();
		let results: Results;
		try {
			results = await this.apply(working, query, effects);
		} catch (error) {
			if (error instanceof QueryError) return failure([error], effects.happened);
			throw error;
		}

		const id = generateId();
		try {
			await saveLibrary(working, this.paths);
			await writeTransactionId(this.paths, id);
		} catch (error) {
			log.error(`could not persist the library: ${errorMessage(error)}`);
			return failure([new QueryError("file-io-error", `could not persist the library: ${errorMessage(error)}`)], true);
		}

		if (this.vcs) {
			try {
				await this.vcs.commit(query.description ?? UNNAMED_QUERY);
			} catch (error) {
				if (error instanceof QueryError) return failure([error], true);
				throw error;
			}
		}

		const response: QueryResponse = { success: true, id, "in-progress": false };
		if (query.operations.some((operation) => operation.kind === "option")) response.options = results.options;
		if (query.operations.some((operation) => operation.kind === "import")) response.import = results.import;
		if (query.operations.some((operation) => operation.kind === "songs")) response.songs = results.songs;
		return response;
	}

	private async apply(library: Library, query: CompiledQuery, effects: DiskEffects): Promise<Results> {
		const results: Results = { options: [], import: [], songs: [] };
		const context = { library, paths: this.paths, files: this.files, tags: this.tags, effects };

		for (const operation of query.operations) {
			switch (operation.kind) {
				case "option":
					results.options.push(executeOptionOperation(library, operation));
					break;
				case "import":
					results.import.push(await importFiles(context, operation));
					break;
				case "songs":
					results.songs.push(await executeSongOperation(context, operation));
					break;
			}
		}
		return results;
	}
}

function failure(errors: QueryError[], inProgress: boolean): QueryResponse {
	return {
		success: false,
		"in-progress": inProgress,
		errors: errors.map((error) => error.toResponse()),
	};
}
