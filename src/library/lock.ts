import fs from "fs/promises";
import lockfile from "proper-lockfile";
import { QueryError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { LibraryPaths } from "./paths.js";

export interface LockOptions {
	retries: number;
	staleMs: number;
}

export type ReleaseLock = () => Promise<void>;

/**
 * Take the cross-process commit lock for a library. Only one process may
 * hold it between loading the library and persisting it.
 */
export async function acquireCommitLock(paths: LibraryPaths, options: LockOptions): Promise<ReleaseLock> {
	await fs.mkdir(paths.workDir, { recursive: true });

	try {
		return await lockfile.lock(paths.workDir, {
			lockfilePath: paths.lockFile,
			stale: options.staleMs,
			retries: { retries: options.retries, minTimeout: 100, maxTimeout: 1000 },
			// Without a handler proper-lockfile throws from a timer when the lock is compromised
			onCompromised: (error) => {
				log.error(`commit lock compromised: ${errorMessage(error)}`);
			},
		});
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ELOCKED") {
			throw new QueryError("library-locked", "another query is already committing to this library", {
				file: paths.lockFile,
			});
		}
		throw error;
	}
}
