import fs from "fs/promises";
import path from "path";
import fg from "fast-glob";

/**
 * Filesystem operations the sync and import steps rely on. Paths are
 * absolute.
 */
export interface FileSystem {
	exists(file: string): Promise<boolean>;
	/** Move a file, creating the destination's parent directories */
	move(from: string, to: string): Promise<void>;
	/** Files under cwd matching a glob, relative to cwd */
	glob(pattern: string, cwd: string, ignore?: string[]): Promise<string[]>;
}

export class NodeFileSystem implements FileSystem {
	async exists(file: string): Promise<boolean> {
		try {
			await fs.access(file);
			return true;
		} catch {
			return false;
		}
	}

	async move(from: string, to: string): Promise<void> {
		await fs.mkdir(path.dirname(to), { recursive: true });
		try {
			await fs.rename(from, to);
		} catch (error) {
			// rename cannot cross devices; copy then remove instead
			if (error instanceof Error && "code" in error && error.code === "EXDEV") {
				await fs.copyFile(from, to);
				await fs.unlink(from);
				return;
			}
			throw error;
		}
	}

	async glob(pattern: string, cwd: string, ignore: string[] = []): Promise<string[]> {
		const files = await fg(pattern, { cwd, onlyFiles: true, dot: false, ignore });
		return files.sort();
	}
}
