import { execFile as execFileCallback } from "child_process";
import { promisify } from "util";
import { GitError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { WORK_DIRNAME } from "./paths.js";

const execFile = promisify(execFileCallback);

export const UNNAMED_QUERY = "Unnamed query";

/**
 * Version control around a library: a request only runs on a clean tree and
 * its changes are committed afterwards
 */
export interface VersionControl {
	ensureClean(): Promise<void>;
	commit(message: string): Promise<boolean>;
}

/**
 * The library's files inside a git working tree. Everything under the
 * library root except `work/` is tracked.
 */
export class GitRepository implements VersionControl {
	readonly root: string;

	constructor(root: string) {
		this.root = root;
	}

	/** Whether `root` lies inside a git working tree */
	static async detect(root: string): Promise<boolean> {
		try {
			const { stdout } = await execFile("git", ["rev-parse", "--is-inside-work-tree"], { cwd: root });
			return stdout.trim() === "true";
		} catch (error) {
			log.debug(`${root} is not in a git working tree: ${errorMessage(error)}`);
			return false;
		}
	}

	private async git(args: string[]): Promise<string> {
		try {
			const { stdout } = await execFile("git", args, { cwd: this.root });
			return stdout;
		} catch (error) {
			throw new GitError(`git ${args[0]} failed: ${errorMessage(error)}`, { command: ["git", ...args].join(" ") });
		}
	}

	/** Staged, unstaged and untracked changes under the library root, as porcelain lines */
	async changes(): Promise<string[]> {
		const stdout = await this.git(["status", "--porcelain", "--untracked-files=all", "--", ".", `:(exclude)${WORK_DIRNAME}`]);
		return stdout.split("\n").filter((line) => line.trim() !== "");
	}

	async ensureClean(): Promise<void> {
		const changes = await this.changes();
		if (changes.length > 0) {
			throw new GitError(`the working tree is not clean; commit or discard ${changes.length} change(s) first`, {
				changes,
			});
		}
	}

	/** Commit everything under the library root. Returns false when there was nothing to commit. */
	async commit(message: string): Promise<boolean> {
		await this.git(["add", "-A", "--", ".", `:(exclude)${WORK_DIRNAME}`]);
		if ((await this.changes()).length === 0) {
			return false;
		}
		await this.git(["commit", "-m", message]);
		log.debug(`committed: ${message}`);
		return true;
	}
}
