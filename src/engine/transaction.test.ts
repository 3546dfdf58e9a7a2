import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import YAML from "yaml";
import { GitError } from "../errors.js";
import type { VersionControl } from "../library/git.js";
import { libraryPaths } from "../library/paths.js";
import { setLogLevel } from "../logger.js";
import { TAG_FIELDS, type TagCodec, type TagUpdate, type TagValues } from "../sync/tags.js";
import { TransactionManager } from "./transaction.js";

class MemoryTagCodec implements TagCodec {
	tags = new Map<string, TagValues>();
	failing = new Set<string>();

	async read(file: string): Promise<TagValues> {
		const tags = this.tags.get(file);
		if (!tags) throw new Error(`no tags in ${file}`);
		return { ...tags };
	}

	async write(file: string, update: TagUpdate): Promise<void> {
		if (this.failing.has(file)) throw new Error("unsupported format");
		const tags = { ...(this.tags.get(file) ?? {}) };
		for (const field of TAG_FIELDS) {
			if (!(field in update)) continue;
			const value = update[field];
			if (value === null || value === undefined) {
				delete tags[field];
			} else {
				tags[field] = value;
			}
		}
		this.tags.set(file, tags);
	}
}

class RecordingVersionControl implements VersionControl {
	clean = true;
	failCommit = false;
	commits: string[] = [];

	async ensureClean(): Promise<void> {
		if (!this.clean) throw new GitError("the working tree is not clean");
	}

	async commit(message: string): Promise<boolean> {
		if (this.failCommit) throw new GitError("git commit failed: no identity");
		this.commits.push(message);
		return true;
	}
}

describe("TransactionManager", () => {
	let root: string;
	let codec: MemoryTagCodec;
	let manager: TransactionManager;

	function write(file: string, contents: string): void {
		const absolute = path.join(root, file);
		fs.mkdirSync(path.dirname(absolute), { recursive: true });
		fs.writeFileSync(absolute, contents);
	}

	function read(file: string): string {
		return fs.readFileSync(path.join(root, file), "utf-8");
	}

	function exists(file: string): boolean {
		return fs.existsSync(path.join(root, file));
	}

	async function run(request: unknown) {
		return manager.execute(request);
	}

	beforeEach(() => {
		setLogLevel("silent");
		root = fs.mkdtempSync(path.join(os.tmpdir(), "tunebase-test-"));
		write("tunebase.yml", "");
		write(
			"metadata/Pink Floyd/Time.yml",
			YAML.stringify({
				album: { album: "Time", "album-artist": "Pink Floyd" },
				songs: [
					{ uuid: "s1", title: "Breathe", file: "media/breathe.mp3" },
					{ uuid: "s2", title: "On the Run", file: "media/on-the-run.mp3" },
					{ uuid: "s3", title: "Time", file: "media/time.mp3" },
				],
			})
		);
		write(
			"metadata/Queen/Jazz.yml",
			YAML.stringify({
				album: { album: "Jazz", "album-artist": "Queen" },
				songs: [{ uuid: "q1", title: "Mustapha", file: "media/mustapha.mp3" }],
			})
		);
		for (const file of ["breathe", "on-the-run", "time", "mustapha"]) {
			write(`media/${file}.mp3`, "");
		}
		write("work/last-id", "B\n");

		codec = new MemoryTagCodec();
		manager = new TransactionManager({
			paths: libraryPaths(path.join(root, "tunebase.yml")),
			tags: codec,
			lock: { retries: 0, staleMs: 10000 },
		});
	});

	afterEach(() => {
		fs.rmSync(root, { recursive: true, force: true });
	});

	describe("last-id", () => {
		test("a stale last-id is rejected with the current id and changes nothing", async () => {
			const response = await run({
				options: [{ name: "deduplication-threshold", set: "0.5" }],
				"last-id": "A",
			});
			expect(response).toEqual({
				success: false,
				"in-progress": false,
				errors: [
					{
						reason: "intervening-transaction",
						message: "the library changed since A; the current transaction is B",
						"last-id": "B",
					},
				],
			});
			expect(read("tunebase.yml")).toBe("");
			expect(read("work/last-id")).toBe("B\n");
		});

		test("a matching last-id commits under a new id", async () => {
			const response = await run({
				options: [{ name: "deduplication-threshold", set: "0.5" }],
				"last-id": "B",
			});
			expect(response.success).toBe(true);
			expect(response.options).toEqual(["0.5"]);
			expect(response.id).toBeDefined();
			expect(response.id).not.toBe("B");
			expect(read("work/last-id")).toBe(`${response.id}\n`);
			expect(YAML.parse(read("tunebase.yml"))).toEqual({ "deduplication-threshold": "0.5" });
		});

		test("requests without last-id always run", async () => {
			const first = await run({});
			const second = await run({});
			expect(first.success).toBe(true);
			expect(second.success).toBe(true);
			expect(second.id).not.toBe(first.id);
		});

		test("concurrent requests are committed one after the other", async () => {
			const [first, second] = await Promise.all([run({ "last-id": "B" }), run({ "last-id": "B" })]);
			expect(first.success).toBe(true);
			expect(second.success).toBe(false);
			expect(second.errors?.[0]).toMatchObject({ reason: "intervening-transaction", "last-id": first.id });
		});
	});

	describe("songs", () => {
		test("returns requested fields of matched songs in stored order", async () => {
			const response = await run({ songs: [{ filter: { album: "Time" }, get: ["title"] }] });
			expect(response.songs).toEqual([[{ title: "Breathe" }, { title: "On the Run" }, { title: "Time" }]]);
		});

		test("an empty filter matches every song", async () => {
			const response = await run({ songs: [{ get: ["uuid"] }] });
			expect(response.songs).toEqual([[{ uuid: "s1" }, { uuid: "s2" }, { uuid: "s3" }, { uuid: "q1" }]]);
		});

		test("absent requested fields come back as null", async () => {
			const response = await run({ songs: [{ filter: { uuid: "q1" }, get: ["title", "genre"] }] });
			expect(response.songs).toEqual([[{ title: "Mustapha", genre: null }]]);
		});

		test("get defaults to every field", async () => {
			const response = await run({ songs: [{ filter: { uuid: "q1" } }] });
			expect(response.songs).toEqual([
				[{ uuid: "q1", album: "Jazz", "album-artist": "Queen", title: "Mustapha", file: "media/mustapha.mp3" }],
			]);
		});

		test("quiet returns the number of matches", async () => {
			const response = await run({ songs: [{ quiet: true }] });
			expect(response.songs).toEqual([4]);
		});

		test("set then get returns the new value, and it is persisted", async () => {
			const response = await run({ songs: [{ filter: { title: "Breathe" }, set: { genre: "Rock" }, get: ["genre"] }] });
			expect(response.songs).toEqual([[{ genre: "Rock" }]]);

			const again = await run({ songs: [{ filter: { uuid: "s1" }, get: ["genre", "title"] }] });
			expect(again.songs).toEqual([[{ genre: "Rock", title: "Breathe" }]]);
		});

		test("setting null hides the album value", async () => {
			await run({ songs: [{ filter: { uuid: "s2" }, set: { album: null } }] });
			const response = await run({ songs: [{ filter: { album: "Time" }, get: ["uuid"] }] });
			expect(response.songs).toEqual([[{ uuid: "s1" }, { uuid: "s3" }]]);
		});

		test("changing the album moves the song to another metadata file", async () => {
			const response = await run({ songs: [{ filter: { uuid: "s3" }, set: { album: "Animals" } }] });
			expect(response.success).toBe(true);
			expect(exists("metadata/Pink Floyd/Animals.yml")).toBe(true);

			const time = YAML.parse(read("metadata/Pink Floyd/Time.yml"));
			expect(time.songs.map((song: { uuid: string }) => song.uuid)).toEqual(["s1", "s2"]);

			const moved = await run({ songs: [{ filter: { album: "Animals" }, get: ["uuid", "title"] }] });
			expect(moved.songs).toEqual([[{ uuid: "s3", title: "Time" }]]);
		});

		test("an emptied album file is removed", async () => {
			await run({ songs: [{ filter: { uuid: "q1" }, set: { album: "News of the World" } }] });
			expect(exists("metadata/Queen/Jazz.yml")).toBe(false);
			expect(exists("metadata/Queen/News of the World.yml")).toBe(true);
		});

		test("no matches is an error unless allowed", async () => {
			const failed = await run({ songs: [{ filter: { album: "Nope" } }] });
			expect(failed.success).toBe(false);
			expect(failed.errors?.[0]).toMatchObject({ reason: "no-matches", subquery: 0 });

			const allowed = await run({ songs: [{ filter: { album: "Nope" }, "allow-no-matches": true }] });
			expect(allowed.songs).toEqual([[]]);
		});

		test("current mismatches abort before any song changes", async () => {
			const response = await run({
				songs: [{ filter: { album: "Time" }, current: { title: "Breathe" }, set: { genre: "Prog" } }],
			});
			expect(response.success).toBe(false);
			expect(response["in-progress"]).toBe(false);
			expect(response.errors?.[0]).toMatchObject({
				reason: "current-mismatch",
				uuid: "s2",
				field: "title",
				expected: "Breathe",
				actual: "On the Run",
			});

			const check = await run({ songs: [{ filter: { uuid: "s1" }, get: ["genre"] }] });
			expect(check.songs).toEqual([[{ genre: null }]]);
		});

		test("current null expects no value", async () => {
			const response = await run({
				songs: [{ filter: { album: "Time" }, current: { genre: null }, set: { genre: "Prog" }, quiet: true }],
			});
			expect(response.songs).toEqual([3]);
		});

		test("malformed subqueries are rejected before anything runs", async () => {
			const response = await run({
				songs: [{ set: { genre: "Prog" } }, { extract: ["title"], set: { title: "x" } }],
			});
			expect(response.success).toBe(false);
			expect(response.errors?.[0]).toMatchObject({ reason: "malformed-query", subquery: 1 });
			expect(read("work/last-id")).toBe("B\n");
		});

		test("text that is not JSON is a malformed query", async () => {
			const response = await manager.executeText("{songs");
			expect(response.success).toBe(false);
			expect(response.errors?.[0].reason).toBe("malformed-query");
		});
	});

	describe("sync", () => {
		test("check lists every missing media file", async () => {
			fs.rmSync(path.join(root, "media/on-the-run.mp3"));
			const response = await run({ songs: [{ check: true }] });
			expect(response.success).toBe(false);
			expect(response.errors).toEqual([
				{
					reason: "missing-files",
					message: "songs subquery 0: 1 media file(s) missing",
					subquery: 0,
					files: ["media/on-the-run.mp3"],
				},
			]);
		});

		test("check passes when every file is present", async () => {
			const response = await run({ songs: [{ check: true, quiet: true }] });
			expect(response.success).toBe(true);
		});

		test("extract copies tags into metadata", async () => {
			codec.tags.set(path.join(root, "media/breathe.mp3"), { title: "Breathe (2011)", genre: "Rock" });
			const response = await run({ songs: [{ filter: { uuid: "s1" }, extract: ["genre"], get: ["genre", "title"] }] });
			expect(response.songs).toEqual([[{ genre: "Rock", title: "Breathe" }]]);
		});

		test("extracting an absent tag clears the field", async () => {
			codec.tags.set(path.join(root, "media/breathe.mp3"), {});
			const response = await run({ songs: [{ filter: { uuid: "s1" }, extract: ["title"], get: ["title"] }] });
			expect(response.songs).toEqual([[{ title: null }]]);
		});

		test("unreadable tags are a tag-io-error", async () => {
			const response = await run({ songs: [{ filter: { uuid: "s1" }, extract: ["genre"] }] });
			expect(response.errors?.[0]).toMatchObject({ reason: "tag-io-error", file: "media/breathe.mp3", uuid: "s1" });
		});

		test("embed writes current values, including ones set in the same subquery", async () => {
			const response = await run({ songs: [{ filter: { uuid: "s1" }, set: { genre: "Prog" }, embed: ["genre", "title"] }] });
			expect(response.success).toBe(true);
			expect(response["in-progress"]).toBe(false);
			expect(codec.tags.get(path.join(root, "media/breathe.mp3"))).toEqual({ genre: "Prog", title: "Breathe" });
		});

		test("a failure after tags were written is reported as in progress", async () => {
			codec.failing.add(path.join(root, "media/on-the-run.mp3"));
			const response = await run({ songs: [{ filter: { album: "Time" }, set: { genre: "Prog" }, embed: ["genre"] }] });
			expect(response.success).toBe(false);
			expect(response["in-progress"]).toBe(true);
			expect(response.errors?.[0]).toMatchObject({ reason: "tag-io-error", file: "media/on-the-run.mp3", uuid: "s2" });
			expect(codec.tags.get(path.join(root, "media/breathe.mp3"))).toEqual({ genre: "Prog" });

			const check = await run({ songs: [{ filter: { uuid: "s1" }, get: ["genre"] }] });
			expect(check.songs).toEqual([[{ genre: null }]]);
		});

		test("rename moves the file to the media path", async () => {
			const response = await run({ songs: [{ filter: { uuid: "s1" }, rename: true, get: ["file"] }] });
			expect(response.songs).toEqual([[{ file: "media/Pink Floyd/Time/Breathe.mp3" }]]);
			expect(exists("media/Pink Floyd/Time/Breathe.mp3")).toBe(true);
			expect(exists("media/breathe.mp3")).toBe(false);
		});

		test("rename refuses to overwrite another file", async () => {
			write("media/Pink Floyd/Time/Breathe.mp3", "other");
			const response = await run({ songs: [{ filter: { uuid: "s1" }, rename: true }] });
			expect(response.errors?.[0]).toMatchObject({
				reason: "file-exists",
				file: "media/breathe.mp3",
				target: "media/Pink Floyd/Time/Breathe.mp3",
			});
			expect(exists("media/breathe.mp3")).toBe(true);
		});

		test("a rename left over from an aborted request is settled by running it again", async () => {
			const first = await run({ songs: [{ filter: { uuid: "s1" }, rename: true }, { filter: { uuid: "nobody" } }] });
			expect(first.success).toBe(false);
			expect(first["in-progress"]).toBe(true);
			expect(exists("media/Pink Floyd/Time/Breathe.mp3")).toBe(true);

			const again = await run({ songs: [{ filter: { uuid: "s1" }, rename: true, get: ["file"] }] });
			expect(again.success).toBe(true);
			expect(again["in-progress"]).toBe(false);
			expect(again.songs).toEqual([[{ file: "media/Pink Floyd/Time/Breathe.mp3" }]]);
		});
	});

	describe("options", () => {
		test("unknown options do not exist", async () => {
			const response = await run({ options: [{ name: "volume" }] });
			expect(response.errors?.[0]).toMatchObject({ reason: "option/does-not-exist", name: "volume" });
		});

		test("values are type-checked", async () => {
			const response = await run({ options: [{ name: "deduplication-threshold", set: "2" }] });
			expect(response.errors?.[0]).toMatchObject({ reason: "option/malformed-value", name: "deduplication-threshold" });
			expect(read("tunebase.yml")).toBe("");
		});

		test("options can be filtered", async () => {
			const response = await run({ options: [{ filter: { name: { type: "search", query: "path" } } }] });
			expect(response.options).toEqual([
				{
					"media-path": "media/{album-artist}/{album}/{title}.{ext}",
					"metadata-path": "metadata/{album-artist}/{album}.yml",
				},
			]);
		});

		test("option current must match", async () => {
			const response = await run({ options: [{ name: "deduplication-threshold", current: "0.9", set: "0.5" }] });
			expect(response.errors?.[0]).toMatchObject({ reason: "current-mismatch", name: "deduplication-threshold" });
		});
	});

	describe("import", () => {
		test("creates songs for new files and nothing the second time", async () => {
			write("incoming/one.mp3", "");
			write("incoming/two.mp3", "");

			const first = await run({ import: ["incoming/*.mp3"] });
			expect(first.success).toBe(true);
			const created = first.import?.[0].created ?? [];
			expect(created.map((song) => song.file)).toEqual(["incoming/one.mp3", "incoming/two.mp3"]);
			expect(exists("unsorted.yml")).toBe(true);

			const second = await run({ import: ["incoming/*.mp3"] });
			expect(second.import).toEqual([
				{
					created: [],
					skipped: [
						{ file: "incoming/one.mp3", reason: "already-imported", uuid: created[0].uuid },
						{ file: "incoming/two.mp3", reason: "already-imported", uuid: created[1].uuid },
					],
				},
			]);
		});

		test("files similar to a known song are skipped", async () => {
			write("incoming/Mustapha.mp3", "");
			const response = await run({ import: ["incoming/*.mp3"] });
			expect(response.import).toEqual([
				{ created: [], skipped: [{ file: "incoming/Mustapha.mp3", reason: "duplicate", uuid: "q1", score: 1 }] },
			]);
		});

		test("already recorded media files are not imported again", async () => {
			const response = await run({ import: [{ query: "media/*.mp3", type: "wildcard" }] });
			expect(response.import?.[0].created).toEqual([]);
			expect(response.import?.[0].skipped.map((skipped) => skipped.reason)).toEqual([
				"already-imported",
				"already-imported",
				"already-imported",
				"already-imported",
			]);
		});

		test("a missing literal file is reported", async () => {
			const response = await run({ import: [{ query: "incoming/nothing.mp3", type: "literal" }] });
			expect(response.errors?.[0]).toMatchObject({ reason: "missing-files", files: ["incoming/nothing.mp3"] });
		});

		test("imported songs can be tagged in the same request", async () => {
			write("incoming/one.mp3", "");
			const response = await run({
				import: ["incoming/*.mp3"],
				songs: [{ filter: { file: "incoming/one.mp3" }, set: { title: "One" }, get: ["title"] }],
			});
			expect(response.songs).toEqual([[{ title: "One" }]]);
		});

		test("renaming a song without metadata is an unresolved placeholder", async () => {
			write("incoming/one.mp3", "");
			await run({ import: ["incoming/*.mp3"] });
			const response = await run({ songs: [{ filter: { file: "incoming/one.mp3" }, rename: true }] });
			expect(response.errors?.[0]).toMatchObject({
				reason: "unresolved-placeholder",
				fields: ["album-artist", "album", "title"],
			});
		});
	});

	describe("version control", () => {
		let vcs: RecordingVersionControl;

		beforeEach(() => {
			vcs = new RecordingVersionControl();
			manager = new TransactionManager({
				paths: libraryPaths(path.join(root, "tunebase.yml")),
				tags: codec,
				lock: { retries: 0, staleMs: 10000 },
				vcs,
			});
		});

		test("a successful request is committed with its description", async () => {
			const response = await run({ songs: [{ filter: { uuid: "s1" }, set: { genre: "Prog" } }], description: "tag Breathe" });
			expect(response.success).toBe(true);
			expect(vcs.commits).toEqual(["tag Breathe"]);
		});

		test("a request without a description gets a default message", async () => {
			await run({ songs: [{ quiet: true }] });
			expect(vcs.commits).toEqual(["Unnamed query"]);
		});

		test("an unclean tree refuses the request", async () => {
			vcs.clean = false;
			const response = await run({ songs: [{ filter: { uuid: "s1" }, set: { genre: "Prog" } }] });
			expect(response).toEqual({
				success: false,
				"in-progress": false,
				errors: [{ reason: "git-error", message: "the working tree is not clean" }],
			});
			expect(read("work/last-id")).toBe("B\n");
			expect(vcs.commits).toEqual([]);
		});

		test("failed requests are not committed", async () => {
			await run({ songs: [{ filter: { uuid: "nobody" } }] });
			expect(vcs.commits).toEqual([]);
		});

		test("a failed commit leaves the persisted request in progress", async () => {
			vcs.failCommit = true;
			const response = await run({ songs: [{ filter: { uuid: "s1" }, set: { genre: "Prog" } }] });
			expect(response.success).toBe(false);
			expect(response["in-progress"]).toBe(true);
			expect(response.errors?.[0]).toMatchObject({ reason: "git-error" });
			expect(read("work/last-id")).not.toBe("B\n");
		});
	});

	describe("database", () => {
		test("a malformed album file is reported with its location", async () => {
			write("metadata/Bad/Album.yml", "songs:\n  - title: x\n");
			const response = await run({ songs: [{}] });
			expect(response.success).toBe(false);
			expect(response.errors?.[0]).toMatchObject({
				reason: "malformed-database",
				file: "metadata/Bad/Album.yml",
				path: "songs[0].uuid",
			});
		});
	});
});
