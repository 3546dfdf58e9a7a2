import path from "path";
import { SyncError, errorMessage } from "../errors.js";
import type { Library } from "../library/library.js";
import { lookupField } from "../library/metadata.js";
import { UNSORTED_FILENAME, WORK_DIRNAME, relativeToRoot, type LibraryPaths } from "../library/paths.js";
import { FILE_FIELD } from "../library/types.js";
import { log } from "../logger.js";
import type { ImportOperation } from "../query/types.js";
import type { FileSystem } from "../sync/files.js";
import { currentMediaPath } from "../sync/media.js";
import type { TagCodec } from "../sync/tags.js";
import { templateToGlob } from "../sync/template.js";
import { identityOf, similarity } from "./similarity.js";

export interface ImportContext {
	library: Library;
	paths: LibraryPaths;
	files: FileSystem;
	tags: TagCodec;
}

export interface SkippedFile {
	file: string;
	reason: "already-imported" | "duplicate" | "outside-library";
	uuid?: string;
	score?: number;
}

export interface ImportResult {
	created: Array<{ uuid: string; file: string }>;
	skipped: SkippedFile[];
}

interface KnownSong {
	uuid: string;
	identity: string;
}

function stem(file: string): string {
	return path.basename(file, path.extname(file));
}

async function candidateFiles(context: ImportContext, operation: ImportOperation): Promise<string[]> {
	const { paths, files, library } = context;

	if (operation.mode === "literal") {
		const absolute = path.resolve(paths.root, operation.pattern);
		if (!(await files.exists(absolute))) {
			const file = relativeToRoot(paths, absolute);
			throw new SyncError("missing-files", `import ${operation.index}: ${file} does not exist`, {
				subquery: operation.index,
				files: [file],
			});
		}
		return [relativeToRoot(paths, absolute)];
	}

	const ignore = [
		`${WORK_DIRNAME}/**`,
		relativeToRoot(paths, paths.optionsFile),
		UNSORTED_FILENAME,
		templateToGlob(library.metadataPath),
	];
	const matched = await files.glob(operation.pattern, paths.root, ignore);
	return matched.map((file) => relativeToRoot(paths, file));
}

/**
 * Identity of a file about to be imported: artist and title from its tags,
 * else its filename
 */
async function fileIdentity(context: ImportContext, file: string): Promise<string> {
	try {
		const tags = await context.tags.read(path.join(context.paths.root, file));
		const identity = identityOf(tags.artist, tags.title);
		if (identity !== "") return identity;
	} catch (error) {
		log.debug(`could not read tags of ${file}: ${errorMessage(error)}`);
	}
	return identityOf(undefined, stem(file));
}

function knownSongs(library: Library): { songs: KnownSong[]; referenced: Map<string, string> } {
	const songs: KnownSong[] = [];
	const referenced = new Map<string, string>();

	for (const ref of library.songs()) {
		const media = currentMediaPath(library, ref);
		if (media.ok) {
			referenced.set(media.path, ref.song.uuid);
		}

		const artist = lookupField(ref, "artist");
		const title = lookupField(ref, "title");
		let identity = identityOf(artist === undefined ? undefined : String(artist), title === undefined ? undefined : String(title));
		if (identity === "" && media.ok) {
			identity = identityOf(undefined, stem(media.path));
		}
		if (identity !== "") {
			songs.push({ uuid: ref.song.uuid, identity });
		}
	}

	return { songs, referenced };
}

function bestMatch(identity: string, songs: KnownSong[]): { uuid: string; score: number } | null {
	let best: { uuid: string; score: number } | null = null;
	for (const song of songs) {
		const score = similarity(identity, song.identity);
		if (!best || score > best.score) {
			best = { uuid: song.uuid, score };
		}
	}
	return best;
}

/**
 * Create songs for the files an import pattern names. Files already recorded
 * are skipped, as are files whose identity scores at or above the
 * deduplication threshold against a known song, including songs created
 * earlier in the same import.
 */
export async function importFiles(context: ImportContext, operation: ImportOperation): Promise<ImportResult> {
	const { library } = context;
	const threshold = library.deduplicationThreshold;
	const { songs, referenced } = knownSongs(library);
	const result: ImportResult = { created: [], skipped: [] };

	for (const file of await candidateFiles(context, operation)) {
		if (file.startsWith("../") || path.isAbsolute(file)) {
			result.skipped.push({ file, reason: "outside-library" });
			continue;
		}

		const existing = referenced.get(file);
		if (existing !== undefined) {
			result.skipped.push({ file, reason: "already-imported", uuid: existing });
			continue;
		}

		const identity = await fileIdentity(context, file);
		const match = identity === "" ? null : bestMatch(identity, songs);
		if (match && match.score >= threshold) {
			log.debug(`skipping ${file}: ${match.score.toFixed(2)} similar to ${match.uuid}`);
			result.skipped.push({ file, reason: "duplicate", uuid: match.uuid, score: match.score });
			continue;
		}

		const { song } = library.addSong({ [FILE_FIELD]: file });
		referenced.set(file, song.uuid);
		if (identity !== "") {
			songs.push({ uuid: song.uuid, identity });
		}
		result.created.push({ uuid: song.uuid, file });
	}

	log.info(`import ${operation.index}: created ${result.created.length}, skipped ${result.skipped.length}`);
	return result;
}
