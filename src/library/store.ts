import fs from "fs/promises";
import path from "path";
import fg from "fast-glob";
import YAML from "yaml";
import { z } from "zod";
import { MalformedDatabaseError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { renderTemplate, templateToGlob } from "../sync/template.js";
import { formatPath, normalizePath } from "../utils/index.js";
import { Library } from "./library.js";
import { effectiveMetadata, splitMetadata } from "./metadata.js";
import { OPTION_NAMES, decodeOption, defaultOptions, isOptionName } from "./options.js";
import { UNSORTED_FILENAME, WORK_DIRNAME, type LibraryPaths } from "./paths.js";
import type { Album, OptionName, Scalar } from "./types.js";

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const optionsFileSchema = z.record(scalarSchema);

const albumFileSchema = z
	.object({
		album: z.record(scalarSchema.nullable()).default({}),
		songs: z.array(z.object({ uuid: z.string().min(1) }).catchall(scalarSchema.nullable())).default([]),
	})
	.strict();

type AlbumDocument = z.input<typeof albumFileSchema>;

async function readTextFile(file: string): Promise<string | null> {
	try {
		return await fs.readFile(file, "utf-8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return null;
		}
		throw error;
	}
}

function parseDocument(text: string, displayName: string): unknown {
	try {
		return YAML.parse(text) ?? {};
	} catch (error) {
		throw new MalformedDatabaseError(displayName, "", `could not parse: ${errorMessage(error)}`);
	}
}

/**
 * Write through a temporary file so readers never see a half-written file
 */
export async function writeFileAtomic(file: string, contents: string): Promise<void> {
	await fs.mkdir(path.dirname(file), { recursive: true });
	const tmpFile = `${file}.tmp`;
	await fs.writeFile(tmpFile, contents, "utf-8");
	await fs.rename(tmpFile, file);
}

async function loadOptions(paths: LibraryPaths) {
	const displayName = path.basename(paths.optionsFile);
	const text = await readTextFile(paths.optionsFile);
	if (text === null) {
		throw new MalformedDatabaseError(displayName, "", "options file does not exist");
	}

	const parsed = optionsFileSchema.safeParse(parseDocument(text, displayName));
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new MalformedDatabaseError(displayName, formatPath(issue.path), issue.message);
	}

	const options = defaultOptions();
	const explicit: OptionName[] = [];
	for (const [name, raw] of Object.entries(parsed.data)) {
		if (!isOptionName(name)) {
			throw new MalformedDatabaseError(displayName, name, `unexpected option ${JSON.stringify(name)}`);
		}
		try {
			options[name] = decodeOption(name, raw);
		} catch (error) {
			throw new MalformedDatabaseError(displayName, name, errorMessage(error));
		}
		explicit.push(name);
	}

	return { options, explicit };
}

async function loadAlbum(paths: LibraryPaths, relativeFile: string): Promise<Album> {
	const text = await readTextFile(path.join(paths.root, relativeFile));
	if (text === null) {
		throw new MalformedDatabaseError(relativeFile, "", "album file disappeared while loading");
	}

	const parsed = albumFileSchema.safeParse(parseDocument(text, relativeFile));
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new MalformedDatabaseError(relativeFile, formatPath(issue.path), issue.message);
	}

	return {
		file: relativeFile,
		fields: parsed.data.album,
		songs: parsed.data.songs.map(({ uuid, ...fields }) => ({ uuid, fields })),
	};
}

async function findAlbumFiles(paths: LibraryPaths, metadataTemplate: string): Promise<string[]> {
	const optionsFile = normalizePath(path.relative(paths.root, paths.optionsFile));
	const files = await fg(templateToGlob(metadataTemplate), {
		cwd: paths.root,
		onlyFiles: true,
		dot: true,
		ignore: [`${WORK_DIRNAME}/**`],
	});
	return files.filter((file) => file !== optionsFile && file !== UNSORTED_FILENAME).sort();
}

export async function readTransactionId(paths: LibraryPaths): Promise<string | null> {
	const text = await readTextFile(paths.lastIdFile);
	const id = text?.trim();
	return id ? id : null;
}

export async function writeTransactionId(paths: LibraryPaths, id: string): Promise<void> {
	await writeFileAtomic(paths.lastIdFile, `${id}\n`);
}

/**
 * Load options, every album file and the current transaction id
 */
export async function loadLibrary(paths: LibraryPaths): Promise<Library> {
	const { options, explicit } = await loadOptions(paths);

	const files = await findAlbumFiles(paths, options["metadata-path"].text);
	if ((await readTextFile(paths.unsortedFile)) !== null) {
		files.push(UNSORTED_FILENAME);
	}

	const albums: Album[] = [];
	const seen = new Map<string, string>();
	for (const file of files) {
		const album = await loadAlbum(paths, file);
		album.songs.forEach((song, index) => {
			const previous = seen.get(song.uuid);
			if (previous !== undefined) {
				throw new MalformedDatabaseError(
					file,
					`songs[${index}].uuid`,
					`duplicate uuid ${song.uuid}, already used in ${previous}`
				);
			}
			seen.set(song.uuid, file);
		});
		albums.push(album);
	}

	log.debug(`loaded ${albums.length} album file(s) with ${seen.size} song(s) from ${paths.root}`);

	return new Library({
		options,
		explicitOptions: explicit,
		albums,
		currentId: await readTransactionId(paths),
		loadedFiles: files,
	});
}

function serializeAlbum(file: string, document: AlbumDocument): string {
	if (file.endsWith(".json")) {
		return `${JSON.stringify(document, null, 2)}\n`;
	}
	return YAML.stringify(document);
}

function serializeOptions(library: Library): string {
	const document: Record<string, string> = {};
	for (const name of OPTION_NAMES) {
		if (library.explicitOptions.has(name)) {
			document[name] = library.getOption(name).text;
		}
	}
	return YAML.stringify(document);
}

/**
 * Group songs by the metadata file their current metadata renders to
 */
export function groupSongsByAlbumFile(library: Library): Map<string, Array<Record<string, Scalar>>> {
	const groups = new Map<string, Array<Record<string, Scalar>>>();
	for (const ref of library.songs()) {
		const metadata = effectiveMetadata(ref);
		const rendered = renderTemplate(library.metadataPath, (field) => metadata[field]);
		const file = rendered.ok ? normalizePath(rendered.path) : UNSORTED_FILENAME;
		const group = groups.get(file);
		if (group) {
			group.push(metadata);
		} else {
			groups.set(file, [metadata]);
		}
	}
	return groups;
}

async function writeIfChanged(file: string, contents: string): Promise<boolean> {
	if ((await readTextFile(file)) === contents) {
		return false;
	}
	await writeFileAtomic(file, contents);
	return true;
}

/**
 * Persist options and album files. Returns the library-relative paths that
 * were written or removed.
 */
export async function saveLibrary(library: Library, paths: LibraryPaths): Promise<string[]> {
	const changed: string[] = [];

	if (library.optionsChanged && (await writeIfChanged(paths.optionsFile, serializeOptions(library)))) {
		changed.push(normalizePath(path.relative(paths.root, paths.optionsFile)));
	}

	const groups = groupSongsByAlbumFile(library);
	for (const [file, songs] of groups) {
		const { album, songs: split } = splitMetadata(songs);
		const document: AlbumDocument = { album, songs: split.map(({ uuid, ...fields }) => ({ uuid: String(uuid), ...fields })) };
		if (await writeIfChanged(path.join(paths.root, file), serializeAlbum(file, document))) {
			changed.push(file);
		}
	}

	for (const file of library.loadedFiles) {
		if (!groups.has(file)) {
			await fs.rm(path.join(paths.root, file), { force: true });
			changed.push(file);
		}
	}

	log.debug(`saved library: ${changed.length} file(s) changed`);
	return changed;
}
