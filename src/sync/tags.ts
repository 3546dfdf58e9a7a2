import path from "path";
import NodeID3 from "node-id3";
import { parseFile } from "music-metadata";

export const TAG_FIELDS = [
	"title",
	"artist",
	"album",
	"album-artist",
	"composer",
	"genre",
	"year",
	"comment",
	"track",
	"total-tracks",
	"disk",
	"total-disks",
	"sort-title",
	"sort-artist",
	"sort-album",
] as const;

export type TagField = (typeof TAG_FIELDS)[number];

export type TagValues = Partial<Record<TagField, string>>;

/** Values to write; null removes the tag */
export type TagUpdate = Partial<Record<TagField, string | null>>;

/**
 * Reads and writes the tags embedded in a media file
 */
export interface TagCodec {
	read(file: string): Promise<TagValues>;
	write(file: string, update: TagUpdate): Promise<void>;
}

const TAG_FIELD_SET: ReadonlySet<string> = new Set(TAG_FIELDS);

export function isTagField(name: string): name is TagField {
	return TAG_FIELD_SET.has(name);
}

function splitFraction(value: string | undefined): [string | undefined, string | undefined] {
	if (!value) return [undefined, undefined];
	const pivot = value.indexOf("/");
	if (pivot === -1) return [value.trim() || undefined, undefined];
	return [value.slice(0, pivot).trim() || undefined, value.slice(pivot + 1).trim() || undefined];
}

function joinFraction(number: string | undefined, total: string | undefined): string | undefined {
	if (!number && !total) return undefined;
	return total ? `${number ?? ""}/${total}` : number;
}

function compact(values: Record<TagField, string | undefined>): TagValues {
	const result: TagValues = {};
	for (const field of TAG_FIELDS) {
		const value = values[field];
		if (value !== undefined && value !== "") {
			result[field] = value;
		}
	}
	return result;
}

function id3ToValues(tags: NodeID3.Tags): TagValues {
	const [track, totalTracks] = splitFraction(tags.trackNumber);
	const [disk, totalDisks] = splitFraction(tags.partOfSet);
	return compact({
		title: tags.title,
		artist: tags.artist,
		album: tags.album,
		"album-artist": tags.performerInfo,
		composer: tags.composer,
		genre: tags.genre,
		year: tags.year,
		comment: tags.comment?.text,
		track,
		"total-tracks": totalTracks,
		disk,
		"total-disks": totalDisks,
		"sort-title": tags.titleSortOrder,
		"sort-artist": tags.performerSortOrder,
		"sort-album": tags.albumSortOrder,
	});
}

// node-id3 writes every key it is given, so cleared fields are removed outright
function assign<K extends keyof NodeID3.Tags>(tags: NodeID3.Tags, key: K, value: NodeID3.Tags[K] | undefined): void {
	if (value === undefined) {
		delete tags[key];
	} else {
		tags[key] = value;
	}
}

function applyUpdate(tags: NodeID3.Tags, update: TagUpdate): NodeID3.Tags {
	const merged = { ...id3ToValues(tags) };
	for (const field of TAG_FIELDS) {
		if (!(field in update)) continue;
		const value = update[field];
		if (value === null || value === undefined || value === "") {
			delete merged[field];
		} else {
			merged[field] = value;
		}
	}

	const next: NodeID3.Tags = { ...tags };
	assign(next, "title", merged.title);
	assign(next, "artist", merged.artist);
	assign(next, "album", merged.album);
	assign(next, "performerInfo", merged["album-artist"]);
	assign(next, "composer", merged.composer);
	assign(next, "genre", merged.genre);
	assign(next, "year", merged.year);
	assign(next, "comment", merged.comment !== undefined ? { language: "eng", text: merged.comment } : undefined);
	assign(next, "trackNumber", joinFraction(merged.track, merged["total-tracks"]));
	assign(next, "partOfSet", joinFraction(merged.disk, merged["total-disks"]));
	assign(next, "titleSortOrder", merged["sort-title"]);
	assign(next, "performerSortOrder", merged["sort-artist"]);
	assign(next, "albumSortOrder", merged["sort-album"]);
	return next;
}

/**
 * ID3 tags of MP3 files, through node-id3
 */
export class Id3TagCodec implements TagCodec {
	async read(file: string): Promise<TagValues> {
		const tags = await NodeID3.Promise.read(file, { noRaw: true });
		return id3ToValues(tags);
	}

	async write(file: string, update: TagUpdate): Promise<void> {
		const existing = await NodeID3.Promise.read(file, { noRaw: true });
		await NodeID3.Promise.write(applyUpdate(existing, update), file);
	}
}

function numberText(value: number | null | undefined): string | undefined {
	return value === null || value === undefined ? undefined : String(value);
}

/**
 * Common tags of any format music-metadata understands. Read only.
 */
export class CommonTagReader {
	async read(file: string): Promise<TagValues> {
		const { common } = await parseFile(file, { skipCovers: true, duration: false });
		return compact({
			title: common.title,
			artist: common.artist,
			album: common.album,
			"album-artist": common.albumartist,
			composer: common.composer?.join(", "),
			genre: common.genre?.join(", "),
			year: numberText(common.year),
			comment: undefined,
			track: numberText(common.track.no),
			"total-tracks": numberText(common.track.of),
			disk: numberText(common.disk.no),
			"total-disks": numberText(common.disk.of),
			"sort-title": undefined,
			"sort-artist": undefined,
			"sort-album": undefined,
		});
	}
}

/**
 * Picks the codec by file extension: ID3 for .mp3, read-only common tags
 * for everything else
 */
export class DefaultTagCodec implements TagCodec {
	private id3 = new Id3TagCodec();
	private common = new CommonTagReader();

	async read(file: string): Promise<TagValues> {
		return isId3File(file) ? this.id3.read(file) : this.common.read(file);
	}

	async write(file: string, update: TagUpdate): Promise<void> {
		if (!isId3File(file)) {
			throw new Error(`writing tags to ${path.extname(file) || "extensionless"} files is not supported`);
		}
		await this.id3.write(file, update);
	}
}

function isId3File(file: string): boolean {
	return path.extname(file).toLowerCase() === ".mp3";
}
