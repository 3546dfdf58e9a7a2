import { FILE_FIELD, UUID_FIELD, type FieldValue, type Metadata, type Scalar, type SongRef } from "./types.js";

/** Fields that always stay on the song when album files are written */
const PER_SONG_FIELDS = new Set([UUID_FIELD, FILE_FIELD]);

/**
 * Current value of a field, falling back from the song to its album
 */
export function lookupField(ref: SongRef, field: string): Scalar | undefined {
	if (field === UUID_FIELD) {
		return ref.song.uuid;
	}
	if (Object.hasOwn(ref.song.fields, field)) {
		const value = ref.song.fields[field];
		return value === null ? undefined : value;
	}
	return albumValue(ref, field);
}

function albumValue(ref: SongRef, field: string): Scalar | undefined {
	if (!Object.hasOwn(ref.album.fields, field)) return undefined;
	return ref.album.fields[field] ?? undefined;
}

/**
 * Every field with a value, album fields overridden by song fields
 */
export function effectiveMetadata(ref: SongRef): Record<string, Scalar> {
	const merged: Record<string, Scalar> = { [UUID_FIELD]: ref.song.uuid };
	for (const [key, value] of Object.entries(ref.album.fields)) {
		if (value !== null) merged[key] = value;
	}
	for (const [key, value] of Object.entries(ref.song.fields)) {
		if (value === null) {
			delete merged[key];
		} else {
			merged[key] = value;
		}
	}
	return merged;
}

/**
 * Write a song-level value. null unsets, hiding any album value.
 */
export function setField(ref: SongRef, field: string, value: FieldValue): void {
	if (value !== null) {
		ref.song.fields[field] = value;
	} else if (albumValue(ref, field) !== undefined) {
		ref.song.fields[field] = null;
	} else {
		delete ref.song.fields[field];
	}
}

export function sameValue(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
	return (a ?? null) === (b ?? null);
}

function valueKey(value: Scalar): string {
	return `${typeof value}:${String(value)}`;
}

/**
 * Split a group of songs' effective metadata into album-level fields and
 * per-song overrides. A value moves to the album when at least half of the
 * songs share it; songs lacking an album field get an explicit null.
 */
export function splitMetadata(songs: Array<Record<string, Scalar>>): {
	album: Record<string, Scalar>;
	songs: Metadata[];
} {
	const counts = new Map<string, Map<string, { value: Scalar; count: number }>>();

	for (const song of songs) {
		for (const [key, value] of Object.entries(song)) {
			if (PER_SONG_FIELDS.has(key)) continue;
			let perValue = counts.get(key);
			if (!perValue) {
				perValue = new Map();
				counts.set(key, perValue);
			}
			const entry = perValue.get(valueKey(value));
			if (entry) {
				entry.count++;
			} else {
				perValue.set(valueKey(value), { value, count: 1 });
			}
		}
	}

	const album: Record<string, Scalar> = {};
	for (const key of [...counts.keys()].sort()) {
		const perValue = counts.get(key);
		if (!perValue) continue;
		for (const { value, count } of perValue.values()) {
			if (count * 2 >= songs.length) {
				album[key] = value;
				break;
			}
		}
	}

	const split = songs.map((song) => {
		const own: Metadata = {};
		if (song[UUID_FIELD] !== undefined) {
			own[UUID_FIELD] = song[UUID_FIELD];
		}
		for (const key of Object.keys(song).sort()) {
			if (key === UUID_FIELD) continue;
			if (!sameValue(song[key], album[key])) {
				own[key] = song[key];
			}
		}
		for (const key of Object.keys(album)) {
			if (!Object.hasOwn(song, key)) {
				own[key] = null;
			}
		}
		return own;
	});

	return { album, songs: split };
}
