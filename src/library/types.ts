export type Scalar = string | number | boolean;

/** null means "no value" and, on a song, hides the album's value */
export type FieldValue = Scalar | null;

export type Metadata = Record<string, FieldValue>;

export interface Song {
	uuid: string;
	fields: Metadata;
}

export interface Album {
	/** Metadata file the album was loaded from, relative to the library root */
	file: string | null;
	/** null is "no value", as on a song */
	fields: Metadata;
	songs: Song[];
}

/** A song together with the album it inherits from */
export interface SongRef {
	song: Song;
	album: Album;
}

export type OptionName = "deduplication-threshold" | "media-path" | "metadata-path";

export type OptionValue =
	| { type: "float"; value: number; text: string }
	| { type: "path-template"; value: string; text: string };

export type Options = Record<OptionName, OptionValue>;

/** Reserved song fields */
export const UUID_FIELD = "uuid";
export const FILE_FIELD = "file";
export const EXT_FIELD = "ext";
