import { generateId } from "../utils/index.js";
import { UNSORTED_FILENAME } from "./paths.js";
import type { Album, Metadata, OptionName, OptionValue, Options, SongRef } from "./types.js";

export interface LibraryInit {
	options: Options;
	/** Options written in the options file rather than taken from defaults */
	explicitOptions?: Iterable<OptionName>;
	albums: Album[];
	currentId: string | null;
	/** Album files present on disk when the library was loaded */
	loadedFiles?: Iterable<string>;
}

/**
 * In-memory aggregate of a library: options plus albums in store order
 */
export class Library {
	options: Options;
	explicitOptions: Set<OptionName>;
	albums: Album[];
	currentId: string | null;
	loadedFiles: Set<string>;
	optionsChanged = false;

	constructor(init: LibraryInit) {
		this.options = init.options;
		this.explicitOptions = new Set(init.explicitOptions ?? []);
		this.albums = init.albums;
		this.currentId = init.currentId;
		this.loadedFiles = new Set(init.loadedFiles ?? []);
	}

	/** Songs in store order: album order, then in-album order */
	songs(): SongRef[] {
		return this.albums.flatMap((album) => album.songs.map((song) => ({ song, album })));
	}

	getOption(name: OptionName): OptionValue {
		return this.options[name];
	}

	setOption(name: OptionName, value: OptionValue): void {
		this.options[name] = value;
		this.explicitOptions.add(name);
		this.optionsChanged = true;
	}

	get deduplicationThreshold(): number {
		const option = this.options["deduplication-threshold"];
		if (option.type !== "float") {
			throw new Error("deduplication-threshold is not a float option");
		}
		return option.value;
	}

	get mediaPath(): string {
		return this.options["media-path"].text;
	}

	get metadataPath(): string {
		return this.options["metadata-path"].text;
	}

	/**
	 * Create a song with a fresh uuid. New songs have no album yet, so they
	 * land in the unsorted album until their metadata says otherwise.
	 */
	addSong(fields: Metadata = {}): SongRef {
		let album = this.albums.find((candidate) => candidate.file === UNSORTED_FILENAME);
		if (!album) {
			album = { file: UNSORTED_FILENAME, fields: {}, songs: [] };
			this.albums.push(album);
		}
		const song = { uuid: generateId(), fields: { ...fields } };
		album.songs.push(song);
		return { song, album };
	}

	/** Working copy that can be discarded on abort */
	clone(): Library {
		return new Library({
			options: structuredClone(this.options),
			explicitOptions: [...this.explicitOptions],
			albums: structuredClone(this.albums),
			currentId: this.currentId,
			loadedFiles: [...this.loadedFiles],
		});
	}
}
