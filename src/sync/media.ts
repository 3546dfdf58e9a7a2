import path from "path";
import type { Library } from "../library/library.js";
import { lookupField } from "../library/metadata.js";
import { EXT_FIELD, FILE_FIELD, type Scalar, type SongRef } from "../library/types.js";
import { normalizePath } from "../utils/index.js";
import { renderTemplate, type RenderResult } from "./template.js";

/**
 * Field lookup for path templates: {ext} falls back to the extension of
 * the song's recorded file
 */
export function templateLookup(ref: SongRef): (field: string) => Scalar | undefined {
	return (field) => {
		const value = lookupField(ref, field);
		if (value !== undefined || field !== EXT_FIELD) {
			return value;
		}
		const file = lookupField(ref, FILE_FIELD);
		const extension = file === undefined ? "" : path.extname(String(file)).slice(1);
		return extension === "" ? undefined : extension;
	};
}

/**
 * Where the media-path template says the song's file belongs
 */
export function targetMediaPath(library: Library, ref: SongRef): RenderResult {
	const rendered = renderTemplate(library.mediaPath, templateLookup(ref));
	return rendered.ok ? { ok: true, path: normalizePath(rendered.path) } : rendered;
}

/**
 * Where the song's file is now: the recorded file, else the rendered
 * media-path
 */
export function currentMediaPath(library: Library, ref: SongRef): RenderResult {
	const file = lookupField(ref, FILE_FIELD);
	if (file !== undefined) {
		return { ok: true, path: normalizePath(String(file)) };
	}
	return targetMediaPath(library, ref);
}
