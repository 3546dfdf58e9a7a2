import path from "path";
import { QueryError, SyncError, errorMessage } from "../errors.js";
import type { Library } from "../library/library.js";
import { effectiveMetadata, lookupField, setField } from "../library/metadata.js";
import type { LibraryPaths } from "../library/paths.js";
import { FILE_FIELD, type FieldValue, type Metadata, type Scalar, type SongRef } from "../library/types.js";
import { log } from "../logger.js";
import { matches } from "../query/filter.js";
import type { SongOperation } from "../query/types.js";
import type { FileSystem } from "../sync/files.js";
import { currentMediaPath, targetMediaPath } from "../sync/media.js";
import type { TagCodec, TagUpdate, TagValues } from "../sync/tags.js";
import type { RenderResult } from "../sync/template.js";

/**
 * Tracks changes made outside the working copy, which an abort cannot undo
 */
export class DiskEffects {
	private actions: string[] = [];

	record(action: string): void {
		log.debug(action);
		this.actions.push(action);
	}

	get happened(): boolean {
		return this.actions.length > 0;
	}
}

export interface MutationContext {
	library: Library;
	paths: LibraryPaths;
	files: FileSystem;
	tags: TagCodec;
	effects: DiskEffects;
}

/** Matched songs' fields, or their count when the subquery is quiet */
export type SongResult = Metadata[] | number;

function sameScalar(actual: Scalar | undefined, expected: FieldValue): boolean {
	if (expected === null) return actual === undefined;
	return actual !== undefined && String(actual) === String(expected);
}

function mediaFile(ref: SongRef, rendered: RenderResult, operation: SongOperation, step: string): string {
	if (!rendered.ok) {
		throw new SyncError(
			"unresolved-placeholder",
			`songs subquery ${operation.index}: cannot ${step} song ${ref.song.uuid}: no value for ${rendered.missing.map((field) => `{${field}}`).join(", ")}`,
			{ subquery: operation.index, uuid: ref.song.uuid, fields: rendered.missing }
		);
	}
	return rendered.path;
}

function checkCurrent(refs: SongRef[], operation: SongOperation): void {
	for (const ref of refs) {
		for (const [field, expected] of Object.entries(operation.current)) {
			const actual = lookupField(ref, field);
			if (!sameScalar(actual, expected)) {
				throw new QueryError(
					"current-mismatch",
					`songs subquery ${operation.index}: song ${ref.song.uuid} has ${field} ${JSON.stringify(actual ?? null)}, expected ${JSON.stringify(expected)}`,
					{ subquery: operation.index, uuid: ref.song.uuid, field, expected, actual: actual ?? null }
				);
			}
		}
	}
}

async function extractTags(context: MutationContext, ref: SongRef, operation: SongOperation): Promise<void> {
	const file = mediaFile(ref, currentMediaPath(context.library, ref), operation, "extract tags of");
	let tags: TagValues;
	try {
		tags = await context.tags.read(path.join(context.paths.root, file));
	} catch (error) {
		throw new SyncError("tag-io-error", `${file}: cannot read tags: ${errorMessage(error)}`, {
			subquery: operation.index,
			uuid: ref.song.uuid,
			file,
		});
	}
	for (const field of operation.extract) {
		setField(ref, field, tags[field] ?? null);
	}
}

async function embedTags(context: MutationContext, ref: SongRef, operation: SongOperation): Promise<void> {
	const file = mediaFile(ref, currentMediaPath(context.library, ref), operation, "embed tags into");
	const update: TagUpdate = {};
	for (const field of operation.embed) {
		const value = lookupField(ref, field);
		update[field] = value === undefined ? null : String(value);
	}
	try {
		await context.tags.write(path.join(context.paths.root, file), update);
	} catch (error) {
		throw new SyncError("tag-io-error", `${file}: cannot write tags: ${errorMessage(error)}`, {
			subquery: operation.index,
			uuid: ref.song.uuid,
			file,
		});
	}
	context.effects.record(`embedded ${operation.embed.join(", ")} into ${file}`);
}

async function renameFile(context: MutationContext, ref: SongRef, operation: SongOperation): Promise<void> {
	const { library, paths, files } = context;
	const target = mediaFile(ref, targetMediaPath(library, ref), operation, "rename");
	const current = mediaFile(ref, currentMediaPath(library, ref), operation, "rename");

	if (current !== target) {
		const from = path.join(paths.root, current);
		const to = path.join(paths.root, target);
		const data = { subquery: operation.index, uuid: ref.song.uuid, file: current, target };

		if (await files.exists(to)) {
			if (await files.exists(from)) {
				throw new SyncError("file-exists", `cannot move ${current} to ${target}: destination exists`, data);
			}
			// moved by an earlier request that then aborted
			log.info(`${current} is already at ${target}`);
		} else {
			try {
				await files.move(from, to);
			} catch (error) {
				throw new SyncError("file-io-error", `cannot move ${current} to ${target}: ${errorMessage(error)}`, data);
			}
			context.effects.record(`moved ${current} to ${target}`);
		}
	}

	if (lookupField(ref, FILE_FIELD) !== target) {
		setField(ref, FILE_FIELD, target);
	}
}

/**
 * Run a songs subquery against the working library. Steps run per matched
 * song in order: current, set, extract, embed, rename, check, get. Every
 * `current` expectation is verified before any song changes.
 */
export async function executeSongOperation(context: MutationContext, operation: SongOperation): Promise<SongResult> {
	const { library, paths, files } = context;
	const refs = library.songs().filter((ref) => matches((field) => lookupField(ref, field), operation.filter));

	if (refs.length === 0 && !operation.allowNoMatches) {
		throw new QueryError("no-matches", `songs subquery ${operation.index} matched no songs`, {
			subquery: operation.index,
		});
	}

	checkCurrent(refs, operation);

	const missing: string[] = [];
	const results: Metadata[] = [];

	for (const ref of refs) {
		for (const [field, value] of Object.entries(operation.set)) {
			setField(ref, field, value);
		}
		if (operation.extract.length > 0) {
			await extractTags(context, ref, operation);
		}
		if (operation.embed.length > 0) {
			await embedTags(context, ref, operation);
		}
		if (operation.rename) {
			await renameFile(context, ref, operation);
		}
		if (operation.check) {
			const file = mediaFile(ref, currentMediaPath(library, ref), operation, "check");
			if (!(await files.exists(path.join(paths.root, file)))) {
				missing.push(file);
			}
		}
		if (!operation.quiet) {
			results.push(readFields(ref, operation.get));
		}
	}

	if (missing.length > 0) {
		throw new SyncError(
			"missing-files",
			`songs subquery ${operation.index}: ${missing.length} media file(s) missing`,
			{ subquery: operation.index, files: missing }
		);
	}

	return operation.quiet ? refs.length : results;
}

function readFields(ref: SongRef, fields: string[] | null): Metadata {
	if (fields === null) {
		return effectiveMetadata(ref);
	}
	const result: Metadata = {};
	for (const field of fields) {
		result[field] = lookupField(ref, field) ?? null;
	}
	return result;
}
