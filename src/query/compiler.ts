import { z } from "zod";
import { MalformedQueryError, errorMessage } from "../errors.js";
import { UUID_FIELD } from "../library/types.js";
import { isTagField, type TagField } from "../sync/tags.js";
import { describeShape, formatPath } from "../utils/index.js";
import { compileFilter } from "./filter.js";
import type { CompiledQuery, ImportOperation, OptionOperation, SongOperation } from "./types.js";

type Section = "options" | "songs" | "import";

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);
const fieldValueSchema = scalarSchema.nullable();
const fieldListSchema = z.array(z.string());

const requestSchema = z
	.object({
		options: z.array(z.unknown()).optional(),
		songs: z.array(z.unknown()).optional(),
		import: z.array(z.unknown()).optional(),
		"last-id": z.string().optional(),
		description: z.string().optional(),
	})
	.strict();

const songSubquerySchema = z
	.object({
		filter: z.unknown().optional(),
		get: fieldListSchema.optional(),
		set: z.record(fieldValueSchema).optional(),
		current: z.record(fieldValueSchema).optional(),
		extract: fieldListSchema.optional(),
		embed: fieldListSchema.optional(),
		rename: z.boolean().optional(),
		check: z.boolean().optional(),
		"allow-no-matches": z.boolean().optional(),
		"require-match": z.boolean().optional(),
		quiet: z.boolean().optional(),
	})
	.strict();

const singleOptionSchema = z
	.object({
		name: z.string(),
		set: scalarSchema.optional(),
		/** Older spelling of `set` */
		value: scalarSchema.optional(),
		current: fieldValueSchema.optional(),
	})
	.strict();

const manyOptionSchema = z
	.object({
		filter: z.unknown().optional(),
		get: fieldListSchema.optional(),
		set: z.record(scalarSchema).optional(),
		current: z.record(fieldValueSchema).optional(),
	})
	.strict();

const importEntrySchema = z.union([
	z.string(),
	z
		.object({
			query: z.string(),
			type: z.enum(["wildcard", "literal"]).default("wildcard"),
		})
		.strict(),
]);

const SHAPE_NAMES: Record<string, string> = {
	array: "vector",
	object: "map",
};

function isMap(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
	let current = root;
	for (const segment of path) {
		if (Array.isArray(current) && typeof segment === "number") {
			current = current[segment];
		} else if (isMap(current) && typeof segment === "string") {
			current = current[segment];
		} else {
			return undefined;
		}
	}
	return current;
}

function describeIssue(issue: z.ZodIssue, raw: unknown): string {
	const where = formatPath(issue.path);
	switch (issue.code) {
		case "invalid_type": {
			if (issue.received === "undefined") {
				return `${where} is required`;
			}
			const expected = SHAPE_NAMES[issue.expected] ?? issue.expected;
			return `${where} is a ${describeShape(valueAt(raw, issue.path))}, but should be a ${expected}`;
		}
		case "unrecognized_keys":
			return `unrecognized key(s) ${issue.keys.map((key) => JSON.stringify(key)).join(", ")}${where ? ` in ${where}` : ""}`;
		default:
			return where ? `${where}: ${issue.message}` : issue.message;
	}
}

function parseSubquery<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	raw: Record<string, unknown>,
	section: Section,
	index: number
): T {
	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new MalformedQueryError(`${section} subquery ${index}: ${describeIssue(issue, raw)}`, {
			query: section,
			subquery: index,
			path: formatPath(issue.path),
		});
	}
	return parsed.data;
}

function subqueryError(section: Section, index: number, message: string, path = ""): MalformedQueryError {
	return new MalformedQueryError(`${section} subquery ${index}: ${message}`, { query: section, subquery: index, path });
}

function compileFilterIn(raw: unknown, section: Section, index: number) {
	try {
		return compileFilter(raw);
	} catch (error) {
		if (error instanceof MalformedQueryError) {
			throw subqueryError(section, index, error.message, typeof error.data.path === "string" ? error.data.path : "");
		}
		throw error;
	}
}

function tagFields(fields: string[] | undefined, step: string, index: number): TagField[] {
	const result: TagField[] = [];
	for (const field of fields ?? []) {
		if (!isTagField(field)) {
			throw subqueryError("songs", index, `${step} names ${JSON.stringify(field)}, which is not a tag field`, step);
		}
		if (!result.includes(field)) result.push(field);
	}
	return result;
}

function compileSongSubquery(raw: Record<string, unknown>, index: number): SongOperation {
	const subquery = parseSubquery(songSubquerySchema, raw, "songs", index);
	const set = subquery.set ?? {};

	if (Object.hasOwn(set, UUID_FIELD)) {
		throw subqueryError("songs", index, "set may not change uuid", "set.uuid");
	}

	const extract = tagFields(subquery.extract, "extract", index);
	const embed = tagFields(subquery.embed, "embed", index);

	for (const field of extract) {
		if (Object.hasOwn(set, field)) {
			throw subqueryError("songs", index, `${JSON.stringify(field)} is both extracted and set`, "extract");
		}
		if (embed.includes(field)) {
			throw subqueryError("songs", index, `${JSON.stringify(field)} is both extracted and embedded`, "extract");
		}
	}

	const allowNoMatches = subquery["allow-no-matches"];
	const requireMatch = subquery["require-match"];
	if (allowNoMatches !== undefined && requireMatch !== undefined && allowNoMatches === requireMatch) {
		throw subqueryError("songs", index, "allow-no-matches and require-match contradict each other");
	}

	return {
		kind: "songs",
		index,
		filter: compileFilterIn(subquery.filter, "songs", index),
		get: subquery.get ?? null,
		set,
		current: subquery.current ?? {},
		extract,
		embed,
		rename: subquery.rename ?? false,
		check: subquery.check ?? false,
		allowNoMatches: allowNoMatches ?? requireMatch === false,
		quiet: subquery.quiet ?? false,
	};
}

function compileOptionSubquery(raw: Record<string, unknown>, index: number): OptionOperation {
	if (Object.hasOwn(raw, "name")) {
		const subquery = parseSubquery(singleOptionSchema, raw, "options", index);
		if (subquery.set !== undefined && subquery.value !== undefined) {
			throw subqueryError("options", index, "set and value are the same thing; give only one");
		}
		return {
			kind: "option",
			index,
			target: "single",
			name: subquery.name,
			set: subquery.set ?? subquery.value,
			current: subquery.current,
		};
	}

	const subquery = parseSubquery(manyOptionSchema, raw, "options", index);
	return {
		kind: "option",
		index,
		target: "many",
		filter: compileFilterIn(subquery.filter, "options", index),
		get: subquery.get ?? null,
		set: subquery.set ?? {},
		current: subquery.current ?? {},
	};
}

function compileImportEntry(raw: unknown, index: number): ImportOperation {
	const parsed = importEntrySchema.safeParse(raw);
	if (!parsed.success) {
		throw new MalformedQueryError(
			`import subquery ${index} is a ${describeShape(raw)}, but should be a string or a map with a query`,
			{ query: "import", subquery: index, path: "" }
		);
	}
	const entry = parsed.data;
	if (typeof entry === "string") {
		return { kind: "import", index, pattern: entry, mode: "wildcard" };
	}
	return { kind: "import", index, pattern: entry.query, mode: entry.type };
}

function subqueryMaps(section: Section, subqueries: unknown[]): Record<string, unknown>[] {
	return subqueries.map((subquery, index) => {
		if (!isMap(subquery)) {
			throw new MalformedQueryError(
				`${section} subquery ${index} is a ${describeShape(subquery)}, but should be a map`,
				{ query: section, subquery: index, path: "" }
			);
		}
		return subquery;
	});
}

/**
 * Validate a request document and turn it into operations, in execution
 * order: options, then imports, then songs. Nothing is executed.
 */
export function compileQuery(request: unknown): CompiledQuery {
	if (!isMap(request)) {
		throw new MalformedQueryError(`query is a ${describeShape(request)}, but should be a map`);
	}

	const parsed = requestSchema.safeParse(request);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new MalformedQueryError(`query: ${describeIssue(issue, request)}`, { path: formatPath(issue.path) });
	}
	const { options = [], songs = [], import: imports = [] } = parsed.data;

	return {
		lastId: parsed.data["last-id"] ?? null,
		description: parsed.data.description ?? null,
		operations: [
			...subqueryMaps("options", options).map(compileOptionSubquery),
			...imports.map(compileImportEntry),
			...subqueryMaps("songs", songs).map(compileSongSubquery),
		],
	};
}

/**
 * Parse request text. Text that is not JSON is a malformed query.
 */
export function parseQueryText(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch (error) {
		throw new MalformedQueryError(`query is not valid JSON: ${errorMessage(error)}`);
	}
}
