import { z } from "zod";
import { MalformedQueryError, errorMessage } from "../errors.js";
import type { Scalar } from "../library/types.js";
import { describeShape, formatPath } from "../utils/index.js";
import type { FilterExpr } from "./types.js";

const ALL = "!all";
const ANY = "!any";

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const leafSchema = z
	.object({
		query: z.union([scalarSchema, z.null()]),
		type: z.enum(["literal", "search", "missing", "regex"]).default("literal"),
		substring: z.boolean().optional(),
		"case-fold": z.boolean().optional(),
	})
	.strict();

function isMap(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(path: Array<string | number>, message: string): MalformedQueryError {
	const where = formatPath(path);
	return new MalformedQueryError(`${where ? `${where}: ` : ""}${message}`, { path: where });
}

function compileLeaf(field: string, raw: unknown, path: Array<string | number>): FilterExpr {
	if (raw === null) {
		return { kind: "missing", field, missing: true };
	}
	if (!isMap(raw)) {
		const scalar = scalarSchema.safeParse(raw);
		if (!scalar.success) {
			throw malformed(path, `filter on ${JSON.stringify(field)} is a ${describeShape(raw)}, but should be a scalar or a map`);
		}
		return { kind: "literal", field, query: String(scalar.data), substring: false, caseFold: false };
	}

	const parsed = leafSchema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw malformed([...path, ...issue.path], issue.message);
	}
	const leaf = parsed.data;

	switch (leaf.type) {
		case "missing":
			if (typeof leaf.query !== "boolean") {
				throw malformed([...path, "query"], "missing filters take a boolean query");
			}
			return { kind: "missing", field, missing: leaf.query };
		case "regex": {
			if (typeof leaf.query !== "string") {
				throw malformed([...path, "query"], "regex filters take a string query");
			}
			const flags = leaf["case-fold"] ? "iu" : "u";
			try {
				return { kind: "regex", field, pattern: new RegExp(leaf.query, flags) };
			} catch (error) {
				throw malformed([...path, "query"], `invalid regular expression: ${errorMessage(error)}`);
			}
		}
		case "literal":
		case "search": {
			if (leaf.query === null) {
				throw malformed([...path, "query"], `${leaf.type} filters take a scalar query`);
			}
			const search = leaf.type === "search";
			return {
				kind: "literal",
				field,
				query: String(leaf.query),
				substring: leaf.substring ?? search,
				caseFold: leaf["case-fold"] ?? search,
			};
		}
	}
}

function compileChildren(raw: unknown, path: Array<string | number>): FilterExpr[] {
	if (Array.isArray(raw)) {
		return raw.map((child, index) => compileFilter(child, [...path, index]));
	}
	if (!isMap(raw)) {
		throw malformed(path, `filter is a ${describeShape(raw)}, but should be a map`);
	}
	// each entry of a map is one operand
	return Object.entries(raw).map(([key, value]) => compileFilter({ [key]: value }, path));
}

/**
 * Compile a filter document. `path` locates it in the request for error
 * messages.
 */
export function compileFilter(raw: unknown, path: Array<string | number> = ["filter"]): FilterExpr {
	if (raw === undefined) {
		return { kind: "all", children: [] };
	}
	if (!isMap(raw)) {
		throw malformed(path, `filter is a ${describeShape(raw)}, but should be a map`);
	}

	const children: FilterExpr[] = [];
	for (const [key, value] of Object.entries(raw)) {
		if (key === ALL) {
			children.push({ kind: "all", children: compileChildren(value, [...path, key]) });
		} else if (key === ANY) {
			children.push({ kind: "any", children: compileChildren(value, [...path, key]) });
		} else if (key.startsWith("!")) {
			throw malformed([...path, key], `unknown filter operation ${JSON.stringify(key)}`);
		} else {
			children.push(compileLeaf(key, value, [...path, key]));
		}
	}

	return children.length === 1 ? children[0] : { kind: "all", children };
}

function fold(text: string, caseFold: boolean): string {
	return caseFold ? text.toLowerCase() : text;
}

/**
 * Whether an entity, seen through `lookup`, satisfies the filter
 */
export function matches(lookup: (field: string) => Scalar | undefined, filter: FilterExpr): boolean {
	switch (filter.kind) {
		case "all":
			return filter.children.every((child) => matches(lookup, child));
		case "any":
			return filter.children.some((child) => matches(lookup, child));
		case "missing":
			return (lookup(filter.field) === undefined) === filter.missing;
		case "regex": {
			const value = lookup(filter.field);
			return value !== undefined && filter.pattern.test(String(value));
		}
		case "literal": {
			const value = lookup(filter.field);
			if (value === undefined) return false;
			const actual = fold(String(value), filter.caseFold);
			const query = fold(filter.query, filter.caseFold);
			return filter.substring ? actual.includes(query) : actual === query;
		}
	}
}
