import { randomUUID } from "crypto";

export function generateId(): string {
	return randomUUID();
}

export function normalizePath(path: string): string {
	return path.replace(/\\/g, "/");
}

/**
 * Describe a JSON value's shape the way the protocol's messages name them
 */
export function describeShape(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "vector";
	if (typeof value === "object") return "map";
	return typeof value;
}

/**
 * Render a path into a JSON document the way error responses report
 * locations, e.g. songs[2].title
 */
export function formatPath(segments: ReadonlyArray<string | number>): string {
	let formatted = "";
	for (const segment of segments) {
		if (typeof segment === "number") {
			formatted += `[${segment}]`;
		} else {
			formatted += formatted ? `.${segment}` : segment;
		}
	}
	return formatted;
}
