import fg from "fast-glob";
import type { Scalar } from "../library/types.js";

export type TemplatePart = { kind: "text"; text: string } | { kind: "field"; name: string };

export type RenderResult = { ok: true; path: string } | { ok: false; missing: string[] };

export class TemplateSyntaxError extends Error {
	constructor(template: string, message: string) {
		super(`malformed path template ${JSON.stringify(template)}: ${message}`);
		this.name = "TemplateSyntaxError";
	}
}

/**
 * Split a path template such as "media/{album-artist}/{album}/{title}.{ext}"
 * into literal text and placeholders
 */
export function parseTemplate(template: string): TemplatePart[] {
	const parts: TemplatePart[] = [];
	let text = "";
	let i = 0;

	while (i < template.length) {
		const ch = template[i];
		if (ch === "}") {
			throw new TemplateSyntaxError(template, `unmatched '}' at position ${i}`);
		}
		if (ch !== "{") {
			text += ch;
			i++;
			continue;
		}
		const end = template.indexOf("}", i + 1);
		if (end === -1) {
			throw new TemplateSyntaxError(template, `unclosed '{' at position ${i}`);
		}
		const name = template.slice(i + 1, end);
		if (name.includes("{")) {
			throw new TemplateSyntaxError(template, `nested '{' at position ${i}`);
		}
		if (name.trim() === "") {
			throw new TemplateSyntaxError(template, `empty placeholder at position ${i}`);
		}
		if (text) {
			parts.push({ kind: "text", text });
			text = "";
		}
		parts.push({ kind: "field", name });
		i = end + 1;
	}

	if (text) {
		parts.push({ kind: "text", text });
	}
	return parts;
}

export function templateFields(template: string): string[] {
	return parseTemplate(template).flatMap((part) => (part.kind === "field" ? [part.name] : []));
}

/**
 * Substitute metadata into a template. Every placeholder without a value is
 * reported, in template order.
 */
export function renderTemplate(template: string, lookup: (field: string) => Scalar | undefined): RenderResult {
	const missing: string[] = [];
	let rendered = "";

	for (const part of parseTemplate(template)) {
		if (part.kind === "text") {
			rendered += part.text;
			continue;
		}
		const value = lookup(part.name);
		if (value === undefined) {
			if (!missing.includes(part.name)) missing.push(part.name);
			continue;
		}
		rendered += sanitizePathComponent(String(value));
	}

	return missing.length > 0 ? { ok: false, missing } : { ok: true, path: rendered };
}

/**
 * Glob matching every path the template can render to
 */
export function templateToGlob(template: string): string {
	return parseTemplate(template)
		.map((part) => (part.kind === "text" ? fg.escapePath(part.text) : "*"))
		.join("");
}

/**
 * Sanitize a metadata value for use as a single path component
 */
export function sanitizePathComponent(name: string): string {
	const sanitized = name
		.replace(/[<>:"/\\|?*\x00-\x1f]/g, "_") // Replace invalid chars
		.replace(/\s+/g, " ") // Normalize whitespace
		.replace(/\.+$/g, "") // Remove trailing dots
		.trim()
		.replace(/^\./, "_") // No hidden files
		.slice(0, 200); // Limit length
	return sanitized === "" ? "_" : sanitized;
}
