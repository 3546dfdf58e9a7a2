import path from "path";
import { parseTemplate } from "../sync/template.js";
import { errorMessage } from "../errors.js";
import type { OptionName, OptionValue, Options, Scalar } from "./types.js";

interface OptionDefinition {
	type: OptionValue["type"];
	default: string;
	/** Extra constraint on top of the type check; returns a problem or null */
	check?: (value: OptionValue) => string | null;
}

export const OPTION_DEFINITIONS: Record<OptionName, OptionDefinition> = {
	"deduplication-threshold": {
		type: "float",
		default: "0.75",
		check: (value) => (value.type === "float" && (value.value < 0 || value.value > 1) ? "must be between 0 and 1" : null),
	},
	"media-path": {
		type: "path-template",
		default: "media/{album-artist}/{album}/{title}.{ext}",
	},
	"metadata-path": {
		type: "path-template",
		default: "metadata/{album-artist}/{album}.yml",
		check: (value) => (/\.(ya?ml|json)$/.test(String(value.value)) ? null : "must end in .yml, .yaml or .json"),
	},
};

export const OPTION_NAMES: readonly OptionName[] = ["deduplication-threshold", "media-path", "metadata-path"];

export function isOptionName(name: string): name is OptionName {
	return Object.prototype.hasOwnProperty.call(OPTION_DEFINITIONS, name);
}

/**
 * Validate a raw value against the option's declared type. Throws with a
 * description of the problem.
 */
export function decodeOption(name: OptionName, raw: Scalar): OptionValue {
	const definition = OPTION_DEFINITIONS[name];
	let value: OptionValue;

	if (definition.type === "float") {
		if (typeof raw === "boolean") {
			throw new Error(`expected a floating-point value, got ${raw}`);
		}
		const text = String(raw).trim();
		const parsed = Number(text);
		if (text === "" || !Number.isFinite(parsed)) {
			throw new Error(`malformed floating-point value: ${JSON.stringify(raw)}`);
		}
		value = { type: "float", value: parsed, text };
	} else {
		if (typeof raw !== "string") {
			throw new Error(`expected a path template string, got ${JSON.stringify(raw)}`);
		}
		validatePathTemplate(raw);
		value = { type: "path-template", value: raw, text: raw };
	}

	const problem = definition.check?.(value);
	if (problem) {
		throw new Error(problem);
	}
	return value;
}

function validatePathTemplate(template: string): void {
	if (template.trim() === "") {
		throw new Error("path template is empty");
	}
	try {
		parseTemplate(template);
	} catch (error) {
		throw new Error(errorMessage(error));
	}
	if (path.isAbsolute(template) || template.startsWith("/")) {
		throw new Error("path template must be relative to the library root");
	}
	if (template.split(/[\\/]/).includes("..")) {
		throw new Error("path template may not contain '..'");
	}
}

function defaultValue(name: OptionName): OptionValue {
	return decodeOption(name, OPTION_DEFINITIONS[name].default);
}

export function defaultOptions(): Options {
	return {
		"deduplication-threshold": defaultValue("deduplication-threshold"),
		"media-path": defaultValue("media-path"),
		"metadata-path": defaultValue("metadata-path"),
	};
}
