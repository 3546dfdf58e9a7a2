import { OptionError, QueryError, errorMessage } from "../errors.js";
import type { Library } from "../library/library.js";
import { OPTION_NAMES, decodeOption, isOptionName } from "../library/options.js";
import type { FieldValue, OptionName, Scalar } from "../library/types.js";
import { matches } from "../query/filter.js";
import type { OptionOperation } from "../query/types.js";

export type OptionResult = string | Record<string, string>;

function optionName(name: string, index: number): OptionName {
	if (!isOptionName(name)) {
		throw new OptionError("option/does-not-exist", `options subquery ${index}: no option named ${JSON.stringify(name)}`, {
			subquery: index,
			name,
		});
	}
	return name;
}

function expectCurrent(library: Library, name: OptionName, expected: FieldValue, index: number): void {
	const actual = library.getOption(name).text;
	if (expected === null || String(expected) !== actual) {
		throw new QueryError(
			"current-mismatch",
			`options subquery ${index}: ${name} is ${JSON.stringify(actual)}, expected ${JSON.stringify(expected)}`,
			{ subquery: index, name, field: "value", expected, actual }
		);
	}
}

function assign(library: Library, name: OptionName, raw: Scalar, index: number): void {
	try {
		library.setOption(name, decodeOption(name, raw));
	} catch (error) {
		throw new OptionError(
			"option/malformed-value",
			`options subquery ${index}: bad value for ${name}: ${errorMessage(error)}`,
			{ subquery: index, name, value: raw }
		);
	}
}

/**
 * Apply an options subquery to the working library and return what it reads
 */
export function executeOptionOperation(library: Library, operation: OptionOperation): OptionResult {
	const { index } = operation;

	if (operation.target === "single") {
		const name = optionName(operation.name, index);
		if (operation.current !== undefined) {
			expectCurrent(library, name, operation.current, index);
		}
		if (operation.set !== undefined) {
			assign(library, name, operation.set, index);
		}
		return library.getOption(name).text;
	}

	const current = Object.entries(operation.current).map(([name, value]) => [optionName(name, index), value] as const);
	const updates = Object.entries(operation.set).map(([name, value]) => [optionName(name, index), value] as const);
	const requested = operation.get?.map((name) => optionName(name, index)) ?? null;

	for (const [name, value] of current) {
		expectCurrent(library, name, value, index);
	}
	for (const [name, value] of updates) {
		assign(library, name, value, index);
	}

	const result: Record<string, string> = {};
	for (const name of OPTION_NAMES) {
		const value = library.getOption(name).text;
		const lookup = (field: string): Scalar | undefined =>
			field === "name" ? name : field === "value" ? value : undefined;
		if (!matches(lookup, operation.filter)) continue;
		if (requested && !requested.includes(name)) continue;
		result[name] = value;
	}
	return result;
}
