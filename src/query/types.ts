import type { FieldValue, Scalar } from "../library/types.js";
import type { TagField } from "../sync/tags.js";

export type FilterExpr =
	| { kind: "all"; children: FilterExpr[] }
	| { kind: "any"; children: FilterExpr[] }
	| { kind: "literal"; field: string; query: string; substring: boolean; caseFold: boolean }
	| { kind: "missing"; field: string; missing: boolean }
	| { kind: "regex"; field: string; pattern: RegExp };

export type OptionOperation =
	| {
			kind: "option";
			index: number;
			target: "single";
			name: string;
			set?: Scalar;
			current?: FieldValue;
	  }
	| {
			kind: "option";
			index: number;
			target: "many";
			filter: FilterExpr;
			get: string[] | null;
			set: Record<string, Scalar>;
			current: Record<string, FieldValue>;
	  };

export interface ImportOperation {
	kind: "import";
	index: number;
	pattern: string;
	mode: "wildcard" | "literal";
}

export interface SongOperation {
	kind: "songs";
	index: number;
	filter: FilterExpr;
	/** null returns every field */
	get: string[] | null;
	set: Record<string, FieldValue>;
	current: Record<string, FieldValue>;
	extract: TagField[];
	embed: TagField[];
	rename: boolean;
	check: boolean;
	allowNoMatches: boolean;
	quiet: boolean;
}

export type Operation = OptionOperation | ImportOperation | SongOperation;

export interface CompiledQuery {
	lastId: string | null;
	description: string | null;
	operations: Operation[];
}
