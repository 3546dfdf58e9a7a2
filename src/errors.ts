export type ErrorReason =
	| "malformed-query"
	| "no-matches"
	| "malformed-database"
	| "intervening-transaction"
	| "missing-files"
	| "option/does-not-exist"
	| "option/malformed-value"
	| "current-mismatch"
	| "unresolved-placeholder"
	| "tag-io-error"
	| "file-exists"
	| "file-io-error"
	| "library-locked"
	| "git-error";

export interface ResponseError {
	reason: ErrorReason;
	message: string;
	[key: string]: unknown;
}

/**
 * A failure reported in-band in the response document. Anything else
 * thrown out of the engine is an internal error.
 */
export class QueryError extends Error {
	readonly reason: ErrorReason;
	readonly data: Record<string, unknown>;

	constructor(reason: ErrorReason, message: string, data: Record<string, unknown> = {}) {
		super(message);
		this.name = "QueryError";
		this.reason = reason;
		this.data = data;
	}

	toResponse(): ResponseError {
		return { reason: this.reason, message: this.message, ...this.data };
	}
}

export class MalformedQueryError extends QueryError {
	constructor(message: string, data: Record<string, unknown> = {}) {
		super("malformed-query", message, data);
		this.name = "MalformedQueryError";
	}
}

export class MalformedDatabaseError extends QueryError {
	constructor(file: string, path: string, message: string) {
		super("malformed-database", `${file}${path ? ` at ${path}` : ""}: ${message}`, { file, path });
		this.name = "MalformedDatabaseError";
	}
}

export class OptionError extends QueryError {
	constructor(reason: "option/does-not-exist" | "option/malformed-value", message: string, data: Record<string, unknown>) {
		super(reason, message, data);
		this.name = "OptionError";
	}
}

/**
 * Tag codec and filesystem failures
 */
export class SyncError extends QueryError {
	constructor(
		reason: "tag-io-error" | "file-exists" | "file-io-error" | "unresolved-placeholder" | "missing-files",
		message: string,
		data: Record<string, unknown> = {}
	) {
		super(reason, message, data);
		this.name = "SyncError";
	}
}

export class GitError extends QueryError {
	constructor(message: string, data: Record<string, unknown> = {}) {
		super("git-error", message, data);
		this.name = "GitError";
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
