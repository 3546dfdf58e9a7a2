import pc from "picocolors";
import { config, LOG_LEVELS } from "./config/index.js";

export type LogLevel = (typeof LOG_LEVELS)[number];

let currentLevel: LogLevel = config.log.level;

function enabled(level: LogLevel): boolean {
	return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel);
}

export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

// stdout carries the response document, so everything here goes to stderr.
export const log = {
	error(message: string, ...details: unknown[]): void {
		if (enabled("error")) console.error(pc.red("error:"), message, ...details);
	},
	warn(message: string, ...details: unknown[]): void {
		if (enabled("warn")) console.error(pc.yellow("warn:"), message, ...details);
	},
	info(message: string, ...details: unknown[]): void {
		if (enabled("info")) console.error(pc.cyan("info:"), message, ...details);
	},
	debug(message: string, ...details: unknown[]): void {
		if (enabled("debug")) console.error(pc.dim("debug:"), message, ...details);
	},
};

/**
 * Log the outcome of a finished request
 */
export function logRequestComplete(summary: {
	success: boolean;
	id?: string;
	inProgress?: boolean;
	errors: number;
	duration: number;
}): void {
	const durationMs = summary.duration.toFixed(0);
	if (summary.success) {
		log.info(`${pc.green("✓")} committed ${summary.id ?? ""} in ${durationMs}ms`);
	} else if (summary.inProgress) {
		log.warn(`${pc.red("✗")} aborted after partial changes (${summary.errors} error(s), ${durationMs}ms)`);
	} else {
		log.info(`${pc.red("✗")} aborted (${summary.errors} error(s), ${durationMs}ms)`);
	}
}
