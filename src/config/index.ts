import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;
export const GIT_MODES = ["auto", "always", "never"] as const;

const configSchema = z.object({
	library: z.object({
		// Options file or the directory holding it
		path: z.string().min(1).optional(),
	}),
	log: z.object({
		level: z.enum(LOG_LEVELS).default("warn"),
	}),
	lock: z.object({
		retries: z.number().int().min(0).default(5),
		staleMs: z.number().int().min(2000).default(10000),
	}),
	git: z.object({
		// auto: commit when the library is inside a git working tree
		mode: z.enum(GIT_MODES).default("auto"),
	}),
});

type Config = z.infer<typeof configSchema>;

function parseInteger(value: string | undefined, fallback: number): number {
	if (value === undefined || value.trim() === "") {
		return fallback;
	}
	return parseInt(value, 10);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const rawConfig = {
		library: {
			path: env.TUNEBASE_LIBRARY || undefined,
		},
		log: {
			level: (env.TUNEBASE_LOG_LEVEL || "warn").toLowerCase(),
		},
		lock: {
			retries: parseInteger(env.TUNEBASE_LOCK_RETRIES, 5),
			staleMs: parseInteger(env.TUNEBASE_LOCK_STALE_MS, 10000),
		},
		git: {
			mode: (env.TUNEBASE_GIT || "auto").toLowerCase(),
		},
	};

	return configSchema.parse(rawConfig);
}

export const config = loadConfig();
export type { Config };
