import path from "node:path";
import { DEFAULT_CACHE_TTL_MS } from "./services/cacheService.js";
import { DEFAULT_QUEUE_CAPACITY } from "./services/urlFetchService.js";

export type ServerConfig = {
	port: number;
	workerCount: number;
	queueCapacity: number;
	cacheTtlMs: number;
	jobLogFile: string | null;
	warmupUrls: string[];
};

function readNumber(raw: string | undefined, fallback: number, min: number) {
	const configured = Number(raw);
	if (raw === undefined || raw.trim() === "" || !Number.isFinite(configured)) return fallback;
	return Math.max(min, Math.floor(configured));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): ServerConfig {
	const logFile = env.JOB_LOG_FILE ?? "logs/jobs.log";

	return {
		port: readNumber(env.PORT, 8080, 0),
		workerCount: readNumber(env.FETCH_WORKERS, 2, 1),
		queueCapacity: readNumber(env.JOB_QUEUE_CAPACITY, DEFAULT_QUEUE_CAPACITY, 1),
		cacheTtlMs: readNumber(env.RESPONSE_CACHE_TTL_MS, DEFAULT_CACHE_TTL_MS, 0),
		jobLogFile: logFile.trim() === "" ? null : path.resolve(cwd, logFile),
		warmupUrls: (env.WARMUP_URLS ?? "")
			.split(",")
			.map(url => url.trim())
			.filter(Boolean)
	};
}
