import type { FetchedBody, FetchFn } from "../src/services/fetcher.js";
import { isTerminalStatus, type Job } from "../src/services/jobsService.js";
import type { JobLogEntry, JobLogger } from "../src/services/logger.js";
import type { UrlFetchService } from "../src/services/urlFetchService.js";

export type MemoryLogger = JobLogger & { entries: JobLogEntry[] };

export function createMemoryLogger(): MemoryLogger {
	const entries: JobLogEntry[] = [];
	const push =
		(level: JobLogEntry["level"]): JobLogger["info"] =>
		(event, message, fields = {}) => {
			entries.push({ at: new Date().toISOString(), level, event, message, ...fields });
		};

	return {
		entries,
		info: push("info"),
		warn: push("warn"),
		error: push("error"),
		flush: async () => {}
	};
}

export function textBody(body: string, status = 200): FetchedBody {
	return { status, text: async () => body };
}

/** Stub fetch answering from a URL -> body table and counting calls per URL. */
export function createStubFetch(bodies: Record<string, string>) {
	const calls: string[] = [];
	const fetchImpl: FetchFn = async url => {
		calls.push(url);
		const body = bodies[url];
		if (body === undefined) {
			throw new Error(`getaddrinfo ENOTFOUND ${new URL(url).hostname}`);
		}
		return textBody(body);
	};
	return { fetchImpl, calls };
}

export async function waitForTerminal(service: UrlFetchService, id: number, timeoutMs = 2000): Promise<Job> {
	const deadline = Date.now() + timeoutMs;
	for (;;) {
		const job = service.getJob(id);
		if (job && isTerminalStatus(job.status)) return job;
		if (Date.now() > deadline) {
			throw new Error(`Job ${id} did not finish, last status: ${job?.status ?? "missing"}`);
		}
		await new Promise(resolve => setTimeout(resolve, 1));
	}
}

export function flushMicrotasks() {
	return new Promise(resolve => setImmediate(resolve));
}
