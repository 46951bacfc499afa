import { buildUrlResponse, isFresh, type ResponseCache } from "./cacheService.js";
import { describeError, fetchUrlBody, type FetchFn } from "./fetcher.js";
import type { JobRegistry, JobStatus } from "./jobsService.js";
import type { JobLogger } from "./logger.js";
import { QueueClosedError, type BoundedQueue } from "./workQueue.js";

export class InternalInconsistencyError extends Error {
	constructor(readonly jobId: number) {
		super(`Dequeued job ${jobId} has no registered record`);
		this.name = "InternalInconsistencyError";
	}
}

export type WorkerContext = {
	registry: JobRegistry;
	cache: ResponseCache;
	queue: BoundedQueue<number>;
	fetchImpl: FetchFn;
	now: () => number;
	cacheTtlMs: number;
	logger: JobLogger;
};

/**
 * Runs the fetch-or-cache-hit procedure for one dequeued job and returns the
 * terminal status it reached. Fetch failures are recorded on the job and never
 * thrown; only a missing job record surfaces as an error.
 */
export async function processJob(jobId: number, ctx: WorkerContext): Promise<JobStatus> {
	const job = ctx.registry.get(jobId);
	if (!job) {
		throw new InternalInconsistencyError(jobId);
	}

	const { url } = job;
	const cached = ctx.cache.lookup(url);
	if (cached && isFresh(cached, ctx.now(), ctx.cacheTtlMs)) {
		ctx.registry.transition(jobId, "done-cached", { at: ctx.now(), result: cached });
		ctx.logger.info("done-cached", `served ${url} from cache`, { jobId, url });
		return "done-cached";
	}

	ctx.registry.transition(jobId, "fetching", { at: ctx.now() });
	ctx.logger.info("fetching", `fetching ${url}`, { jobId, url });

	let fetched: { statusCode: number; body: string };
	try {
		fetched = await fetchUrlBody(url, ctx.fetchImpl);
	} catch (error) {
		const message = describeError(error);
		ctx.registry.transition(jobId, "error", { at: ctx.now(), error: message });
		ctx.logger.error("error", message, { jobId, url, error: message });
		return "error";
	}

	const response = buildUrlResponse(url, fetched.body, fetched.statusCode, ctx.now());
	ctx.cache.publish(url, response);
	ctx.registry.transition(jobId, "done", { at: response.timestamp, result: response });
	ctx.logger.info("done", `fetched ${url} (${fetched.statusCode}, ${fetched.body.length} chars)`, { jobId, url });
	return "done";
}

/** Drains the queue until it is closed. */
export async function runWorker(workerId: number, ctx: WorkerContext) {
	ctx.logger.info("worker-started", "worker running", { workerId });

	for (;;) {
		let jobId: number;
		try {
			jobId = await ctx.queue.dequeue();
		} catch (error) {
			if (error instanceof QueueClosedError) break;
			throw error;
		}

		try {
			await processJob(jobId, ctx);
		} catch (error) {
			ctx.logger.error("anomaly", describeError(error), { jobId, workerId, error: describeError(error) });
		}
	}

	ctx.logger.info("worker-stopped", "worker stopped", { workerId });
}
