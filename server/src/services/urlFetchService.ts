import { DEFAULT_CACHE_TTL_MS, ResponseCache, type UrlResponse } from "./cacheService.js";
import { defaultFetch, describeError, type FetchFn } from "./fetcher.js";
import { buildJobRecord, JobRegistry, type Job } from "./jobsService.js";
import { createJobLogger, type JobLogger } from "./logger.js";
import { runWorker, type WorkerContext } from "./workerPool.js";
import { BoundedQueue, QueueClosedError } from "./workQueue.js";

export const DEFAULT_QUEUE_CAPACITY = 1000;

export type UrlFetchServiceOptions = {
	queueCapacity?: number;
	cacheTtlMs?: number;
	fetchImpl?: FetchFn;
	now?: () => number;
	logger?: JobLogger;
};

/**
 * The job registry, response cache, work queue and id counter of one process,
 * together with the worker pool draining them.
 */
export class UrlFetchService {
	readonly registry = new JobRegistry();
	readonly cache = new ResponseCache();
	readonly queue: BoundedQueue<number>;

	private readonly context: WorkerContext;
	private readonly workers: Promise<void>[] = [];
	private lastJobId = 0;

	constructor(options: UrlFetchServiceOptions = {}) {
		this.queue = new BoundedQueue<number>(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
		this.context = {
			registry: this.registry,
			cache: this.cache,
			queue: this.queue,
			fetchImpl: options.fetchImpl ?? defaultFetch,
			now: options.now ?? Date.now,
			cacheTtlMs: options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
			logger: options.logger ?? createJobLogger({ file: null })
		};
	}

	get workerCount() {
		return this.workers.length;
	}

	/**
	 * Registers a `waiting` job and queues it. The returned promise stays pending
	 * while the queue is full; the job itself is visible through `getJob` as soon
	 * as it is registered. If the queue closes before the id is accepted, the
	 * job ends in `error` and the promise rejects.
	 */
	async submit(url: string): Promise<Job> {
		if (this.queue.isClosed) {
			throw new QueueClosedError();
		}

		const job = buildJobRecord(++this.lastJobId, url, this.context.now());
		this.registry.register(job);
		this.context.logger.info("submitted", `queued ${url}`, { jobId: job.id, url });

		try {
			await this.queue.enqueue(job.id);
		} catch (error) {
			const reason = describeError(error);
			this.registry.abandon(job.id, reason, this.context.now());
			this.context.logger.error("error", `not queued: ${reason}`, { jobId: job.id, url, error: reason });
			throw error;
		}
		return job;
	}

	getJob(id: number): Job | null {
		return this.registry.get(id);
	}

	listJobs(): Job[] {
		return this.registry.list();
	}

	getResponse(url: string): UrlResponse | null {
		return this.cache.lookup(url);
	}

	listResponses(): UrlResponse[] {
		return this.cache.list();
	}

	startWorkers(count: number) {
		if (!Number.isInteger(count) || count < 1) {
			throw new RangeError(`Worker count must be a positive integer, got ${count}`);
		}
		if (this.workers.length > 0) {
			this.context.logger.warn("anomaly", `workers already running (${this.workers.length}), ignoring request for ${count}`);
			return;
		}

		const { logger } = this.context;
		for (let workerId = 1; workerId <= count; workerId++) {
			const worker = runWorker(workerId, this.context).catch(error => {
				logger.error("anomaly", `worker exited unexpectedly: ${describeError(error)}`, { workerId });
			});
			this.workers.push(worker);
		}
	}

	/**
	 * Closes the queue, fails the jobs still buffered in it and waits for every
	 * worker to finish its current job.
	 */
	async stop() {
		for (const jobId of this.queue.close()) {
			this.registry.abandon(jobId, "Work queue closed before the job was processed", this.context.now());
			this.context.logger.warn("error", "dropped from the queue on shutdown", { jobId });
		}
		await Promise.all(this.workers);
		await this.context.logger.flush();
	}
}
