import type { UrlResponse } from "./cacheService.js";

export const JOB_STATUSES = ["waiting", "fetching", "done", "done-cached", "error"] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type Job = {
	readonly id: number;
	readonly url: string;
	status: JobStatus;
	result: UrlResponse | null;
	error: string | null;
	requestedAt: number;
	completedAt: number | null;
};

export type TransitionDetails = {
	at: number;
	result?: UrlResponse;
	error?: string;
};

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
	waiting: ["fetching", "done-cached"],
	fetching: ["done", "error"],
	done: [],
	"done-cached": [],
	error: []
};

export function isTerminalStatus(status: JobStatus) {
	return ALLOWED_TRANSITIONS[status].length === 0;
}

export class JobNotFoundError extends Error {
	constructor(readonly jobId: number) {
		super(`Job ${jobId} is not registered`);
		this.name = "JobNotFoundError";
	}
}

export class InvalidTransitionError extends Error {
	constructor(
		readonly jobId: number,
		readonly from: JobStatus,
		readonly to: JobStatus
	) {
		super(`Job ${jobId} cannot move from '${from}' to '${to}'`);
		this.name = "InvalidTransitionError";
	}
}

export function buildJobRecord(id: number, url: string, requestedAt: number): Job {
	return {
		id,
		url,
		status: "waiting",
		result: null,
		error: null,
		requestedAt,
		completedAt: null
	};
}

/**
 * Owns the canonical record of every submitted job.
 *
 * Callers only ever receive copies; the stored record changes exclusively
 * through {@link JobRegistry.transition}, which enforces the status graph
 * `waiting -> fetching -> done | error` and `waiting -> done-cached`, and
 * through {@link JobRegistry.abandon} for jobs that never reached the queue.
 */
export class JobRegistry {
	private readonly jobs = new Map<number, Job>();

	register(job: Job) {
		if (this.jobs.has(job.id)) {
			throw new Error(`Job ${job.id} is already registered`);
		}
		this.jobs.set(job.id, { ...job });
	}

	get(id: number): Job | null {
		const job = this.jobs.get(id);
		return job ? { ...job } : null;
	}

	list(): Job[] {
		return [...this.jobs.values()].sort((a, b) => a.id - b.id).map(job => ({ ...job }));
	}

	get size() {
		return this.jobs.size;
	}

	/** Fails a `waiting` job whose id could not be queued. */
	abandon(id: number, reason: string, at: number): Job {
		const job = this.jobs.get(id);
		if (!job) {
			throw new JobNotFoundError(id);
		}
		if (job.status !== "waiting") {
			throw new InvalidTransitionError(id, job.status, "error");
		}

		job.status = "error";
		job.error = reason;
		job.completedAt = at;
		return { ...job };
	}

	transition(id: number, status: JobStatus, details: TransitionDetails): Job {
		const job = this.jobs.get(id);
		if (!job) {
			throw new JobNotFoundError(id);
		}
		if (!ALLOWED_TRANSITIONS[job.status].includes(status)) {
			throw new InvalidTransitionError(id, job.status, status);
		}

		job.status = status;
		if (details.result) {
			job.result = details.result;
		}
		if (details.error !== undefined) {
			job.error = details.error;
		}
		if (isTerminalStatus(status)) {
			job.completedAt = details.at;
		}

		return { ...job };
	}
}
