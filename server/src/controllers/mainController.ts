import type { Request, RequestHandler, Response } from "express";
import { AddJobRequestSchema, JobIdParamSchema, ResponseQuerySchema } from "../schemas/jobSchemas.js";
import type { UrlResponse } from "../services/cacheService.js";
import type { Job } from "../services/jobsService.js";
import type { UrlFetchService } from "../services/urlFetchService.js";

export type SerializedResponse = {
	url: string;
	body: string;
	statusCode: number;
	timestamp: string;
};

export type SerializedJob = {
	id: number;
	url: string;
	status: Job["status"];
	response: SerializedResponse | null;
	error: string | null;
	requestedAt: string;
	completedAt: string | null;
};

export function serializeResponse(response: UrlResponse): SerializedResponse {
	return {
		url: response.url,
		body: response.body,
		statusCode: response.statusCode,
		timestamp: new Date(response.timestamp).toISOString()
	};
}

export function serializeJob(job: Job): SerializedJob {
	return {
		id: job.id,
		url: job.url,
		status: job.status,
		response: job.result ? serializeResponse(job.result) : null,
		error: job.error,
		requestedAt: new Date(job.requestedAt).toISOString(),
		completedAt: job.completedAt === null ? null : new Date(job.completedAt).toISOString()
	};
}

export type MainController = {
	addJob: RequestHandler;
	listJobs: RequestHandler;
	getJob: RequestHandler;
	listResponses: RequestHandler;
	getResponse: RequestHandler;
};

export function createMainController(service: UrlFetchService): MainController {
	async function addJob(req: Request, res: Response) {
		const parsedBody = AddJobRequestSchema.safeParse(req.body ?? {});
		if (!parsedBody.success) {
			res.status(400).json({
				error: "Invalid input",
				details: parsedBody.error.flatten()
			});
			return;
		}

		try {
			const job = await service.submit(parsedBody.data.url);
			res.status(202).json(serializeJob(job));
		} catch (error) {
			console.error("Failed to submit job:", error);
			res.status(500).json({ error: "Failed to submit job" });
		}
	}

	function getJob(req: Request, res: Response) {
		const parsedParams = JobIdParamSchema.safeParse(req.params);
		if (!parsedParams.success) {
			res.status(400).json({ error: "Job id must be a positive integer" });
			return;
		}

		const job = service.getJob(parsedParams.data.id);
		if (!job) {
			res.status(404).json({ error: `Job ${parsedParams.data.id} not found` });
			return;
		}

		res.json(serializeJob(job));
	}

	function getResponse(req: Request, res: Response) {
		const parsedQuery = ResponseQuerySchema.safeParse(req.query);
		if (!parsedQuery.success) {
			res.status(400).json({
				error: "Invalid input",
				details: parsedQuery.error.flatten()
			});
			return;
		}

		const response = service.getResponse(parsedQuery.data.url);
		if (!response) {
			res.status(404).json({ error: "No cached response for this URL" });
			return;
		}

		res.json(serializeResponse(response));
	}

	return {
		addJob: (req, res) => {
			addJob(req, res).catch(error => {
				console.error("Unhandled error while adding job:", error);
			});
		},
		listJobs: (_req, res) => {
			res.json(service.listJobs().map(serializeJob));
		},
		getJob,
		listResponses: (_req, res) => {
			res.json(service.listResponses().map(serializeResponse));
		},
		getResponse
	};
}
