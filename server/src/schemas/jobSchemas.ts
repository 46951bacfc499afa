import { z } from "zod";

export const AddJobRequestSchema = z.object({
	url: z
		.string()
		.trim()
		.url("Invalid URL")
		.refine(value => /^https?:\/\//i.test(value), "Only http and https URLs can be fetched")
});

export const JobIdParamSchema = z.object({
	id: z.coerce.number().int().positive()
});

export const ResponseQuerySchema = z.object({
	url: z.string().min(1, "Missing 'url' parameter")
});
