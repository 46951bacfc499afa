import express from "express";
import cors from "cors";
import { createMainRouter } from "./routers/mainRouter.js";
import { createLogsRouter } from "./routers/logsRouter.js";
import type { UrlFetchService } from "./services/urlFetchService.js";

export type AppOptions = {
	service: UrlFetchService;
	jobLogFile: string | null;
};

export function createApp({ service, jobLogFile }: AppOptions) {
	const app = express();

	app.use(
		cors({
			origin: "*",
			methods: ["GET", "POST", "OPTIONS"],
			allowedHeaders: ["Content-Type"]
		})
	);

	app.use((req, res, next) => {
		if (req.method === "OPTIONS") {
			res.sendStatus(200);
			return;
		}

		next();
	});

	app.use(express.json({ limit: "64kb" }));
	app.use("/api/logs", createLogsRouter(jobLogFile));
	app.use("/", createMainRouter(service));

	return app;
}
