import path from "node:path";
import { config } from "dotenv-defaults";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { createJobLogger } from "./services/logger.js";
import { UrlFetchService } from "./services/urlFetchService.js";

config({
	path: path.resolve(process.cwd(), ".env"),
	encoding: "utf8",
	defaults: path.resolve(process.cwd(), ".env.defaults")
});

const settings = loadConfig();
const logger = createJobLogger({ file: settings.jobLogFile });
const service = new UrlFetchService({
	queueCapacity: settings.queueCapacity,
	cacheTtlMs: settings.cacheTtlMs,
	logger
});

console.log(`Starting ${settings.workerCount} fetch workers`);
service.startWorkers(settings.workerCount);

for (const url of settings.warmupUrls) {
	await service.submit(url);
}

const app = createApp({ service, jobLogFile: settings.jobLogFile });
const server = app.listen(settings.port, () => {
	console.log(`Server listening on http://localhost:${settings.port}`);
});

// In-flight fetches finish before exit; jobs still queued end in `error`.
function gracefulCloseAndExit(code = 0) {
	console.log("Closing server...");
	server.close(() => {
		service
			.stop()
			.then(() => {
				console.log("Server closed");
				process.exit(code);
			})
			.catch(error => {
				console.error("Error during graceful shutdown", error);
				process.exit(1);
			});
	});
}

process.on("SIGTERM", () => gracefulCloseAndExit(0));
process.on("SIGINT", () => gracefulCloseAndExit(0));
