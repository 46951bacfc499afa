import { Router } from "express";
import fs from "node:fs";
import readline from "node:readline";

export async function readJobLog(logFile: string): Promise<unknown[]> {
	if (!fs.existsSync(logFile)) {
		return [];
	}

	const rl = readline.createInterface({
		input: fs.createReadStream(logFile),
		crlfDelay: Infinity
	});

	const logs: unknown[] = [];
	for await (const line of rl) {
		if (!line.trim()) continue;
		try {
			logs.push(JSON.parse(line));
		} catch {
			console.error("Failed to parse log line:", line);
		}
	}
	return logs;
}

export function createLogsRouter(logFile: string | null) {
	const logsRouter = Router();

	logsRouter.get("/", async (_req, res) => {
		if (!logFile) {
			res.json([]);
			return;
		}

		try {
			res.json(await readJobLog(logFile));
		} catch (error) {
			console.error("Error reading logs:", error);
			res.status(500).json({ error: "Failed to read logs" });
		}
	});

	return logsRouter;
}
