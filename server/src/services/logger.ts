import fs from "node:fs";
import path from "node:path";

export type JobLogLevel = "info" | "warn" | "error";

export type JobLogEvent =
	| "submitted"
	| "fetching"
	| "done"
	| "done-cached"
	| "error"
	| "anomaly"
	| "worker-started"
	| "worker-stopped";

export type JobLogFields = {
	jobId?: number;
	url?: string;
	workerId?: number;
	error?: string;
};

export type JobLogEntry = JobLogFields & {
	at: string;
	level: JobLogLevel;
	event: JobLogEvent;
	message: string;
};

export interface JobLogger {
	info(event: JobLogEvent, message: string, fields?: JobLogFields): void;
	warn(event: JobLogEvent, message: string, fields?: JobLogFields): void;
	error(event: JobLogEvent, message: string, fields?: JobLogFields): void;
	flush(): Promise<void>;
}

export type JobLoggerOptions = {
	/** JSON-lines file to append to; `null` keeps events on the console only. */
	file: string | null;
	console?: boolean;
};

function consolePrefix(fields: JobLogFields) {
	if (fields.jobId !== undefined) return `[JOB ${fields.jobId}]`;
	if (fields.workerId !== undefined) return `[WORKER ${fields.workerId}]`;
	return "[JOBS]";
}

export function createJobLogger({ file, console: useConsole = true }: JobLoggerOptions): JobLogger {
	let pending: Promise<void> = Promise.resolve();
	let logDirReady = false;

	function append(entry: JobLogEntry) {
		if (!file) return;
		const target = file;
		const line = JSON.stringify(entry) + "\n";

		pending = pending
			.then(async () => {
				if (!logDirReady) {
					await fs.promises.mkdir(path.dirname(target), { recursive: true });
					logDirReady = true;
				}
				await fs.promises.appendFile(target, line, { encoding: "utf8" });
			})
			.catch(err => {
				console.error("Failed to write job log:", err);
			});
	}

	function write(level: JobLogLevel, event: JobLogEvent, message: string, fields: JobLogFields = {}) {
		const entry: JobLogEntry = { at: new Date().toISOString(), level, event, message, ...fields };

		if (useConsole) {
			const text = `${consolePrefix(fields)} ${message}`;
			if (level === "error") console.error(text);
			else if (level === "warn") console.warn(text);
			else console.log(text);
		}

		append(entry);
	}

	return {
		info: (event, message, fields) => write("info", event, message, fields),
		warn: (event, message, fields) => write("warn", event, message, fields),
		error: (event, message, fields) => write("error", event, message, fields),
		flush: () => pending
	};
}
