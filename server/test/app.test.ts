import test from "node:test";
import assert from "node:assert/strict";

import { createApp } from "../src/app.js";
import { UrlFetchService } from "../src/services/urlFetchService.js";
import { createStubFetch, waitForTerminal } from "./helpers.js";

const T = Date.UTC(2024, 0, 1);
const { fetchImpl } = createStubFetch({ "http://example.test/a": "X" });
const service = new UrlFetchService({ fetchImpl, now: () => T });
service.startWorkers(1);

const server = createApp({ service, jobLogFile: null }).listen(0);
await new Promise<void>(resolve => server.once("listening", () => resolve()));
const address = server.address();
if (!address || typeof address === "string") {
	throw new Error("Test server is not listening on a TCP port");
}
const baseUrl = `http://127.0.0.1:${address.port}`;

const cachedResponse = {
	url: "http://example.test/a",
	body: "X",
	statusCode: 200,
	timestamp: "2024-01-01T00:00:00.000Z"
};

const finishedJob = {
	id: 1,
	url: "http://example.test/a",
	status: "done",
	response: cachedResponse,
	error: null,
	requestedAt: "2024-01-01T00:00:00.000Z",
	completedAt: "2024-01-01T00:00:00.000Z"
};

test("POST /jobs queues a job and GET /jobs/:id reports its result", async () => {
	const created = await fetch(`${baseUrl}/jobs`, {
		method: "POST",
		headers: { "Content-Type": "application/json" },
		body: JSON.stringify({ url: "http://example.test/a" })
	});
	assert.equal(created.status, 202);
	assert.deepEqual(await created.json(), {
		id: 1,
		url: "http://example.test/a",
		status: "waiting",
		response: null,
		error: null,
		requestedAt: "2024-01-01T00:00:00.000Z",
		completedAt: null
	});

	await waitForTerminal(service, 1);

	const polled = await fetch(`${baseUrl}/jobs/1`);
	assert.equal(polled.status, 200);
	assert.deepEqual(await polled.json(), finishedJob);
});

test("GET /jobs and GET /responses list every record", async () => {
	assert.deepEqual(await (await fetch(`${baseUrl}/jobs`)).json(), [finishedJob]);
	assert.deepEqual(await (await fetch(`${baseUrl}/responses`)).json(), [cachedResponse]);
});

test("GET /response returns the cached response or 404", async () => {
	const hit = await fetch(`${baseUrl}/response?url=${encodeURIComponent("http://example.test/a")}`);
	assert.equal(hit.status, 200);
	assert.deepEqual(await hit.json(), cachedResponse);

	const miss = await fetch(`${baseUrl}/response?url=${encodeURIComponent("http://example.test/b")}`);
	assert.equal(miss.status, 404);

	const missing = await fetch(`${baseUrl}/response`);
	assert.equal(missing.status, 400);
	assert.deepEqual(await missing.json(), {
		error: "Invalid input",
		details: { formErrors: [], fieldErrors: { url: ["Required"] } }
	});
});

test("GET /response rejects a repeated url parameter", async () => {
	const repeated = await fetch(`${baseUrl}/response?url=a&url=b`);
	assert.equal(repeated.status, 400);
	assert.deepEqual(await repeated.json(), {
		error: "Invalid input",
		details: { formErrors: [], fieldErrors: { url: ["Expected string, received array"] } }
	});
});

test("invalid input is rejected with 400 and unknown jobs with 404", async () => {
	const badUrl = await fetch(`${baseUrl}/jobs`, {
		method: "POST",
		headers: { "Content-Type": "application/json" },
		body: JSON.stringify({ url: "ftp://example.test/file" })
	});
	assert.equal(badUrl.status, 400);
	assert.deepEqual(await badUrl.json(), {
		error: "Invalid input",
		details: {
			formErrors: [],
			fieldErrors: { url: ["Only http and https URLs can be fetched"] }
		}
	});

	assert.equal((await fetch(`${baseUrl}/jobs/abc`)).status, 400);
	assert.equal((await fetch(`${baseUrl}/jobs/999`)).status, 404);
});

test("GET /api/logs returns an empty list without a log file", async () => {
	const logs = await fetch(`${baseUrl}/api/logs`);
	assert.deepEqual(await logs.json(), []);
});

test.after(async () => {
	await new Promise<void>(resolve => server.close(() => resolve()));
	await service.stop();
});
