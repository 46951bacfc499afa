import test from "node:test";
import assert from "node:assert/strict";

import { buildUrlResponse, DEFAULT_CACHE_TTL_MS, isFresh, ResponseCache } from "../src/services/cacheService.js";

const MINUTE = 60 * 1000;

test("lookup misses with null until a response is published", () => {
	const cache = new ResponseCache();
	assert.equal(cache.lookup("http://a.test/"), null);

	const response = buildUrlResponse("http://a.test/", "hello", 200, 1000);
	cache.publish("http://a.test/", response);
	assert.equal(cache.lookup("http://a.test/"), response);
});

test("publish replaces the previous entry instead of editing it", () => {
	const cache = new ResponseCache();
	const first = buildUrlResponse("http://a.test/", "old", 200, 1000);
	const second = buildUrlResponse("http://a.test/", "new", 200, 2000);

	cache.publish("http://a.test/", first);
	cache.publish("http://a.test/", second);

	assert.equal(cache.lookup("http://a.test/"), second);
	assert.equal(first.body, "old");
	assert.equal(cache.size, 1);
	assert.deepEqual(cache.list(), [second]);
});

test("published responses are frozen", () => {
	const response = buildUrlResponse("http://a.test/", "hello", 200, 1000);
	assert.equal(Object.isFrozen(response), true);
});

test("a response is fresh for strictly less than one hour", () => {
	const response = buildUrlResponse("http://a.test/", "hello", 200, 0);

	assert.equal(DEFAULT_CACHE_TTL_MS, 60 * MINUTE);
	assert.equal(isFresh(response, 59 * MINUTE), true);
	assert.equal(isFresh(response, 60 * MINUTE - 1), true);
	assert.equal(isFresh(response, 60 * MINUTE), false);
	assert.equal(isFresh(response, 61 * MINUTE), false);
});

test("isFresh honours a custom ttl", () => {
	const response = buildUrlResponse("http://a.test/", "hello", 200, 1000);
	assert.equal(isFresh(response, 1499, 500), true);
	assert.equal(isFresh(response, 1500, 500), false);
	assert.equal(isFresh(response, 1000, 0), false);
});
