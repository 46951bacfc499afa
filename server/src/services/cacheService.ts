export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

export type UrlResponse = {
	readonly url: string;
	readonly body: string;
	readonly statusCode: number;
	readonly timestamp: number;
};

export function buildUrlResponse(url: string, body: string, statusCode: number, timestamp: number): UrlResponse {
	return Object.freeze({ url, body, statusCode, timestamp });
}

export function isFresh(response: UrlResponse, now: number, ttlMs = DEFAULT_CACHE_TTL_MS) {
	return now - response.timestamp < ttlMs;
}

// Latest response per URL. Entries are replaced, never expired or removed.
export class ResponseCache {
	private readonly store = new Map<string, UrlResponse>();

	lookup(url: string): UrlResponse | null {
		return this.store.get(url) ?? null;
	}

	publish(url: string, response: UrlResponse) {
		this.store.set(url, response);
	}

	list(): UrlResponse[] {
		return [...this.store.values()];
	}

	get size() {
		return this.store.size;
	}
}
