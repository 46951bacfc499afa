export type FetchedBody = {
	status: number;
	text(): Promise<string>;
};

/** Subset of the global `fetch` the workers rely on. */
export type FetchFn = (url: string) => Promise<FetchedBody>;

export class TransportFailureError extends Error {
	constructor(
		readonly url: string,
		options?: { cause?: unknown }
	) {
		super(`Request to ${url} failed: ${describeError(options?.cause)}`, options);
		this.name = "TransportFailureError";
	}
}

export class ReadFailureError extends Error {
	constructor(
		readonly url: string,
		options?: { cause?: unknown }
	) {
		super(`Reading the body of ${url} failed: ${describeError(options?.cause)}`, options);
		this.name = "ReadFailureError";
	}
}

export function describeError(error: unknown) {
	if (error instanceof Error) return error.message;
	return String(error);
}

export const defaultFetch: FetchFn = url => fetch(url);

export async function fetchUrlBody(url: string, fetchImpl: FetchFn = defaultFetch) {
	let response: FetchedBody;
	try {
		response = await fetchImpl(url);
	} catch (cause) {
		throw new TransportFailureError(url, { cause });
	}

	try {
		const body = await response.text();
		return { statusCode: response.status, body };
	} catch (cause) {
		throw new ReadFailureError(url, { cause });
	}
}
