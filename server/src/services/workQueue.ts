export class QueueClosedError extends Error {
	constructor() {
		super("Work queue is closed");
		this.name = "QueueClosedError";
	}
}

type Slot<T> = { value: T };

type Taker<T> = {
	resolve: (value: T) => void;
	reject: (error: Error) => void;
};

type Putter<T> = {
	value: T;
	resolve: () => void;
	reject: (error: Error) => void;
};

/**
 * Bounded FIFO channel.
 *
 * `enqueue` stays pending while the buffer is full and `dequeue` stays pending
 * while it is empty. Blocked producers are admitted in arrival order as
 * consumers free capacity, so overall insertion order is preserved.
 */
export class BoundedQueue<T> {
	private readonly items: Slot<T>[] = [];
	private readonly takers: Taker<T>[] = [];
	private readonly putters: Putter<T>[] = [];
	private closed = false;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
		}
	}

	get size() {
		return this.items.length;
	}

	get isClosed() {
		return this.closed;
	}

	/** Number of producers currently waiting for capacity. */
	get blockedProducers() {
		return this.putters.length;
	}

	enqueue(value: T): Promise<void> {
		if (this.closed) {
			return Promise.reject(new QueueClosedError());
		}

		const taker = this.takers.shift();
		if (taker) {
			taker.resolve(value);
			return Promise.resolve();
		}

		if (this.items.length < this.capacity) {
			this.items.push({ value });
			return Promise.resolve();
		}

		return new Promise<void>((resolve, reject) => {
			this.putters.push({ value, resolve, reject });
		});
	}

	dequeue(): Promise<T> {
		const slot = this.items.shift();
		if (slot) {
			this.admitPutter();
			return Promise.resolve(slot.value);
		}

		if (this.closed) {
			return Promise.reject(new QueueClosedError());
		}

		return new Promise<T>((resolve, reject) => {
			this.takers.push({ resolve, reject });
		});
	}

	/** Rejects every waiter and returns the buffered items that were never dequeued. */
	close(): T[] {
		if (this.closed) return [];
		this.closed = true;

		const error = new QueueClosedError();
		for (const taker of this.takers.splice(0)) {
			taker.reject(error);
		}
		for (const putter of this.putters.splice(0)) {
			putter.reject(error);
		}
		return this.items.splice(0).map(slot => slot.value);
	}

	private admitPutter() {
		const putter = this.putters.shift();
		if (!putter) return;
		this.items.push({ value: putter.value });
		putter.resolve();
	}
}
