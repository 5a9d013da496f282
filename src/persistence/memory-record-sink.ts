/**
 * MemoryRecordSink — in-memory, append-only record sink.
 *
 * Default sink for desk wiring and tests. Not persisted across restarts.
 */

import type { RecordSink } from "./record-sink.js";

/** Configuration for creating a MemoryRecordSink instance. */
export interface MemoryRecordSinkConfig {
	/** Oldest records are evicted past this count */
	readonly maxRecords?: number;
}

export class MemoryRecordSink<R> implements RecordSink<R> {
	private readonly store: R[] = [];
	private readonly maxRecords: number;
	private closed = false;

	constructor(config?: MemoryRecordSinkConfig) {
		this.maxRecords = config?.maxRecords ?? Number.POSITIVE_INFINITY;
	}

	append(record: R): void {
		if (this.closed) {
			throw new Error("MemoryRecordSink is closed");
		}
		this.store.push(record);
		const excess = this.store.length - this.maxRecords;
		if (excess > 0) {
			this.store.splice(0, excess);
		}
	}

	/** Returns a shallow copy of the records, oldest first. */
	records(): R[] {
		return [...this.store];
	}

	clear(): void {
		this.store.length = 0;
	}

	/** Writes are synchronous; nothing to wait for. */
	async flush(): Promise<void> {}

	async close(): Promise<void> {
		this.closed = true;
	}

	get size(): number {
		return this.store.length;
	}
}
