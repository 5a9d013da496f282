/**
 * Append-only destination for export records.
 *
 * `append` is synchronous so it can be called from inside a notify cascade.
 * Sinks that write asynchronously queue the work; `flush` waits for it.
 */
export interface RecordSink<R> {
	append(record: R): void;
	/** Resolves once every appended record is written; rejects with the first write failure. */
	flush(): Promise<void>;
	/** Drains pending writes. Appending afterwards throws. */
	close(): Promise<void>;
}
