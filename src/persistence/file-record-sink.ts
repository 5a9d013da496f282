/**
 * FileRecordSink -- CSV file sink for export records.
 *
 * Appends one comma-separated line per record, columns in layout order.
 * Writes run one at a time on an internal queue. The first write to fail
 * since the previous flush() is thrown by the next flush() or close().
 */

import { appendFile, writeFile } from "node:fs/promises";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { RecordSink } from "./record-sink.js";
import { type RecordLayout, csvHeader, toCsvLine } from "./records.js";

/** Configuration for creating a FileRecordSink instance. */
export interface FileRecordSinkConfig<R> {
	readonly filePath: string;
	readonly layout: RecordLayout<R>;
	/** `truncate` empties the file when the sink is created (default); `append` keeps it */
	readonly mode?: "truncate" | "append";
	/** Write the column names as the first line */
	readonly header?: boolean;
	readonly logger?: Logger;
}

const MAX_KEPT_ERRORS = 10;

export class FileRecordSink<R> implements RecordSink<R> {
	private readonly config: FileRecordSinkConfig<R>;
	private readonly logger: Logger;
	private closed = false;
	private headerPending: boolean;
	private writeQueue: Promise<void>;
	private readonly _writeErrors: Error[] = [];
	private unreported: Error | undefined;

	private constructor(config: FileRecordSinkConfig<R>) {
		this.config = config;
		this.logger = (config.logger ?? silentLogger()).child({
			sink: config.layout.name,
			filePath: config.filePath,
		});
		this.headerPending = config.header ?? false;
		this.writeQueue =
			(config.mode ?? "truncate") === "truncate"
				? this.guarded(() => writeFile(config.filePath, "", "utf-8"))
				: Promise.resolve();
	}

	/**
	 * Creates a sink writing to `config.filePath`.
	 * @example FileRecordSink.create({ filePath: "positions.txt", layout: POSITION_LAYOUT })
	 */
	static create<R>(config: FileRecordSinkConfig<R>): FileRecordSink<R> {
		return new FileRecordSink(config);
	}

	/** Queues the record. @throws Error after close() */
	append(record: R): void {
		if (this.closed) {
			throw new Error(`FileRecordSink ${this.config.filePath} is closed`);
		}
		let text = `${toCsvLine(this.config.layout, record)}\n`;
		if (this.headerPending) {
			text = `${csvHeader(this.config.layout)}\n${text}`;
			this.headerPending = false;
		}
		this.writeQueue = this.writeQueue.then(() =>
			this.guarded(() => appendFile(this.config.filePath, text, "utf-8")),
		);
	}

	async flush(): Promise<void> {
		await this.writeQueue;
		const failure = this.unreported;
		this.unreported = undefined;
		if (failure !== undefined) {
			throw failure;
		}
	}

	async close(): Promise<void> {
		this.closed = true;
		await this.flush();
	}

	/** Returns the last 10 write errors. */
	writeErrors(): readonly Error[] {
		return [...this._writeErrors];
	}

	/** Runs one write; a failure is recorded and logged so later writes still run. */
	private async guarded(write: () => Promise<void>): Promise<void> {
		try {
			await write();
		} catch (err: unknown) {
			const code = isNodeError(err) ? err.code : "UNKNOWN";
			const msg = err instanceof Error ? err.message : String(err);
			const error = new Error(
				`FileRecordSink write to ${this.config.filePath} failed: [${code}] ${msg}`,
				{ cause: err },
			);
			if (this.unreported === undefined) {
				this.unreported = error;
			}
			this._writeErrors.push(error);
			if (this._writeErrors.length > MAX_KEPT_ERRORS) {
				this._writeErrors.shift();
			}
			this.logger.error({ code, err: msg }, "record write failed");
		}
	}
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
