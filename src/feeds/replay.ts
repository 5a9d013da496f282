/**
 * Feed replay — drives a stage from a line-oriented feed.
 *
 * Bad lines are logged with their line number and skipped. Errors thrown by
 * `ingest` are not caught: they come from inside a cascade and reach the caller.
 */

import { readFile } from "node:fs/promises";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { FeedParser } from "./parsers.js";

export interface FeedReport {
	readonly accepted: number;
	readonly skipped: number;
}

export interface ReplayOptions {
	readonly logger?: Logger;
	/** Name bound to the log lines, e.g. the feed file */
	readonly feed?: string;
}

export function replayFeed<T>(
	lines: Iterable<string>,
	parse: FeedParser<T>,
	ingest: (value: T) => void,
	options: ReplayOptions = {},
): FeedReport {
	const logger = (options.logger ?? silentLogger()).child({ feed: options.feed ?? "feed" });
	let accepted = 0;
	let skipped = 0;
	let lineNumber = 0;

	for (const line of lines) {
		lineNumber++;
		if (line.trim().length === 0) continue;

		const parsed = parse(line);
		if (!parsed.ok) {
			skipped++;
			logger.warn(
				{ lineNumber, code: parsed.error.code, error: parsed.error.message },
				"feed record skipped",
			);
			continue;
		}
		ingest(parsed.value);
		accepted++;
	}

	logger.info({ accepted, skipped }, "feed replay complete");
	return { accepted, skipped };
}

/** Reads a text feed and splits it into lines. */
export async function readFeedLines(filePath: string): Promise<string[]> {
	const content = await readFile(filePath, "utf-8");
	return content.split(/\r?\n/);
}
