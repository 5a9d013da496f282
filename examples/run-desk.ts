/**
 * Run Desk — replays the four input feeds through a fully wired desk and
 * writes the export records as comma-separated text files.
 *
 * Feed files are read from the data directory when they exist:
 * trades.txt, prices.txt, marketdata.txt, inquiries.txt.
 *
 * Run: npx tsx examples/run-desk.ts [dataDir] [outDir]
 */

import { access, mkdir } from "node:fs/promises";
import { join } from "node:path";
import {
	EXECUTION_LAYOUT,
	FileRecordSink,
	GUI_QUOTE_LAYOUT,
	INQUIRY_LAYOUT,
	POSITION_LAYOUT,
	RISK_LAYOUT,
	STREAM_LAYOUT,
	createDesk,
	createLogger,
	readFeedLines,
	replayFeed,
} from "../src/index.js";

const dataDir = process.argv[2] ?? "data";
const outDir = process.argv[3] ?? "output";
await mkdir(outDir, { recursive: true });

const logger = createLogger({ level: "info" });
const desk = createDesk({
	logger,
	sinks: {
		positions: FileRecordSink.create({
			filePath: join(outDir, "positions.txt"),
			layout: POSITION_LAYOUT,
			logger,
		}),
		risk: FileRecordSink.create({
			filePath: join(outDir, "risk.txt"),
			layout: RISK_LAYOUT,
			logger,
		}),
		streaming: FileRecordSink.create({
			filePath: join(outDir, "streaming.txt"),
			layout: STREAM_LAYOUT,
			logger,
		}),
		gui: FileRecordSink.create({
			filePath: join(outDir, "gui.txt"),
			layout: GUI_QUOTE_LAYOUT,
			logger,
		}),
		executions: FileRecordSink.create({
			filePath: join(outDir, "executions.txt"),
			layout: EXECUTION_LAYOUT,
			logger,
		}),
		inquiries: FileRecordSink.create({
			filePath: join(outDir, "allinquiries.txt"),
			layout: INQUIRY_LAYOUT,
			logger,
		}),
	},
});

async function feedLines(name: string): Promise<string[]> {
	const filePath = join(dataDir, name);
	try {
		await access(filePath);
	} catch {
		logger.warn({ filePath }, "feed file missing, skipping");
		return [];
	}
	return readFeedLines(filePath);
}

replayFeed(
	await feedLines("trades.txt"),
	desk.parsers.trade,
	(t) => desk.tradeBooking.bookTrade(t),
	{ logger, feed: "trades.txt" },
);
replayFeed(
	await feedLines("prices.txt"),
	desk.parsers.quote,
	(p) => desk.pricing.onMessage(p),
	{ logger, feed: "prices.txt" },
);
replayFeed(
	await feedLines("marketdata.txt"),
	desk.parsers.orderBook,
	(b) => desk.marketData.onMessage(b),
	{ logger, feed: "marketdata.txt" },
);
replayFeed(
	await feedLines("inquiries.txt"),
	desk.parsers.inquiry,
	(i) => desk.inquiry.onMessage(i),
	{ logger, feed: "inquiries.txt" },
);

await desk.close();
console.log(`Records written to ${outDir}`);
