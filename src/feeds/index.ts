export {
	type FeedContext,
	type FeedParser,
	type FeedParsers,
	ORDER_BOOK_DEPTH,
	parseTradeRecord,
	parseQuoteRecord,
	parseOrderBookRecord,
	parseInquiryRecord,
	feedParsers,
} from "./parsers.js";
export { type FeedReport, type ReplayOptions, replayFeed, readFeedLines } from "./replay.js";
