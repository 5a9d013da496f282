// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type InstrumentId,
	type TradeId,
	type BookId,
	type OrderId,
	type InquiryId,
	instrumentId,
	tradeId,
	bookId,
	orderId,
	inquiryId,
	idToString,
	type Result,
	ok,
	err,
	mapErr,
	unwrap,
	Decimal,
	Side,
	PricingSide,
	oppositeSide,
	tradeSideFor,
	type Clock,
	SystemClock,
	FakeClock,
	type DeskConfig,
	DEFAULT_DESK_CONFIG,
	UnknownBookPolicy,
	SideCounterScope,
	configFromEnv,
	resolveConfig,
	ErrorCategory,
	DeskError,
	NotFoundError,
	UnknownInstrumentError,
	UnknownBookError,
	MalformedInputError,
	UnsupportedOperationError,
	InvalidTransitionError,
	ConfigError,
	toDeskError,
	isNotFoundError,
	isUnknownInstrumentError,
	isUnknownBookError,
	isMalformedInputError,
	isUnsupportedOperationError,
	isInvalidTransitionError,
	isConfigError,
} from "./shared/index.js";

// ── Libraries ────────────────────────────────────────────────────────
export { createLogger, silentLogger, type Logger, type LogLevel } from "./lib/logger/index.js";
export { validate, ValidationError, type ValidationIssue } from "./lib/validation/index.js";

// ── Pipeline ─────────────────────────────────────────────────────────
export {
	type ServiceListener,
	type ListenerHost,
	onAdd,
	KeyedService,
	type ServiceOptions,
	connect,
	connectVia,
} from "./pipeline/index.js";

// ── Instruments ──────────────────────────────────────────────────────
export {
	type InstrumentLike,
	type Bond,
	InstrumentIdType,
	InstrumentCatalog,
	bond,
	treasuryBonds,
} from "./instrument/index.js";

// ── Stages ───────────────────────────────────────────────────────────
export {
	DESK_BOOKS,
	type Trade,
	TradeBookingService,
	tradeFromExecution,
	cycleBooks,
} from "./booking/index.js";
export { Position, PositionService, type PositionServiceOptions } from "./position/index.js";
export { PV01, BucketedSector, RiskService, type RiskServiceOptions } from "./risk/index.js";
export {
	PRICE_TICK,
	HALF_TICK,
	isFractionalPrice,
	tryDecodePrice,
	decodePrice,
	encodePrice,
	type Price,
	type PriceStream,
	type PriceStreamOrder,
	createPrice,
	bidOf,
	offerOf,
	QuoteThrottle,
	PricingService,
	ThrottledQuoteService,
	AlgoStreamingService,
	StreamingService,
} from "./pricing/index.js";
export {
	type Order,
	type OrderBook,
	type BidOffer,
	MarketDataService,
	topOfBook,
} from "./market-data/index.js";
export {
	OrderType,
	Market,
	type ExecutionOrder,
	AlgoExecutionService,
	ExecutionService,
} from "./execution/index.js";
export {
	InquiryState,
	type Inquiry,
	checkTransition,
	InquiryService,
	type QuotePriceSource,
	fixedQuotePrice,
	createQuoteResponder,
} from "./inquiry/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type RecordSink,
	MemoryRecordSink,
	FileRecordSink,
	HistoricalDataService,
	POSITION_LAYOUT,
	RISK_LAYOUT,
	STREAM_LAYOUT,
	GUI_QUOTE_LAYOUT,
	EXECUTION_LAYOUT,
	INQUIRY_LAYOUT,
	toCsvLine,
	csvHeader,
} from "./persistence/index.js";

// ── Feeds ────────────────────────────────────────────────────────────
export {
	type FeedParser,
	type FeedParsers,
	type FeedReport,
	parseTradeRecord,
	parseQuoteRecord,
	parseOrderBookRecord,
	parseInquiryRecord,
	feedParsers,
	replayFeed,
	readFeedLines,
} from "./feeds/index.js";

// ── Desk ─────────────────────────────────────────────────────────────
export { type Desk, type DeskComponents, type DeskSinks, createDesk, memorySinks } from "./desk/index.js";
