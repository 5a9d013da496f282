/**
 * Desk wiring — builds every stage once and connects them.
 *
 * Listener registration order is the cascade order: a stage's first listener
 * finishes its whole downstream cascade before the second one runs.
 */

import { cycleBooks, tradeFromExecution } from "../booking/trade-from-execution.js";
import { TradeBookingService } from "../booking/trade-booking-service.js";
import { AlgoExecutionService } from "../execution/algo-execution-service.js";
import { ExecutionService } from "../execution/execution-service.js";
import { type ExecutionOrder, Market } from "../execution/types.js";
import { type FeedParsers, feedParsers } from "../feeds/parsers.js";
import { InquiryService } from "../inquiry/inquiry-service.js";
import type { Inquiry } from "../inquiry/types.js";
import {
	type QuotePriceSource,
	createQuoteResponder,
	fixedQuotePrice,
} from "../inquiry/quote-responder.js";
import { InstrumentCatalog } from "../instrument/catalog.js";
import type { Bond } from "../instrument/types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { MarketDataService } from "../market-data/market-data-service.js";
import {
	type HistoricalDataService,
	executionHistory,
	guiQuoteHistory,
	inquiryHistory,
	positionHistory,
	riskHistory,
	streamingHistory,
} from "../persistence/historical-data-service.js";
import { MemoryRecordSink } from "../persistence/memory-record-sink.js";
import type { RecordSink } from "../persistence/record-sink.js";
import type {
	ExecutionRecord,
	GuiQuoteRecord,
	InquiryRecord,
	PositionRecord,
	RiskRecord,
	StreamRecord,
} from "../persistence/records.js";
import { connect, connectVia } from "../pipeline/bridges.js";
import type { Position } from "../position/position.js";
import { PositionService } from "../position/position-service.js";
import { AlgoStreamingService } from "../pricing/algo-streaming-service.js";
import { PricingService } from "../pricing/pricing-service.js";
import { StreamingService } from "../pricing/streaming-service.js";
import { ThrottledQuoteService } from "../pricing/throttled-quote-service.js";
import type { Price, PriceStream } from "../pricing/types.js";
import type { PV01 } from "../risk/pv01.js";
import { RiskService } from "../risk/risk-service.js";
import { type DeskConfig, type Env, resolveConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { type Clock, SystemClock } from "../shared/time.js";

/** One export sink per record stream. */
export interface DeskSinks {
	readonly positions: RecordSink<PositionRecord>;
	readonly risk: RecordSink<RiskRecord>;
	readonly streaming: RecordSink<StreamRecord>;
	readonly gui: RecordSink<GuiQuoteRecord>;
	readonly executions: RecordSink<ExecutionRecord>;
	readonly inquiries: RecordSink<InquiryRecord>;
}

export interface MemoryDeskSinks extends DeskSinks {
	readonly positions: MemoryRecordSink<PositionRecord>;
	readonly risk: MemoryRecordSink<RiskRecord>;
	readonly streaming: MemoryRecordSink<StreamRecord>;
	readonly gui: MemoryRecordSink<GuiQuoteRecord>;
	readonly executions: MemoryRecordSink<ExecutionRecord>;
	readonly inquiries: MemoryRecordSink<InquiryRecord>;
}

export function memorySinks(): MemoryDeskSinks {
	return {
		positions: new MemoryRecordSink<PositionRecord>(),
		risk: new MemoryRecordSink<RiskRecord>(),
		streaming: new MemoryRecordSink<StreamRecord>(),
		gui: new MemoryRecordSink<GuiQuoteRecord>(),
		executions: new MemoryRecordSink<ExecutionRecord>(),
		inquiries: new MemoryRecordSink<InquiryRecord>(),
	};
}

/** Optional dependency overrides for createDesk. */
export interface DeskComponents {
	config?: Partial<DeskConfig> | undefined;
	env?: Env | undefined;
	clock?: Clock | undefined;
	logger?: Logger | undefined;
	/** Sinks not given here are in-memory */
	sinks?: Partial<DeskSinks> | undefined;
	catalog?: InstrumentCatalog<Bond> | undefined;
	/** Price the quote responder gives each inquiry; defaults to `inquiryQuotePrice` */
	quotePriceSource?: QuotePriceSource<Bond> | undefined;
}

export interface Desk {
	readonly config: DeskConfig;
	readonly catalog: InstrumentCatalog<Bond>;
	readonly sinks: DeskSinks;

	readonly tradeBooking: TradeBookingService<Bond>;
	readonly position: PositionService<Bond>;
	readonly risk: RiskService<Bond>;
	readonly pricing: PricingService<Bond>;
	readonly guiQuotes: ThrottledQuoteService<Bond>;
	readonly algoStreaming: AlgoStreamingService<Bond>;
	readonly streaming: StreamingService<Bond>;
	readonly marketData: MarketDataService<Bond>;
	readonly algoExecution: AlgoExecutionService<Bond>;
	readonly execution: ExecutionService<Bond>;
	readonly inquiry: InquiryService<Bond>;

	readonly history: {
		readonly position: HistoricalDataService<Position<Bond>, PositionRecord>;
		readonly risk: HistoricalDataService<PV01<Bond>, RiskRecord>;
		readonly streaming: HistoricalDataService<PriceStream<Bond>, StreamRecord>;
		readonly gui: HistoricalDataService<Price<Bond>, GuiQuoteRecord>;
		readonly execution: HistoricalDataService<ExecutionOrder<Bond>, ExecutionRecord>;
		readonly inquiry: HistoricalDataService<Inquiry<Bond>, InquiryRecord>;
	};

	/** Feed parsers bound to this desk's catalog and sizes */
	readonly parsers: FeedParsers<Bond>;

	/** Waits for every sink; rejects with the first write failure. */
	flush(): Promise<void>;
	/** Closes every sink. */
	close(): Promise<void>;
}

/**
 * Builds the desk graph.
 * @throws ConfigError when the merged configuration is invalid
 */
export function createDesk(components: DeskComponents = {}): Desk {
	const config = resolveConfig(components.config ?? {}, components.env ?? process.env);
	const clock = components.clock ?? SystemClock;
	const logger = components.logger ?? silentLogger();
	const catalog = components.catalog ?? InstrumentCatalog.treasuries();
	const sinks: DeskSinks = { ...memorySinks(), ...components.sinks };
	const quotePrice =
		components.quotePriceSource ?? fixedQuotePrice<Bond>(Decimal.from(config.inquiryQuotePrice));

	// ── Stages ───────────────────────────────────────────────────────
	const tradeBooking = new TradeBookingService<Bond>({ logger });
	const position = new PositionService<Bond>(catalog.all(), {
		logger,
		unknownBookPolicy: config.unknownBookPolicy,
	});
	const risk = new RiskService<Bond>({ logger, pv01PerUnit: config.pv01PerUnit });
	const pricing = new PricingService<Bond>({ logger });
	const guiQuotes = new ThrottledQuoteService<Bond>({
		logger,
		clock,
		intervalMs: config.quoteThrottleMs,
	});
	const algoStreaming = new AlgoStreamingService<Bond>({
		logger,
		visibleQuantity: config.streamVisibleQuantity,
		hiddenQuantity: config.streamHiddenQuantity,
	});
	const streaming = new StreamingService<Bond>({ logger });
	const marketData = new MarketDataService<Bond>({ logger });
	const algoExecution = new AlgoExecutionService<Bond>({
		logger,
		spreadTolerance: config.executionSpreadTolerance,
		hiddenRatio: config.hiddenRatio,
		sideCounterScope: config.sideCounterScope,
	});
	const execution = new ExecutionService<Bond>({ logger, market: Market.Cme });
	const inquiry = new InquiryService<Bond>({ logger });

	const history = {
		position: positionHistory<Bond>({ sink: sinks.positions, clock, logger }),
		risk: riskHistory<Bond>({ sink: sinks.risk, clock, logger }),
		streaming: streamingHistory<Bond>({ sink: sinks.streaming, clock, logger }),
		gui: guiQuoteHistory<Bond>({ sink: sinks.gui, clock, logger }),
		execution: executionHistory<Bond>({ sink: sinks.executions, clock, logger }),
		inquiry: inquiryHistory<Bond>({ sink: sinks.inquiries, clock, logger }),
	};

	// ── Trades ───────────────────────────────────────────────────────
	connect(tradeBooking, (trade) => position.addTrade(trade));
	connect(position, (value) => history.position.persistData(value));
	connect(position, (value) => risk.addPosition(value));
	connect(risk, (value) => history.risk.persistData(value));

	// ── Prices ───────────────────────────────────────────────────────
	connect(pricing, (price) => guiQuotes.onMessage(price));
	connect(guiQuotes, (price) => history.gui.persistData(price));
	connect(pricing, (price) => algoStreaming.publishPrice(price));
	connect(algoStreaming, (stream) => streaming.publishPrice(stream));
	connect(streaming, (stream) => history.streaming.persistData(stream));

	// ── Market data → executions → trades ────────────────────────────
	const nextBook = cycleBooks();
	connect(marketData, (book) => algoExecution.execute(book));
	connect(algoExecution, (order) => execution.executeOrder(order, Market.Cme));
	connect(execution, (order) => history.execution.persistData(order));
	connectVia(
		execution,
		(order) => tradeFromExecution(order, nextBook()),
		(trade) => tradeBooking.bookTrade(trade),
	);

	// ── Inquiries ────────────────────────────────────────────────────
	connect(inquiry, (value) => history.inquiry.persistData(value));
	inquiry.registerListener(createQuoteResponder(inquiry, quotePrice));

	logger.info({ instruments: catalog.size }, "desk wired");

	const allSinks = (): RecordSink<unknown>[] => [
		sinks.positions,
		sinks.risk,
		sinks.streaming,
		sinks.gui,
		sinks.executions,
		sinks.inquiries,
	];

	return {
		config,
		catalog,
		sinks,
		tradeBooking,
		position,
		risk,
		pricing,
		guiQuotes,
		algoStreaming,
		streaming,
		marketData,
		algoExecution,
		execution,
		inquiry,
		history,
		parsers: feedParsers({
			catalog,
			orderBookSizeStep: config.orderBookSizeStep,
			inquiryQuantity: config.inquiryQuantity,
		}),
		async flush() {
			await Promise.all(allSinks().map((sink) => sink.flush()));
		},
		async close() {
			await Promise.all(allSinks().map((sink) => sink.close()));
		},
	};
}
