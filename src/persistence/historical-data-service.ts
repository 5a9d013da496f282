import type { ExecutionOrder } from "../execution/types.js";
import type { Inquiry } from "../inquiry/types.js";
import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import type { Position } from "../position/position.js";
import type { Price, PriceStream } from "../pricing/types.js";
import type { PV01 } from "../risk/pv01.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { RecordSink } from "./record-sink.js";
import {
	type ExecutionRecord,
	type GuiQuoteRecord,
	type InquiryRecord,
	type PositionRecord,
	type RiskRecord,
	type StreamRecord,
	executionRecord,
	guiQuoteRecord,
	inquiryRecord,
	positionRecord,
	riskRecord,
	streamRecord,
} from "./records.js";

export interface HistoricalDataServiceOptions<V, R> extends ServiceOptions {
	readonly name: string;
	readonly sink: RecordSink<R>;
	readonly keyOf: (value: V) => string;
	readonly toRecord: (value: V, timestamp: number) => R;
	readonly clock?: Clock;
}

/**
 * Keeps the latest value per key and appends a timestamped export record for
 * every value it receives.
 */
export class HistoricalDataService<V, R> extends KeyedService<string, V> {
	private readonly sink: RecordSink<R>;
	private readonly keyOf: (value: V) => string;
	private readonly toRecord: (value: V, timestamp: number) => R;
	private readonly clock: Clock;

	constructor(options: HistoricalDataServiceOptions<V, R>) {
		super(options.name, options);
		this.sink = options.sink;
		this.keyOf = options.keyOf;
		this.toRecord = options.toRecord;
		this.clock = options.clock ?? SystemClock;
	}

	onMessage(value: V): void {
		this.persistData(value);
	}

	persistData(value: V): void {
		this.store.set(this.keyOf(value), value);
		this.sink.append(this.toRecord(value, this.clock.now()));
		this.notify(value);
	}
}

// ── Per-stream histories ─────────────────────────────────────────────

type HistoryOptions<R> = ServiceOptions & {
	readonly sink: RecordSink<R>;
	readonly clock?: Clock;
};

export function positionHistory<I extends InstrumentLike = Bond>(
	options: HistoryOptions<PositionRecord>,
): HistoricalDataService<Position<I>, PositionRecord> {
	return new HistoricalDataService<Position<I>, PositionRecord>({
		...options,
		name: "position-history",
		keyOf: (position: Position<I>) => position.instrument.id,
		toRecord: positionRecord,
	});
}

export function riskHistory<I extends InstrumentLike = Bond>(
	options: HistoryOptions<RiskRecord>,
): HistoricalDataService<PV01<I>, RiskRecord> {
	return new HistoricalDataService<PV01<I>, RiskRecord>({
		...options,
		name: "risk-history",
		keyOf: (risk: PV01<I>) => risk.product.id,
		toRecord: riskRecord,
	});
}

export function streamingHistory<I extends InstrumentLike = Bond>(
	options: HistoryOptions<StreamRecord>,
): HistoricalDataService<PriceStream<I>, StreamRecord> {
	return new HistoricalDataService<PriceStream<I>, StreamRecord>({
		...options,
		name: "streaming-history",
		keyOf: (stream: PriceStream<I>) => stream.instrument.id,
		toRecord: streamRecord,
	});
}

export function guiQuoteHistory<I extends InstrumentLike = Bond>(
	options: HistoryOptions<GuiQuoteRecord>,
): HistoricalDataService<Price<I>, GuiQuoteRecord> {
	return new HistoricalDataService<Price<I>, GuiQuoteRecord>({
		...options,
		name: "gui-history",
		keyOf: (price: Price<I>) => price.instrument.id,
		toRecord: guiQuoteRecord,
	});
}

export function executionHistory<I extends InstrumentLike = Bond>(
	options: HistoryOptions<ExecutionRecord>,
): HistoricalDataService<ExecutionOrder<I>, ExecutionRecord> {
	return new HistoricalDataService<ExecutionOrder<I>, ExecutionRecord>({
		...options,
		name: "execution-history",
		keyOf: (order: ExecutionOrder<I>) => order.orderId,
		toRecord: executionRecord,
	});
}

export function inquiryHistory<I extends InstrumentLike = Bond>(
	options: HistoryOptions<InquiryRecord>,
): HistoricalDataService<Inquiry<I>, InquiryRecord> {
	return new HistoricalDataService<Inquiry<I>, InquiryRecord>({
		...options,
		name: "inquiry-history",
		keyOf: (inquiry: Inquiry<I>) => inquiry.inquiryId,
		toRecord: inquiryRecord,
	});
}
