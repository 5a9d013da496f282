/**
 * Export record shapes and their column order.
 *
 * Column order is the on-disk field order. Prices are plain decimal strings;
 * a missing inquiry price is an empty cell.
 */

import { executedTradeId } from "../booking/trade-from-execution.js";
import { DESK_BOOKS } from "../booking/types.js";
import type { ExecutionOrder } from "../execution/types.js";
import type { Inquiry } from "../inquiry/types.js";
import type { InstrumentLike } from "../instrument/types.js";
import type { Position } from "../position/position.js";
import type { PriceStream, Price } from "../pricing/types.js";
import type { PV01 } from "../risk/pv01.js";
import { tradeSideFor } from "../shared/sides.js";

export interface RecordLayout<R> {
	readonly name: string;
	readonly columns: readonly (keyof R & string)[];
}

// ── Record shapes ────────────────────────────────────────────────────

export interface PositionRecord {
	readonly timestamp: number;
	readonly instrumentId: string;
	readonly trsy1: number;
	readonly trsy2: number;
	readonly trsy3: number;
	readonly aggregate: number;
}

export interface RiskRecord {
	readonly timestamp: number;
	readonly instrumentId: string;
	readonly totalRisk: string;
}

export interface StreamRecord {
	readonly timestamp: number;
	readonly instrumentId: string;
	readonly bidPrice: string;
	readonly offerPrice: string;
}

export interface GuiQuoteRecord {
	readonly timestamp: number;
	readonly instrumentId: string;
	readonly mid: string;
	readonly spread: string;
}

export interface ExecutionRecord {
	readonly timestamp: number;
	readonly instrumentId: string;
	readonly orderId: string;
	readonly orderType: string;
	readonly side: string;
	readonly price: string;
	readonly visibleQuantity: number;
	readonly hiddenQuantity: number;
}

export interface InquiryRecord {
	readonly timestamp: number;
	readonly inquiryId: string;
	readonly instrumentId: string;
	readonly side: string;
	readonly price: string | null;
	readonly state: string;
}

// ── Layouts ──────────────────────────────────────────────────────────

export const POSITION_LAYOUT: RecordLayout<PositionRecord> = {
	name: "positions",
	columns: ["timestamp", "instrumentId", "trsy1", "trsy2", "trsy3", "aggregate"],
};

export const RISK_LAYOUT: RecordLayout<RiskRecord> = {
	name: "risk",
	columns: ["timestamp", "instrumentId", "totalRisk"],
};

export const STREAM_LAYOUT: RecordLayout<StreamRecord> = {
	name: "streaming",
	columns: ["timestamp", "instrumentId", "bidPrice", "offerPrice"],
};

export const GUI_QUOTE_LAYOUT: RecordLayout<GuiQuoteRecord> = {
	name: "gui",
	columns: ["timestamp", "instrumentId", "mid", "spread"],
};

export const EXECUTION_LAYOUT: RecordLayout<ExecutionRecord> = {
	name: "executions",
	columns: [
		"timestamp",
		"instrumentId",
		"orderId",
		"orderType",
		"side",
		"price",
		"visibleQuantity",
		"hiddenQuantity",
	],
};

export const INQUIRY_LAYOUT: RecordLayout<InquiryRecord> = {
	name: "allinquiries",
	columns: ["timestamp", "inquiryId", "instrumentId", "side", "price", "state"],
};

// ── Mappers ──────────────────────────────────────────────────────────

export function positionRecord(position: Position<InstrumentLike>, timestamp: number): PositionRecord {
	const [trsy1, trsy2, trsy3] = DESK_BOOKS.map((book) =>
		position.hasBook(book) ? position.quantity(book) : 0,
	);
	return {
		timestamp,
		instrumentId: position.instrument.id,
		trsy1: trsy1 ?? 0,
		trsy2: trsy2 ?? 0,
		trsy3: trsy3 ?? 0,
		aggregate: position.aggregate(),
	};
}

export function riskRecord(risk: PV01<InstrumentLike>, timestamp: number): RiskRecord {
	return {
		timestamp,
		instrumentId: risk.product.id,
		totalRisk: risk.total().toString(),
	};
}

export function streamRecord(stream: PriceStream<InstrumentLike>, timestamp: number): StreamRecord {
	return {
		timestamp,
		instrumentId: stream.instrument.id,
		bidPrice: stream.bidOrder.price.toString(),
		offerPrice: stream.offerOrder.price.toString(),
	};
}

export function guiQuoteRecord(price: Price<InstrumentLike>, timestamp: number): GuiQuoteRecord {
	return {
		timestamp,
		instrumentId: price.instrument.id,
		mid: price.mid.toString(),
		spread: price.bidOfferSpread.toString(),
	};
}

export function executionRecord(
	order: ExecutionOrder<InstrumentLike>,
	timestamp: number,
): ExecutionRecord {
	return {
		timestamp,
		instrumentId: order.instrument.id,
		orderId: executedTradeId(order.orderId),
		orderType: order.orderType,
		side: tradeSideFor(order.side),
		price: order.price.toString(),
		visibleQuantity: order.visibleQuantity,
		hiddenQuantity: order.hiddenQuantity,
	};
}

export function inquiryRecord(inquiry: Inquiry<InstrumentLike>, timestamp: number): InquiryRecord {
	return {
		timestamp,
		inquiryId: inquiry.inquiryId,
		instrumentId: inquiry.instrument.id,
		side: inquiry.side,
		price: inquiry.price?.toString() ?? null,
		state: inquiry.state,
	};
}

// ── Encoding ─────────────────────────────────────────────────────────

function cell(value: unknown): string {
	if (value === null || value === undefined) return "";
	return String(value);
}

/** Comma-separated fields in layout order, no trailing newline. */
export function toCsvLine<R>(layout: RecordLayout<R>, record: R): string {
	return layout.columns.map((column) => cell(record[column])).join(",");
}

export function csvHeader<R>(layout: RecordLayout<R>): string {
	return layout.columns.join(",");
}
