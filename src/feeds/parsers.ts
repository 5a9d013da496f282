/**
 * Comma-separated feed records → domain entities.
 *
 * Each parser returns a Result so that replay can report a bad line and keep
 * going. Field layouts are zod tuples; prices go through the fractional codec.
 */

import type { Trade } from "../booking/types.js";
import { type Inquiry, InquiryState } from "../inquiry/types.js";
import type { InstrumentCatalog } from "../instrument/catalog.js";
import type { Bond, InstrumentLike } from "../instrument/types.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import type { OrderBook, Order } from "../market-data/types.js";
import { tryDecodePrice } from "../pricing/price-codec.js";
import { type Price, createPrice } from "../pricing/types.js";
import { DEFAULT_DESK_CONFIG } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { type DeskError, MalformedInputError } from "../shared/errors.js";
import { bookId, inquiryId, tradeId } from "../shared/identifiers.js";
import { type Result, err, mapErr, ok } from "../shared/result.js";
import { PricingSide, Side } from "../shared/sides.js";

/** Number of price levels per side in an order-book record. */
export const ORDER_BOOK_DEPTH = 5;

const TWO = Decimal.from(2);
const PLAIN_DECIMAL = /^\d+(\.\d+)?$/;

/** What the parsers need beyond the line itself. */
export interface FeedContext<I extends InstrumentLike = Bond> {
	readonly catalog: InstrumentCatalog<I>;
	/** Level i of an order book is sized `orderBookSizeStep × (i + 1)` */
	readonly orderBookSizeStep?: number;
	/** Quantity given to every parsed inquiry */
	readonly inquiryQuantity?: number;
}

export type FeedParser<T> = (line: string) => Result<T, DeskError>;

// ── Field schemas ────────────────────────────────────────────────────

const field = z.string().trim().min(1, "must not be empty");

const fractionalPrice = field.transform((text, ctx) => {
	const decoded = tryDecodePrice(text);
	if (!decoded.ok) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: decoded.error.message });
		return z.NEVER;
	}
	return decoded.value;
});

/** Trade feeds carry either fractional notation or a plain decimal. */
const tradePrice = field.transform((text, ctx) => {
	if (PLAIN_DECIMAL.test(text)) {
		return Decimal.from(text);
	}
	const decoded = tryDecodePrice(text);
	if (!decoded.ok) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `Malformed price: "${text}" is neither fractional nor decimal`,
		});
		return z.NEVER;
	}
	return decoded.value;
});

const quantity = field
	.regex(/^\d+$/, "must be a whole number")
	.transform(Number)
	.refine((n) => Number.isSafeInteger(n) && n > 0, "must be a positive integer");

const side = field.pipe(z.enum([Side.Buy, Side.Sell]));

const TradeFields = z.tuple([field, field, field, quantity, tradePrice, side]);
const QuoteFields = z.tuple([field, fractionalPrice, fractionalPrice]);
const OrderBookFields = z.tuple([field]).rest(fractionalPrice);
const InquiryFields = z.union([
	z.tuple([field, field, side]),
	z.tuple([field, field, side, z.string()]),
]);

// ── Helpers ──────────────────────────────────────────────────────────

function splitLine(line: string): string[] {
	return line.split(",");
}

function parseFields<T>(
	kind: string,
	line: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Result<T, MalformedInputError> {
	return mapErr(validate(schema, splitLine(line)), (cause) => malformed(kind, line, cause));
}

function malformed(kind: string, line: string, cause: ValidationError): MalformedInputError {
	return new MalformedInputError(`Malformed ${kind} record: ${cause.summary()}`, {
		line,
		issues: cause.issues,
		cause,
	});
}

// ── Parsers ──────────────────────────────────────────────────────────

/** `instrumentId,tradeId,book,quantity,price,side` */
export function parseTradeRecord<I extends InstrumentLike>(
	line: string,
	context: FeedContext<I>,
): Result<Trade<I>, DeskError> {
	const fields = parseFields("trade", line, TradeFields);
	if (!fields.ok) return fields;
	const [id, trade, book, qty, price, tradeSide] = fields.value;
	const instrument = context.catalog.resolve(id);
	if (!instrument.ok) return instrument;
	return ok({
		instrument: instrument.value,
		tradeId: tradeId(trade),
		book: bookId(book),
		quantity: qty,
		price,
		side: tradeSide,
	});
}

/** `instrumentId,bid,ask`, both fractional. Mid is the average, spread is ask − bid. */
export function parseQuoteRecord<I extends InstrumentLike>(
	line: string,
	context: FeedContext<I>,
): Result<Price<I>, DeskError> {
	const fields = parseFields("quote", line, QuoteFields);
	if (!fields.ok) return fields;
	const [id, bid, ask] = fields.value;
	const instrument = context.catalog.resolve(id);
	if (!instrument.ok) return instrument;
	return ok(createPrice(instrument.value, bid.add(ask).div(TWO), ask.sub(bid)));
}

/** `instrumentId` then five `bid,ask` pairs, best level first. */
export function parseOrderBookRecord<I extends InstrumentLike>(
	line: string,
	context: FeedContext<I>,
): Result<OrderBook<I>, DeskError> {
	const step = context.orderBookSizeStep ?? DEFAULT_DESK_CONFIG.orderBookSizeStep;
	const fields = parseFields("order book", line, OrderBookFields);
	if (!fields.ok) return fields;
	const [id, ...prices] = fields.value;
	if (prices.length !== ORDER_BOOK_DEPTH * 2) {
		return err(
			new MalformedInputError(
				`Malformed order book record: expected ${ORDER_BOOK_DEPTH * 2} prices, got ${prices.length}`,
				{ line },
			),
		);
	}
	const instrument = context.catalog.resolve(id);
	if (!instrument.ok) return instrument;

	const bidStack: Order[] = [];
	const offerStack: Order[] = [];
	prices.forEach((price, index) => {
		const size = step * (Math.floor(index / 2) + 1);
		if (index % 2 === 0) {
			bidStack.push({ price, quantity: size, side: PricingSide.Bid });
		} else {
			offerStack.push({ price, quantity: size, side: PricingSide.Offer });
		}
	});
	return ok({ instrument: instrument.value, bidStack, offerStack });
}

/** `inquiryId,instrumentId,side[,state]`. The state column is ignored; every inquiry starts RECEIVED. */
export function parseInquiryRecord<I extends InstrumentLike>(
	line: string,
	context: FeedContext<I>,
): Result<Inquiry<I>, DeskError> {
	const qty = context.inquiryQuantity ?? DEFAULT_DESK_CONFIG.inquiryQuantity;
	const fields = parseFields("inquiry", line, InquiryFields);
	if (!fields.ok) return fields;
	const [id, instrumentText, inquirySide] = fields.value;
	const instrument = context.catalog.resolve(instrumentText);
	if (!instrument.ok) return instrument;
	return ok({
		inquiryId: inquiryId(id),
		instrument: instrument.value,
		side: inquirySide,
		quantity: qty,
		price: null,
		state: InquiryState.Received,
	});
}

// ── Binding ──────────────────────────────────────────────────────────

export interface FeedParsers<I extends InstrumentLike = Bond> {
	readonly trade: FeedParser<Trade<I>>;
	readonly quote: FeedParser<Price<I>>;
	readonly orderBook: FeedParser<OrderBook<I>>;
	readonly inquiry: FeedParser<Inquiry<I>>;
}

/** The four parsers bound to one context, ready for `replayFeed`. */
export function feedParsers<I extends InstrumentLike>(context: FeedContext<I>): FeedParsers<I> {
	return {
		trade: (line) => parseTradeRecord(line, context),
		quote: (line) => parseQuoteRecord(line, context),
		orderBook: (line) => parseOrderBookRecord(line, context),
		inquiry: (line) => parseInquiryRecord(line, context),
	};
}
