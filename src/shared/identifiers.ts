/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, so an inquiry id can
 * never be passed where an instrument id is expected.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Ticker-like identifier of a catalog instrument (e.g. "B10y"). */
export type InstrumentId = Brand<string, "InstrumentId">;
/** Identifier of a booked trade. */
export type TradeId = Brand<string, "TradeId">;
/** Trading book a trade is booked into. */
export type BookId = Brand<string, "BookId">;
/** Identifier of an execution order. */
export type OrderId = Brand<string, "OrderId">;
/** Identifier of a client inquiry. */
export type InquiryId = Brand<string, "InquiryId">;

export type AnyId = InstrumentId | TradeId | BookId | OrderId | InquiryId;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated InstrumentId. Throws if empty. */
export function instrumentId(value: string): InstrumentId {
	return createBrandedId(value, "InstrumentId");
}

/** Create a validated TradeId. Throws if empty. */
export function tradeId(value: string): TradeId {
	return createBrandedId(value, "TradeId");
}

/** Create a validated BookId. Throws if empty. */
export function bookId(value: string): BookId {
	return createBrandedId(value, "BookId");
}

/** Create a validated OrderId. Throws if empty. */
export function orderId(value: string): OrderId {
	return createBrandedId(value, "OrderId");
}

/** Create a validated InquiryId. Throws if empty. */
export function inquiryId(value: string): InquiryId {
	return createBrandedId(value, "InquiryId");
}

/** Extract the raw string from any branded identifier. */
export function idToString(id: AnyId): string {
	return id;
}
