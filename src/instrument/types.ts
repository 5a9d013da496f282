import type { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";

/**
 * What a stage needs to know about an instrument: its key.
 * Stages are generic over this, so any product carrying an id flows through.
 */
export interface InstrumentLike {
	readonly id: InstrumentId;
}

export const InstrumentIdType = {
	Cusip: "CUSIP",
	Isin: "ISIN",
} as const;

export type InstrumentIdType = (typeof InstrumentIdType)[keyof typeof InstrumentIdType];

/** Treasury bond. Maturity is an ISO calendar date (YYYY-MM-DD). */
export interface Bond extends InstrumentLike {
	readonly kind: "bond";
	readonly idType: InstrumentIdType;
	readonly ticker: string;
	readonly coupon: Decimal;
	readonly maturity: string;
}
