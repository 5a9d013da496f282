/**
 * Trade and pricing sides.
 *
 * `Side` is the direction of a trade or inquiry; `PricingSide` is the side of
 * a quote or order-book level. Values are the upper-case names written to
 * export records.
 */

/** Direction of a trade or client inquiry. */
export const Side = {
	Buy: "BUY",
	Sell: "SELL",
} as const;

export type Side = (typeof Side)[keyof typeof Side];

/** Side of a two-sided quote or an order-book level. */
export const PricingSide = {
	Bid: "BID",
	Offer: "OFFER",
} as const;

export type PricingSide = (typeof PricingSide)[keyof typeof PricingSide];

/** Return the opposite trade side. */
export function oppositeSide(side: Side): Side {
	return side === Side.Buy ? Side.Sell : Side.Buy;
}

/** Signed multiplier for a quantity moving in the given direction. */
export function sideSign(side: Side): 1 | -1 {
	return side === Side.Buy ? 1 : -1;
}

/** Trade direction that results from aggressing on a pricing side. */
export function tradeSideFor(pricingSide: PricingSide): Side {
	return pricingSide === PricingSide.Bid ? Side.Buy : Side.Sell;
}

export function isSide(value: string): value is Side {
	return value === Side.Buy || value === Side.Sell;
}

export function isPricingSide(value: string): value is PricingSide {
	return value === PricingSide.Bid || value === PricingSide.Offer;
}
