import type { Bond, InstrumentLike } from "../instrument/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { PricingSide } from "../shared/sides.js";

/** One price level of an order book. */
export interface Order {
	readonly price: Decimal;
	readonly quantity: number;
	readonly side: PricingSide;
}

/** Bid and offer stacks, best level first. */
export interface OrderBook<I extends InstrumentLike = Bond> {
	readonly instrument: I;
	readonly bidStack: readonly Order[];
	readonly offerStack: readonly Order[];
}

export interface BidOffer {
	readonly bid: Order;
	readonly offer: Order;
}
