import type { Bond, InstrumentLike } from "../instrument/types.js";
import { Decimal } from "../shared/decimal.js";
import type { PricingSide } from "../shared/sides.js";

const TWO = Decimal.from(2);

/** Mid price and bid/offer spread for an instrument. */
export interface Price<I extends InstrumentLike = Bond> {
	readonly instrument: I;
	readonly mid: Decimal;
	readonly bidOfferSpread: Decimal;
}

export function createPrice<I extends InstrumentLike>(
	instrument: I,
	mid: Decimal,
	bidOfferSpread: Decimal,
): Price<I> {
	return Object.freeze({ instrument, mid, bidOfferSpread });
}

/** mid − spread/2 */
export function bidOf(price: Price<InstrumentLike>): Decimal {
	return price.mid.sub(price.bidOfferSpread.div(TWO));
}

/** mid + spread/2 */
export function offerOf(price: Price<InstrumentLike>): Decimal {
	return price.mid.add(price.bidOfferSpread.div(TWO));
}

/** One leg of a two-sided stream. */
export interface PriceStreamOrder {
	readonly side: PricingSide;
	readonly price: Decimal;
	readonly visibleQuantity: number;
	readonly hiddenQuantity: number;
}

export interface PriceStream<I extends InstrumentLike = Bond> {
	readonly instrument: I;
	readonly bidOrder: PriceStreamOrder;
	readonly offerOrder: PriceStreamOrder;
}
