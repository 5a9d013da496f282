import type { Bond, InstrumentLike } from "../instrument/types.js";
import type { Decimal } from "../shared/decimal.js";
import { type BookId, bookId } from "../shared/identifiers.js";
import type { TradeId } from "../shared/identifiers.js";
import type { Side } from "../shared/sides.js";

/** The fixed trading books every position carries. */
export const DESK_BOOKS: readonly BookId[] = Object.freeze([
	bookId("TRSY1"),
	bookId("TRSY2"),
	bookId("TRSY3"),
]);

export interface Trade<I extends InstrumentLike = Bond> {
	readonly instrument: I;
	readonly tradeId: TradeId;
	readonly price: Decimal;
	readonly book: BookId;
	/** Always positive; direction comes from `side` */
	readonly quantity: number;
	readonly side: Side;
}
