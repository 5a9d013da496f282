import type { ExecutionOrder } from "../execution/types.js";
import type { InstrumentLike } from "../instrument/types.js";
import { type BookId, type OrderId, type TradeId, tradeId } from "../shared/identifiers.js";
import { tradeSideFor } from "../shared/sides.js";
import { DESK_BOOKS, type Trade } from "./types.js";

/** Id under which an execution is booked and exported. */
export function executedTradeId(id: OrderId): TradeId {
	return tradeId(`TID_${id}`);
}

/**
 * Books an execution as a trade: id `TID_<orderId>`, the full visible plus
 * hidden size, BID → BUY and OFFER → SELL, at the execution price.
 */
export function tradeFromExecution<I extends InstrumentLike>(
	order: ExecutionOrder<I>,
	book: BookId,
): Trade<I> {
	return {
		instrument: order.instrument,
		tradeId: executedTradeId(order.orderId),
		price: order.price,
		book,
		quantity: order.visibleQuantity + order.hiddenQuantity,
		side: tradeSideFor(order.side),
	};
}

/** Round-robin over `books`: each call returns the next one, wrapping around. */
export function cycleBooks(books: readonly BookId[] = DESK_BOOKS): () => BookId {
	const ring = [...books];
	let next = 0;
	return () => {
		const book = ring[next];
		if (book === undefined) {
			throw new RangeError("cycleBooks needs at least one book");
		}
		next = (next + 1) % ring.length;
		return book;
	};
}
