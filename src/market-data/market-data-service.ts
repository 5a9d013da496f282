import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import { MalformedInputError } from "../shared/errors.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { BidOffer, Order, OrderBook } from "./types.js";

/** Best bid and best offer of a book. */
export function topOfBook(book: OrderBook<InstrumentLike>): BidOffer {
	const bid = book.bidStack[0];
	const offer = book.offerStack[0];
	if (bid === undefined || offer === undefined) {
		throw new MalformedInputError(`Order book for ${book.instrument.id} has an empty side`, {
			instrumentId: book.instrument.id,
			bidLevels: book.bidStack.length,
			offerLevels: book.offerStack.length,
		});
	}
	return { bid, offer };
}

/** Merge levels that share a price, keeping first-seen order. */
function mergeLevels(levels: readonly Order[]): Order[] {
	const merged: Order[] = [];
	for (const level of levels) {
		const index = merged.findIndex((m) => m.price.eq(level.price));
		const existing = merged[index];
		if (existing === undefined) {
			merged.push(level);
		} else {
			merged[index] = { ...existing, quantity: existing.quantity + level.quantity };
		}
	}
	return merged;
}

/** Latest order book per instrument. */
export class MarketDataService<I extends InstrumentLike = Bond> extends KeyedService<
	InstrumentId,
	OrderBook<I>
> {
	constructor(options: ServiceOptions = {}) {
		super("market-data", options);
	}

	onMessage(book: OrderBook<I>): void {
		this.store.set(book.instrument.id, book);
		this.notify(book);
	}

	/**
	 * @throws NotFoundError when no book has arrived for the instrument
	 * @throws MalformedInputError when either side is empty
	 */
	bestBidOffer(id: InstrumentId): BidOffer {
		return topOfBook(this.lookup(id));
	}

	/** The stored book with same-price levels combined on each side. */
	aggregateDepth(id: InstrumentId): OrderBook<I> {
		const book = this.lookup(id);
		return {
			instrument: book.instrument,
			bidStack: mergeLevels(book.bidStack),
			offerStack: mergeLevels(book.offerStack),
		};
	}
}
