/**
 * Position — signed quantity per book for one instrument.
 *
 * The book set is fixed at construction and never changes.
 */

import { DESK_BOOKS } from "../booking/types.js";
import type { Bond, InstrumentLike } from "../instrument/types.js";
import { UnknownBookError } from "../shared/errors.js";
import type { BookId } from "../shared/identifiers.js";
import { type Side, sideSign } from "../shared/sides.js";

export class Position<I extends InstrumentLike = Bond> {
	readonly instrument: I;
	private readonly quantities: Map<BookId, number>;

	constructor(instrument: I, books: readonly BookId[] = DESK_BOOKS) {
		this.instrument = instrument;
		this.quantities = new Map(books.map((book) => [book, 0]));
	}

	books(): readonly BookId[] {
		return [...this.quantities.keys()];
	}

	hasBook(book: BookId): boolean {
		return this.quantities.has(book);
	}

	/** @throws UnknownBookError */
	quantity(book: BookId): number {
		const quantity = this.quantities.get(book);
		if (quantity === undefined) {
			throw new UnknownBookError(`Unknown book: ${book}`, {
				book,
				instrumentId: this.instrument.id,
			});
		}
		return quantity;
	}

	/**
	 * Adds `quantity` to the book for BUY, subtracts it for SELL.
	 * @throws UnknownBookError
	 */
	update(book: BookId, quantity: number, side: Side): void {
		const current = this.quantity(book);
		this.quantities.set(book, current + sideSign(side) * quantity);
	}

	/** Sum over all books, recomputed on every call. */
	aggregate(): number {
		let total = 0;
		for (const quantity of this.quantities.values()) {
			total += quantity;
		}
		return total;
	}

	clone(): Position<I> {
		const copy = new Position(this.instrument, this.books());
		for (const [book, quantity] of this.quantities) {
			copy.quantities.set(book, quantity);
		}
		return copy;
	}
}
