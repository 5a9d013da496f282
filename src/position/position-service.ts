import type { Trade } from "../booking/types.js";
import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import { UnknownBookPolicy } from "../shared/config.js";
import { UnknownBookError, UnknownInstrumentError } from "../shared/errors.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { Position } from "./position.js";

export interface PositionServiceOptions extends ServiceOptions {
	readonly unknownBookPolicy?: UnknownBookPolicy;
}

/**
 * Aggregates trades into one position per catalog instrument.
 *
 * Positions exist from construction, so `lookup` answers for every catalog
 * instrument even before its first trade.
 */
export class PositionService<I extends InstrumentLike = Bond> extends KeyedService<
	InstrumentId,
	Position<I>,
	Trade<I>
> {
	private readonly unknownBookPolicy: UnknownBookPolicy;

	constructor(instruments: Iterable<I>, options: PositionServiceOptions = {}) {
		super("position", options);
		this.unknownBookPolicy = options.unknownBookPolicy ?? UnknownBookPolicy.Drop;
		for (const instrument of instruments) {
			this.store.set(instrument.id, new Position(instrument));
		}
	}

	onMessage(trade: Trade<I>): void {
		this.addTrade(trade);
	}

	/**
	 * Applies the trade to its book and notifies with a copy of the position.
	 * @throws UnknownInstrumentError when the instrument has no position
	 * @throws UnknownBookError when the book is unknown and the policy is `throw`
	 */
	addTrade(trade: Trade<I>): void {
		const position = this.store.get(trade.instrument.id);
		if (position === undefined) {
			throw new UnknownInstrumentError(`No position for instrument ${trade.instrument.id}`, {
				instrumentId: trade.instrument.id,
				tradeId: trade.tradeId,
			});
		}

		if (!position.hasBook(trade.book)) {
			if (this.unknownBookPolicy === UnknownBookPolicy.Throw) {
				throw new UnknownBookError(`Unknown book: ${trade.book}`, {
					book: trade.book,
					tradeId: trade.tradeId,
				});
			}
			this.logger.warn(
				{ book: trade.book, tradeId: trade.tradeId, instrumentId: trade.instrument.id },
				"trade dropped: unknown book",
			);
			return;
		}

		position.update(trade.book, trade.quantity, trade.side);
		this.notify(position.clone());
	}

	/** Copy of the current position; the stored one is never handed out. */
	override lookup(key: InstrumentId): Position<I> {
		return super.lookup(key).clone();
	}

	/** Sum of the position over its books. */
	aggregate(position: Position<I>): number {
		return position.aggregate();
	}
}
