/**
 * AlgoExecutionService — crosses the spread when it is tight enough.
 *
 * Successive executions alternate sides: the counter increments before use,
 * an odd count aggresses the offer and an even count the bid. Aggressing the
 * offer trades at the best offer for the best bid's size, and the reverse for
 * the bid.
 */

import type { Bond, InstrumentLike } from "../instrument/types.js";
import { topOfBook } from "../market-data/market-data-service.js";
import type { OrderBook } from "../market-data/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import { SideCounterScope } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { type InstrumentId, orderId } from "../shared/identifiers.js";
import { PricingSide } from "../shared/sides.js";
import { type ExecutionOrder, OrderType } from "./types.js";

export interface AlgoExecutionServiceOptions extends ServiceOptions {
	/** Widest spread that still executes, as a decimal string */
	readonly spreadTolerance?: string;
	/** Share of the matched quantity placed hidden, as a decimal string */
	readonly hiddenRatio?: string;
	readonly sideCounterScope?: SideCounterScope;
}

export class AlgoExecutionService<I extends InstrumentLike = Bond> extends KeyedService<
	InstrumentId,
	ExecutionOrder<I>,
	OrderBook<I>
> {
	private readonly spreadTolerance: Decimal;
	private readonly hiddenRatio: Decimal;
	private readonly sideCounterScope: SideCounterScope;
	private stageCount = 0;
	private readonly instrumentCounts = new Map<InstrumentId, number>();

	constructor(options: AlgoExecutionServiceOptions = {}) {
		super("algo-execution", options);
		this.spreadTolerance = Decimal.from(options.spreadTolerance ?? "0.015625");
		this.hiddenRatio = Decimal.from(options.hiddenRatio ?? "0.9");
		this.sideCounterScope = options.sideCounterScope ?? SideCounterScope.Stage;
	}

	onMessage(book: OrderBook<I>): void {
		this.execute(book);
	}

	/**
	 * Emits at most one MARKET order for the book.
	 * @throws MalformedInputError when either side of the book is empty
	 */
	execute(book: OrderBook<I>): void {
		const { bid, offer } = topOfBook(book);
		const spread = offer.price.sub(bid.price);
		if (spread.gt(this.spreadTolerance)) {
			this.logger.debug(
				{ instrumentId: book.instrument.id, spread: spread.toString() },
				"spread too wide",
			);
			return;
		}

		const count = this.nextCount(book.instrument.id);
		const aggressOffer = count % 2 === 1;
		const price = aggressOffer ? offer.price : bid.price;
		const quantity = aggressOffer ? bid.quantity : offer.quantity;
		const id = orderId(String(count));

		const order: ExecutionOrder<I> = Object.freeze({
			instrument: book.instrument,
			side: aggressOffer ? PricingSide.Offer : PricingSide.Bid,
			orderId: id,
			orderType: OrderType.Market,
			price,
			visibleQuantity: quantity,
			hiddenQuantity: this.hiddenRatio.mul(Decimal.from(quantity)).floor().toNumber(),
			parentOrderId: id,
			isChildOrder: false,
		});
		this.store.set(book.instrument.id, order);
		this.notify(order);
	}

	private nextCount(id: InstrumentId): number {
		if (this.sideCounterScope === SideCounterScope.Stage) {
			this.stageCount += 1;
			return this.stageCount;
		}
		const count = (this.instrumentCounts.get(id) ?? 0) + 1;
		this.instrumentCounts.set(id, count);
		return count;
	}
}
