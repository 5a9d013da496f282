import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import { NotFoundError } from "../shared/errors.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { type ExecutionOrder, Market } from "./types.js";

export interface ExecutionServiceOptions extends ServiceOptions {
	/** Venue used by `onMessage` */
	readonly market?: Market;
}

/** Records orders sent to a venue, latest per instrument. */
export class ExecutionService<I extends InstrumentLike = Bond> extends KeyedService<
	InstrumentId,
	ExecutionOrder<I>
> {
	private readonly defaultMarket: Market;
	private readonly venues = new Map<InstrumentId, Market>();

	constructor(options: ExecutionServiceOptions = {}) {
		super("execution", options);
		this.defaultMarket = options.market ?? Market.Cme;
	}

	onMessage(order: ExecutionOrder<I>): void {
		this.executeOrder(order, this.defaultMarket);
	}

	executeOrder(order: ExecutionOrder<I>, market: Market): void {
		this.store.set(order.instrument.id, order);
		this.venues.set(order.instrument.id, market);
		this.logger.debug(
			{ instrumentId: order.instrument.id, orderId: order.orderId, market },
			"order executed",
		);
		this.notify(order);
	}

	/**
	 * Venue of the latest order for the instrument.
	 * @throws NotFoundError
	 */
	marketOf(id: InstrumentId): Market {
		const market = this.venues.get(id);
		if (market === undefined) {
			throw new NotFoundError(`execution: no order for ${id}`, { instrumentId: id });
		}
		return market;
	}
}
