import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import { MalformedInputError } from "../shared/errors.js";
import type { TradeId } from "../shared/identifiers.js";
import type { Trade } from "./types.js";

/** Entry point for trades, keyed by trade id. */
export class TradeBookingService<I extends InstrumentLike = Bond> extends KeyedService<
	TradeId,
	Trade<I>
> {
	constructor(options: ServiceOptions = {}) {
		super("trade-booking", options);
	}

	onMessage(trade: Trade<I>): void {
		this.bookTrade(trade);
	}

	/** @throws MalformedInputError when the quantity is not a positive integer */
	bookTrade(trade: Trade<I>): void {
		if (!Number.isSafeInteger(trade.quantity) || trade.quantity <= 0) {
			throw new MalformedInputError(`Trade ${trade.tradeId} has invalid quantity ${trade.quantity}`, {
				tradeId: trade.tradeId,
				quantity: trade.quantity,
			});
		}
		const booked = Object.freeze({ ...trade });
		this.store.set(booked.tradeId, booked);
		this.notify(booked);
	}
}
