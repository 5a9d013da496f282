import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { Price } from "./types.js";

/** Entry point for quotes. Keeps the latest price per instrument. */
export class PricingService<I extends InstrumentLike = Bond> extends KeyedService<
	InstrumentId,
	Price<I>
> {
	constructor(options: ServiceOptions = {}) {
		super("pricing", options);
	}

	onMessage(price: Price<I>): void {
		this.store.set(price.instrument.id, price);
		this.notify(price);
	}
}
