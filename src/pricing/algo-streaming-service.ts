import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { PricingSide } from "../shared/sides.js";
import { type Price, type PriceStream, bidOf, offerOf } from "./types.js";

export interface AlgoStreamingServiceOptions extends ServiceOptions {
	readonly visibleQuantity?: number;
	readonly hiddenQuantity?: number;
}

/** Turns each price into a two-sided stream with fixed leg sizes. */
export class AlgoStreamingService<I extends InstrumentLike = Bond> extends KeyedService<
	InstrumentId,
	PriceStream<I>,
	Price<I>
> {
	private readonly visibleQuantity: number;
	private readonly hiddenQuantity: number;

	constructor(options: AlgoStreamingServiceOptions = {}) {
		super("algo-streaming", options);
		this.visibleQuantity = options.visibleQuantity ?? 1_000_000;
		this.hiddenQuantity = options.hiddenQuantity ?? 1_000_000;
	}

	onMessage(price: Price<I>): void {
		this.publishPrice(price);
	}

	/** Builds bid and offer legs around the mid and always notifies. */
	publishPrice(price: Price<I>): void {
		const stream: PriceStream<I> = Object.freeze({
			instrument: price.instrument,
			bidOrder: Object.freeze({
				side: PricingSide.Bid,
				price: bidOf(price),
				visibleQuantity: this.visibleQuantity,
				hiddenQuantity: this.hiddenQuantity,
			}),
			offerOrder: Object.freeze({
				side: PricingSide.Offer,
				price: offerOf(price),
				visibleQuantity: this.visibleQuantity,
				hiddenQuantity: this.hiddenQuantity,
			}),
		});
		this.store.set(price.instrument.id, stream);
		this.notify(stream);
	}
}
