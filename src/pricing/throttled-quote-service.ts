import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { QuoteThrottle, type QuoteThrottleStats } from "./quote-throttle.js";
import type { Price } from "./types.js";

export interface ThrottledQuoteServiceOptions extends ServiceOptions {
	readonly intervalMs?: number;
	readonly clock?: Clock;
}

/**
 * Rate-limited quote delivery for display sinks.
 *
 * One throttle window per service, shared by all instruments. Quotes inside
 * the window are dropped: not stored, not notified.
 */
export class ThrottledQuoteService<I extends InstrumentLike = Bond> extends KeyedService<
	InstrumentId,
	Price<I>
> {
	private readonly throttle: QuoteThrottle;

	constructor(options: ThrottledQuoteServiceOptions = {}) {
		super("gui", options);
		this.throttle = new QuoteThrottle({
			intervalMs: options.intervalMs ?? 300,
			clock: options.clock ?? SystemClock,
		});
	}

	onMessage(price: Price<I>): void {
		if (!this.throttle.tryAcquire()) {
			this.logger.debug({ instrumentId: price.instrument.id }, "quote throttled");
			return;
		}
		this.store.set(price.instrument.id, price);
		this.notify(price);
	}

	getStats(): QuoteThrottleStats {
		return this.throttle.getStats();
	}
}
