import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { PriceStream } from "./types.js";

/** Last hop for two-sided streams before the streaming sink. */
export class StreamingService<I extends InstrumentLike = Bond> extends KeyedService<
	InstrumentId,
	PriceStream<I>
> {
	constructor(options: ServiceOptions = {}) {
		super("streaming", options);
	}

	onMessage(stream: PriceStream<I>): void {
		this.publishPrice(stream);
	}

	publishPrice(stream: PriceStream<I>): void {
		this.store.set(stream.instrument.id, stream);
		this.notify(stream);
	}
}
