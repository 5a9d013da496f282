export {
	PRICE_TICK,
	HALF_TICK,
	isFractionalPrice,
	tryDecodePrice,
	decodePrice,
	encodePrice,
} from "./price-codec.js";
export {
	type Price,
	type PriceStream,
	type PriceStreamOrder,
	createPrice,
	bidOf,
	offerOf,
} from "./types.js";
export { QuoteThrottle, type QuoteThrottleConfig, type QuoteThrottleStats } from "./quote-throttle.js";
export { PricingService } from "./pricing-service.js";
export {
	ThrottledQuoteService,
	type ThrottledQuoteServiceOptions,
} from "./throttled-quote-service.js";
export { AlgoStreamingService, type AlgoStreamingServiceOptions } from "./algo-streaming-service.js";
export { StreamingService } from "./streaming-service.js";
