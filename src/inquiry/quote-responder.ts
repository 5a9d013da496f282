import type { InstrumentLike } from "../instrument/types.js";
import { type ServiceListener, onAdd } from "../pipeline/listener.js";
import type { Decimal } from "../shared/decimal.js";
import type { InquiryService } from "./inquiry-service.js";
import { type Inquiry, InquiryState } from "./types.js";

export type QuotePriceSource<I extends InstrumentLike> = (inquiry: Inquiry<I>) => Decimal;

/** Quotes every inquiry at the same price. */
export function fixedQuotePrice<I extends InstrumentLike>(price: Decimal): QuotePriceSource<I> {
	return () => price;
}

/**
 * Auto-quoting listener for the inquiry stage.
 *
 * On RECEIVED it feeds QUOTED (priced by `priceFor`) and then DONE back into
 * `service`, each as a separate event. Other states are ignored.
 */
export function createQuoteResponder<I extends InstrumentLike>(
	service: InquiryService<I>,
	priceFor: QuotePriceSource<I>,
): ServiceListener<Inquiry<I>> {
	return onAdd((inquiry: Inquiry<I>) => {
		if (inquiry.state !== InquiryState.Received) return;
		service.sendQuote(inquiry.inquiryId, priceFor(inquiry));
		service.completeInquiry(inquiry.inquiryId);
	});
}
