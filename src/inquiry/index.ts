export { InquiryState, type Inquiry, isInquiryState } from "./types.js";
export { allowedTransitions, isTerminal, checkTransition } from "./state-machine.js";
export { InquiryService } from "./inquiry-service.js";
export {
	type QuotePriceSource,
	fixedQuotePrice,
	createQuoteResponder,
} from "./quote-responder.js";
