import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import type { Decimal } from "../shared/decimal.js";
import type { InquiryId } from "../shared/identifiers.js";
import { checkTransition, isTerminal } from "./state-machine.js";
import { type Inquiry, InquiryState } from "./types.js";

function reopens(from: InquiryState, to: InquiryState): boolean {
	return isTerminal(from) && to === InquiryState.Received;
}

/**
 * Latest state per inquiry id.
 *
 * A known id may only move along the lifecycle. An unseen id is accepted in
 * any state so recorded streams can be replayed, and a RECEIVED for a finished
 * id opens a new lifecycle under the same id.
 */
export class InquiryService<I extends InstrumentLike = Bond> extends KeyedService<
	InquiryId,
	Inquiry<I>
> {
	constructor(options: ServiceOptions = {}) {
		super("inquiry", options);
	}

	/** @throws InvalidTransitionError */
	onMessage(inquiry: Inquiry<I>): void {
		const previous = this.store.get(inquiry.inquiryId);
		if (previous !== undefined && !reopens(previous.state, inquiry.state)) {
			const result = checkTransition(previous.state, inquiry.state);
			if (!result.ok) {
				throw result.error;
			}
		}
		const recorded = Object.freeze({ ...inquiry });
		this.store.set(recorded.inquiryId, recorded);
		this.notify(recorded);
	}

	/**
	 * Moves the inquiry to QUOTED at `price`.
	 * @throws NotFoundError | InvalidTransitionError
	 */
	sendQuote(id: InquiryId, price: Decimal): void {
		this.onMessage({ ...this.lookup(id), price, state: InquiryState.Quoted });
	}

	/** @throws NotFoundError | InvalidTransitionError */
	completeInquiry(id: InquiryId): void {
		this.onMessage({ ...this.lookup(id), state: InquiryState.Done });
	}

	/** @throws NotFoundError | InvalidTransitionError */
	rejectInquiry(id: InquiryId): void {
		this.onMessage({ ...this.lookup(id), state: InquiryState.Rejected });
	}
}
