/**
 * Client inquiry types.
 *
 * An inquiry is a client request for a price on one instrument. It moves
 * RECEIVED → QUOTED → DONE, or RECEIVED → REJECTED.
 */

import type { Bond, InstrumentLike } from "../instrument/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { InquiryId } from "../shared/identifiers.js";
import type { Side } from "../shared/sides.js";

export const InquiryState = {
	/** Arrived from the client, not yet priced */
	Received: "RECEIVED",
	/** A price has been sent back */
	Quoted: "QUOTED",
	/** Terminal: traded at the quoted price */
	Done: "DONE",
	/** Terminal: declined without a quote */
	Rejected: "REJECTED",
} as const;

export type InquiryState = (typeof InquiryState)[keyof typeof InquiryState];

export interface Inquiry<I extends InstrumentLike = Bond> {
	readonly inquiryId: InquiryId;
	readonly instrument: I;
	readonly side: Side;
	readonly quantity: number;
	/** null until quoted */
	readonly price: Decimal | null;
	readonly state: InquiryState;
}

export function isInquiryState(value: string): value is InquiryState {
	return (
		value === InquiryState.Received ||
		value === InquiryState.Quoted ||
		value === InquiryState.Done ||
		value === InquiryState.Rejected
	);
}
