/**
 * Inquiry lifecycle transitions.
 *
 * Every move goes through checkTransition(), which validates it against the
 * allowed table. DONE and REJECTED are terminal.
 */

import { InvalidTransitionError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { InquiryState } from "./types.js";

const ALLOWED: Readonly<Record<InquiryState, readonly InquiryState[]>> = {
	[InquiryState.Received]: [InquiryState.Quoted, InquiryState.Rejected],
	[InquiryState.Quoted]: [InquiryState.Done],
	[InquiryState.Done]: [],
	[InquiryState.Rejected]: [],
};

export function allowedTransitions(from: InquiryState): readonly InquiryState[] {
	return ALLOWED[from];
}

export function isTerminal(state: InquiryState): boolean {
	return ALLOWED[state].length === 0;
}

export function checkTransition(
	from: InquiryState,
	to: InquiryState,
): Result<InquiryState, InvalidTransitionError> {
	if (ALLOWED[from].includes(to)) {
		return ok(to);
	}
	const message = isTerminal(from)
		? `Inquiry already ${from}`
		: `Cannot transition inquiry from ${from} to ${to}`;
	return err(new InvalidTransitionError(message, { from, to }));
}
