/**
 * Fractional bond-price notation.
 *
 * Grammar: `<whole>-<frac>[+]` where `whole` is one or more digits, `frac` is
 * exactly two digits in 00..31 counting thirty-seconds, and a trailing `+`
 * adds one sixty-fourth. "99-16+" is 99 + 16/32 + 1/64 = 99.515625.
 */

import { Decimal } from "../shared/decimal.js";
import { MalformedInputError } from "../shared/errors.js";
import { type Result, err, ok, unwrap } from "../shared/result.js";

const PRICE_PATTERN = /^(\d+)-(\d{2})(\+)?$/;

const THIRTY_TWO = Decimal.from(32);
/** One thirty-second of a point. */
export const PRICE_TICK = Decimal.one().div(THIRTY_TWO);
/** One sixty-fourth of a point, the `+` increment. */
export const HALF_TICK = Decimal.one().div(Decimal.from(64));
const PLUS_THRESHOLD = Decimal.from("0.25");

export function isFractionalPrice(text: string): boolean {
	return tryDecodePrice(text).ok;
}

export function tryDecodePrice(text: string): Result<Decimal, MalformedInputError> {
	const match = PRICE_PATTERN.exec(text.trim());
	if (match === null) {
		return err(new MalformedInputError(`Malformed price: "${text}"`, { text }));
	}
	const [, wholeText = "", fracText = "", plus] = match;
	const thirtySeconds = Number.parseInt(fracText, 10);
	if (thirtySeconds > 31) {
		return err(
			new MalformedInputError(`Malformed price: "${text}" has more than 31 thirty-seconds`, {
				text,
			}),
		);
	}
	let value = Decimal.from(wholeText).add(Decimal.from(thirtySeconds).mul(PRICE_TICK));
	if (plus !== undefined) {
		value = value.add(HALF_TICK);
	}
	return ok(value);
}

/** @throws MalformedInputError when `text` is outside the grammar */
export function decodePrice(text: string): Decimal {
	return unwrap(tryDecodePrice(text));
}

/**
 * Whole points, then the thirty-seconds truncated, then `+` when more than a
 * quarter of a thirty-second remains.
 * @throws MalformedInputError for negative prices
 */
export function encodePrice(price: Decimal): string {
	if (price.isNegative()) {
		throw new MalformedInputError(`Cannot encode negative price ${price.toString()}`, {
			price: price.toString(),
		});
	}
	const whole = price.floor();
	const fraction = price.sub(whole).mul(THIRTY_TWO);
	const thirtySeconds = fraction.trunc();
	const plus = fraction.sub(thirtySeconds).gt(PLUS_THRESHOLD) ? "+" : "";
	return `${whole.toString()}-${thirtySeconds.toString().padStart(2, "0")}${plus}`;
}
