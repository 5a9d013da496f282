/**
 * Decimal — the numeric type for every price, spread, tolerance and risk figure.
 *
 * Backed by decimal.js-light through the lib wrapper. Quantities stay plain
 * integers; anything fractional is a Decimal.
 */

export { LibDecimal as Decimal } from "../lib/decimal/index.js";
