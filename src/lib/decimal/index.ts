/**
 * LibDecimal — domain-agnostic wrapper around decimal.js-light.
 *
 * Exact decimal arithmetic for prices, spreads and risk. Domain code imports
 * it through the shared/decimal facade and never from decimal.js-light directly.
 */
import * as decimalLight from "decimal.js-light";

// Under Node the package resolves to its CommonJS build, whose only ESM
// export is `default`; bundlers pick the .mjs build, which has both.
const DecimalLight = decimalLight.default;
type DecimalLight = decimalLight.Decimal;

DecimalLight.set({ precision: 40 });

// decimal.js-light rounding modes
const ROUND_DOWN = 1;
const ROUND_FLOOR = 3;

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example LibDecimal.from("99.515625")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new DecimalLight(1));
	}

	/** Sum of the given values; zero for an empty list. */
	static sum(values: Iterable<LibDecimal>): LibDecimal {
		let total = LibDecimal.zero();
		for (const v of values) {
			total = total.add(v);
		}
		return total;
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/**
	 * @throws Error if dividing by zero
	 */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	/** Largest integer less than or equal to this value. */
	floor(): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(0, ROUND_FLOOR));
	}

	/** Integer part, rounding toward zero. */
	trunc(): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(0, ROUND_DOWN));
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	isInteger(): boolean {
		return this.raw.isInteger();
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain decimal notation without trailing zeros.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Use with caution - may lose precision. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	toJSON(): string {
		return this.toString();
	}
}
