import type { Bond, InstrumentLike } from "../instrument/types.js";
import { Decimal } from "../shared/decimal.js";

/** Interest-rate risk of a holding: per-unit PV01 times quantity. */
export class PV01<T = Bond> {
	readonly product: T;
	readonly pv01: Decimal;
	readonly quantity: number;

	constructor(product: T, pv01: Decimal, quantity: number) {
		this.product = product;
		this.pv01 = pv01;
		this.quantity = quantity;
		Object.freeze(this);
	}

	total(): Decimal {
		return this.pv01.mul(Decimal.from(this.quantity));
	}
}

/** A named group of instruments risk can be reported over. */
export class BucketedSector<I extends InstrumentLike = Bond> {
	readonly products: readonly I[];
	readonly name: string;

	constructor(products: readonly I[], name: string) {
		this.products = [...products];
		this.name = name;
		Object.freeze(this);
	}
}
