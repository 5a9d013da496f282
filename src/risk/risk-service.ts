import type { Bond, InstrumentLike } from "../instrument/types.js";
import { KeyedService, type ServiceOptions } from "../pipeline/service.js";
import type { Position } from "../position/position.js";
import { Decimal } from "../shared/decimal.js";
import { UnsupportedOperationError } from "../shared/errors.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { type BucketedSector, PV01 } from "./pv01.js";

export interface RiskServiceOptions extends ServiceOptions {
	/** Per-unit PV01 as a decimal string */
	readonly pv01PerUnit?: string;
}

/**
 * Converts positions into PV01 risk, one latest value per instrument.
 *
 * The per-unit sensitivity is a flat policy value, not derived from the
 * instrument's coupon or maturity.
 */
export class RiskService<I extends InstrumentLike = Bond> extends KeyedService<
	InstrumentId,
	PV01<I>,
	Position<I>
> {
	private readonly pv01PerUnit: Decimal;

	constructor(options: RiskServiceOptions = {}) {
		super("risk", options);
		this.pv01PerUnit = Decimal.from(options.pv01PerUnit ?? "0.02");
	}

	onMessage(position: Position<I>): void {
		this.addPosition(position);
	}

	addPosition(position: Position<I>): void {
		const risk = new PV01(position.instrument, this.pv01PerUnit, position.aggregate());
		this.store.set(position.instrument.id, risk);
		this.notify(risk);
	}

	/**
	 * No aggregation rule is defined for sectors yet.
	 * @throws UnsupportedOperationError always
	 */
	getBucketedRisk(sector: BucketedSector<I>): PV01<BucketedSector<I>> {
		throw new UnsupportedOperationError(`Bucketed risk is not supported (sector ${sector.name})`, {
			sector: sector.name,
			products: sector.products.map((p) => p.id),
		});
	}
}
