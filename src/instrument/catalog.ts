/**
 * InstrumentCatalog — the static set of instruments the desk trades.
 *
 * Feeds resolve ids through it; stages pre-create per-instrument state from it.
 */

import { Decimal } from "../shared/decimal.js";
import { UnknownInstrumentError } from "../shared/errors.js";
import { type InstrumentId, instrumentId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Bond, type InstrumentLike, InstrumentIdType } from "./types.js";

// ── Treasury catalog ─────────────────────────────────────────────────

const TREASURIES: ReadonlyArray<readonly [id: string, coupon: string, maturity: string]> = [
	["B02y", "0.02", "2026-12-31"],
	["B03y", "0.025", "2027-12-31"],
	["B05y", "0.03", "2029-12-31"],
	["B07y", "0.035", "2031-12-31"],
	["B10y", "0.04", "2034-12-31"],
	["B20y", "0.045", "2044-12-31"],
	["B30y", "0.05", "2054-12-31"],
];

export function bond(id: string, coupon: string, maturity: string): Bond {
	const value: Bond = {
		kind: "bond",
		id: instrumentId(id),
		idType: InstrumentIdType.Cusip,
		ticker: id,
		coupon: Decimal.from(coupon),
		maturity,
	};
	return Object.freeze(value);
}

/** The seven on-the-run treasuries, shortest maturity first. */
export function treasuryBonds(): readonly Bond[] {
	return TREASURIES.map(([id, coupon, maturity]) => bond(id, coupon, maturity));
}

// ── Catalog ──────────────────────────────────────────────────────────

export class InstrumentCatalog<I extends InstrumentLike = Bond> {
	private readonly byId: ReadonlyMap<string, I>;

	constructor(instruments: Iterable<I>) {
		const byId = new Map<string, I>();
		for (const instrument of instruments) {
			byId.set(instrument.id, instrument);
		}
		this.byId = byId;
	}

	static treasuries(): InstrumentCatalog<Bond> {
		return new InstrumentCatalog(treasuryBonds());
	}

	/** @throws UnknownInstrumentError */
	get(id: InstrumentId | string): I {
		const instrument = this.find(id);
		if (instrument === undefined) {
			throw new UnknownInstrumentError(`Unknown instrument: ${id}`, { instrumentId: id });
		}
		return instrument;
	}

	resolve(id: string): Result<I, UnknownInstrumentError> {
		const instrument = this.find(id);
		return instrument === undefined
			? err(new UnknownInstrumentError(`Unknown instrument: ${id}`, { instrumentId: id }))
			: ok(instrument);
	}

	find(id: InstrumentId | string): I | undefined {
		return this.byId.get(id);
	}

	has(id: InstrumentId | string): boolean {
		return this.find(id) !== undefined;
	}

	all(): readonly I[] {
		return [...this.byId.values()];
	}

	get size(): number {
		return this.byId.size;
	}
}
