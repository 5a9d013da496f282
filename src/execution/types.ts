import type { Bond, InstrumentLike } from "../instrument/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { OrderId } from "../shared/identifiers.js";
import type { PricingSide } from "../shared/sides.js";

export const OrderType = {
	Fok: "FOK",
	Ioc: "IOC",
	Market: "MARKET",
	Limit: "LIMIT",
	Stop: "STOP",
} as const;

export type OrderType = (typeof OrderType)[keyof typeof OrderType];

/** Venue an order is routed to. */
export const Market = {
	Brokertec: "BROKERTEC",
	Espeed: "ESPEED",
	Cme: "CME",
} as const;

export type Market = (typeof Market)[keyof typeof Market];

export interface ExecutionOrder<I extends InstrumentLike = Bond> {
	readonly instrument: I;
	readonly side: PricingSide;
	readonly orderId: OrderId;
	readonly orderType: OrderType;
	readonly price: Decimal;
	readonly visibleQuantity: number;
	readonly hiddenQuantity: number;
	readonly parentOrderId: OrderId;
	readonly isChildOrder: boolean;
}
