import { describe, expect, it } from "vitest";
import { bond } from "../instrument/catalog.js";
import { onAdd } from "../pipeline/listener.js";
import { Decimal } from "../shared/decimal.js";
import { FakeClock } from "../shared/time.js";
import { AlgoStreamingService } from "./algo-streaming-service.js";
import { PricingService } from "./pricing-service.js";
import { StreamingService } from "./streaming-service.js";
import { ThrottledQuoteService } from "./throttled-quote-service.js";
import { type Price, type PriceStream, bidOf, createPrice, offerOf } from "./types.js";

const B10 = bond("B10y", "0.04", "2034-12-31");
const B02 = bond("B02y", "0.02", "2026-12-31");

function quote(mid: string, spread = "0.5", instrument = B10): Price {
	return createPrice(instrument, Decimal.from(mid), Decimal.from(spread));
}

describe("Price", () => {
	it("bid and offer sit half a spread either side of mid", () => {
		const price = quote("100", "0.5");
		expect(bidOf(price).toString()).toBe("99.75");
		expect(offerOf(price).toString()).toBe("100.25");
	});

	it("a zero spread gives a locked market", () => {
		const price = quote("99.5", "0");
		expect(bidOf(price).eq(offerOf(price))).toBe(true);
	});
});

describe("PricingService", () => {
	it("stores the latest price and notifies", () => {
		const service = new PricingService();
		const seen: Price[] = [];
		service.registerListener(onAdd((p: Price) => seen.push(p)));

		service.onMessage(quote("99"));
		service.onMessage(quote("100"));

		expect(service.lookup(B10.id).mid.toString()).toBe("100");
		expect(seen.map((p) => p.mid.toString())).toEqual(["99", "100"]);
	});
});

describe("ThrottledQuoteService", () => {
	function setup(intervalMs = 300) {
		const clock = new FakeClock(10_000);
		const service = new ThrottledQuoteService({ clock, intervalMs });
		const delivered: Price[] = [];
		service.registerListener(onAdd((p: Price) => delivered.push(p)));
		return { clock, service, delivered };
	}

	it("only the first of two quotes 100ms apart is delivered", () => {
		const { clock, service, delivered } = setup();

		service.onMessage(quote("99"));
		clock.advance(100);
		service.onMessage(quote("100"));

		expect(delivered.map((p) => p.mid.toString())).toEqual(["99"]);
		expect(service.lookup(B10.id).mid.toString()).toBe("99");
		expect(service.getStats()).toEqual({ delivered: 1, dropped: 1 });
	});

	it("both quotes 400ms apart are delivered", () => {
		const { clock, service, delivered } = setup();

		service.onMessage(quote("99"));
		clock.advance(400);
		service.onMessage(quote("100"));

		expect(delivered).toHaveLength(2);
	});

	it("the window is shared across instruments", () => {
		const { clock, service, delivered } = setup();

		service.onMessage(quote("99", "0.5", B10));
		clock.advance(50);
		service.onMessage(quote("101", "0.5", B02));

		expect(delivered).toHaveLength(1);
		expect(service.has(B02.id)).toBe(false);
	});

	it("uses the configured interval", () => {
		const { clock, service, delivered } = setup(50);

		service.onMessage(quote("99"));
		clock.advance(51);
		service.onMessage(quote("100"));

		expect(delivered).toHaveLength(2);
	});
});

describe("AlgoStreamingService", () => {
	it("builds symmetric legs with the configured sizes", () => {
		const service = new AlgoStreamingService();
		service.publishPrice(quote("100", "0.5"));

		const stream = service.lookup(B10.id);
		expect(stream.bidOrder.side).toBe("BID");
		expect(stream.bidOrder.price.toString()).toBe("99.75");
		expect(stream.offerOrder.side).toBe("OFFER");
		expect(stream.offerOrder.price.toString()).toBe("100.25");
		expect(stream.bidOrder.visibleQuantity).toBe(1_000_000);
		expect(stream.bidOrder.hiddenQuantity).toBe(1_000_000);
		expect(stream.offerOrder.visibleQuantity).toBe(stream.bidOrder.visibleQuantity);
		expect(stream.offerOrder.hiddenQuantity).toBe(stream.bidOrder.hiddenQuantity);
	});

	it("honours visible and hidden quantity options", () => {
		const service = new AlgoStreamingService({ visibleQuantity: 500, hiddenQuantity: 1_500 });
		service.onMessage(quote("100"));

		const stream = service.lookup(B10.id);
		expect(stream.offerOrder.visibleQuantity).toBe(500);
		expect(stream.offerOrder.hiddenQuantity).toBe(1_500);
	});

	it("notifies on every price", () => {
		const service = new AlgoStreamingService();
		const streams: PriceStream[] = [];
		service.registerListener(onAdd((s: PriceStream) => streams.push(s)));

		service.onMessage(quote("99"));
		service.onMessage(quote("99"));

		expect(streams).toHaveLength(2);
	});
});

describe("StreamingService", () => {
	it("stores and forwards streams unchanged", () => {
		const algo = new AlgoStreamingService();
		const streaming = new StreamingService();
		const published: PriceStream[] = [];
		algo.registerListener(onAdd((s: PriceStream) => streaming.publishPrice(s)));
		streaming.registerListener(onAdd((s: PriceStream) => published.push(s)));

		algo.onMessage(quote("98.5", "0.25"));

		expect(published).toHaveLength(1);
		expect(published[0]).toBe(algo.lookup(B10.id));
		expect(streaming.lookup(B10.id).bidOrder.price.toString()).toBe("98.375");
	});
});
