import { describe, expect, it } from "vitest";
import { InstrumentCatalog } from "../instrument/catalog.js";
import { isMalformedInputError, isUnknownInstrumentError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import {
	feedParsers,
	parseInquiryRecord,
	parseOrderBookRecord,
	parseQuoteRecord,
	parseTradeRecord,
} from "./parsers.js";

const context = { catalog: InstrumentCatalog.treasuries() };

function expectOk<T>(result: Result<T, Error>): T {
	if (!result.ok) throw result.error;
	return result.value;
}

describe("parseTradeRecord", () => {
	it("parses a trade with a fractional price", () => {
		const trade = expectOk(parseTradeRecord("B05y,T1,TRSY1,1000000,99-16+,BUY", context));

		expect(trade.instrument.id).toBe("B05y");
		expect(trade.tradeId).toBe("T1");
		expect(trade.book).toBe("TRSY1");
		expect(trade.quantity).toBe(1_000_000);
		expect(trade.price.toString()).toBe("99.515625");
		expect(trade.side).toBe("BUY");
	});

	it("accepts a plain decimal price", () => {
		const trade = expectOk(parseTradeRecord("B05y,T2,TRSY2,500000,99.5,SELL", context));
		expect(trade.price.toString()).toBe("99.5");
		expect(trade.side).toBe("SELL");
	});

	it("tolerates surrounding whitespace and a trailing carriage return", () => {
		const trade = expectOk(parseTradeRecord("B05y, T3 ,TRSY3,10,100-00,BUY\r", context));
		expect(trade.tradeId).toBe("T3");
		expect(trade.price.toString()).toBe("100");
	});

	it("keeps books it does not know; the position stage decides", () => {
		const trade = expectOk(parseTradeRecord("B05y,T4,TRSY9,10,100-00,BUY", context));
		expect(trade.book).toBe("TRSY9");
	});

	it("rejects a zero quantity", () => {
		const result = parseTradeRecord("B05y,T1,TRSY1,0,99-16,BUY", context);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(isMalformedInputError(result.error)).toBe(true);
			expect(result.error.message).toBe("Malformed trade record: 3: must be a positive integer");
		}
	});

	it("rejects an unknown side", () => {
		const result = parseTradeRecord("B05y,T1,TRSY1,10,99-16,HOLD", context);
		expect(!result.ok && isMalformedInputError(result.error)).toBe(true);
	});

	it("rejects a price in neither notation", () => {
		const result = parseTradeRecord("B05y,T1,TRSY1,10,99-32,BUY", context);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toContain("is neither fractional nor decimal");
		}
	});

	it("rejects a short record", () => {
		const result = parseTradeRecord("B05y,T1,TRSY1", context);
		expect(!result.ok && isMalformedInputError(result.error)).toBe(true);
	});

	it("reports an instrument outside the catalog", () => {
		const result = parseTradeRecord("B99y,T1,TRSY1,10,99-16,BUY", context);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(isUnknownInstrumentError(result.error)).toBe(true);
			expect(result.error.message).toBe("Unknown instrument: B99y");
		}
	});
});

describe("parseQuoteRecord", () => {
	it("derives mid and spread from bid and ask", () => {
		const price = expectOk(parseQuoteRecord("B10y,99-16,99-17", context));

		expect(price.instrument.id).toBe("B10y");
		expect(price.mid.toString()).toBe("99.515625");
		expect(price.bidOfferSpread.toString()).toBe("0.03125");
	});

	it("requires fractional notation", () => {
		const result = parseQuoteRecord("B10y,99.5,99-17", context);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe('Malformed quote record: 1: Malformed price: "99.5"');
		}
	});
});

describe("parseOrderBookRecord", () => {
	const line = "B02y,99-00,99-01,98-31,99-02,98-30,99-03,98-29,99-04,98-28,99-05";

	it("builds five levels per side, best first, sized by level", () => {
		const book = expectOk(parseOrderBookRecord(line, context));

		expect(book.bidStack.map((o) => o.price.toString())).toEqual([
			"99",
			"98.96875",
			"98.9375",
			"98.90625",
			"98.875",
		]);
		expect(book.offerStack.map((o) => o.price.toString())).toEqual([
			"99.03125",
			"99.0625",
			"99.09375",
			"99.125",
			"99.15625",
		]);
		expect(book.bidStack.map((o) => o.quantity)).toEqual([
			1_000_000, 2_000_000, 3_000_000, 4_000_000, 5_000_000,
		]);
		expect(book.bidStack.every((o) => o.side === "BID")).toBe(true);
		expect(book.offerStack.every((o) => o.side === "OFFER")).toBe(true);
	});

	it("uses the configured size step", () => {
		const book = expectOk(parseOrderBookRecord(line, { ...context, orderBookSizeStep: 100 }));
		expect(book.offerStack.map((o) => o.quantity)).toEqual([100, 200, 300, 400, 500]);
	});

	it("rejects a record without five full levels", () => {
		const result = parseOrderBookRecord("B02y,99-00,99-01,98-31,99-02", context);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe(
				"Malformed order book record: expected 10 prices, got 4",
			);
		}
	});
});

describe("parseInquiryRecord", () => {
	it("starts every inquiry RECEIVED and unpriced", () => {
		const inquiry = expectOk(parseInquiryRecord("INQ1,B07y,BUY", context));

		expect(inquiry.inquiryId).toBe("INQ1");
		expect(inquiry.instrument.id).toBe("B07y");
		expect(inquiry.side).toBe("BUY");
		expect(inquiry.quantity).toBe(1_000_000);
		expect(inquiry.price).toBeNull();
		expect(inquiry.state).toBe("RECEIVED");
	});

	it("ignores a trailing state column", () => {
		const inquiry = expectOk(
			parseInquiryRecord("INQ2,B07y,SELL,DONE", { ...context, inquiryQuantity: 250 }),
		);
		expect(inquiry.state).toBe("RECEIVED");
		expect(inquiry.quantity).toBe(250);
	});

	it("rejects an unknown side", () => {
		const result = parseInquiryRecord("INQ3,B07y,HOLD", context);
		expect(!result.ok && isMalformedInputError(result.error)).toBe(true);
	});
});

describe("feedParsers", () => {
	it("binds every parser to one context", () => {
		const parsers = feedParsers(context);

		expect(parsers.trade("B05y,T1,TRSY1,10,99-16,BUY").ok).toBe(true);
		expect(parsers.quote("B05y,99-16,99-17").ok).toBe(true);
		expect(parsers.inquiry("INQ1,B05y,SELL").ok).toBe(true);
		expect(parsers.orderBook("B05y").ok).toBe(false);
	});
});
