import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { MalformedInputError } from "../shared/errors.js";
import {
	HALF_TICK,
	PRICE_TICK,
	decodePrice,
	encodePrice,
	isFractionalPrice,
	tryDecodePrice,
} from "./price-codec.js";

describe("decodePrice", () => {
	it.each([
		["99-00", "99"],
		["99-16", "99.5"],
		["99-16+", "99.515625"],
		["99-17", "99.53125"],
		["100-31+", "100.984375"],
		["0-01", "0.03125"],
		["101-08", "101.25"],
	])("%s decodes to %s", (text, expected) => {
		expect(decodePrice(text).toString()).toBe(expected);
	});

	it("tolerates surrounding whitespace", () => {
		expect(decodePrice(" 99-16 ").toString()).toBe("99.5");
	});

	it.each(["99-32", "99-1", "99-160", "99.5", "-99-16", "99-16++", "99-ab", "", "99-"])(
		"rejects %j",
		(text) => {
			expect(() => decodePrice(text)).toThrow(MalformedInputError);
		},
	);

	it("names the text in the error", () => {
		expect(() => decodePrice("99-32")).toThrow('Malformed price: "99-32" has more than 31');
	});
});

describe("tryDecodePrice", () => {
	it("returns ok for valid text", () => {
		const result = tryDecodePrice("98-04+");
		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value.toString()).toBe("98.140625");
	});

	it("returns err for invalid text", () => {
		const result = tryDecodePrice("98.125");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("MALFORMED_INPUT");
			expect(result.error.context).toEqual({ text: "98.125" });
		}
	});

	it("isFractionalPrice mirrors the grammar", () => {
		expect(isFractionalPrice("99-16+")).toBe(true);
		expect(isFractionalPrice("99.5")).toBe(false);
	});
});

describe("encodePrice", () => {
	it.each([
		["99", "99-00"],
		["99.5", "99-16"],
		["99.515625", "99-16+"],
		["99.53125", "99-17"],
		["100.984375", "100-31+"],
		["0.03125", "0-01"],
	])("%s encodes to %s", (value, expected) => {
		expect(encodePrice(Decimal.from(value))).toBe(expected);
	});

	it("appends + only when more than a quarter of a thirty-second remains", () => {
		// 99.5 + 0.25/32: exactly a quarter remains
		expect(encodePrice(Decimal.from("99.5078125"))).toBe("99-16");
		// 99.5 + 0.3/32
		expect(encodePrice(Decimal.from("99.509375"))).toBe("99-16+");
	});

	it("truncates what lies below a sixty-fourth", () => {
		// 99.5 + 0.9/32
		expect(encodePrice(Decimal.from("99.528125"))).toBe("99-16+");
	});

	it("rejects negative prices", () => {
		expect(() => encodePrice(Decimal.from("-0.5"))).toThrow(MalformedInputError);
	});
});

describe("ticks", () => {
	it("PRICE_TICK is 1/32 and HALF_TICK is 1/64", () => {
		expect(PRICE_TICK.toString()).toBe("0.03125");
		expect(HALF_TICK.toString()).toBe("0.015625");
	});
});
