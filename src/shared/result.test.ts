import { describe, expect, it } from "vitest";
import { tryDecodePrice } from "../pricing/price-codec.js";
import { MalformedInputError } from "./errors.js";
import { type Result, err, mapErr, ok, unwrap } from "./result.js";

function positiveQuantity(text: string): Result<number, string> {
	const n = Number(text);
	return Number.isSafeInteger(n) && n > 0 ? ok(n) : err(`bad quantity "${text}"`);
}

describe("Result", () => {
	it("ok and err carry their payload", () => {
		expect(positiveQuantity("1000000")).toEqual({ ok: true, value: 1_000_000 });
		expect(positiveQuantity("-5")).toEqual({ ok: false, error: 'bad quantity "-5"' });
	});

	describe("mapErr", () => {
		it("rewrites only the error", () => {
			expect(mapErr(positiveQuantity("0"), (e) => `quantity column: ${e}`)).toEqual(
				err('quantity column: bad quantity "0"'),
			);
			expect(mapErr(positiveQuantity("7"), (e) => `quantity column: ${e}`)).toEqual(ok(7));
		});

		it("wraps a codec failure into a record-level message", () => {
			const wrapped = mapErr(tryDecodePrice("100-40"), (e) => `quote line 3: ${e.message}`);
			expect(wrapped).toEqual(
				err('quote line 3: Malformed price: "100-40" has more than 31 thirty-seconds'),
			);
		});
	});

	describe("unwrap", () => {
		it("returns the decoded value", () => {
			expect(unwrap(tryDecodePrice("99-16")).toString()).toBe("99.5");
		});

		it("throws the carried error itself", () => {
			const failed = tryDecodePrice("abc");
			expect(() => unwrap(failed)).toThrow(MalformedInputError);
			if (!failed.ok) expect(() => unwrap(failed)).toThrow(failed.error);
		});
	});
});
