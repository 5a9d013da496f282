import { describe, expect, it } from "vitest";
import {
	ConfigError,
	DeskError,
	ErrorCategory,
	InvalidTransitionError,
	MalformedInputError,
	NotFoundError,
	UnknownBookError,
	UnknownInstrumentError,
	UnsupportedOperationError,
	isConfigError,
	isInvalidTransitionError,
	isMalformedInputError,
	isNotFoundError,
	isUnknownBookError,
	isUnknownInstrumentError,
	isUnsupportedOperationError,
	toDeskError,
} from "./errors.js";

describe("DeskError hierarchy", () => {
	describe("codes and categories", () => {
		const cases: Array<[string, DeskError, string, ErrorCategory]> = [
			["NotFoundError", new NotFoundError("missing"), "NOT_FOUND", ErrorCategory.NotFound],
			[
				"UnknownInstrumentError",
				new UnknownInstrumentError("B99y"),
				"UNKNOWN_INSTRUMENT",
				ErrorCategory.InvalidInput,
			],
			["UnknownBookError", new UnknownBookError("TRSY9"), "UNKNOWN_BOOK", ErrorCategory.InvalidInput],
			[
				"MalformedInputError",
				new MalformedInputError("99-32"),
				"MALFORMED_INPUT",
				ErrorCategory.InvalidInput,
			],
			[
				"UnsupportedOperationError",
				new UnsupportedOperationError("bucketed risk"),
				"UNSUPPORTED_OPERATION",
				ErrorCategory.Unsupported,
			],
			[
				"InvalidTransitionError",
				new InvalidTransitionError("DONE -> QUOTED"),
				"INVALID_TRANSITION",
				ErrorCategory.InvalidInput,
			],
			["ConfigError", new ConfigError("bad config"), "CONFIG_ERROR", ErrorCategory.Fatal],
		];

		it.each(cases)("%s has code %s", (name, error, code, category) => {
			expect(error.name).toBe(name);
			expect(error.code).toBe(code);
			expect(error.category).toBe(category);
		});
	});

	describe("isInputError", () => {
		it("input errors return true", () => {
			expect(new MalformedInputError("x").isInputError).toBe(true);
			expect(new UnknownBookError("x").isInputError).toBe(true);
		});

		it("other errors return false", () => {
			expect(new NotFoundError("x").isInputError).toBe(false);
			expect(new ConfigError("x").isInputError).toBe(false);
		});
	});

	describe("error properties", () => {
		it("preserves message, code, and context", () => {
			const e = new UnknownBookError("unknown book", { book: "TRSY4" });
			expect(e.message).toBe("unknown book");
			expect(e.code).toBe("UNKNOWN_BOOK");
			expect(e.context).toEqual({ book: "TRSY4" });
		});

		it("keeps cause out of context", () => {
			const cause = new Error("root");
			const e = new MalformedInputError("wrapped", { line: 3, cause });
			expect(e.cause).toBe(cause);
			expect(e.context).toEqual({ line: 3 });
		});

		it("is instanceof Error", () => {
			expect(new NotFoundError("fail")).toBeInstanceOf(Error);
			expect(new NotFoundError("fail")).toBeInstanceOf(DeskError);
		});
	});
});

describe("toDeskError", () => {
	it("returns DeskError as-is", () => {
		const original = new NotFoundError("B10y");
		expect(toDeskError(original)).toBe(original);
	});

	it("wraps a plain Error as a fatal internal error", () => {
		const cause = new Error("disk full");
		const e = toDeskError(cause);
		expect(e.code).toBe("INTERNAL_ERROR");
		expect(e.category).toBe(ErrorCategory.Fatal);
		expect(e.message).toBe("disk full");
		expect(e.cause).toBe(cause);
	});

	it("handles non-Error thrown values", () => {
		const e = toDeskError("string error");
		expect(e.message).toBe("string error");
		expect(e.code).toBe("INTERNAL_ERROR");
	});
});

describe("toJSON", () => {
	it("serializes all fields", () => {
		const e = new UnknownInstrumentError("unknown instrument", { instrumentId: "B99y" });
		expect(e.toJSON()).toEqual({
			name: "UnknownInstrumentError",
			message: "unknown instrument",
			code: "UNKNOWN_INSTRUMENT",
			category: ErrorCategory.InvalidInput,
			context: { instrumentId: "B99y" },
		});
	});
});

describe("type guards", () => {
	it("each guard accepts its own class", () => {
		expect(isNotFoundError(new NotFoundError("x"))).toBe(true);
		expect(isUnknownInstrumentError(new UnknownInstrumentError("x"))).toBe(true);
		expect(isUnknownBookError(new UnknownBookError("x"))).toBe(true);
		expect(isMalformedInputError(new MalformedInputError("x"))).toBe(true);
		expect(isUnsupportedOperationError(new UnsupportedOperationError("x"))).toBe(true);
		expect(isInvalidTransitionError(new InvalidTransitionError("x"))).toBe(true);
		expect(isConfigError(new ConfigError("x"))).toBe(true);
	});

	it("guards reject other errors and non-errors", () => {
		expect(isNotFoundError(new UnknownBookError("x"))).toBe(false);
		expect(isUnknownBookError(new Error("x"))).toBe(false);
		expect(isMalformedInputError("not an error")).toBe(false);
	});
});
