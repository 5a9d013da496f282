import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type StageEvents = {
	add: (value: { instrumentId: string; quantity: number }) => void;
	update: (value: { instrumentId: string; quantity: number }) => void;
};

describe("TypedEmitter", () => {
	it("emit() triggers registered on() handler with correct args", () => {
		const emitter = new TypedEmitter<StageEvents>();
		const handler = vi.fn();

		emitter.on("add", handler);
		emitter.emit("add", { instrumentId: "B10y", quantity: 1_000_000 });

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith({ instrumentId: "B10y", quantity: 1_000_000 });
	});

	it("handlers run in registration order", () => {
		const emitter = new TypedEmitter<StageEvents>();
		const calls: string[] = [];

		emitter.on("add", () => calls.push("first"));
		emitter.on("add", () => calls.push("second"));
		emitter.on("add", () => calls.push("third"));
		emitter.emit("add", { instrumentId: "B02y", quantity: 1 });

		expect(calls).toEqual(["first", "second", "third"]);
	});

	it("handlers run before emit returns", () => {
		const emitter = new TypedEmitter<StageEvents>();
		let seen = 0;

		emitter.on("add", (v) => {
			seen = v.quantity;
		});
		emitter.emit("add", { instrumentId: "B05y", quantity: 7 });

		expect(seen).toBe(7);
	});

	it("a throwing handler stops later handlers and the error reaches the caller", () => {
		const emitter = new TypedEmitter<StageEvents>();
		const later = vi.fn();

		emitter.on("add", () => {
			throw new Error("listener failed");
		});
		emitter.on("add", later);

		expect(() => emitter.emit("add", { instrumentId: "B07y", quantity: 1 })).toThrow(
			"listener failed",
		);
		expect(later).not.toHaveBeenCalled();
	});

	it("events are independent", () => {
		const emitter = new TypedEmitter<StageEvents>();
		const onAdd = vi.fn();

		emitter.on("add", onAdd);
		emitter.emit("update", { instrumentId: "B20y", quantity: 1 });

		expect(onAdd).not.toHaveBeenCalled();
	});

	it("emit returns false when no listeners", () => {
		const emitter = new TypedEmitter<StageEvents>();

		expect(emitter.emit("add", { instrumentId: "B30y", quantity: 0 })).toBe(false);
	});

	it("listenerCount() counts handlers per event", () => {
		const emitter = new TypedEmitter<StageEvents>();

		emitter.on("add", vi.fn());
		emitter.on("add", vi.fn());
		emitter.on("update", vi.fn());

		expect(emitter.listenerCount("add")).toBe(2);
		expect(emitter.listenerCount("update")).toBe(1);
	});
});
