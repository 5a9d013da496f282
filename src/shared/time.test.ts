import { describe, expect, it } from "vitest";
import { FakeClock, SystemClock } from "./time.js";

describe("Clock", () => {
	it("SystemClock returns current time", () => {
		const before = Date.now();
		const now = SystemClock.now();
		const after = Date.now();
		expect(now).toBeGreaterThanOrEqual(before);
		expect(now).toBeLessThanOrEqual(after);
	});

	describe("FakeClock", () => {
		it("starts at the given time, 0 by default", () => {
			expect(new FakeClock(1000).now()).toBe(1000);
			expect(new FakeClock().now()).toBe(0);
		});

		it("advance moves time forward", () => {
			const clock = new FakeClock(100);
			clock.advance(300);
			clock.advance(1);
			expect(clock.now()).toBe(401);
		});

		it("advance refuses to step backwards", () => {
			const clock = new FakeClock(100);
			expect(() => clock.advance(-1)).toThrow("FakeClock.advance: negative step -1");
			expect(clock.now()).toBe(100);
		});

		it("set jumps to an absolute time", () => {
			const clock = new FakeClock(100);
			clock.set(5_000);
			expect(clock.now()).toBe(5_000);
		});
	});
});
