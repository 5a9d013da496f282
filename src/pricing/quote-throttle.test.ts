import { describe, expect, it } from "vitest";
import { ConfigError } from "../shared/errors.js";
import { FakeClock } from "../shared/time.js";
import { QuoteThrottle } from "./quote-throttle.js";

describe("QuoteThrottle", () => {
	function createThrottle(intervalMs = 300) {
		const clock = new FakeClock(1_000);
		const throttle = new QuoteThrottle({ intervalMs, clock });
		return { throttle, clock };
	}

	it("the first call always passes", () => {
		const { throttle } = createThrottle();
		expect(throttle.lastPassedAt()).toBeNull();
		expect(throttle.tryAcquire()).toBe(true);
		expect(throttle.lastPassedAt()).toBe(1_000);
	});

	it("blocks calls 100ms apart", () => {
		const { throttle, clock } = createThrottle();
		throttle.tryAcquire();
		clock.advance(100);
		expect(throttle.tryAcquire()).toBe(false);
	});

	it("passes calls 400ms apart", () => {
		const { throttle, clock } = createThrottle();
		throttle.tryAcquire();
		clock.advance(400);
		expect(throttle.tryAcquire()).toBe(true);
	});

	it("exactly the interval is not enough", () => {
		const { throttle, clock } = createThrottle();
		throttle.tryAcquire();
		clock.advance(300);
		expect(throttle.tryAcquire()).toBe(false);
		clock.advance(1);
		expect(throttle.tryAcquire()).toBe(true);
	});

	it("dropped calls do not move the window", () => {
		const { throttle, clock } = createThrottle();
		throttle.tryAcquire();
		clock.advance(200);
		expect(throttle.tryAcquire()).toBe(false);
		clock.advance(200);
		expect(throttle.tryAcquire()).toBe(true);
		expect(throttle.lastPassedAt()).toBe(1_400);
	});

	it("counts delivered and dropped calls", () => {
		const { throttle, clock } = createThrottle();
		throttle.tryAcquire();
		throttle.tryAcquire();
		throttle.tryAcquire();
		clock.advance(301);
		throttle.tryAcquire();
		expect(throttle.getStats()).toEqual({ delivered: 2, dropped: 2 });
	});

	it("a zero interval passes calls at distinct times only", () => {
		const { throttle, clock } = createThrottle(0);
		expect(throttle.tryAcquire()).toBe(true);
		expect(throttle.tryAcquire()).toBe(false);
		clock.advance(1);
		expect(throttle.tryAcquire()).toBe(true);
	});

	it("rejects a negative interval", () => {
		expect(() => new QuoteThrottle({ intervalMs: -1, clock: new FakeClock() })).toThrow(ConfigError);
	});
});
