/**
 * Clocks. Record timestamps and the quote throttle window read the time from
 * an injected Clock, never from `Date.now()` directly.
 */

/** Milliseconds since the epoch. */
export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Manually driven clock for tests: time only changes through `advance` and `set`. */
export class FakeClock implements Clock {
	private current: number;

	constructor(startMs = 0) {
		this.current = startMs;
	}

	now(): number {
		return this.current;
	}

	/** @throws RangeError for a negative step; use `set` to go back */
	advance(ms: number): void {
		if (ms < 0) {
			throw new RangeError(`FakeClock.advance: negative step ${ms}`);
		}
		this.current += ms;
	}

	set(ms: number): void {
		this.current = ms;
	}
}
