import { ConfigError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";

export interface QuoteThrottleConfig {
	/** A quote passes only when strictly more than this many ms have elapsed since the last one that passed */
	readonly intervalMs: number;
	readonly clock: Clock;
}

/** Snapshot of throttle usage statistics. */
export interface QuoteThrottleStats {
	readonly delivered: number;
	readonly dropped: number;
}

/**
 * Elapsed-time gate with injectable clock.
 *
 * The first call always passes. Later calls pass when `now − lastPassed`
 * exceeds `intervalMs`; rejected calls do not move the window.
 */
export class QuoteThrottle {
	private readonly intervalMs: number;
	private readonly clock: Clock;
	private lastPassedMs: number | null = null;

	private _delivered = 0;
	private _dropped = 0;

	constructor(config: QuoteThrottleConfig) {
		if (!Number.isFinite(config.intervalMs) || config.intervalMs < 0) {
			throw new ConfigError("intervalMs must be a non-negative number", {
				intervalMs: config.intervalMs,
			});
		}
		this.intervalMs = config.intervalMs;
		this.clock = config.clock;
	}

	/**
	 * @returns true when the caller may deliver now
	 * @example
	 * if (throttle.tryAcquire()) {
	 *   sink.publish(quote);
	 * }
	 */
	tryAcquire(): boolean {
		const now = this.clock.now();
		if (this.lastPassedMs === null || now - this.lastPassedMs > this.intervalMs) {
			this.lastPassedMs = now;
			this._delivered++;
			return true;
		}
		this._dropped++;
		return false;
	}

	/** Time of the last call that passed, or null before the first. */
	lastPassedAt(): number | null {
		return this.lastPassedMs;
	}

	getStats(): QuoteThrottleStats {
		return { delivered: this._delivered, dropped: this._dropped };
	}
}
