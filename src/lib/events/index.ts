import { EventEmitter } from "eventemitter3";

// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

type EventName<TEvents extends EventMap> = keyof TEvents & string;

/**
 * Compile-time checked facade over eventemitter3.
 *
 * eventemitter3 dispatches synchronously, in registration order, and does not
 * catch: an exception from a handler skips the handlers after it and is
 * rethrown from `emit`. Stage fan-out depends on all three.
 *
 * @example
 * ```ts
 * type StageEvents = { add: (trade: Trade) => void };
 * const events = new TypedEmitter<StageEvents>();
 * events.on("add", (trade) => positions.addTrade(trade));
 * events.emit("add", trade);
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly emitter = new EventEmitter();

	/** Appends `handler` after every handler already registered for `event`. */
	on<K extends EventName<TEvents>>(event: K, handler: TEvents[K]): this {
		this.emitter.on(event, handler as (...args: unknown[]) => void);
		return this;
	}

	/** @returns false when nobody listens to `event` */
	emit<K extends EventName<TEvents>>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.emitter.emit(event, ...args);
	}

	listenerCount(event: EventName<TEvents>): number {
		return this.emitter.listenerCount(event);
	}
}
