/**
 * KeyedService — latest-value-per-key store with synchronous listener fan-out.
 *
 * Every stage extends this. Ingest is stage-specific (`onMessage`); the store
 * is owned by the stage and only read from outside through `lookup`.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { NotFoundError } from "../shared/errors.js";
import type { ListenerHost, ServiceListener } from "./listener.js";

type ServiceEvents<V> = {
	add: (value: V) => void;
};

export interface ServiceOptions {
	readonly logger?: Logger;
}

/**
 * @typeParam K - key of the stored values
 * @typeParam V - stored and notified value
 * @typeParam M - ingested message, when it differs from the stored value
 */
export abstract class KeyedService<K, V, M = V> implements ListenerHost<V> {
	protected readonly store = new Map<K, V>();
	protected readonly logger: Logger;
	private readonly registered: ServiceListener<V>[] = [];
	private readonly events = new TypedEmitter<ServiceEvents<V>>();

	constructor(
		readonly name: string,
		options: ServiceOptions = {},
	) {
		this.logger = (options.logger ?? silentLogger()).child({ stage: name });
	}

	/** Ingest one message. Cascades run to completion before this returns. */
	abstract onMessage(message: M): void;

	/** @throws NotFoundError when nothing has been stored under `key` */
	lookup(key: K): V {
		const value = this.store.get(key);
		if (value === undefined) {
			throw new NotFoundError(`${this.name}: no value for key ${String(key)}`, {
				stage: this.name,
				key: String(key),
			});
		}
		return value;
	}

	has(key: K): boolean {
		return this.store.has(key);
	}

	keys(): K[] {
		return [...this.store.keys()];
	}

	get size(): number {
		return this.store.size;
	}

	/** Appends a listener. Listeners are notified in registration order. */
	registerListener(listener: ServiceListener<V>): void {
		this.registered.push(listener);
		this.events.on("add", (value: V) => listener.processAdd(value));
	}

	listeners(): readonly ServiceListener<V>[] {
		return [...this.registered];
	}

	/**
	 * Calls every listener's `processAdd` in order. A throwing listener stops
	 * the fan-out and the error reaches the caller.
	 */
	protected notify(value: V): void {
		this.events.emit("add", value);
	}
}
