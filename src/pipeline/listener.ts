/**
 * Listener contract between stages.
 *
 * A stage notifies its listeners through `processAdd`. `processRemove` and
 * `processUpdate` are part of the contract but no stage emits them.
 */
export interface ServiceListener<V> {
	processAdd(value: V): void;
	processRemove(value: V): void;
	processUpdate(value: V): void;
}

/** Anything listeners can be attached to. */
export interface ListenerHost<V> {
	registerListener(listener: ServiceListener<V>): void;
}

/** Listener that forwards adds to `fn` and ignores removes and updates. */
export function onAdd<V>(fn: (value: V) => void): ServiceListener<V> {
	return {
		processAdd: fn,
		processRemove: () => undefined,
		processUpdate: () => undefined,
	};
}
