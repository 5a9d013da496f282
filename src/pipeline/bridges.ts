import { type ListenerHost, onAdd } from "./listener.js";

/** Forward every value `source` notifies into `ingest`. */
export function connect<V>(source: ListenerHost<V>, ingest: (value: V) => void): void {
	source.registerListener(onAdd(ingest));
}

/** Forward every value `source` notifies, converted by `transform`, into `ingest`. */
export function connectVia<V, W>(
	source: ListenerHost<V>,
	transform: (value: V) => W,
	ingest: (value: W) => void,
): void {
	source.registerListener(onAdd((value: V) => ingest(transform(value))));
}
