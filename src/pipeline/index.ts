export { type ServiceListener, type ListenerHost, onAdd } from "./listener.js";
export { KeyedService, type ServiceOptions } from "./service.js";
export { connect, connectVia } from "./bridges.js";
