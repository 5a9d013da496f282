export { OrderType, Market, type ExecutionOrder } from "./types.js";
export { AlgoExecutionService, type AlgoExecutionServiceOptions } from "./algo-execution-service.js";
export { ExecutionService, type ExecutionServiceOptions } from "./execution-service.js";
