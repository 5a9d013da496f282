export { Position } from "./position.js";
export { PositionService, type PositionServiceOptions } from "./position-service.js";
