export { PV01, BucketedSector } from "./pv01.js";
export { RiskService, type RiskServiceOptions } from "./risk-service.js";
