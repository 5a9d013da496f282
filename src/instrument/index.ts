export { type InstrumentLike, type Bond, InstrumentIdType } from "./types.js";
export { InstrumentCatalog, bond, treasuryBonds } from "./catalog.js";
