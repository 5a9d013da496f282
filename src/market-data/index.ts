export type { Order, OrderBook, BidOffer } from "./types.js";
export { MarketDataService, topOfBook } from "./market-data-service.js";
