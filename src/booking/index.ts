export { DESK_BOOKS, type Trade } from "./types.js";
export { TradeBookingService } from "./trade-booking-service.js";
export { tradeFromExecution, executedTradeId, cycleBooks } from "./trade-from-execution.js";
