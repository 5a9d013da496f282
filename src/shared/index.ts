export {
	type InstrumentId,
	type TradeId,
	type BookId,
	type OrderId,
	type InquiryId,
	type AnyId,
	instrumentId,
	tradeId,
	bookId,
	orderId,
	inquiryId,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	mapErr,
	unwrap,
} from "./result.js";

export {
	ErrorCategory,
	DeskError,
	NotFoundError,
	UnknownInstrumentError,
	UnknownBookError,
	MalformedInputError,
	UnsupportedOperationError,
	InvalidTransitionError,
	ConfigError,
	toDeskError,
	isNotFoundError,
	isUnknownInstrumentError,
	isUnknownBookError,
	isMalformedInputError,
	isUnsupportedOperationError,
	isInvalidTransitionError,
	isConfigError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export {
	Side,
	PricingSide,
	oppositeSide,
	sideSign,
	tradeSideFor,
	isSide,
	isPricingSide,
} from "./sides.js";
export { type Clock, SystemClock, FakeClock } from "./time.js";
export {
	type DeskConfig,
	type Env,
	DEFAULT_DESK_CONFIG,
	UnknownBookPolicy,
	SideCounterScope,
	configFromEnv,
	resolveConfig,
} from "./config.js";
