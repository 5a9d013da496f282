/**
 * Desk configuration.
 *
 * Every setting has a default. `resolveConfig` layers defaults, then
 * `BONDDESK_*` environment variables, then explicit overrides, and validates
 * the result.
 */

import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export const UnknownBookPolicy = {
	Drop: "drop",
	Throw: "throw",
} as const;

export type UnknownBookPolicy = (typeof UnknownBookPolicy)[keyof typeof UnknownBookPolicy];

export const SideCounterScope = {
	Stage: "stage",
	Instrument: "instrument",
} as const;

export type SideCounterScope = (typeof SideCounterScope)[keyof typeof SideCounterScope];

export interface DeskConfig {
	/** Minimum gap in milliseconds between two delivered GUI quotes */
	readonly quoteThrottleMs: number;
	/** Visible quantity on each leg of a two-sided stream */
	readonly streamVisibleQuantity: number;
	/** Hidden quantity on each leg of a two-sided stream */
	readonly streamHiddenQuantity: number;
	/** Largest bid/offer spread at which the algo execution stage trades (decimal string) */
	readonly executionSpreadTolerance: string;
	/** Share of an execution quantity placed hidden (decimal string) */
	readonly hiddenRatio: string;
	/** Per-unit PV01 sensitivity (decimal string) */
	readonly pv01PerUnit: string;
	/** What the position stage does with a trade for a book it does not carry */
	readonly unknownBookPolicy: UnknownBookPolicy;
	/** Whether the execution side alternation is shared or kept per instrument */
	readonly sideCounterScope: SideCounterScope;
	/** Quantity assigned to inquiries read from a feed */
	readonly inquiryQuantity: number;
	/** Price the quote responder assigns when no price source is supplied (decimal string) */
	readonly inquiryQuotePrice: string;
	/** Order-book level i carries orderBookSizeStep × (i + 1) */
	readonly orderBookSizeStep: number;
}

export const DEFAULT_DESK_CONFIG: DeskConfig = {
	quoteThrottleMs: 300,
	streamVisibleQuantity: 1_000_000,
	streamHiddenQuantity: 1_000_000,
	executionSpreadTolerance: "0.015625",
	hiddenRatio: "0.9",
	pv01PerUnit: "0.02",
	unknownBookPolicy: UnknownBookPolicy.Drop,
	sideCounterScope: SideCounterScope.Stage,
	inquiryQuantity: 1_000_000,
	inquiryQuotePrice: "100",
	orderBookSizeStep: 1_000_000,
};

const decimalString = z
	.string()
	.regex(/^-?\d+(\.\d+)?$/, "must be a plain decimal number");

const nonNegativeDecimalString = decimalString.refine((s) => !s.startsWith("-"), {
	message: "must not be negative",
});

const DeskConfigSchema = z.object({
	quoteThrottleMs: z.number().int().nonnegative(),
	streamVisibleQuantity: z.number().int().nonnegative(),
	streamHiddenQuantity: z.number().int().nonnegative(),
	executionSpreadTolerance: nonNegativeDecimalString,
	hiddenRatio: nonNegativeDecimalString,
	pv01PerUnit: decimalString,
	unknownBookPolicy: z.enum([UnknownBookPolicy.Drop, UnknownBookPolicy.Throw]),
	sideCounterScope: z.enum([SideCounterScope.Stage, SideCounterScope.Instrument]),
	inquiryQuantity: z.number().int().positive(),
	inquiryQuotePrice: nonNegativeDecimalString,
	orderBookSizeStep: z.number().int().positive(),
});

/** Mutable builder shape for constructing Partial<DeskConfig> without TS4111 index issues. */
type MutableDeskConfig = { -readonly [K in keyof DeskConfig]?: DeskConfig[K] };

type IntKey = {
	[K in keyof DeskConfig]: number extends DeskConfig[K] ? K : never;
}[keyof DeskConfig];

type StringKey = {
	[K in keyof DeskConfig]: string extends DeskConfig[K] ? K : never;
}[keyof DeskConfig];

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads desk settings from `BONDDESK_*` environment variables.
 * Supported: BONDDESK_QUOTE_THROTTLE_MS, BONDDESK_STREAM_VISIBLE_QUANTITY,
 * BONDDESK_STREAM_HIDDEN_QUANTITY, BONDDESK_EXECUTION_SPREAD_TOLERANCE,
 * BONDDESK_HIDDEN_RATIO, BONDDESK_PV01_PER_UNIT, BONDDESK_UNKNOWN_BOOK_POLICY,
 * BONDDESK_SIDE_COUNTER_SCOPE, BONDDESK_INQUIRY_QUANTITY,
 * BONDDESK_INQUIRY_QUOTE_PRICE, BONDDESK_ORDER_BOOK_SIZE_STEP.
 * @throws ConfigError if a numeric variable is not a non-negative integer
 */
export function configFromEnv(env: Env = process.env): Partial<DeskConfig> {
	const result: MutableDeskConfig = {};

	parseIntEnv(env, "BONDDESK_QUOTE_THROTTLE_MS", "quoteThrottleMs", result);
	parseIntEnv(env, "BONDDESK_STREAM_VISIBLE_QUANTITY", "streamVisibleQuantity", result);
	parseIntEnv(env, "BONDDESK_STREAM_HIDDEN_QUANTITY", "streamHiddenQuantity", result);
	parseIntEnv(env, "BONDDESK_INQUIRY_QUANTITY", "inquiryQuantity", result);
	parseIntEnv(env, "BONDDESK_ORDER_BOOK_SIZE_STEP", "orderBookSizeStep", result);

	copyStringEnv(env, "BONDDESK_EXECUTION_SPREAD_TOLERANCE", "executionSpreadTolerance", result);
	copyStringEnv(env, "BONDDESK_HIDDEN_RATIO", "hiddenRatio", result);
	copyStringEnv(env, "BONDDESK_PV01_PER_UNIT", "pv01PerUnit", result);
	copyStringEnv(env, "BONDDESK_INQUIRY_QUOTE_PRICE", "inquiryQuotePrice", result);

	const policy = env["BONDDESK_UNKNOWN_BOOK_POLICY"];
	if (policy) {
		if (policy !== UnknownBookPolicy.Drop && policy !== UnknownBookPolicy.Throw) {
			throw new ConfigError(`Invalid BONDDESK_UNKNOWN_BOOK_POLICY: "${policy}"`);
		}
		result.unknownBookPolicy = policy;
	}

	const scope = env["BONDDESK_SIDE_COUNTER_SCOPE"];
	if (scope) {
		if (scope !== SideCounterScope.Stage && scope !== SideCounterScope.Instrument) {
			throw new ConfigError(`Invalid BONDDESK_SIDE_COUNTER_SCOPE: "${scope}"`);
		}
		result.sideCounterScope = scope;
	}

	return result;
}

/**
 * Defaults, then environment, then overrides.
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(
	overrides: Partial<DeskConfig> = {},
	env: Env = process.env,
): DeskConfig {
	const merged = { ...DEFAULT_DESK_CONFIG, ...configFromEnv(env), ...overrides };
	const result = validate(DeskConfigSchema, merged);
	if (!result.ok) {
		throw new ConfigError(`Invalid desk config: ${result.error.summary()}`, {
			issues: result.error.issues,
		});
	}
	return result.value;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(env: Env, envKey: string, configKey: IntKey, result: MutableDeskConfig): void {
	const raw = env[envKey];
	if (!raw) return;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < 0) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a non-negative integer`);
	}
	result[configKey] = parsed;
}

function copyStringEnv(
	env: Env,
	envKey: string,
	configKey: StringKey,
	result: MutableDeskConfig,
): void {
	const raw = env[envKey];
	if (!raw) return;
	result[configKey] = raw.trim();
}
