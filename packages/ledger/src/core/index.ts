/**
 * Core module - Records, configuration and errors
 */

// Types
export type {
	AccountId,
	LenderRecord,
	BorrowerRecord,
	PoolState,
	QuarterRate,
	MarketConfig,
} from "./types.js";

// Constants and validation
export {
	BPS_DENOMINATOR,
	DAY,
	MAX_AMOUNT,
	MIN_COLLATERAL_RATIO_BPS,
	MAX_COLLATERAL_RATIO_BPS,
	DEFAULT_RATE_SCHEDULE,
	emptyLender,
	emptyBorrower,
	emptyPool,
	assertPositiveAmount,
	assertAccount,
	validateMarketConfig,
	validateRateSchedule,
} from "./types.js";

// Errors
export type { LedgerErrorCode } from "./errors.js";
export {
	LEDGER_ERROR_CODES,
	LedgerError,
	isLedgerError,
	toError,
} from "./errors.js";
