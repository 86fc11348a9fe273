/**
 * Market module - The lending market facade and its execution plumbing
 */

export type {
	LedgerLogger,
	LendingMarketOptions,
	BorrowerPosition,
} from "./lending-market.js";
export { LendingMarket } from "./lending-market.js";

export type { Clock } from "./clock.js";
export { systemClock, ManualClock } from "./clock.js";

export { SerialExecutor } from "./serial-executor.js";
