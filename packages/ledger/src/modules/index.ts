/**
 * Modules - Supply, collateral, credit and liquidation engines
 */

export type {
	ResolvedMarketConfig,
	OperationContext,
	PlannedTransfer,
	OperationPlan,
} from "./types.js";

export { SupplyLedger } from "./supply/supply-ledger.js";
export { CollateralVault } from "./collateral/collateral-vault.js";

export type { RepaymentQuote } from "./credit/credit-engine.js";
export { CreditEngine, requireActiveLoan } from "./credit/credit-engine.js";
export type {
	CreditState,
	CreditAction,
	CreditTransitionContext,
} from "./credit/credit-state-machine.js";
export {
	CREDIT_STATE_MACHINE,
	creditStateOf,
	hasActiveLoan,
} from "./credit/credit-state-machine.js";
export type { ResolvedRate } from "./credit/rate-schedule.js";
export { loanAge, resolveRate, applyBps } from "./credit/rate-schedule.js";

export type {
	LiquidationReason,
	LiquidationResult,
} from "./liquidation/liquidation-engine.js";
export { LiquidationEngine } from "./liquidation/liquidation-engine.js";
