/**
 * Collateral Ledger
 *
 * Bookkeeping for a single-pool, over-collateralized lending market:
 * lender supply, borrower collateral, quarterly interest and fees, and
 * third-party liquidation.
 *
 * @example
 * ```typescript
 * import {
 *   LendingMarket,
 *   MemoryLedgerStore,
 *   MemoryAsset,
 * } from "@collateral-ledger/ledger";
 *
 * const usd = new MemoryAsset("USD", "custody");
 * const eth = new MemoryAsset("ETH", "custody");
 *
 * const market = new LendingMarket({
 *   config: {
 *     marketId: "usd-eth",
 *     owner: "owner",
 *     baseAsset: "USD",
 *     collateralAsset: "ETH",
 *     collateralRatio: 8000,
 *     protocolFeeBps: 100,
 *     feeRecipient: "treasury",
 *   },
 *   store: new MemoryLedgerStore(),
 *   base: usd,
 *   collateral: eth,
 * });
 *
 * usd.mint("lender", 1_000n);
 * usd.approve("lender", "custody", 1_000n);
 * await market.deposit("lender", 1_000n);
 * ```
 */

// Core - Records, configuration and errors
export {
	type AccountId,
	type LenderRecord,
	type BorrowerRecord,
	type PoolState,
	type QuarterRate,
	type MarketConfig,
	type LedgerErrorCode,
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
	LEDGER_ERROR_CODES,
	LedgerError,
	isLedgerError,
	toError,
} from "./core/index.js";

// State - Transition tables
export {
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	type StateMachineErrorCode,
	StateMachine,
	StateMachineError,
} from "./state/state-machine.js";

// Store - Persistence
export {
	type LedgerChangeset,
	type LedgerStore,
	StoreError,
	MemoryLedgerStore,
	LedgerSession,
} from "./store/index.js";

// Assets - Value transfer
export {
	type AssetTransfer,
	type TransferDirection,
	AssetTransferError,
	MemoryAsset,
} from "./assets/index.js";

// Events
export * from "./events/ledger-events.js";

// Modules - Engines
export * from "./modules/index.js";

// Market - Facade
export * from "./market/index.js";
