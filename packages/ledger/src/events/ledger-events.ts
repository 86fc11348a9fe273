/**
 * Ledger notifications
 *
 * One event per successful mutating operation, emitted after every state
 * change and transfer has completed. Amounts are decimal strings so that
 * payloads survive JSON transport.
 */

import { AccountId } from "../core/index.js";

type LedgerEventBase = {
	eventId: string;
	marketId: string;
	occurredAt: string; // ISO timestamp
};

export const LEDGER_DEPOSITED = "ledger.deposited";
export type Deposited = LedgerEventBase & {
	account: AccountId;
	amount: string;
	amountSupplied: string;
};

export const LEDGER_WITHDRAWN = "ledger.withdrawn";
export type Withdrawn = LedgerEventBase & {
	account: AccountId;
	amount: string;
	amountSupplied: string;
};

export const LEDGER_COLLATERAL_DEPOSITED = "ledger.collateral-deposited";
export type CollateralDeposited = LedgerEventBase & {
	account: AccountId;
	amount: string;
	collateralDeposited: string;
};

export const LEDGER_COLLATERAL_WITHDRAWN = "ledger.collateral-withdrawn";
export type CollateralWithdrawn = LedgerEventBase & {
	account: AccountId;
	amount: string;
	collateralDeposited: string;
};

export const LEDGER_BORROWED = "ledger.borrowed";
export type Borrowed = LedgerEventBase & {
	account: AccountId;
	amount: string;
	amountBorrowed: string;
};

export const LEDGER_REPAID = "ledger.repaid";
export type Repaid = LedgerEventBase & {
	account: AccountId;
	principal: string;
	interest: string;
	fee: string;
	quarter: number;
	closed: boolean;
};

export const LEDGER_LIQUIDATED = "ledger.liquidated";
export type Liquidated = LedgerEventBase & {
	account: AccountId;
	liquidator: AccountId;
	debt: string;
	collateral: string;
	reasons: string[];
};

export const LEDGER_FEE_RECIPIENT_UPDATED = "ledger.fee-recipient-updated";
export type FeeRecipientUpdated = LedgerEventBase & {
	account: AccountId;
	previousRecipient: AccountId;
	feeRecipient: AccountId;
};

export interface LedgerEventMap {
	[LEDGER_DEPOSITED]: Deposited;
	[LEDGER_WITHDRAWN]: Withdrawn;
	[LEDGER_COLLATERAL_DEPOSITED]: CollateralDeposited;
	[LEDGER_COLLATERAL_WITHDRAWN]: CollateralWithdrawn;
	[LEDGER_BORROWED]: Borrowed;
	[LEDGER_REPAID]: Repaid;
	[LEDGER_LIQUIDATED]: Liquidated;
	[LEDGER_FEE_RECIPIENT_UPDATED]: FeeRecipientUpdated;
}

export type LedgerEventName = keyof LedgerEventMap;
export type LedgerEvent = LedgerEventMap[LedgerEventName];

export const LEDGER_EVENT_NAMES: LedgerEventName[] = [
	LEDGER_DEPOSITED,
	LEDGER_WITHDRAWN,
	LEDGER_COLLATERAL_DEPOSITED,
	LEDGER_COLLATERAL_WITHDRAWN,
	LEDGER_BORROWED,
	LEDGER_REPAID,
	LEDGER_LIQUIDATED,
	LEDGER_FEE_RECIPIENT_UPDATED,
];

/**
 * An event as produced by an engine, before the market stamps it.
 */
export type PendingEvent = {
	[K in LedgerEventName]: {
		name: K;
		payload: Omit<LedgerEventMap[K], keyof LedgerEventBase>;
	};
}[LedgerEventName];

/**
 * Anything with an `emit` method, such as an EventEmitter2 instance.
 */
export interface LedgerEventSink {
	emit(event: LedgerEventName, payload: LedgerEvent): unknown;
}
