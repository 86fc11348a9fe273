/**
 * Shared types for the ledger engines.
 */

import { AccountId, MarketConfig, QuarterRate } from "../core/index.js";
import { TransferDirection } from "../assets/index.js";
import { PendingEvent } from "../events/ledger-events.js";

/**
 * Market configuration with defaults filled in.
 */
export type ResolvedMarketConfig = Readonly<
	Omit<MarketConfig, "rateSchedule"> & {
		rateSchedule: readonly QuarterRate[];
	}
>;

/**
 * Inputs shared by every engine call. `now` is read once per operation.
 */
export interface OperationContext {
	config: ResolvedMarketConfig;
	now: number;
}

/**
 * One asset movement an operation needs once its state is committed.
 */
export interface PlannedTransfer {
	asset: "base" | "collateral";
	direction: TransferDirection;
	account: AccountId;
	amount: bigint;
}

/**
 * What an engine hands back to the market: the transfers to run, in order,
 * and the notification to emit once they succeed.
 */
export interface OperationPlan<TResult = void> {
	transfers: PlannedTransfer[];
	event: PendingEvent;
	result: TResult;
}
