/**
 * Credit State Machine
 *
 * Per-borrower loan lifecycle. The state is derived from the record:
 * `active` while principal is outstanding, `no-loan` otherwise.
 */

import { BorrowerRecord } from "../../core/index.js";
import { StateMachine } from "../../state/state-machine.js";

export type CreditState = "no-loan" | "active";

export type CreditAction =
	| "borrow" // Draw principal
	| "repay" // Partial repayment, loan stays open
	| "close" // Repayment that clears the principal
	| "liquidate"; // Forced closure by a third party

export interface CreditTransitionContext {
	/** Principal outstanding after the action */
	remaining: bigint;
}

export const CREDIT_STATE_MACHINE = new StateMachine<
	CreditState,
	CreditAction,
	CreditTransitionContext
>({
	states: [
		{
			name: "no-loan",
			allowedActions: ["borrow"],
			description: "No principal outstanding",
		},
		{
			name: "active",
			allowedActions: ["borrow", "repay", "close", "liquidate"],
			description: "Principal outstanding, interest accruing",
		},
	],
	transitions: [
		{ from: ["no-loan", "active"], action: "borrow", to: "active" },
		{
			from: "active",
			action: "repay",
			to: "active",
			guard: (ctx) => ctx.remaining > 0n,
		},
		{
			from: "active",
			action: "close",
			to: "no-loan",
			guard: (ctx) => ctx.remaining === 0n,
		},
		{
			from: "active",
			action: "liquidate",
			to: "no-loan",
			guard: (ctx) => ctx.remaining === 0n,
		},
	],
});

export function creditStateOf(
	record: Pick<BorrowerRecord, "amountBorrowed">,
): CreditState {
	return record.amountBorrowed > 0n ? "active" : "no-loan";
}

/**
 * Check if a borrower has an active loan.
 */
export function hasActiveLoan(
	record: Pick<BorrowerRecord, "amountBorrowed">,
): boolean {
	return creditStateOf(record) === "active";
}
