/**
 * Collateral Vault
 *
 * Collateral bookkeeping for borrowers. A borrower record is created on the
 * first collateral deposit.
 */

import {
	AccountId,
	LedgerError,
	assertAccount,
	assertPositiveAmount,
} from "../../core/index.js";
import {
	LEDGER_COLLATERAL_DEPOSITED,
	LEDGER_COLLATERAL_WITHDRAWN,
} from "../../events/ledger-events.js";
import { LedgerSession } from "../../store/index.js";
import { applyBps } from "../credit/rate-schedule.js";
import { OperationContext, OperationPlan } from "../types.js";

export class CollateralVault {
	/**
	 * Lock `amount` of collateral for the caller.
	 *
	 * Also stamps `borrowTimestamp`, even with no loan open; `borrow`
	 * overwrites it.
	 */
	async depositCollateral(
		session: LedgerSession,
		ctx: OperationContext,
		caller: AccountId,
		amount: bigint,
	): Promise<OperationPlan> {
		assertAccount(caller, "caller");
		assertPositiveAmount(amount);

		const borrower = await session.getBorrower(caller);
		borrower.collateralDeposited += amount;
		borrower.borrowTimestamp = ctx.now;
		session.putBorrower(borrower);

		return {
			transfers: [
				{ asset: "collateral", direction: "pull", account: caller, amount },
			],
			event: {
				name: LEDGER_COLLATERAL_DEPOSITED,
				payload: {
					account: caller,
					amount: amount.toString(),
					collateralDeposited: borrower.collateralDeposited.toString(),
				},
			},
			result: undefined,
		};
	}

	/**
	 * Release collateral not needed to back the outstanding principal.
	 */
	async withdrawCollateral(
		session: LedgerSession,
		ctx: OperationContext,
		caller: AccountId,
		amount: bigint,
	): Promise<OperationPlan> {
		assertAccount(caller, "caller");
		assertPositiveAmount(amount);

		const borrower = await session.getBorrower(caller);
		if (amount > borrower.collateralDeposited) {
			throw new LedgerError(
				`Cannot withdraw ${amount} collateral: ${caller} has ${borrower.collateralDeposited} deposited`,
				"INSUFFICIENT_BALANCE",
				{
					requested: amount.toString(),
					available: borrower.collateralDeposited.toString(),
				},
			);
		}

		const remaining = borrower.collateralDeposited - amount;
		const capacity = applyBps(remaining, ctx.config.collateralRatio);
		if (borrower.amountBorrowed > capacity) {
			throw new LedgerError(
				`Withdrawing ${amount} collateral would leave ${borrower.amountBorrowed} borrowed against a limit of ${capacity}`,
				"COLLATERAL_LIMIT_EXCEEDED",
				{
					amountBorrowed: borrower.amountBorrowed.toString(),
					limit: capacity.toString(),
				},
			);
		}

		borrower.collateralDeposited = remaining;
		session.putBorrower(borrower);

		return {
			transfers: [
				{ asset: "collateral", direction: "push", account: caller, amount },
			],
			event: {
				name: LEDGER_COLLATERAL_WITHDRAWN,
				payload: {
					account: caller,
					amount: amount.toString(),
					collateralDeposited: remaining.toString(),
				},
			},
			result: undefined,
		};
	}
}
