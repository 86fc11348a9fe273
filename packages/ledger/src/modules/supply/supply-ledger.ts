/**
 * Supply Ledger
 *
 * Deposit and withdrawal bookkeeping for the lendable asset. Keeps the sum
 * of lender balances and the pool's `totalSupplied` moving together.
 */

import {
	AccountId,
	LedgerError,
	assertAccount,
	assertPositiveAmount,
} from "../../core/index.js";
import {
	LEDGER_DEPOSITED,
	LEDGER_WITHDRAWN,
} from "../../events/ledger-events.js";
import { LedgerSession } from "../../store/index.js";
import { OperationContext, OperationPlan } from "../types.js";

export class SupplyLedger {
	/**
	 * Credit `amount` to the caller's supplied balance and the pool.
	 * The base asset is pulled from the caller afterwards.
	 */
	async deposit(
		session: LedgerSession,
		ctx: OperationContext,
		caller: AccountId,
		amount: bigint,
	): Promise<OperationPlan> {
		assertAccount(caller, "caller");
		assertPositiveAmount(amount);

		const lender = await session.getLender(caller);
		const pool = await session.getPool();

		lender.amountSupplied += amount;
		lender.depositTimestamp = ctx.now;
		pool.totalSupplied += amount;

		session.putLender(lender);
		session.putPool(pool);

		return {
			transfers: [{ asset: "base", direction: "pull", account: caller, amount }],
			event: {
				name: LEDGER_DEPOSITED,
				payload: {
					account: caller,
					amount: amount.toString(),
					amountSupplied: lender.amountSupplied.toString(),
				},
			},
			result: undefined,
		};
	}

	/**
	 * Debit `amount` from the caller's supplied balance and the pool, then
	 * push it to the caller.
	 */
	async withdraw(
		session: LedgerSession,
		_ctx: OperationContext,
		caller: AccountId,
		amount: bigint,
	): Promise<OperationPlan> {
		assertAccount(caller, "caller");
		assertPositiveAmount(amount);

		const lender = await session.getLender(caller);
		if (amount > lender.amountSupplied) {
			throw new LedgerError(
				`Cannot withdraw ${amount}: ${caller} has ${lender.amountSupplied} supplied`,
				"INSUFFICIENT_BALANCE",
				{ requested: amount.toString(), available: lender.amountSupplied.toString() },
			);
		}

		const pool = await session.getPool();
		if (amount > pool.totalSupplied) {
			// The rest is lent out.
			throw new LedgerError(
				`Cannot withdraw ${amount}: pool liquidity is ${pool.totalSupplied}`,
				"INSUFFICIENT_LIQUIDITY",
				{ requested: amount.toString(), available: pool.totalSupplied.toString() },
			);
		}

		lender.amountSupplied -= amount;
		pool.totalSupplied -= amount;

		session.putLender(lender);
		session.putPool(pool);

		return {
			transfers: [{ asset: "base", direction: "push", account: caller, amount }],
			event: {
				name: LEDGER_WITHDRAWN,
				payload: {
					account: caller,
					amount: amount.toString(),
					amountSupplied: lender.amountSupplied.toString(),
				},
			},
			result: undefined,
		};
	}
}
