/**
 * Liquidation Engine
 *
 * Decides when a position may be closed out by a third party and performs
 * the full seizure: the liquidator repays the outstanding principal and
 * receives all of the borrower's collateral.
 */

import {
	AccountId,
	BorrowerRecord,
	DAY,
	LedgerError,
	assertAccount,
} from "../../core/index.js";
import { LEDGER_LIQUIDATED } from "../../events/ledger-events.js";
import { LedgerSession } from "../../store/index.js";
import { CreditEngine, requireActiveLoan } from "../credit/credit-engine.js";
import {
	CREDIT_STATE_MACHINE,
	creditStateOf,
	hasActiveLoan,
} from "../credit/credit-state-machine.js";
import { loanAge } from "../credit/rate-schedule.js";
import { OperationContext, OperationPlan } from "../types.js";

export type LiquidationReason =
	| "matured" // Older than 365 days
	| "undercollateralized" // Ratio below the market threshold
	| "q3-repayment-shortfall" // Day 181-270 with < 25% of the baseline repaid
	| "q4-repayment-shortfall"; // Day 271-365 with < 50% of the baseline repaid

const MATURITY = 365 * DAY;
const Q2_END = 180 * DAY;
const Q3_END = 270 * DAY;

export interface LiquidationResult {
	debt: bigint;
	collateral: bigint;
	reasons: LiquidationReason[];
}

export class LiquidationEngine {
	constructor(private readonly credit: CreditEngine) {}

	/**
	 * Every rule the position currently breaks. Empty with no active loan.
	 */
	reasons(record: BorrowerRecord, ctx: OperationContext): LiquidationReason[] {
		if (!hasActiveLoan(record)) return [];

		const reasons: LiquidationReason[] = [];
		const age = loanAge(record.borrowTimestamp, ctx.now);

		if (age > MATURITY) {
			reasons.push("matured");
		}
		if (this.credit.collateralRatio(record) < BigInt(ctx.config.collateralRatio)) {
			reasons.push("undercollateralized");
		}
		// amountRepaid < 25% (resp. 50%) of initialBorrowAmount, without rounding
		if (
			age > Q2_END &&
			age <= Q3_END &&
			record.amountRepaid * 4n < record.initialBorrowAmount
		) {
			reasons.push("q3-repayment-shortfall");
		}
		if (
			age > Q3_END &&
			age <= MATURITY &&
			record.amountRepaid * 2n < record.initialBorrowAmount
		) {
			reasons.push("q4-repayment-shortfall");
		}

		return reasons;
	}

	isLiquidatable(record: BorrowerRecord, ctx: OperationContext): boolean {
		return this.reasons(record, ctx).length > 0;
	}

	/**
	 * Seize `borrower`'s collateral against repayment of its principal.
	 * Open to any account.
	 */
	async liquidate(
		session: LedgerSession,
		ctx: OperationContext,
		liquidator: AccountId,
		borrowerAccount: AccountId,
	): Promise<OperationPlan<LiquidationResult>> {
		assertAccount(liquidator, "liquidator");
		assertAccount(borrowerAccount, "borrower");

		const borrower = await session.findBorrower(borrowerAccount);
		requireActiveLoan(borrower, borrowerAccount);

		const reasons = this.reasons(borrower, ctx);
		if (reasons.length === 0) {
			throw new LedgerError(
				`${borrowerAccount} is not liquidatable`,
				"NOT_LIQUIDATABLE",
				{ collateralRatio: this.credit.collateralRatio(borrower).toString() },
			);
		}

		const debt = borrower.amountBorrowed;
		const collateral = borrower.collateralDeposited;

		CREDIT_STATE_MACHINE.transition(creditStateOf(borrower), "liquidate", {
			remaining: 0n,
		});
		borrower.amountBorrowed = 0n;
		borrower.collateralDeposited = 0n;
		borrower.borrowTimestamp = 0;
		borrower.lastIteration = ctx.now;

		const pool = await session.getPool();
		pool.totalSupplied += debt;
		pool.totalBorrowed -= debt;

		session.putBorrower(borrower);
		session.putPool(pool);

		const transfers: OperationPlan["transfers"] = [
			{ asset: "base", direction: "pull", account: liquidator, amount: debt },
		];
		if (collateral > 0n) {
			transfers.push({
				asset: "collateral",
				direction: "push",
				account: liquidator,
				amount: collateral,
			});
		}

		return {
			transfers,
			event: {
				name: LEDGER_LIQUIDATED,
				payload: {
					account: borrowerAccount,
					liquidator,
					debt: debt.toString(),
					collateral: collateral.toString(),
					reasons,
				},
			},
			result: { debt, collateral, reasons },
		};
	}
}
