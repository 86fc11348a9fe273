/**
 * Credit Engine
 *
 * Borrow-limit enforcement, borrow and repay transitions, and the
 * principal, interest and fee arithmetic behind them.
 */

import {
	AccountId,
	BPS_DENOMINATOR,
	BorrowerRecord,
	LedgerError,
	MAX_AMOUNT,
	assertAccount,
	assertPositiveAmount,
} from "../../core/index.js";
import { LEDGER_BORROWED, LEDGER_REPAID } from "../../events/ledger-events.js";
import { LedgerSession } from "../../store/index.js";
import {
	OperationContext,
	OperationPlan,
	PlannedTransfer,
	ResolvedMarketConfig,
} from "../types.js";
import {
	CREDIT_STATE_MACHINE,
	creditStateOf,
	hasActiveLoan,
} from "./credit-state-machine.js";
import { applyBps, loanAge, resolveRate } from "./rate-schedule.js";

/**
 * What a repayment of a given principal costs right now.
 */
export interface RepaymentQuote {
	principal: bigint;
	/** Interest for the current quarter over the whole outstanding principal */
	interest: bigint;
	/** Charged only when the repayment closes the loan */
	fee: bigint;
	/** principal + interest, pulled from the payer */
	total: bigint;
	closesLoan: boolean;
	quarter: number;
	interestBps: number;
	feeBps: number;
}

/**
 * @throws LedgerError `NO_ACTIVE_LOAN` unless principal is outstanding
 */
export function requireActiveLoan(
	record: BorrowerRecord | null,
	account?: AccountId,
): asserts record is BorrowerRecord {
	if (!record || !hasActiveLoan(record)) {
		throw new LedgerError(
			`${record?.account ?? account ?? "Borrower"} has no active loan`,
			"NO_ACTIVE_LOAN",
		);
	}
}

export class CreditEngine {
	/**
	 * Principal the collateral can back: collateral * ratio / 10000.
	 */
	maxBorrowable(
		record: Pick<BorrowerRecord, "collateralDeposited">,
		config: ResolvedMarketConfig,
	): bigint {
		return applyBps(record.collateralDeposited, config.collateralRatio);
	}

	/**
	 * Interest owed now on the outstanding principal, 0 with no active loan.
	 */
	accruedInterest(record: BorrowerRecord, ctx: OperationContext): bigint {
		if (!hasActiveLoan(record)) return 0n;
		const rate = resolveRate(
			loanAge(record.borrowTimestamp, ctx.now),
			ctx.config.rateSchedule,
		);
		return applyBps(record.amountBorrowed, rate.interestBps);
	}

	/**
	 * Outstanding principal plus current-quarter interest.
	 */
	totalDebt(record: BorrowerRecord, ctx: OperationContext): bigint {
		if (!hasActiveLoan(record)) return 0n;
		return record.amountBorrowed + this.accruedInterest(record, ctx);
	}

	/**
	 * collateral * 10000 / principal, or MAX_AMOUNT with no active loan.
	 */
	collateralRatio(record: BorrowerRecord): bigint {
		if (!hasActiveLoan(record)) return MAX_AMOUNT;
		return (record.collateralDeposited * BPS_DENOMINATOR) / record.amountBorrowed;
	}

	async borrow(
		session: LedgerSession,
		ctx: OperationContext,
		caller: AccountId,
		amount: bigint,
	): Promise<OperationPlan> {
		assertAccount(caller, "caller");
		assertPositiveAmount(amount);

		const borrower = await session.getBorrower(caller);
		if (borrower.collateralDeposited === 0n) {
			throw new LedgerError(
				`${caller} has no collateral deposited`,
				"COLLATERAL_LIMIT_EXCEEDED",
				{ requested: amount.toString(), limit: "0" },
			);
		}

		const limit = this.maxBorrowable(borrower, ctx.config);
		if (borrower.amountBorrowed + amount > limit) {
			throw new LedgerError(
				`Borrowing ${amount} would exceed the collateral limit of ${limit} (${borrower.amountBorrowed} already borrowed)`,
				"COLLATERAL_LIMIT_EXCEEDED",
				{
					requested: amount.toString(),
					amountBorrowed: borrower.amountBorrowed.toString(),
					limit: limit.toString(),
				},
			);
		}

		const pool = await session.getPool();
		if (amount > pool.totalSupplied) {
			throw new LedgerError(
				`Cannot borrow ${amount}: pool liquidity is ${pool.totalSupplied}`,
				"INSUFFICIENT_LIQUIDITY",
				{ requested: amount.toString(), available: pool.totalSupplied.toString() },
			);
		}

		CREDIT_STATE_MACHINE.transition(creditStateOf(borrower), "borrow", {
			remaining: borrower.amountBorrowed + amount,
		});
		borrower.amountBorrowed += amount;
		borrower.initialBorrowAmount += amount;
		borrower.borrowTimestamp = ctx.now;
		borrower.lastIteration = ctx.now;
		pool.totalSupplied -= amount;
		pool.totalBorrowed += amount;

		session.putBorrower(borrower);
		session.putPool(pool);

		return {
			transfers: [{ asset: "base", direction: "push", account: caller, amount }],
			event: {
				name: LEDGER_BORROWED,
				payload: {
					account: caller,
					amount: amount.toString(),
					amountBorrowed: borrower.amountBorrowed.toString(),
				},
			},
			result: undefined,
		};
	}

	/**
	 * Price a repayment without changing anything.
	 *
	 * @throws LedgerError `INVALID_AMOUNT`, `NO_ACTIVE_LOAN` or `OVER_REPAYMENT`
	 */
	quote(
		record: BorrowerRecord | null,
		ctx: OperationContext,
		principal: bigint,
	): RepaymentQuote {
		assertPositiveAmount(principal, "principalAmount");
		requireActiveLoan(record);

		if (principal > record.amountBorrowed) {
			throw new LedgerError(
				`Cannot repay ${principal}: only ${record.amountBorrowed} is outstanding`,
				"OVER_REPAYMENT",
				{
					requested: principal.toString(),
					amountBorrowed: record.amountBorrowed.toString(),
				},
			);
		}

		const rate = resolveRate(
			loanAge(record.borrowTimestamp, ctx.now),
			ctx.config.rateSchedule,
		);
		const interest = applyBps(record.amountBorrowed, rate.interestBps);
		const closesLoan = principal === record.amountBorrowed;

		return {
			principal,
			interest,
			fee: closesLoan ? applyBps(interest, rate.feeBps) : 0n,
			total: principal + interest,
			closesLoan,
			quarter: rate.quarter,
			interestBps: rate.interestBps,
			feeBps: rate.feeBps,
		};
	}

	/**
	 * Repay principal plus the current quarter's interest. Closing the loan
	 * sends the fee share of the interest to the fee recipient.
	 */
	async repay(
		session: LedgerSession,
		ctx: OperationContext,
		caller: AccountId,
		principal: bigint,
	): Promise<OperationPlan<RepaymentQuote>> {
		assertAccount(caller, "caller");
		assertPositiveAmount(principal, "principalAmount");

		const borrower = await session.findBorrower(caller);
		requireActiveLoan(borrower, caller);
		const quote = this.quote(borrower, ctx, principal);

		const remaining = borrower.amountBorrowed - principal;
		CREDIT_STATE_MACHINE.transition(
			creditStateOf(borrower),
			quote.closesLoan ? "close" : "repay",
			{ remaining },
		);

		borrower.amountBorrowed = remaining;
		borrower.amountRepaid += principal;
		borrower.lastIteration = ctx.now;
		if (quote.closesLoan) {
			borrower.borrowTimestamp = 0;
		}

		const pool = await session.getPool();
		pool.totalSupplied += principal;
		pool.totalBorrowed -= principal;
		pool.reserves += quote.interest - quote.fee;
		pool.feesPaid += quote.fee;

		session.putBorrower(borrower);
		session.putPool(pool);

		const transfers: PlannedTransfer[] = [
			{ asset: "base", direction: "pull", account: caller, amount: quote.total },
		];
		if (quote.fee > 0n) {
			transfers.push({
				asset: "base",
				direction: "push",
				account: ctx.config.feeRecipient,
				amount: quote.fee,
			});
		}

		return {
			transfers,
			event: {
				name: LEDGER_REPAID,
				payload: {
					account: caller,
					principal: principal.toString(),
					interest: quote.interest.toString(),
					fee: quote.fee.toString(),
					quarter: quote.quarter,
					closed: quote.closesLoan,
				},
			},
			result: quote,
		};
	}
}
