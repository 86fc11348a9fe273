import {
	BorrowerRecord,
	DAY,
	DEFAULT_RATE_SCHEDULE,
	MAX_AMOUNT,
	emptyBorrower,
} from "../../core/index.js";
import { MemoryLedgerStore, LedgerSession } from "../../store/index.js";
import { OperationContext, ResolvedMarketConfig } from "../types.js";
import { CreditEngine } from "./credit-engine.js";
import { CREDIT_STATE_MACHINE } from "./credit-state-machine.js";

const T0 = 1_700_000_000;

const config: ResolvedMarketConfig = {
	marketId: "usd-eth",
	owner: "owner",
	baseAsset: "USD",
	collateralAsset: "ETH",
	collateralRatio: 8_000,
	protocolFeeBps: 100,
	feeRecipient: "treasury",
	rateSchedule: DEFAULT_RATE_SCHEDULE,
};

const at = (days: number): OperationContext => ({ config, now: T0 + days * DAY });

const loan = (overrides: Partial<BorrowerRecord> = {}): BorrowerRecord => ({
	...emptyBorrower("borrower"),
	collateralDeposited: 1_000n,
	amountBorrowed: 800n,
	initialBorrowAmount: 800n,
	borrowTimestamp: T0,
	lastIteration: T0,
	...overrides,
});

describe("CreditEngine", () => {
	const credit = new CreditEngine();

	describe("read surface", () => {
		it("should cap borrowing at collateral * ratio", () => {
			expect(credit.maxBorrowable({ collateralDeposited: 1_000n }, config)).toBe(
				800n,
			);
			expect(credit.maxBorrowable({ collateralDeposited: 999n }, config)).toBe(
				799n,
			);
		});

		it("should report the sentinel ratio without a loan", () => {
			expect(credit.collateralRatio(emptyBorrower("borrower"))).toBe(MAX_AMOUNT);
			expect(credit.collateralRatio(loan())).toBe(12_500n);
		});

		it("should add the current quarter's interest to the debt", () => {
			expect(credit.totalDebt(loan(), at(10))).toBe(836n);
			expect(credit.totalDebt(loan(), at(95))).toBe(864n);
			expect(credit.totalDebt(loan(), at(200))).toBe(884n);
			expect(credit.totalDebt(loan(), at(300))).toBe(904n);
			expect(credit.totalDebt(emptyBorrower("borrower"), at(10))).toBe(0n);
		});
	});

	describe("quote", () => {
		it("should charge no fee on a partial repayment", () => {
			expect(credit.quote(loan(), at(95), 300n)).toEqual({
				principal: 300n,
				interest: 64n,
				fee: 0n,
				total: 364n,
				closesLoan: false,
				quarter: 2,
				interestBps: 800,
				feeBps: 150,
			});
		});

		it("should round the closing fee down", () => {
			expect(credit.quote(loan(), at(95), 800n)).toMatchObject({
				interest: 64n,
				fee: 0n,
				total: 864n,
				closesLoan: true,
			});
			expect(
				credit.quote(loan({ amountBorrowed: 10_000n }), at(10), 10_000n),
			).toMatchObject({ interest: 450n, fee: 4n, total: 10_450n });
		});

		it("should reject over-repayment", () => {
			expect(() => credit.quote(loan(), at(10), 801n)).toThrow(
				expect.objectContaining({ code: "OVER_REPAYMENT" }),
			);
		});

		it("should reject a quote without a loan", () => {
			expect(() => credit.quote(null, at(10), 1n)).toThrow(
				expect.objectContaining({ code: "NO_ACTIVE_LOAN" }),
			);
		});
	});

	describe("borrow", () => {
		let store: MemoryLedgerStore;

		beforeEach(async () => {
			store = new MemoryLedgerStore();
			await store.apply({
				lenders: [],
				borrowers: [loan({ amountBorrowed: 0n, initialBorrowAmount: 0n })],
				pool: {
					totalSupplied: 500n,
					totalBorrowed: 0n,
					reserves: 0n,
					feesPaid: 0n,
				},
			});
		});

		it("should check the collateral limit before liquidity", async () => {
			await expect(
				credit.borrow(new LedgerSession(store), at(0), "borrower", 801n),
			).rejects.toMatchObject({ code: "COLLATERAL_LIMIT_EXCEEDED" });
			await expect(
				credit.borrow(new LedgerSession(store), at(0), "borrower", 600n),
			).rejects.toMatchObject({ code: "INSUFFICIENT_LIQUIDITY" });
		});

		it("should refuse borrowers without collateral", async () => {
			await expect(
				credit.borrow(new LedgerSession(store), at(0), "stranger", 1n),
			).rejects.toMatchObject({
				code: "COLLATERAL_LIMIT_EXCEEDED",
				details: { requested: "1", limit: "0" },
			});
		});

		it("should move the borrower out of the no-loan state", async () => {
			const transition = jest.spyOn(CREDIT_STATE_MACHINE, "transition");
			try {
				await credit.borrow(new LedgerSession(store), at(0), "borrower", 500n);
				expect(transition).toHaveBeenCalledWith("no-loan", "borrow", {
					remaining: 500n,
				});
			} finally {
				transition.mockRestore();
			}
		});

		it("should start from the active state when topping up a loan", async () => {
			await store.apply({
				lenders: [],
				borrowers: [loan({ amountBorrowed: 100n, initialBorrowAmount: 100n })],
			});
			const transition = jest.spyOn(CREDIT_STATE_MACHINE, "transition");
			try {
				await credit.borrow(new LedgerSession(store), at(0), "borrower", 200n);
				expect(transition).toHaveBeenCalledWith("active", "borrow", {
					remaining: 300n,
				});
			} finally {
				transition.mockRestore();
			}
		});

		it("should stage the loan and plan a push to the borrower", async () => {
			const session = new LedgerSession(store);
			const plan = await credit.borrow(session, at(3), "borrower", 500n);

			expect(plan.transfers).toEqual([
				{ asset: "base", direction: "push", account: "borrower", amount: 500n },
			]);
			expect(session.changes()).toEqual({
				lenders: [],
				borrowers: [
					loan({
						amountBorrowed: 500n,
						initialBorrowAmount: 500n,
						borrowTimestamp: T0 + 3 * DAY,
						lastIteration: T0 + 3 * DAY,
					}),
				],
				pool: {
					totalSupplied: 0n,
					totalBorrowed: 500n,
					reserves: 0n,
					feesPaid: 0n,
				},
			});
		});
	});
});
