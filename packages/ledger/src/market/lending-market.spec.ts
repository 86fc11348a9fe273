import { AccountId, DAY, MarketConfig } from "../core/index.js";
import { AssetTransferError, MemoryAsset } from "../assets/index.js";
import {
	LEDGER_BORROWED,
	LEDGER_COLLATERAL_DEPOSITED,
	LEDGER_DEPOSITED,
	LEDGER_FEE_RECIPIENT_UPDATED,
	LEDGER_LIQUIDATED,
	LEDGER_REPAID,
	LedgerEvent,
	LedgerEventName,
} from "../events/ledger-events.js";
import { MemoryLedgerStore, StoreError } from "../store/index.js";
import { ManualClock } from "./clock.js";
import { LendingMarket } from "./lending-market.js";

const T0 = 1_700_000_000;
const CUSTODY = "market-custody";

const CONFIG: MarketConfig = {
	marketId: "usd-eth",
	owner: "owner",
	baseAsset: "USD",
	collateralAsset: "ETH",
	collateralRatio: 8_000,
	protocolFeeBps: 100,
	feeRecipient: "treasury",
};

/**
 * Asset whose pushes to one account are rejected, and whose pulls can run a
 * hook first.
 */
class ScriptedAsset extends MemoryAsset {
	rejectPushTo?: AccountId;
	beforePull?: () => Promise<unknown>;

	async pull(from: AccountId, amount: bigint): Promise<void> {
		if (this.beforePull) await this.beforePull();
		return super.pull(from, amount);
	}

	async push(to: AccountId, amount: bigint): Promise<void> {
		if (to === this.rejectPushTo) {
			throw new AssetTransferError(`push to ${to} rejected`, "TRANSFER_REJECTED");
		}
		return super.push(to, amount);
	}
}

function setup(overrides: Partial<MarketConfig> = {}) {
	const clock = new ManualClock(T0);
	const store = new MemoryLedgerStore();
	const usd = new ScriptedAsset("USD", CUSTODY);
	const eth = new ScriptedAsset("ETH", CUSTODY);
	const emitted: { name: LedgerEventName; payload: LedgerEvent }[] = [];
	const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
	const market = new LendingMarket({
		config: { ...CONFIG, ...overrides },
		store,
		base: usd,
		collateral: eth,
		clock,
		logger,
		events: { emit: (name, payload) => emitted.push({ name, payload }) },
	});

	/** Let the market pull `amount` more of what `account` already holds. */
	const allow = (asset: MemoryAsset, account: AccountId, amount: bigint) => {
		asset.approve(account, CUSTODY, asset.allowance(account, CUSTODY) + amount);
	};

	/** Mint `amount` to `account` and approve the market to pull it. */
	const fund = (asset: MemoryAsset, account: AccountId, amount: bigint) => {
		asset.mint(account, amount);
		allow(asset, account, amount);
	};

	return { clock, store, usd, eth, emitted, logger, market, fund, allow };
}

type Fixture = ReturnType<typeof setup>;

/** 1000 USD supplied, 1000 ETH posted by the borrower, 800 USD borrowed at T0. */
async function openLoan(f: Fixture): Promise<void> {
	f.fund(f.usd, "lender", 1_000n);
	await f.market.deposit("lender", 1_000n);
	f.fund(f.eth, "borrower", 1_000n);
	await f.market.depositCollateral("borrower", 1_000n);
	await f.market.borrow("borrower", 800n);
}

describe("LendingMarket", () => {
	let f: Fixture;

	beforeEach(() => {
		f = setup();
	});

	it("should reject an invalid configuration", () => {
		expect(() => setup({ collateralRatio: 4_999 })).toThrow(
			expect.objectContaining({ code: "INVALID_CONFIG" }),
		);
	});

	it("should fill in the default rate schedule", () => {
		expect(f.market.getConfig().rateSchedule).toHaveLength(4);
		expect(f.market.id).toBe("usd-eth");
	});

	describe("supply", () => {
		it("should credit deposits and pull the base asset", async () => {
			f.fund(f.usd, "lender", 1_000n);
			await f.market.deposit("lender", 1_000n);

			expect(await f.market.getLender("lender")).toEqual({
				account: "lender",
				amountSupplied: 1_000n,
				depositTimestamp: T0,
			});
			expect((await f.market.getPool()).totalSupplied).toBe(1_000n);
			expect(f.usd.balanceOf(CUSTODY)).toBe(1_000n);
			expect(f.usd.balanceOf("lender")).toBe(0n);
		});

		it("should restore balances after depositing and withdrawing the same amount", async () => {
			f.fund(f.usd, "lender", 300n);
			await f.market.deposit("lender", 300n);
			await f.market.withdraw("lender", 300n);

			expect(await f.market.getLenderBalance("lender")).toBe(0n);
			expect((await f.market.getPool()).totalSupplied).toBe(0n);
			expect(f.usd.balanceOf("lender")).toBe(300n);
		});

		it("should keep lender balances summing to the pool total", async () => {
			f.fund(f.usd, "alice", 700n);
			f.fund(f.usd, "bob", 500n);
			await f.market.deposit("alice", 400n);
			await f.market.deposit("bob", 500n);
			await f.market.withdraw("alice", 150n);
			await f.market.deposit("alice", 300n);
			await f.market.withdraw("bob", 500n);

			const lenders = await f.store.listLenders();
			const sum = lenders.reduce((acc, l) => acc + l.amountSupplied, 0n);
			expect(sum).toBe(550n);
			expect((await f.market.getPool()).totalSupplied).toBe(sum);
		});

		it("should refuse to withdraw more than was supplied", async () => {
			f.fund(f.usd, "lender", 100n);
			await f.market.deposit("lender", 100n);

			await expect(f.market.withdraw("lender", 101n)).rejects.toMatchObject({
				code: "INSUFFICIENT_BALANCE",
			});
		});

		it("should refuse to withdraw liquidity that is lent out", async () => {
			await openLoan(f);

			await expect(f.market.withdraw("lender", 500n)).rejects.toMatchObject({
				code: "INSUFFICIENT_LIQUIDITY",
			});
			await f.market.withdraw("lender", 200n);
			expect(await f.market.getLenderBalance("lender")).toBe(800n);
		});

		it("should serialize concurrent calls", async () => {
			f.fund(f.usd, "lender", 500n);
			await Promise.all([
				f.market.deposit("lender", 500n),
				f.market.withdraw("lender", 500n),
			]);

			expect(await f.market.getLenderBalance("lender")).toBe(0n);
			expect(f.usd.balanceOf("lender")).toBe(500n);
		});
	});

	describe("zero amounts", () => {
		it.each([
			["deposit", (m: LendingMarket) => m.deposit("lender", 0n)],
			["withdraw", (m: LendingMarket) => m.withdraw("lender", 0n)],
			["depositCollateral", (m: LendingMarket) => m.depositCollateral("borrower", 0n)],
			["borrow", (m: LendingMarket) => m.borrow("borrower", 0n)],
			["repay", (m: LendingMarket) => m.repay("borrower", 0n)],
		])("should reject %s(0) without changing state", async (_name, call) => {
			await expect(call(f.market)).rejects.toMatchObject({
				code: "INVALID_AMOUNT",
			});

			expect(await f.store.listLenders()).toEqual([]);
			expect(await f.store.listBorrowers()).toEqual([]);
			expect(await f.market.getPool()).toEqual({
				totalSupplied: 0n,
				totalBorrowed: 0n,
				reserves: 0n,
				feesPaid: 0n,
			});
			expect(f.emitted).toEqual([]);
		});
	});

	describe("borrowing", () => {
		it("should lend up to the collateral limit and no further", async () => {
			await openLoan(f);

			expect(f.usd.balanceOf("borrower")).toBe(800n);
			expect(await f.market.getPool()).toEqual({
				totalSupplied: 200n,
				totalBorrowed: 800n,
				reserves: 0n,
				feesPaid: 0n,
			});
			await expect(f.market.borrow("borrower", 1n)).rejects.toMatchObject({
				code: "COLLATERAL_LIMIT_EXCEEDED",
			});
		});

		it("should refuse a loan the pool cannot fund", async () => {
			f.fund(f.usd, "lender", 100n);
			await f.market.deposit("lender", 100n);
			f.fund(f.eth, "borrower", 1_000n);
			await f.market.depositCollateral("borrower", 1_000n);

			await expect(f.market.borrow("borrower", 101n)).rejects.toMatchObject({
				code: "INSUFFICIENT_LIQUIDITY",
			});
		});

		it("should report the position", async () => {
			await openLoan(f);
			f.clock.advance(10 * DAY);

			expect(await f.market.calculateTotalDebt("borrower")).toBe(836n);
			expect(await f.market.getCollateralRatio("borrower")).toBe(12_500n);
			expect(await f.market.getPosition("borrower")).toMatchObject({
				totalDebt: 836n,
				collateralRatio: 12_500n,
				borrowCapacity: 0n,
				liquidationReasons: [],
			});
			expect(await f.market.getPosition("stranger")).toBeNull();
			expect(await f.market.calculateTotalDebt("stranger")).toBe(0n);
		});

		it("should keep collateral that backs the loan", async () => {
			await openLoan(f);

			await expect(
				f.market.withdrawCollateral("borrower", 1n),
			).rejects.toMatchObject({ code: "COLLATERAL_LIMIT_EXCEEDED" });
			await expect(
				f.market.withdrawCollateral("borrower", 1_001n),
			).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });
		});
	});

	describe("repayment", () => {
		it("should charge second-quarter interest and round the fee to zero", async () => {
			await openLoan(f);
			f.clock.set(T0 + 95 * DAY);
			f.fund(f.usd, "borrower", 64n);
			f.allow(f.usd, "borrower", 800n);

			const quote = await f.market.repay("borrower", 800n);

			expect(quote).toMatchObject({
				principal: 800n,
				interest: 64n,
				fee: 0n,
				total: 864n,
				closesLoan: true,
				quarter: 2,
			});
			expect(f.usd.balanceOf("borrower")).toBe(0n);
			expect(f.usd.balanceOf("treasury")).toBe(0n);
			expect(f.usd.balanceOf(CUSTODY)).toBe(1_064n);
			expect(await f.market.getBorrower("borrower")).toEqual({
				account: "borrower",
				amountBorrowed: 0n,
				initialBorrowAmount: 800n,
				collateralDeposited: 1_000n,
				borrowTimestamp: 0,
				lastIteration: T0 + 95 * DAY,
				amountRepaid: 800n,
			});
			expect(await f.market.getPool()).toEqual({
				totalSupplied: 1_000n,
				totalBorrowed: 0n,
				reserves: 64n,
				feesPaid: 0n,
			});
			expect(await f.market.getCollateralRatio("borrower")).toBe(2n ** 256n - 1n);
		});

		it("should send the closing fee to the fee recipient", async () => {
			f.fund(f.usd, "lender", 20_000n);
			await f.market.deposit("lender", 20_000n);
			f.fund(f.eth, "borrower", 20_000n);
			await f.market.depositCollateral("borrower", 20_000n);
			await f.market.borrow("borrower", 10_000n);
			f.clock.advance(10 * DAY);
			f.fund(f.usd, "borrower", 450n);
			f.allow(f.usd, "borrower", 10_000n);

			await f.market.repay("borrower", 10_000n);

			expect(f.usd.balanceOf("treasury")).toBe(4n);
			expect(f.usd.balanceOf(CUSTODY)).toBe(20_446n);
			expect(await f.market.getPool()).toEqual({
				totalSupplied: 20_000n,
				totalBorrowed: 0n,
				reserves: 446n,
				feesPaid: 4n,
			});
			expect(f.emitted.at(-1)).toMatchObject({
				name: LEDGER_REPAID,
				payload: { principal: "10000", interest: "450", fee: "4", closed: true },
			});
		});

		it("should charge no fee on a partial repayment", async () => {
			await openLoan(f);
			f.clock.advance(10 * DAY);

			expect(await f.market.quoteRepayment("borrower", 300n)).toMatchObject({
				interest: 36n,
				fee: 0n,
				total: 336n,
				closesLoan: false,
			});
			f.allow(f.usd, "borrower", 336n);
			await f.market.repay("borrower", 300n);

			expect(await f.market.getBorrower("borrower")).toMatchObject({
				amountBorrowed: 500n,
				amountRepaid: 300n,
				borrowTimestamp: T0,
				lastIteration: T0 + 10 * DAY,
			});
			expect(f.usd.balanceOf("borrower")).toBe(464n);
			expect(f.usd.balanceOf("treasury")).toBe(0n);
		});

		it("should refuse repayments beyond the principal or without a loan", async () => {
			await openLoan(f);

			await expect(f.market.repay("borrower", 801n)).rejects.toMatchObject({
				code: "OVER_REPAYMENT",
			});
			await expect(f.market.repay("lender", 1n)).rejects.toMatchObject({
				code: "NO_ACTIVE_LOAN",
			});
		});

		it("should release collateral once the loan is closed", async () => {
			await openLoan(f);
			f.fund(f.usd, "borrower", 36n);
			f.allow(f.usd, "borrower", 800n);
			await f.market.repay("borrower", 800n);

			await f.market.withdrawCollateral("borrower", 1_000n);
			expect(f.eth.balanceOf("borrower")).toBe(1_000n);
		});
	});

	describe("liquidation", () => {
		it("should liquidate a matured loan regardless of its ratio", async () => {
			await openLoan(f);
			f.clock.set(T0 + 370 * DAY);
			f.fund(f.usd, "keeper", 800n);

			expect(await f.market.isLiquidatable("borrower")).toBe(true);
			expect(await f.market.getLiquidationReasons("borrower")).toEqual(["matured"]);

			const result = await f.market.liquidate("keeper", "borrower");

			expect(result).toEqual({ debt: 800n, collateral: 1_000n, reasons: ["matured"] });
			expect(f.usd.balanceOf("keeper")).toBe(0n);
			expect(f.eth.balanceOf("keeper")).toBe(1_000n);
			expect(await f.market.getBorrower("borrower")).toEqual({
				account: "borrower",
				amountBorrowed: 0n,
				initialBorrowAmount: 800n,
				collateralDeposited: 0n,
				borrowTimestamp: 0,
				lastIteration: T0 + 370 * DAY,
				amountRepaid: 0n,
			});
			expect(await f.market.getPool()).toMatchObject({
				totalSupplied: 1_000n,
				totalBorrowed: 0n,
			});
			expect(f.emitted.at(-1)).toMatchObject({
				name: LEDGER_LIQUIDATED,
				payload: {
					account: "borrower",
					liquidator: "keeper",
					debt: "800",
					collateral: "1000",
					reasons: ["matured"],
				},
			});
		});

		it("should liquidate a healthy loan that is behind on repayments", async () => {
			await openLoan(f);

			f.clock.set(T0 + 100 * DAY);
			expect(await f.market.isLiquidatable("borrower")).toBe(false);
			await expect(f.market.liquidate("keeper", "borrower")).rejects.toMatchObject({
				code: "NOT_LIQUIDATABLE",
			});

			f.clock.set(T0 + 200 * DAY);
			expect(await f.market.getCollateralRatio("borrower")).toBe(12_500n);
			expect(await f.market.getLiquidationReasons("borrower")).toEqual([
				"q3-repayment-shortfall",
			]);
		});

		it("should track the repayment baseline through the fourth quarter", async () => {
			await openLoan(f);
			f.clock.set(T0 + 200 * DAY);
			// Q3: 1050 bp on 800 outstanding
			f.fund(f.usd, "borrower", 84n);
			f.allow(f.usd, "borrower", 200n);
			await f.market.repay("borrower", 200n);

			expect(await f.market.isLiquidatable("borrower")).toBe(false);

			f.clock.set(T0 + 280 * DAY);
			expect(await f.market.getLiquidationReasons("borrower")).toEqual([
				"q4-repayment-shortfall",
			]);
		});

		it("should refuse to liquidate a borrower without a loan", async () => {
			await expect(f.market.liquidate("keeper", "nobody")).rejects.toMatchObject({
				code: "NO_ACTIVE_LOAN",
			});
		});
	});

	describe("transfer failures", () => {
		it("should roll back a deposit the asset refuses", async () => {
			f.usd.mint("lender", 1_000n);

			const err = await f.market.deposit("lender", 1_000n).catch((e: unknown) => e);

			expect(err).toMatchObject({
				code: "TRANSFER_FAILED",
				details: { operation: "deposit", direction: "pull", amount: "1000" },
				cause: expect.objectContaining({ code: "INSUFFICIENT_ALLOWANCE" }),
			});
			expect(await f.market.getLender("lender")).toBeNull();
			expect((await f.market.getPool()).totalSupplied).toBe(0n);
			expect(f.emitted).toEqual([]);
		});

		it("should refund the payer when the fee transfer fails", async () => {
			f.fund(f.usd, "lender", 20_000n);
			await f.market.deposit("lender", 20_000n);
			f.fund(f.eth, "borrower", 20_000n);
			await f.market.depositCollateral("borrower", 20_000n);
			await f.market.borrow("borrower", 10_000n);
			f.clock.advance(10 * DAY);
			f.fund(f.usd, "borrower", 450n);
			f.allow(f.usd, "borrower", 10_000n);
			f.usd.rejectPushTo = "treasury";
			const emittedBefore = f.emitted.length;

			await expect(f.market.repay("borrower", 10_000n)).rejects.toMatchObject({
				code: "TRANSFER_FAILED",
			});

			expect(f.usd.balanceOf("borrower")).toBe(10_450n);
			expect(f.usd.balanceOf(CUSTODY)).toBe(10_000n);
			expect(await f.market.getBorrower("borrower")).toMatchObject({
				amountBorrowed: 10_000n,
				amountRepaid: 0n,
				borrowTimestamp: T0,
			});
			expect(await f.market.getPool()).toEqual({
				totalSupplied: 10_000n,
				totalBorrowed: 10_000n,
				reserves: 0n,
				feesPaid: 0n,
			});
			expect(f.emitted).toHaveLength(emittedBefore);
			expect(f.logger.warn).toHaveBeenCalledTimes(1);
			expect(f.logger.error).not.toHaveBeenCalled();
		});
	});

	describe("reentrancy", () => {
		it("should fail an operation whose transfer calls back into the market", async () => {
			f.fund(f.usd, "lender", 1_000n);
			f.usd.beforePull = () => f.market.deposit("lender", 1n);

			const err = await f.market.deposit("lender", 500n).catch((e: unknown) => e);

			expect(err).toMatchObject({
				code: "TRANSFER_FAILED",
				cause: expect.objectContaining({ code: "REENTRANT_CALL" }),
			});
			expect(await f.market.getLender("lender")).toBeNull();
		});

		it("should let event listeners call back into the market", async () => {
			const store = new MemoryLedgerStore();
			const usd = new MemoryAsset("USD", CUSTODY);
			const eth = new MemoryAsset("ETH", CUSTODY);
			let followUp: Promise<void> | undefined;
			const market: LendingMarket = new LendingMarket({
				config: CONFIG,
				store,
				base: usd,
				collateral: eth,
				events: {
					emit: (name) => {
						if (name === LEDGER_DEPOSITED && !followUp) {
							followUp = market.withdraw("lender", 100n);
						}
					},
				},
			});
			usd.mint("lender", 1_000n);
			usd.approve("lender", CUSTODY, 1_000n);

			await market.deposit("lender", 1_000n);
			await followUp;

			expect(await market.getLenderBalance("lender")).toBe(900n);
			expect(usd.balanceOf("lender")).toBe(100n);
		});
	});

	describe("notifications", () => {
		it("should emit one stamped event per operation", async () => {
			await openLoan(f);

			expect(f.emitted.map((e) => e.name)).toEqual([
				LEDGER_DEPOSITED,
				LEDGER_COLLATERAL_DEPOSITED,
				LEDGER_BORROWED,
			]);
			expect(f.emitted[0].payload).toMatchObject({
				marketId: "usd-eth",
				occurredAt: new Date(T0 * 1000).toISOString(),
				account: "lender",
				amount: "1000",
				amountSupplied: "1000",
			});
			expect(f.emitted[0].payload.eventId).toHaveLength(8);
		});
	});

	describe("fee recipient", () => {
		it("should only let the owner change it", async () => {
			await expect(
				f.market.setFeeRecipient("mallory", "mallory"),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });

			await f.market.setFeeRecipient("owner", "new-treasury");

			expect(f.market.getConfig().feeRecipient).toBe("new-treasury");
			expect(f.emitted).toEqual([
				{
					name: LEDGER_FEE_RECIPIENT_UPDATED,
					payload: expect.objectContaining({
						account: "owner",
						previousRecipient: "treasury",
						feeRecipient: "new-treasury",
					}),
				},
			]);
		});

		it("should reject an empty recipient", async () => {
			await expect(f.market.setFeeRecipient("owner", "")).rejects.toMatchObject({
				code: "INVALID_CONFIG",
			});
		});

		describe("with a store that keeps the configuration", () => {
			class ConfigStore extends MemoryLedgerStore {
				feeRecipient = "treasury";
				failNext = false;

				async setFeeRecipient(recipient: AccountId): Promise<void> {
					if (this.failNext) {
						this.failNext = false;
						throw new StoreError("disk full", "WRITE_FAILED");
					}
					this.feeRecipient = recipient;
				}
			}

			let store: ConfigStore;
			let market: LendingMarket;
			let emitted: LedgerEventName[];

			beforeEach(() => {
				store = new ConfigStore();
				emitted = [];
				market = new LendingMarket({
					config: CONFIG,
					store,
					base: new MemoryAsset("USD", CUSTODY),
					collateral: new MemoryAsset("ETH", CUSTODY),
					clock: new ManualClock(T0),
					events: { emit: (name) => emitted.push(name) },
				});
			});

			it("should persist the recipient before switching to it", async () => {
				await market.setFeeRecipient("owner", "vault");

				expect(store.feeRecipient).toBe("vault");
				expect(market.getConfig().feeRecipient).toBe("vault");
				expect(emitted).toEqual([LEDGER_FEE_RECIPIENT_UPDATED]);
			});

			it("should keep the old recipient when persisting fails", async () => {
				store.failNext = true;

				await expect(market.setFeeRecipient("owner", "vault")).rejects.toMatchObject({
					code: "WRITE_FAILED",
				});

				expect(store.feeRecipient).toBe("treasury");
				expect(market.getConfig().feeRecipient).toBe("treasury");
				expect(emitted).toEqual([]);

				await market.setFeeRecipient("owner", "vault");
				expect(market.getConfig().feeRecipient).toBe("vault");
			});
		});
	});

	describe("documented quirks", () => {
		it("should stamp borrowTimestamp on a collateral deposit with no loan open", async () => {
			f.clock.set(T0 + 5);
			f.fund(f.eth, "borrower", 10n);
			await f.market.depositCollateral("borrower", 10n);

			expect(await f.market.getBorrower("borrower")).toMatchObject({
				amountBorrowed: 0n,
				borrowTimestamp: T0 + 5,
			});
		});

		it("should keep the lifetime repayment baseline across loan cycles", async () => {
			await openLoan(f);
			f.clock.set(T0 + 10 * DAY);
			f.fund(f.usd, "borrower", 36n);
			f.allow(f.usd, "borrower", 800n);
			await f.market.repay("borrower", 800n);

			f.clock.set(T0 + 20 * DAY);
			await f.market.borrow("borrower", 400n);

			expect(await f.market.getBorrower("borrower")).toMatchObject({
				amountBorrowed: 400n,
				initialBorrowAmount: 1_200n,
				amountRepaid: 800n,
				borrowTimestamp: T0 + 20 * DAY,
			});

			// 800 * 4 >= 1200: the first cycle's repayments cover the shortfall rule
			f.clock.set(T0 + 220 * DAY);
			expect(await f.market.isLiquidatable("borrower")).toBe(false);
		});
	});
});
