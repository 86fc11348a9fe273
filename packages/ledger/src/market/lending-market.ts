/**
 * Lending Market
 *
 * One pool of a base asset lent against one collateral asset. The market
 * wires the engines to a store, two asset collaborators and a clock, and
 * owns the execution discipline every mutating operation follows:
 *
 * 1. queue behind any running operation (single writer per market)
 * 2. read the clock once
 * 3. check preconditions and stage state changes
 * 4. commit the staged state
 * 5. run the asset transfers, in order
 * 6. on a transfer failure, refund completed pulls, revert the commit and
 *    throw `TRANSFER_FAILED`
 * 7. emit one notification
 */

import { nanoid } from "nanoid";
import {
	AccountId,
	BorrowerRecord,
	DEFAULT_RATE_SCHEDULE,
	LedgerError,
	LenderRecord,
	MAX_AMOUNT,
	MarketConfig,
	PoolState,
	assertAccount,
	toError,
	validateMarketConfig,
} from "../core/index.js";
import { AssetTransfer } from "../assets/index.js";
import {
	LEDGER_FEE_RECIPIENT_UPDATED,
	LedgerEvent,
	LedgerEventName,
	LedgerEventSink,
	PendingEvent,
} from "../events/ledger-events.js";
import { LedgerSession, LedgerStore } from "../store/index.js";
import {
	CollateralVault,
	CreditEngine,
	LiquidationEngine,
	LiquidationReason,
	LiquidationResult,
	OperationContext,
	OperationPlan,
	PlannedTransfer,
	RepaymentQuote,
	ResolvedMarketConfig,
	SupplyLedger,
} from "../modules/index.js";
import { Clock, systemClock } from "./clock.js";
import { SerialExecutor } from "./serial-executor.js";

/**
 * Minimal logger contract. NestJS's `Logger` satisfies it.
 */
export interface LedgerLogger {
	log(message: string): void;
	warn(message: string): void;
	error(message: string, trace?: string): void;
}

export interface LendingMarketOptions {
	config: MarketConfig;
	store: LedgerStore;
	/** Collaborator for the lendable asset */
	base: AssetTransfer;
	/** Collaborator for the collateral asset */
	collateral: AssetTransfer;
	/** Defaults to the system clock */
	clock?: Clock;
	/** Receives one event per successful mutating operation */
	events?: LedgerEventSink;
	logger?: LedgerLogger;
}

/**
 * Borrower position with its derived figures.
 */
export interface BorrowerPosition {
	record: BorrowerRecord;
	totalDebt: bigint;
	collateralRatio: bigint;
	borrowCapacity: bigint;
	liquidationReasons: LiquidationReason[];
}

/**
 * Collateralized lending market.
 *
 * @example
 * ```typescript
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
 * await market.deposit("lender", 1_000n);
 * await market.depositCollateral("borrower", 1_000n);
 * await market.borrow("borrower", 800n);
 * ```
 */
export class LendingMarket {
	readonly id: string;
	private config: ResolvedMarketConfig;
	private readonly store: LedgerStore;
	private readonly assets: Record<PlannedTransfer["asset"], AssetTransfer>;
	private readonly clock: Clock;
	private readonly events?: LedgerEventSink;
	private readonly logger?: LedgerLogger;
	private readonly executor = new SerialExecutor();

	private readonly supply = new SupplyLedger();
	private readonly vault = new CollateralVault();
	private readonly credit = new CreditEngine();
	private readonly liquidation = new LiquidationEngine(this.credit);

	constructor(options: LendingMarketOptions) {
		validateMarketConfig(options.config);
		this.id = options.config.marketId;
		this.config = Object.freeze({
			...options.config,
			rateSchedule: options.config.rateSchedule ?? DEFAULT_RATE_SCHEDULE,
		});
		this.store = options.store;
		this.assets = { base: options.base, collateral: options.collateral };
		this.clock = options.clock ?? systemClock;
		this.events = options.events;
		this.logger = options.logger;
	}

	// ==================== Supply ====================

	deposit(caller: AccountId, amount: bigint): Promise<void> {
		return this.execute("deposit", (session, ctx) =>
			this.supply.deposit(session, ctx, caller, amount),
		);
	}

	withdraw(caller: AccountId, amount: bigint): Promise<void> {
		return this.execute("withdraw", (session, ctx) =>
			this.supply.withdraw(session, ctx, caller, amount),
		);
	}

	// ==================== Collateral ====================

	depositCollateral(caller: AccountId, amount: bigint): Promise<void> {
		return this.execute("depositCollateral", (session, ctx) =>
			this.vault.depositCollateral(session, ctx, caller, amount),
		);
	}

	withdrawCollateral(caller: AccountId, amount: bigint): Promise<void> {
		return this.execute("withdrawCollateral", (session, ctx) =>
			this.vault.withdrawCollateral(session, ctx, caller, amount),
		);
	}

	// ==================== Credit ====================

	borrow(caller: AccountId, amount: bigint): Promise<void> {
		return this.execute("borrow", (session, ctx) =>
			this.credit.borrow(session, ctx, caller, amount),
		);
	}

	/**
	 * Repay `principalAmount`; the caller pays it plus the current
	 * quarter's interest.
	 */
	repay(caller: AccountId, principalAmount: bigint): Promise<RepaymentQuote> {
		return this.execute("repay", (session, ctx) =>
			this.credit.repay(session, ctx, caller, principalAmount),
		);
	}

	// ==================== Liquidation ====================

	liquidate(
		liquidator: AccountId,
		borrower: AccountId,
	): Promise<LiquidationResult> {
		return this.execute("liquidate", (session, ctx) =>
			this.liquidation.liquidate(session, ctx, liquidator, borrower),
		);
	}

	// ==================== Admin ====================

	/**
	 * Point protocol fees at a new recipient. Owner only.
	 */
	setFeeRecipient(caller: AccountId, recipient: AccountId): Promise<void> {
		return this.execute("setFeeRecipient", async (_session, ctx) => {
			if (caller !== ctx.config.owner) {
				throw new LedgerError(
					`${caller} is not the owner of market ${this.id}`,
					"UNAUTHORIZED",
				);
			}
			assertAccount(recipient, "feeRecipient", "INVALID_CONFIG");

			const previousRecipient = this.config.feeRecipient;
			await this.store.setFeeRecipient?.(recipient);
			this.config = Object.freeze({ ...this.config, feeRecipient: recipient });
			this.logger?.log(
				`Market ${this.id}: fee recipient ${previousRecipient} -> ${recipient}`,
			);

			return {
				transfers: [],
				event: {
					name: LEDGER_FEE_RECIPIENT_UPDATED,
					payload: { account: caller, previousRecipient, feeRecipient: recipient },
				},
				result: undefined,
			};
		});
	}

	// ==================== Reads ====================

	getConfig(): ResolvedMarketConfig {
		return this.config;
	}

	getPool(): Promise<PoolState> {
		return this.store.getPool();
	}

	getLender(account: AccountId): Promise<LenderRecord | null> {
		return this.store.getLender(account);
	}

	async getLenderBalance(account: AccountId): Promise<bigint> {
		return (await this.store.getLender(account))?.amountSupplied ?? 0n;
	}

	getBorrower(account: AccountId): Promise<BorrowerRecord | null> {
		return this.store.getBorrower(account);
	}

	/**
	 * Principal plus current-quarter interest; 0 with no active loan.
	 */
	async calculateTotalDebt(account: AccountId): Promise<bigint> {
		const record = await this.store.getBorrower(account);
		return record ? this.credit.totalDebt(record, this.readContext()) : 0n;
	}

	/**
	 * Collateral-to-principal ratio in bp; MAX_AMOUNT with no active loan.
	 */
	async getCollateralRatio(account: AccountId): Promise<bigint> {
		const record = await this.store.getBorrower(account);
		return record ? this.credit.collateralRatio(record) : MAX_AMOUNT;
	}

	async isLiquidatable(account: AccountId): Promise<boolean> {
		return (await this.getLiquidationReasons(account)).length > 0;
	}

	async getLiquidationReasons(account: AccountId): Promise<LiquidationReason[]> {
		const record = await this.store.getBorrower(account);
		return record ? this.liquidation.reasons(record, this.readContext()) : [];
	}

	async quoteRepayment(
		account: AccountId,
		principalAmount: bigint,
	): Promise<RepaymentQuote> {
		const record = await this.store.getBorrower(account);
		return this.credit.quote(record, this.readContext(), principalAmount);
	}

	/**
	 * Everything the read surface knows about a borrower, evaluated at a
	 * single instant.
	 */
	async getPosition(account: AccountId): Promise<BorrowerPosition | null> {
		const record = await this.store.getBorrower(account);
		if (!record) return null;
		const ctx = this.readContext();
		const limit = this.credit.maxBorrowable(record, ctx.config);
		return {
			record,
			totalDebt: this.credit.totalDebt(record, ctx),
			collateralRatio: this.credit.collateralRatio(record),
			borrowCapacity:
				limit > record.amountBorrowed ? limit - record.amountBorrowed : 0n,
			liquidationReasons: this.liquidation.reasons(record, ctx),
		};
	}

	// ==================== Execution ====================

	private readContext(): OperationContext {
		return { config: this.config, now: this.clock.now() };
	}

	private async execute<T>(
		operation: string,
		plan: (
			session: LedgerSession,
			ctx: OperationContext,
		) => Promise<OperationPlan<T>>,
	): Promise<T> {
		const { result, event } = await this.executor.run(operation, async () => {
			const ctx = this.readContext();
			const session = new LedgerSession(this.store);
			const planned = await plan(session, ctx);

			await session.commit();
			await this.runTransfers(operation, session, planned.transfers);

			return { result: planned.result, event: this.stamp(planned.event, ctx) };
		});

		// Outside the executor, so listeners may call back into the market.
		this.events?.emit(event.name, event.payload);
		return result;
	}

	private async runTransfers(
		operation: string,
		session: LedgerSession,
		transfers: PlannedTransfer[],
	): Promise<void> {
		const completed: PlannedTransfer[] = [];

		for (const transfer of transfers) {
			const asset = this.assets[transfer.asset];
			try {
				await asset[transfer.direction](transfer.account, transfer.amount);
				completed.push(transfer);
			} catch (cause) {
				const err = toError(cause);
				this.logger?.warn(
					`Market ${this.id}: ${operation} aborted, ${transfer.direction} of ${transfer.amount} ${asset.asset} for ${transfer.account} failed: ${err.message}`,
				);
				await this.refund(operation, completed);
				await session.revert();
				throw new LedgerError(
					`${transfer.direction} of ${transfer.amount} ${asset.asset} failed: ${err.message}`,
					"TRANSFER_FAILED",
					{
						operation,
						asset: asset.asset,
						direction: transfer.direction,
						account: transfer.account,
						amount: transfer.amount.toString(),
					},
					{ cause: err },
				);
			}
		}
	}

	/**
	 * Return funds pulled earlier in a failed operation. Pushes cannot be
	 * clawed back and are only reported.
	 */
	private async refund(
		operation: string,
		completed: PlannedTransfer[],
	): Promise<void> {
		for (const transfer of [...completed].reverse()) {
			const asset = this.assets[transfer.asset];
			if (transfer.direction === "push") {
				this.logger?.error(
					`Market ${this.id}: ${operation} cannot reverse push of ${transfer.amount} ${asset.asset} to ${transfer.account}`,
				);
				continue;
			}
			try {
				await asset.push(transfer.account, transfer.amount);
			} catch (cause) {
				const err = toError(cause);
				this.logger?.error(
					`Market ${this.id}: ${operation} failed to refund ${transfer.amount} ${asset.asset} to ${transfer.account}: ${err.message}`,
					err.stack,
				);
			}
		}
	}

	private stamp(
		pending: PendingEvent,
		ctx: OperationContext,
	): { name: LedgerEventName; payload: LedgerEvent } {
		return {
			name: pending.name,
			payload: {
				...pending.payload,
				eventId: nanoid(8),
				marketId: this.id,
				occurredAt: new Date(ctx.now * 1000).toISOString(),
			},
		};
	}
}
