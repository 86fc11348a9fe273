/**
 * TypeORM Ledger Store
 *
 * Implements the ledger's LedgerStore interface on top of the market and
 * position entities. Each market gets its own store instance scoped by
 * `marketId`; pool totals and the fee recipient live on the market row.
 */

import { In, Repository } from "typeorm";
import {
	AccountId,
	BorrowerRecord,
	LedgerChangeset,
	LedgerStore,
	LenderRecord,
	PoolState,
	StoreError,
} from "@collateral-ledger/ledger";

import { Market } from "./market.entity";
import { BorrowerPosition, LenderPosition } from "./position.entity";
import { TransactionsService } from "../common/transactions.service";

/**
 * TypeORM-based ledger store for one market.
 *
 * @example
 * ```typescript
 * const store = new TypeOrmLedgerStore(marketId, repos, transactions);
 * const market = new LendingMarket({ config, store, base, collateral });
 * ```
 */
export class TypeOrmLedgerStore implements LedgerStore {
	constructor(
		private readonly marketId: string,
		private readonly repos: {
			markets: Repository<Market>;
			lenders: Repository<LenderPosition>;
			borrowers: Repository<BorrowerPosition>;
		},
		private readonly transactions: TransactionsService,
	) {}

	async getLender(account: AccountId): Promise<LenderRecord | null> {
		const row = await this.repos.lenders.findOneBy({
			marketId: this.marketId,
			account,
		});
		return row ? toLenderRecord(row) : null;
	}

	async getBorrower(account: AccountId): Promise<BorrowerRecord | null> {
		const row = await this.repos.borrowers.findOneBy({
			marketId: this.marketId,
			account,
		});
		return row ? toBorrowerRecord(row) : null;
	}

	async getPool(): Promise<PoolState> {
		const market = await this.repos.markets.findOneBy({
			externalId: this.marketId,
		});
		if (!market) {
			throw new StoreError(`Market ${this.marketId} not found`, "NOT_FOUND");
		}
		return {
			totalSupplied: market.totalSupplied,
			totalBorrowed: market.totalBorrowed,
			reserves: market.reserves,
			feesPaid: market.feesPaid,
		};
	}

	async listLenders(): Promise<LenderRecord[]> {
		const rows = await this.repos.lenders.find({
			where: { marketId: this.marketId },
			order: { id: "ASC" },
		});
		return rows.map(toLenderRecord);
	}

	async listBorrowers(): Promise<BorrowerRecord[]> {
		const rows = await this.repos.borrowers.find({
			where: { marketId: this.marketId },
			order: { id: "ASC" },
		});
		return rows.map(toBorrowerRecord);
	}

	async apply(changes: LedgerChangeset): Promise<void> {
		const { marketId } = this;
		await this.transactions.run(`ledger:${marketId}`, async (manager) => {
			if (changes.lenders.length > 0) {
				await manager.upsert(
					LenderPosition,
					changes.lenders.map((r) => ({ ...r, marketId })),
					["marketId", "account"],
				);
			}
			if (changes.borrowers.length > 0) {
				await manager.upsert(
					BorrowerPosition,
					changes.borrowers.map((r) => ({ ...r, marketId })),
					["marketId", "account"],
				);
			}
			if (changes.removeLenders?.length) {
				await manager.delete(LenderPosition, {
					marketId,
					account: In(changes.removeLenders),
				});
			}
			if (changes.removeBorrowers?.length) {
				await manager.delete(BorrowerPosition, {
					marketId,
					account: In(changes.removeBorrowers),
				});
			}
			if (changes.pool) {
				const result = await manager.update(
					Market,
					{ externalId: marketId },
					{ ...changes.pool },
				);
				if (result.affected === 0) {
					throw new StoreError(`Market ${marketId} not found`, "NOT_FOUND");
				}
			}
		});
	}

	async setFeeRecipient(recipient: AccountId): Promise<void> {
		const { marketId } = this;
		await this.transactions.run(`config:${marketId}`, async (manager) => {
			const result = await manager.update(
				Market,
				{ externalId: marketId },
				{ feeRecipient: recipient },
			);
			if (result.affected === 0) {
				throw new StoreError(`Market ${marketId} not found`, "NOT_FOUND");
			}
		});
	}
}

function toLenderRecord(row: LenderPosition): LenderRecord {
	return {
		account: row.account,
		amountSupplied: row.amountSupplied,
		depositTimestamp: row.depositTimestamp,
	};
}

function toBorrowerRecord(row: BorrowerPosition): BorrowerRecord {
	return {
		account: row.account,
		amountBorrowed: row.amountBorrowed,
		initialBorrowAmount: row.initialBorrowAmount,
		collateralDeposited: row.collateralDeposited,
		borrowTimestamp: row.borrowTimestamp,
		lastIteration: row.lastIteration,
		amountRepaid: row.amountRepaid,
	};
}
