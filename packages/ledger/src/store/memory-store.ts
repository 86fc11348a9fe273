/**
 * In-Memory Ledger Store
 *
 * Map-backed store for tests, development and embedders that keep their
 * ledger in process. Data is lost when the process exits.
 */

import {
	AccountId,
	BorrowerRecord,
	LenderRecord,
	PoolState,
	emptyPool,
} from "../core/index.js";
import { LedgerChangeset, LedgerStore } from "./types.js";

/**
 * In-memory ledger store.
 *
 * Records are copied on the way in and on the way out, so callers never
 * hold a reference to stored state.
 *
 * @example
 * ```typescript
 * const store = new MemoryLedgerStore();
 * const market = new LendingMarket({ config, store, base, collateral });
 * ```
 */
export class MemoryLedgerStore implements LedgerStore {
	private lenders: Map<AccountId, LenderRecord> = new Map();
	private borrowers: Map<AccountId, BorrowerRecord> = new Map();
	private pool: PoolState = emptyPool();

	async getLender(account: AccountId): Promise<LenderRecord | null> {
		const record = this.lenders.get(account);
		return record ? { ...record } : null;
	}

	async getBorrower(account: AccountId): Promise<BorrowerRecord | null> {
		const record = this.borrowers.get(account);
		return record ? { ...record } : null;
	}

	async getPool(): Promise<PoolState> {
		return { ...this.pool };
	}

	async listLenders(): Promise<LenderRecord[]> {
		return Array.from(this.lenders.values(), (r) => ({ ...r }));
	}

	async listBorrowers(): Promise<BorrowerRecord[]> {
		return Array.from(this.borrowers.values(), (r) => ({ ...r }));
	}

	async apply(changes: LedgerChangeset): Promise<void> {
		// Single synchronous block: nothing can interleave with it.
		for (const record of changes.lenders) {
			this.lenders.set(record.account, { ...record });
		}
		for (const record of changes.borrowers) {
			this.borrowers.set(record.account, { ...record });
		}
		for (const account of changes.removeLenders ?? []) {
			this.lenders.delete(account);
		}
		for (const account of changes.removeBorrowers ?? []) {
			this.borrowers.delete(account);
		}
		if (changes.pool) {
			this.pool = { ...changes.pool };
		}
	}

	/**
	 * Drop every record and reset the pool.
	 */
	clear(): void {
		this.lenders.clear();
		this.borrowers.clear();
		this.pool = emptyPool();
	}
}
