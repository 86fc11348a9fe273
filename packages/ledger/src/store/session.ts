/**
 * Ledger Session
 *
 * Staging overlay used by a single mutating operation. Engines read records
 * through the session and stage their writes; nothing reaches the store
 * until {@link LedgerSession.commit}. After a commit the session can undo
 * itself with {@link LedgerSession.revert}, which restores every touched
 * record to the value it had when the session first read it.
 */

import {
	AccountId,
	BorrowerRecord,
	LenderRecord,
	PoolState,
	emptyBorrower,
	emptyLender,
} from "../core/index.js";
import { LedgerChangeset, LedgerStore, StoreError } from "./types.js";

type SessionStatus = "open" | "committed" | "reverted";

export class LedgerSession {
	private status: SessionStatus = "open";

	private readonly lenders = new Map<AccountId, LenderRecord>();
	private readonly borrowers = new Map<AccountId, BorrowerRecord>();
	private pool?: PoolState;

	// Values as first read from the store; null means "did not exist"
	private readonly originalLenders = new Map<AccountId, LenderRecord | null>();
	private readonly originalBorrowers = new Map<
		AccountId,
		BorrowerRecord | null
	>();
	private originalPool?: PoolState;

	private readonly dirtyLenders = new Set<AccountId>();
	private readonly dirtyBorrowers = new Set<AccountId>();
	private poolDirty = false;

	constructor(private readonly store: LedgerStore) {}

	/**
	 * Lender record, or null if the account never deposited.
	 */
	async findLender(account: AccountId): Promise<LenderRecord | null> {
		if (!this.originalLenders.has(account)) {
			const loaded = await this.store.getLender(account);
			this.originalLenders.set(account, loaded);
			if (loaded) this.lenders.set(account, { ...loaded });
		}
		const record = this.lenders.get(account);
		return record ? { ...record } : null;
	}

	/**
	 * Lender record, or a zeroed one for unknown accounts.
	 */
	async getLender(account: AccountId): Promise<LenderRecord> {
		return (await this.findLender(account)) ?? emptyLender(account);
	}

	/**
	 * Borrower record, or null if the account never deposited collateral.
	 */
	async findBorrower(account: AccountId): Promise<BorrowerRecord | null> {
		if (!this.originalBorrowers.has(account)) {
			const loaded = await this.store.getBorrower(account);
			this.originalBorrowers.set(account, loaded);
			if (loaded) this.borrowers.set(account, { ...loaded });
		}
		const record = this.borrowers.get(account);
		return record ? { ...record } : null;
	}

	/**
	 * Borrower record, or a zeroed one for unknown accounts.
	 */
	async getBorrower(account: AccountId): Promise<BorrowerRecord> {
		return (await this.findBorrower(account)) ?? emptyBorrower(account);
	}

	async getPool(): Promise<PoolState> {
		if (!this.pool) {
			const loaded = await this.store.getPool();
			this.originalPool = { ...loaded };
			this.pool = { ...loaded };
		}
		return { ...this.pool };
	}

	putLender(record: LenderRecord): void {
		this.assertOpen();
		if (!this.originalLenders.has(record.account)) {
			throw new StoreError(
				`Lender ${record.account} must be read before it is written`,
				"UNREAD_RECORD",
			);
		}
		this.lenders.set(record.account, { ...record });
		this.dirtyLenders.add(record.account);
	}

	putBorrower(record: BorrowerRecord): void {
		this.assertOpen();
		if (!this.originalBorrowers.has(record.account)) {
			throw new StoreError(
				`Borrower ${record.account} must be read before it is written`,
				"UNREAD_RECORD",
			);
		}
		this.borrowers.set(record.account, { ...record });
		this.dirtyBorrowers.add(record.account);
	}

	putPool(pool: PoolState): void {
		this.assertOpen();
		if (!this.originalPool) {
			throw new StoreError(
				"Pool must be read before it is written",
				"UNREAD_RECORD",
			);
		}
		this.pool = { ...pool };
		this.poolDirty = true;
	}

	/**
	 * The staged writes, as they would be applied.
	 */
	changes(): LedgerChangeset {
		const changes: LedgerChangeset = {
			lenders: [...this.dirtyLenders].flatMap((a) => {
				const r = this.lenders.get(a);
				return r ? [{ ...r }] : [];
			}),
			borrowers: [...this.dirtyBorrowers].flatMap((a) => {
				const r = this.borrowers.get(a);
				return r ? [{ ...r }] : [];
			}),
		};
		if (this.poolDirty && this.pool) {
			changes.pool = { ...this.pool };
		}
		return changes;
	}

	/**
	 * Write staged changes to the store.
	 */
	async commit(): Promise<void> {
		this.assertOpen();
		await this.store.apply(this.changes());
		this.status = "committed";
	}

	/**
	 * Undo a commit. A no-op for sessions that never committed.
	 */
	async revert(): Promise<void> {
		if (this.status !== "committed") {
			this.status = "reverted";
			return;
		}

		const undo: LedgerChangeset = {
			lenders: [],
			borrowers: [],
			removeLenders: [],
			removeBorrowers: [],
		};
		for (const account of this.dirtyLenders) {
			const original = this.originalLenders.get(account);
			if (original) undo.lenders.push({ ...original });
			else undo.removeLenders?.push(account);
		}
		for (const account of this.dirtyBorrowers) {
			const original = this.originalBorrowers.get(account);
			if (original) undo.borrowers.push({ ...original });
			else undo.removeBorrowers?.push(account);
		}
		if (this.poolDirty && this.originalPool) {
			undo.pool = { ...this.originalPool };
		}

		await this.store.apply(undo);
		this.status = "reverted";
	}

	private assertOpen(): void {
		if (this.status !== "open") {
			throw new StoreError(
				`Session is ${this.status} and cannot be modified`,
				"SESSION_CLOSED",
			);
		}
	}
}
