/**
 * Ledger Store Types
 *
 * The store only holds records. All behaviour lives in the engines, which
 * read and stage writes through a {@link LedgerSession}. Bring your own
 * persistence layer (SQLite, Postgres, in-memory...) by implementing
 * {@link LedgerStore}.
 */

import {
	AccountId,
	BorrowerRecord,
	LenderRecord,
	PoolState,
} from "../core/index.js";

/**
 * A set of record writes applied atomically.
 */
export interface LedgerChangeset {
	/** Lender records to create or replace */
	lenders: LenderRecord[];
	/** Borrower records to create or replace */
	borrowers: BorrowerRecord[];
	/** New pool totals, if they changed */
	pool?: PoolState;
	/** Lender records to delete (only used when undoing a creation) */
	removeLenders?: AccountId[];
	/** Borrower records to delete (only used when undoing a creation) */
	removeBorrowers?: AccountId[];
}

/**
 * Storage backend for one market's ledger.
 *
 * @example
 * ```typescript
 * class PostgresLedgerStore implements LedgerStore {
 *   constructor(private pool: Pool, private marketId: string) {}
 *
 *   async apply(changes: LedgerChangeset): Promise<void> {
 *     const client = await this.pool.connect();
 *     await client.query("BEGIN");
 *     // ... upsert records, update pool row
 *     await client.query("COMMIT");
 *   }
 *
 *   // ... other methods
 * }
 * ```
 */
export interface LedgerStore {
	/**
	 * Load a lender record.
	 *
	 * @returns The record if found, null otherwise
	 */
	getLender(account: AccountId): Promise<LenderRecord | null>;

	/**
	 * Load a borrower record.
	 *
	 * @returns The record if found, null otherwise
	 */
	getBorrower(account: AccountId): Promise<BorrowerRecord | null>;

	/**
	 * Load pool totals. A fresh store returns all-zero totals.
	 */
	getPool(): Promise<PoolState>;

	listLenders(): Promise<LenderRecord[]>;

	listBorrowers(): Promise<BorrowerRecord[]>;

	/**
	 * Apply a changeset. Either every write lands or none does.
	 */
	apply(changes: LedgerChangeset): Promise<void>;

	/**
	 * Persist a new fee recipient for stores that keep the market's
	 * configuration. The market only switches recipients once this resolves.
	 */
	setFeeRecipient?(recipient: AccountId): Promise<void>;
}

/**
 * Error thrown by store implementations.
 */
export class StoreError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StoreError";
	}
}
