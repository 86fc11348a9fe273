/**
 * Value-transfer collaborator types
 *
 * The ledger never moves funds itself. A market is given one
 * {@link AssetTransfer} per asset and calls it after its own state has been
 * committed.
 */

import { AccountId } from "../core/index.js";

/**
 * Moves one asset between accounts and the market's custody.
 *
 * Implementations must throw on failure. Returning normally means the
 * transfer happened.
 */
export interface AssetTransfer {
	/** Asset identifier, used in logs and errors */
	readonly asset: string;

	/**
	 * Move `amount` from `from` into custody. Requires `from` to have
	 * approved the custody account beforehand.
	 */
	pull(from: AccountId, amount: bigint): Promise<void>;

	/**
	 * Move `amount` out of custody to `to`.
	 */
	push(to: AccountId, amount: bigint): Promise<void>;
}

export type TransferDirection = "pull" | "push";

/**
 * Error thrown by asset implementations.
 */
export class AssetTransferError extends Error {
	constructor(
		message: string,
		public readonly code?:
			| "INSUFFICIENT_FUNDS"
			| "INSUFFICIENT_ALLOWANCE"
			| "INVALID_AMOUNT"
			| "TRANSFER_REJECTED",
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "AssetTransferError";
	}
}
