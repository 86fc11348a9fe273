/**
 * In-Memory Asset
 *
 * Balance book with allowances, implementing {@link AssetTransfer} for a
 * single custody account. Useful for tests and in-process simulations.
 */

import { AccountId } from "../core/index.js";
import { AssetTransfer, AssetTransferError } from "./types.js";

/**
 * In-memory asset.
 *
 * @example
 * ```typescript
 * const usd = new MemoryAsset("USD", "market-custody");
 * usd.mint("alice", 1_000n);
 * usd.approve("alice", "market-custody", 1_000n);
 * await usd.pull("alice", 400n); // alice: 600, custody: 400
 * ```
 */
export class MemoryAsset implements AssetTransfer {
	private readonly balances = new Map<AccountId, bigint>();
	private readonly allowances = new Map<AccountId, Map<AccountId, bigint>>();

	constructor(
		readonly asset: string,
		readonly custody: AccountId,
	) {}

	balanceOf(account: AccountId): bigint {
		return this.balances.get(account) ?? 0n;
	}

	allowance(owner: AccountId, spender: AccountId): bigint {
		return this.allowances.get(owner)?.get(spender) ?? 0n;
	}

	mint(account: AccountId, amount: bigint): void {
		this.assertAmount(amount);
		this.balances.set(account, this.balanceOf(account) + amount);
	}

	/**
	 * Set (not add to) the amount `spender` may pull from `owner`.
	 */
	approve(owner: AccountId, spender: AccountId, amount: bigint): void {
		if (amount < 0n) {
			throw new AssetTransferError("Allowance cannot be negative", "INVALID_AMOUNT");
		}
		let granted = this.allowances.get(owner);
		if (!granted) {
			granted = new Map();
			this.allowances.set(owner, granted);
		}
		granted.set(spender, amount);
	}

	transfer(from: AccountId, to: AccountId, amount: bigint): void {
		this.assertAmount(amount);
		const balance = this.balanceOf(from);
		if (balance < amount) {
			throw new AssetTransferError(
				`${this.asset}: ${from} holds ${balance}, needs ${amount}`,
				"INSUFFICIENT_FUNDS",
				{ account: from, balance: balance.toString() },
			);
		}
		this.balances.set(from, balance - amount);
		this.balances.set(to, this.balanceOf(to) + amount);
	}

	async pull(from: AccountId, amount: bigint): Promise<void> {
		const allowed = this.allowance(from, this.custody);
		if (allowed < amount) {
			throw new AssetTransferError(
				`${this.asset}: ${from} approved ${allowed} to ${this.custody}, needs ${amount}`,
				"INSUFFICIENT_ALLOWANCE",
				{ account: from, allowance: allowed.toString() },
			);
		}
		this.transfer(from, this.custody, amount);
		this.approve(from, this.custody, allowed - amount);
	}

	async push(to: AccountId, amount: bigint): Promise<void> {
		this.transfer(this.custody, to, amount);
	}

	private assertAmount(amount: bigint): void {
		if (amount <= 0n) {
			throw new AssetTransferError(
				`${this.asset}: amount must be positive`,
				"INVALID_AMOUNT",
			);
		}
	}
}
