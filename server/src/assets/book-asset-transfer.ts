import type { AccountId, AssetTransfer } from "@collateral-ledger/ledger";
import type { AssetBookService } from "./asset-book.service";

/**
 * {@link AssetTransfer} for one asset, moving funds in and out of a
 * market's custody account in the asset book.
 */
export class BookAssetTransfer implements AssetTransfer {
	constructor(
		private readonly book: AssetBookService,
		readonly asset: string,
		readonly custody: AccountId,
	) {}

	pull(from: AccountId, amount: bigint): Promise<void> {
		return this.book.pull(this.asset, from, this.custody, amount);
	}

	push(to: AccountId, amount: bigint): Promise<void> {
		return this.book.push(this.asset, this.custody, to, amount);
	}
}

export function custodyAccount(marketId: string): AccountId {
	return `market:${marketId}`;
}
