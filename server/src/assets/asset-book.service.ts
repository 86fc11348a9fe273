import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { EntityManager, Repository } from "typeorm";
import { AccountId, AssetTransferError } from "@collateral-ledger/ledger";

import { AssetAllowance, AssetBalance } from "./asset-balance.entity";
import { TransactionsService } from "../common/transactions.service";

/**
 * Persistent balance book for every asset the server knows about.
 *
 * Stands in for the external value-transfer mechanism: markets move funds
 * between accounts and their custody account through {@link pull} and
 * {@link push}.
 */
@Injectable()
export class AssetBookService {
	private readonly logger = new Logger(AssetBookService.name);

	constructor(
		@InjectRepository(AssetBalance)
		private readonly balances: Repository<AssetBalance>,
		@InjectRepository(AssetAllowance)
		private readonly allowances: Repository<AssetAllowance>,
		private readonly transactions: TransactionsService,
	) {}

	async balanceOf(asset: string, account: AccountId): Promise<bigint> {
		const row = await this.balances.findOneBy({ asset, account });
		return row?.balance ?? 0n;
	}

	async allowance(
		asset: string,
		owner: AccountId,
		spender: AccountId,
	): Promise<bigint> {
		const row = await this.allowances.findOneBy({ asset, owner, spender });
		return row?.amount ?? 0n;
	}

	async mint(asset: string, account: AccountId, amount: bigint): Promise<bigint> {
		assertPositive(asset, amount);
		const balance = await this.transactions.run("mint", async (manager) => {
			const next = (await this.readBalance(manager, asset, account)) + amount;
			await this.writeBalance(manager, asset, account, next);
			return next;
		});
		this.logger.log(`Minted ${amount} ${asset} to ${account}`);
		return balance;
	}

	/**
	 * Set the amount `spender` may pull from `owner`.
	 */
	async approve(
		asset: string,
		owner: AccountId,
		spender: AccountId,
		amount: bigint,
	): Promise<void> {
		if (amount < 0n) {
			throw new AssetTransferError(
				"Allowance cannot be negative",
				"INVALID_AMOUNT",
			);
		}
		await this.transactions.run("approve", (manager) =>
			manager.upsert(AssetAllowance, { asset, owner, spender, amount }, [
				"asset",
				"owner",
				"spender",
			]),
		);
	}

	/**
	 * Move `amount` from `from` to `spender`, consuming allowance.
	 */
	pull(
		asset: string,
		from: AccountId,
		spender: AccountId,
		amount: bigint,
	): Promise<void> {
		assertPositive(asset, amount);
		return this.transactions.run("pull", async (manager) => {
			const allowed =
				(
					await manager.findOneBy(AssetAllowance, {
						asset,
						owner: from,
						spender,
					})
				)?.amount ?? 0n;
			if (allowed < amount) {
				throw new AssetTransferError(
					`${asset}: ${from} approved ${allowed} to ${spender}, needs ${amount}`,
					"INSUFFICIENT_ALLOWANCE",
					{ account: from, allowance: allowed.toString() },
				);
			}
			await this.move(manager, asset, from, spender, amount);
			await manager.upsert(
				AssetAllowance,
				{ asset, owner: from, spender, amount: allowed - amount },
				["asset", "owner", "spender"],
			);
		});
	}

	/**
	 * Move `amount` from `from` to `to` without an allowance.
	 */
	push(
		asset: string,
		from: AccountId,
		to: AccountId,
		amount: bigint,
	): Promise<void> {
		assertPositive(asset, amount);
		return this.transactions.run("push", (manager) =>
			this.move(manager, asset, from, to, amount),
		);
	}

	private async move(
		manager: EntityManager,
		asset: string,
		from: AccountId,
		to: AccountId,
		amount: bigint,
	): Promise<void> {
		const balance = await this.readBalance(manager, asset, from);
		if (balance < amount) {
			throw new AssetTransferError(
				`${asset}: ${from} holds ${balance}, needs ${amount}`,
				"INSUFFICIENT_FUNDS",
				{ account: from, balance: balance.toString() },
			);
		}
		await this.writeBalance(manager, asset, from, balance - amount);
		const target = await this.readBalance(manager, asset, to);
		await this.writeBalance(manager, asset, to, target + amount);
	}

	private async readBalance(
		manager: EntityManager,
		asset: string,
		account: AccountId,
	): Promise<bigint> {
		const row = await manager.findOneBy(AssetBalance, { asset, account });
		return row?.balance ?? 0n;
	}

	private async writeBalance(
		manager: EntityManager,
		asset: string,
		account: AccountId,
		balance: bigint,
	): Promise<void> {
		await manager.upsert(AssetBalance, { asset, account, balance }, [
			"asset",
			"account",
		]);
	}
}

function assertPositive(asset: string, amount: bigint): void {
	if (amount <= 0n) {
		throw new AssetTransferError(
			`${asset}: amount must be positive`,
			"INVALID_AMOUNT",
		);
	}
}
