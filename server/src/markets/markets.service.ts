import {
	Inject,
	Injectable,
	Logger,
	NotFoundException,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { InjectRepository } from "@nestjs/typeorm";
import { Brackets, type Repository } from "typeorm";
import { customAlphabet } from "nanoid";
import {
	type AccountId,
	type BorrowerPosition as Position,
	type Clock,
	type LenderRecord,
	type LiquidationResult,
	type MarketConfig,
	type RepaymentQuote,
	LendingMarket,
	emptyLender,
	validateMarketConfig,
} from "@collateral-ledger/ledger";

import { Market } from "./market.entity";
import { BorrowerPosition, LenderPosition } from "./position.entity";
import { TypeOrmLedgerStore } from "./typeorm-ledger-store";
import type { CreateMarketInDto } from "./dto/create-market.dto";
import { type GetMarketDto, toMarketDto } from "./dto/get-market.dto";
import { AssetBookService } from "../assets/asset-book.service";
import {
	BookAssetTransfer,
	custodyAccount,
} from "../assets/book-asset-transfer";
import { TransactionsService } from "../common/transactions.service";
import { CLOCK } from "../common/clock";
import { type Cursor, cursorToString, emptyCursor } from "../common/dto/envelopes";

const generateMarketId = customAlphabet(
	"0123456789abcdefghijklmnopqrstuvwxyz",
	16,
);

@Injectable()
export class MarketsService {
	private readonly logger = new Logger(MarketsService.name);
	// One engine per market so that its operations share a single queue
	private readonly engines = new Map<string, Promise<LendingMarket>>();

	constructor(
		@InjectRepository(Market)
		private readonly markets: Repository<Market>,
		@InjectRepository(LenderPosition)
		private readonly lenders: Repository<LenderPosition>,
		@InjectRepository(BorrowerPosition)
		private readonly borrowers: Repository<BorrowerPosition>,
		private readonly book: AssetBookService,
		private readonly transactions: TransactionsService,
		private readonly config: ConfigService,
		private readonly events: EventEmitter2,
		@Inject(CLOCK) private readonly clock: Clock,
	) {}

	// ==================== Marketplace ====================

	async create(dto: CreateMarketInDto, owner: AccountId): Promise<GetMarketDto> {
		const marketId = generateMarketId();
		const config: MarketConfig = {
			marketId,
			owner,
			baseAsset: dto.baseAsset,
			collateralAsset: dto.collateralAsset,
			collateralRatio: dto.collateralRatio,
			protocolFeeBps: dto.protocolFeeBps ?? 0,
			feeRecipient:
				dto.feeRecipient ??
				this.config.get<string>("DEFAULT_FEE_RECIPIENT") ??
				owner,
			rateSchedule: dto.rateSchedule?.map((b) => ({
				untilDay: b.untilDay ?? null,
				interestBps: b.interestBps,
				feeBps: b.feeBps,
			})),
		};
		validateMarketConfig(config);

		const entity = await this.transactions.run(`createMarket:${marketId}`, (manager) =>
			manager.save(
				manager.create(Market, {
					externalId: marketId,
					owner: config.owner,
					baseAsset: config.baseAsset,
					collateralAsset: config.collateralAsset,
					collateralRatio: config.collateralRatio,
					protocolFeeBps: config.protocolFeeBps,
					feeRecipient: config.feeRecipient,
					rateSchedule: config.rateSchedule ?? null,
					totalSupplied: 0n,
					totalBorrowed: 0n,
					reserves: 0n,
					feesPaid: 0n,
				}),
			),
		);
		this.logger.log(
			`Market ${marketId} created: ${config.baseAsset}/${config.collateralAsset} at ${config.collateralRatio} bp`,
		);

		return toMarketDto(entity, await this.engine(marketId));
	}

	/*
	 * Cursor is base64(`${createdAtMs}:${id}`), newest first.
	 */
	async list(
		limit: number,
		cursor: Cursor = emptyCursor,
	): Promise<{ items: GetMarketDto[]; nextCursor?: string; total: number }> {
		const take = Math.min(Math.max(limit, 1), 100);

		const qb = this.markets.createQueryBuilder("m");
		if (cursor.createdBefore !== undefined && cursor.idBefore !== undefined) {
			qb.where(
				new Brackets((w) => {
					w.where("m.createdAt < :createdBefore", {
						createdBefore: cursor.createdBefore,
					}).orWhere(
						new Brackets((w2) => {
							w2.where("m.createdAt = :createdAtEq", {
								createdAtEq: cursor.createdBefore,
							}).andWhere("m.id < :idBefore", { idBefore: cursor.idBefore });
						}),
					);
				}),
			);
		}

		const rows = await qb
			.orderBy("m.createdAt", "DESC")
			.addOrderBy("m.id", "DESC")
			.take(take)
			.getMany();
		const total = await this.markets.count();

		let nextCursor: string | undefined;
		if (rows.length === take) {
			const last = rows[rows.length - 1];
			nextCursor = cursorToString(last.createdAt, last.id);
		}

		const items: GetMarketDto[] = [];
		for (const row of rows) {
			items.push(toMarketDto(row, await this.engine(row.externalId)));
		}
		return { items, nextCursor, total };
	}

	async get(marketId: string): Promise<GetMarketDto> {
		const entity = await this.findOrThrow(marketId);
		return toMarketDto(entity, await this.engine(marketId));
	}

	async setFeeRecipient(
		marketId: string,
		caller: AccountId,
		recipient: AccountId,
	): Promise<GetMarketDto> {
		// The engine's store writes the market row before the switch
		await (await this.engine(marketId)).setFeeRecipient(caller, recipient);
		return this.get(marketId);
	}

	// ==================== Ledger operations ====================

	async deposit(marketId: string, caller: AccountId, amount: bigint): Promise<void> {
		await (await this.engine(marketId)).deposit(caller, amount);
	}

	async withdraw(marketId: string, caller: AccountId, amount: bigint): Promise<void> {
		await (await this.engine(marketId)).withdraw(caller, amount);
	}

	async depositCollateral(marketId: string, caller: AccountId, amount: bigint): Promise<void> {
		await (await this.engine(marketId)).depositCollateral(caller, amount);
	}

	async withdrawCollateral(marketId: string, caller: AccountId, amount: bigint): Promise<void> {
		await (await this.engine(marketId)).withdrawCollateral(caller, amount);
	}

	async borrow(marketId: string, caller: AccountId, amount: bigint): Promise<void> {
		await (await this.engine(marketId)).borrow(caller, amount);
	}

	async repay(
		marketId: string,
		caller: AccountId,
		principal: bigint,
	): Promise<RepaymentQuote> {
		return (await this.engine(marketId)).repay(caller, principal);
	}

	async liquidate(
		marketId: string,
		liquidator: AccountId,
		borrower: AccountId,
	): Promise<LiquidationResult> {
		return (await this.engine(marketId)).liquidate(liquidator, borrower);
	}

	// ==================== Reads ====================

	async getLender(marketId: string, account: AccountId): Promise<LenderRecord> {
		const engine = await this.engine(marketId);
		return (await engine.getLender(account)) ?? emptyLender(account);
	}

	async getPosition(marketId: string, account: AccountId): Promise<Position> {
		const position = await (await this.engine(marketId)).getPosition(account);
		if (!position) {
			throw new NotFoundException(`${account} has no position in ${marketId}`);
		}
		return position;
	}

	async quoteRepayment(
		marketId: string,
		account: AccountId,
		principal: bigint,
	): Promise<RepaymentQuote> {
		return (await this.engine(marketId)).quoteRepayment(account, principal);
	}

	// ==================== Engines ====================

	private async findOrThrow(marketId: string): Promise<Market> {
		const entity = await this.markets.findOneBy({ externalId: marketId });
		if (!entity) throw new NotFoundException("Market not found");
		return entity;
	}

	private engine(marketId: string): Promise<LendingMarket> {
		const cached = this.engines.get(marketId);
		if (cached) return cached;

		const loading = this.load(marketId);
		this.engines.set(marketId, loading);
		return loading;
	}

	private async load(marketId: string): Promise<LendingMarket> {
		let entity: Market;
		try {
			entity = await this.findOrThrow(marketId);
		} catch (e) {
			this.engines.delete(marketId);
			throw e;
		}

		const custody = custodyAccount(marketId);
		return new LendingMarket({
			config: {
				marketId,
				owner: entity.owner,
				baseAsset: entity.baseAsset,
				collateralAsset: entity.collateralAsset,
				collateralRatio: entity.collateralRatio,
				protocolFeeBps: entity.protocolFeeBps,
				feeRecipient: entity.feeRecipient,
				rateSchedule: entity.rateSchedule ?? undefined,
			},
			store: new TypeOrmLedgerStore(
				marketId,
				{
					markets: this.markets,
					lenders: this.lenders,
					borrowers: this.borrowers,
				},
				this.transactions,
			),
			base: new BookAssetTransfer(this.book, entity.baseAsset, custody),
			collateral: new BookAssetTransfer(this.book, entity.collateralAsset, custody),
			clock: this.clock,
			events: this.events,
			logger: new Logger(`LendingMarket:${marketId}`),
		});
	}
}
