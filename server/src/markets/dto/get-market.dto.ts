import { ApiProperty } from "@nestjs/swagger";
import type { LendingMarket, PoolState } from "@collateral-ledger/ledger";
import { custodyAccount } from "../../assets/book-asset-transfer";
import type { Market } from "../market.entity";

export class PoolOutDto {
	@ApiProperty({ example: "200", description: "Liquidity available to borrow" })
	totalSupplied!: string;

	@ApiProperty({ example: "800" })
	totalBorrowed!: string;

	@ApiProperty({ example: "64", description: "Interest kept by the pool" })
	reserves!: string;

	@ApiProperty({ example: "0", description: "Fees paid out so far" })
	feesPaid!: string;
}

export class RateBracketOutDto {
	@ApiProperty({ type: Number, nullable: true, example: 90 })
	untilDay!: number | null;

	@ApiProperty({ example: 450 })
	interestBps!: number;

	@ApiProperty({ example: 100 })
	feeBps!: number;
}

export class GetMarketDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	marketId!: string;

	@ApiProperty({ example: "owner" })
	owner!: string;

	@ApiProperty({ example: "USD" })
	baseAsset!: string;

	@ApiProperty({ example: "ETH" })
	collateralAsset!: string;

	@ApiProperty({ example: 8000 })
	collateralRatio!: number;

	@ApiProperty({ example: 100 })
	protocolFeeBps!: number;

	@ApiProperty({ example: "treasury" })
	feeRecipient!: string;

	@ApiProperty({ type: [RateBracketOutDto] })
	rateSchedule!: RateBracketOutDto[];

	@ApiProperty({
		example: "market:q3f7p9n4z81k6c0b",
		description: "Account to approve before deposits and repayments",
	})
	custodyAccount!: string;

	@ApiProperty({ type: PoolOutDto })
	pool!: PoolOutDto;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	createdAt!: number;
}

export function toPoolDto(pool: PoolState): PoolOutDto {
	return {
		totalSupplied: pool.totalSupplied.toString(),
		totalBorrowed: pool.totalBorrowed.toString(),
		reserves: pool.reserves.toString(),
		feesPaid: pool.feesPaid.toString(),
	};
}

export function toMarketDto(entity: Market, engine: LendingMarket): GetMarketDto {
	const config = engine.getConfig();
	return {
		marketId: entity.externalId,
		owner: config.owner,
		baseAsset: config.baseAsset,
		collateralAsset: config.collateralAsset,
		collateralRatio: config.collateralRatio,
		protocolFeeBps: config.protocolFeeBps,
		feeRecipient: config.feeRecipient,
		rateSchedule: config.rateSchedule.map((b) => ({ ...b })),
		custodyAccount: custodyAccount(entity.externalId),
		pool: toPoolDto(entity),
		createdAt: entity.createdAt.getTime(),
	};
}
