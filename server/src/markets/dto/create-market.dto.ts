import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	ArrayMinSize,
	IsArray,
	IsInt,
	IsOptional,
	IsString,
	Matches,
	Max,
	MaxLength,
	Min,
	ValidateNested,
} from "class-validator";
import {
	MAX_COLLATERAL_RATIO_BPS,
	MIN_COLLATERAL_RATIO_BPS,
} from "@collateral-ledger/ledger";

export class RateBracketDto {
	@ApiPropertyOptional({
		type: Number,
		nullable: true,
		description:
			"Inclusive upper bound of the bracket in days of loan age. Omit or null for the last, open-ended bracket.",
		example: 90,
	})
	@IsOptional()
	@IsInt()
	@Min(1)
	untilDay?: number | null;

	@ApiProperty({ example: 450, description: "Interest in basis points" })
	@IsInt()
	@Min(0)
	@Max(10_000)
	interestBps!: number;

	@ApiProperty({
		example: 100,
		description: "Fee on the interest, in basis points, charged on closure",
	})
	@IsInt()
	@Min(0)
	@Max(10_000)
	feeBps!: number;
}

export class CreateMarketInDto {
	@ApiProperty({ example: "USD", description: "Lendable asset" })
	@IsString()
	@Matches(/^[A-Za-z0-9_.-]{1,32}$/)
	baseAsset!: string;

	@ApiProperty({ example: "ETH", description: "Collateral asset" })
	@IsString()
	@Matches(/^[A-Za-z0-9_.-]{1,32}$/)
	collateralAsset!: string;

	@ApiProperty({
		minimum: MIN_COLLATERAL_RATIO_BPS,
		maximum: MAX_COLLATERAL_RATIO_BPS,
		example: 8000,
		description: "Borrow limit and liquidation threshold, in basis points",
	})
	@IsInt()
	collateralRatio!: number;

	@ApiPropertyOptional({
		minimum: 0,
		maximum: 10_000,
		example: 100,
		description: "Advertised protocol fee in basis points",
	})
	@IsOptional()
	@IsInt()
	protocolFeeBps?: number;

	@ApiPropertyOptional({
		example: "treasury",
		description: "Defaults to DEFAULT_FEE_RECIPIENT, then to the owner",
	})
	@IsOptional()
	@IsString()
	@MaxLength(64)
	feeRecipient?: string;

	@ApiPropertyOptional({
		type: [RateBracketDto],
		description: "Quarterly schedule; defaults to 450/800/1050/1300 bp",
	})
	@IsOptional()
	@IsArray()
	@ArrayMinSize(1)
	@ValidateNested({ each: true })
	@Type(() => RateBracketDto)
	rateSchedule?: RateBracketDto[];
}

export class UpdateFeeRecipientInDto {
	@ApiProperty({ example: "new-treasury" })
	@IsString()
	@MaxLength(64)
	feeRecipient!: string;
}
