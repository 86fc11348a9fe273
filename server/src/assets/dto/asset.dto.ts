import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString, IsString, Matches, MaxLength } from "class-validator";
import { AMOUNT_PATTERN_DESCRIPTION } from "../../common/dto/amount.dto";

export class MintInDto {
	@ApiProperty({ example: "alice" })
	@IsString()
	@Matches(/^[A-Za-z0-9_.-]{1,64}$/)
	account!: string;

	@ApiProperty({ example: "1000", description: AMOUNT_PATTERN_DESCRIPTION })
	@IsNumberString({ no_symbols: true })
	@MaxLength(78)
	amount!: string;
}

export class ApproveInDto {
	@ApiProperty({
		example: "q3f7p9n4z81k6c0b",
		description: "Market whose custody account may pull the funds",
	})
	@IsString()
	@MaxLength(64)
	marketId!: string;

	@ApiProperty({
		example: "1000",
		description: `Allowance to set. ${AMOUNT_PATTERN_DESCRIPTION}`,
	})
	@IsNumberString({ no_symbols: true })
	@MaxLength(78)
	amount!: string;
}

export class AssetBalanceOutDto {
	@ApiProperty({ example: "USD" })
	asset!: string;

	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ example: "1000" })
	balance!: string;
}

export class AllowanceOutDto {
	@ApiProperty({ example: "USD" })
	asset!: string;

	@ApiProperty({ example: "alice" })
	owner!: string;

	@ApiProperty({ example: "market:q3f7p9n4z81k6c0b" })
	spender!: string;

	@ApiProperty({ example: "1000" })
	amount!: string;
}
