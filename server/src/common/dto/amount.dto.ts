import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString, MaxLength } from "class-validator";

export const AMOUNT_PATTERN_DESCRIPTION =
	"Unsigned integer in the asset's smallest unit, as a decimal string";

export class AmountInDto {
	@ApiProperty({ example: "1000", description: AMOUNT_PATTERN_DESCRIPTION })
	@IsNumberString({ no_symbols: true })
	@MaxLength(78)
	amount!: string;
}
