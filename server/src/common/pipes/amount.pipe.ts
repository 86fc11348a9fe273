import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";

/**
 * Parses a decimal integer string, such as a query parameter, into a bigint.
 */
@Injectable()
export class ParseAmountPipe implements PipeTransform<string | undefined, bigint> {
	transform(value: string | undefined): bigint {
		if (!value || !/^\d{1,78}$/.test(value)) {
			throw new BadRequestException("Amount must be a non-negative integer");
		}
		return BigInt(value);
	}
}
