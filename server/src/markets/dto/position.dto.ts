import { ApiProperty } from "@nestjs/swagger";
import type {
	BorrowerPosition,
	LenderRecord,
	LiquidationReason,
	LiquidationResult,
	RepaymentQuote,
} from "@collateral-ledger/ledger";

const LIQUIDATION_REASONS: LiquidationReason[] = [
	"matured",
	"undercollateralized",
	"q3-repayment-shortfall",
	"q4-repayment-shortfall",
];

export class LenderOutDto {
	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ example: "1000" })
	amountSupplied!: string;

	@ApiProperty({ description: "Unix seconds of the last deposit", example: 0 })
	depositTimestamp!: number;
}

export class BorrowerOutDto {
	@ApiProperty({ example: "bob" })
	account!: string;

	@ApiProperty({ example: "800", description: "Outstanding principal" })
	amountBorrowed!: string;

	@ApiProperty({ example: "800" })
	initialBorrowAmount!: string;

	@ApiProperty({ example: "1000" })
	collateralDeposited!: string;

	@ApiProperty({ description: "Unix seconds, 0 without an active loan" })
	borrowTimestamp!: number;

	@ApiProperty({ description: "Unix seconds" })
	lastIteration!: number;

	@ApiProperty({ example: "0" })
	amountRepaid!: string;

	@ApiProperty({ example: "836", description: "Principal plus interest owed now" })
	totalDebt!: string;

	@ApiProperty({
		example: "12500",
		description: "Collateral to principal in basis points; 2^256 - 1 without a loan",
	})
	collateralRatio!: string;

	@ApiProperty({ example: "0" })
	borrowCapacity!: string;

	@ApiProperty()
	liquidatable!: boolean;

	@ApiProperty({ enum: LIQUIDATION_REASONS, isArray: true })
	liquidationReasons!: LiquidationReason[];
}

export class RepaymentQuoteOutDto {
	@ApiProperty({ example: "800" })
	principal!: string;

	@ApiProperty({ example: "64" })
	interest!: string;

	@ApiProperty({ example: "0" })
	fee!: string;

	@ApiProperty({ example: "864", description: "Amount pulled from the payer" })
	total!: string;

	@ApiProperty()
	closesLoan!: boolean;

	@ApiProperty({ example: 2 })
	quarter!: number;

	@ApiProperty({ example: 800 })
	interestBps!: number;

	@ApiProperty({ example: 150 })
	feeBps!: number;
}

export class LiquidationOutDto {
	@ApiProperty({ example: "800" })
	debt!: string;

	@ApiProperty({ example: "1000" })
	collateral!: string;

	@ApiProperty({ enum: LIQUIDATION_REASONS, isArray: true })
	reasons!: LiquidationReason[];
}

export function toLenderDto(record: LenderRecord): LenderOutDto {
	return {
		account: record.account,
		amountSupplied: record.amountSupplied.toString(),
		depositTimestamp: record.depositTimestamp,
	};
}

export function toBorrowerDto(position: BorrowerPosition): BorrowerOutDto {
	const { record } = position;
	return {
		account: record.account,
		amountBorrowed: record.amountBorrowed.toString(),
		initialBorrowAmount: record.initialBorrowAmount.toString(),
		collateralDeposited: record.collateralDeposited.toString(),
		borrowTimestamp: record.borrowTimestamp,
		lastIteration: record.lastIteration,
		amountRepaid: record.amountRepaid.toString(),
		totalDebt: position.totalDebt.toString(),
		collateralRatio: position.collateralRatio.toString(),
		borrowCapacity: position.borrowCapacity.toString(),
		liquidatable: position.liquidationReasons.length > 0,
		liquidationReasons: position.liquidationReasons,
	};
}

export function toQuoteDto(quote: RepaymentQuote): RepaymentQuoteOutDto {
	return {
		principal: quote.principal.toString(),
		interest: quote.interest.toString(),
		fee: quote.fee.toString(),
		total: quote.total.toString(),
		closesLoan: quote.closesLoan,
		quarter: quote.quarter,
		interestBps: quote.interestBps,
		feeBps: quote.feeBps,
	};
}

export function toLiquidationDto(result: LiquidationResult): LiquidationOutDto {
	return {
		debt: result.debt.toString(),
		collateral: result.collateral.toString(),
		reasons: result.reasons,
	};
}
