import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	Query,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiExtraModels,
	ApiHeader,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";

import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForEmptyResponse,
} from "../common/dto/envelopes";
import { AmountInDto } from "../common/dto/amount.dto";
import { ParseAmountPipe } from "../common/pipes/amount.pipe";
import { ACCOUNT_HEADER, AccountGuard } from "../common/auth/account.guard";
import { CallerAccount } from "../common/auth/account.decorator";
import {
	BorrowerOutDto,
	LenderOutDto,
	LiquidationOutDto,
	RepaymentQuoteOutDto,
	toBorrowerDto,
	toLenderDto,
	toLiquidationDto,
	toQuoteDto,
} from "./dto/position.dto";
import { MarketsService } from "./markets.service";

type Empty = ApiEnvelope<Record<string, never>>;

@ApiTags("2 - Lending")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	LenderOutDto,
	BorrowerOutDto,
	RepaymentQuoteOutDto,
	LiquidationOutDto,
)
@ApiHeader({ name: ACCOUNT_HEADER, required: false })
@ApiUnprocessableEntityResponse({ description: "Rejected by the ledger" })
@Controller("api/v1/markets/:marketId")
export class LendingController {
	constructor(private readonly marketsService: MarketsService) {}

	// ==================== Supply ====================

	@Post("deposit")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiBody({ type: AmountInDto })
	@ApiOkResponse({ schema: getSchemaPathForEmptyResponse() })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiOperation({ summary: "Supply base asset to the pool" })
	async deposit(
		@Param("marketId") marketId: string,
		@Body() dto: AmountInDto,
		@CallerAccount() account: string,
	): Promise<Empty> {
		await this.marketsService.deposit(marketId, account, BigInt(dto.amount));
		return envelope();
	}

	@Post("withdraw")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiBody({ type: AmountInDto })
	@ApiOkResponse({ schema: getSchemaPathForEmptyResponse() })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiOperation({ summary: "Withdraw supplied base asset" })
	async withdraw(
		@Param("marketId") marketId: string,
		@Body() dto: AmountInDto,
		@CallerAccount() account: string,
	): Promise<Empty> {
		await this.marketsService.withdraw(marketId, account, BigInt(dto.amount));
		return envelope();
	}

	// ==================== Collateral ====================

	@Post("collateral/deposit")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiBody({ type: AmountInDto })
	@ApiOkResponse({ schema: getSchemaPathForEmptyResponse() })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiOperation({ summary: "Lock collateral" })
	async depositCollateral(
		@Param("marketId") marketId: string,
		@Body() dto: AmountInDto,
		@CallerAccount() account: string,
	): Promise<Empty> {
		await this.marketsService.depositCollateral(
			marketId,
			account,
			BigInt(dto.amount),
		);
		return envelope();
	}

	@Post("collateral/withdraw")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiBody({ type: AmountInDto })
	@ApiOkResponse({ schema: getSchemaPathForEmptyResponse() })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiOperation({ summary: "Release collateral not needed to back the loan" })
	async withdrawCollateral(
		@Param("marketId") marketId: string,
		@Body() dto: AmountInDto,
		@CallerAccount() account: string,
	): Promise<Empty> {
		await this.marketsService.withdrawCollateral(
			marketId,
			account,
			BigInt(dto.amount),
		);
		return envelope();
	}

	// ==================== Credit ====================

	@Post("borrow")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiBody({ type: AmountInDto })
	@ApiOkResponse({ schema: getSchemaPathForEmptyResponse() })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiOperation({ summary: "Borrow base asset against collateral" })
	async borrow(
		@Param("marketId") marketId: string,
		@Body() dto: AmountInDto,
		@CallerAccount() account: string,
	): Promise<Empty> {
		await this.marketsService.borrow(marketId, account, BigInt(dto.amount));
		return envelope();
	}

	@Post("repay")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiBody({ type: AmountInDto, description: "Principal to repay" })
	@ApiOkResponse({ schema: getSchemaPathForDto(RepaymentQuoteOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiOperation({
		summary: "Repay principal plus the current quarter's interest",
	})
	async repay(
		@Param("marketId") marketId: string,
		@Body() dto: AmountInDto,
		@CallerAccount() account: string,
	): Promise<ApiEnvelope<RepaymentQuoteOutDto>> {
		const quote = await this.marketsService.repay(
			marketId,
			account,
			BigInt(dto.amount),
		);
		return envelope(toQuoteDto(quote));
	}

	// ==================== Liquidation ====================

	@Post("liquidate/:borrower")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiOkResponse({ schema: getSchemaPathForDto(LiquidationOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiOperation({
		summary: "Repay a liquidatable borrower's principal and seize its collateral",
	})
	async liquidate(
		@Param("marketId") marketId: string,
		@Param("borrower") borrower: string,
		@CallerAccount() account: string,
	): Promise<ApiEnvelope<LiquidationOutDto>> {
		const result = await this.marketsService.liquidate(
			marketId,
			account,
			borrower,
		);
		return envelope(toLiquidationDto(result));
	}

	// ==================== Reads ====================

	@Get("lenders/:account")
	@ApiOkResponse({ schema: getSchemaPathForDto(LenderOutDto) })
	@ApiOperation({ summary: "Supplied balance of a lender" })
	async lender(
		@Param("marketId") marketId: string,
		@Param("account") account: string,
	): Promise<ApiEnvelope<LenderOutDto>> {
		return envelope(
			toLenderDto(await this.marketsService.getLender(marketId, account)),
		);
	}

	@Get("borrowers/:account")
	@ApiOkResponse({ schema: getSchemaPathForDto(BorrowerOutDto) })
	@ApiNotFoundResponse({ description: "No position for this account" })
	@ApiOperation({ summary: "Borrower position with debt, ratio and health" })
	async borrower(
		@Param("marketId") marketId: string,
		@Param("account") account: string,
	): Promise<ApiEnvelope<BorrowerOutDto>> {
		return envelope(
			toBorrowerDto(await this.marketsService.getPosition(marketId, account)),
		);
	}

	@Get("borrowers/:account/repayment-quote")
	@ApiQuery({
		name: "principal",
		required: true,
		description: "Principal to repay",
		schema: { type: "string", example: "800" },
	})
	@ApiOkResponse({ schema: getSchemaPathForDto(RepaymentQuoteOutDto) })
	@ApiOperation({ summary: "What repaying a principal would cost right now" })
	async quote(
		@Param("marketId") marketId: string,
		@Param("account") account: string,
		@Query("principal", ParseAmountPipe) principal: bigint,
	): Promise<ApiEnvelope<RepaymentQuoteOutDto>> {
		const quote = await this.marketsService.quoteRepayment(
			marketId,
			account,
			principal,
		);
		return envelope(toQuoteDto(quote));
	}
}
