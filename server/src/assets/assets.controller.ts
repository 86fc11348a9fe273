import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";

import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { ACCOUNT_HEADER, AccountGuard, OwnerGuard } from "../common/auth/account.guard";
import { CallerAccount } from "../common/auth/account.decorator";
import { AssetBookService } from "./asset-book.service";
import { custodyAccount } from "./book-asset-transfer";
import {
	AllowanceOutDto,
	ApproveInDto,
	AssetBalanceOutDto,
	MintInDto,
} from "./dto/asset.dto";

@ApiTags("3 - Assets")
@ApiExtraModels(ApiEnvelopeShellDto, AssetBalanceOutDto, AllowanceOutDto)
@ApiHeader({ name: ACCOUNT_HEADER, required: false })
@Controller("api/v1/assets")
export class AssetsController {
	constructor(private readonly book: AssetBookService) {}

	@Post(":asset/mint")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard, OwnerGuard)
	@ApiBody({ type: MintInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(AssetBalanceOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiForbiddenResponse({ description: "Caller is not the owner" })
	@ApiOperation({ summary: "Credit an account with test funds (owner only)" })
	async mint(
		@Param("asset") asset: string,
		@Body() dto: MintInDto,
	): Promise<ApiEnvelope<AssetBalanceOutDto>> {
		const balance = await this.book.mint(asset, dto.account, BigInt(dto.amount));
		return envelope({ asset, account: dto.account, balance: balance.toString() });
	}

	@Post(":asset/approve")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiBody({ type: ApproveInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(AllowanceOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiOperation({
		summary: "Allow a market's custody account to pull the caller's funds",
	})
	async approve(
		@Param("asset") asset: string,
		@Body() dto: ApproveInDto,
		@CallerAccount() account: string,
	): Promise<ApiEnvelope<AllowanceOutDto>> {
		const spender = custodyAccount(dto.marketId);
		const amount = BigInt(dto.amount);
		await this.book.approve(asset, account, spender, amount);
		return envelope({ asset, owner: account, spender, amount: amount.toString() });
	}

	@Get(":asset/balances/:account")
	@ApiOkResponse({ schema: getSchemaPathForDto(AssetBalanceOutDto) })
	@ApiOperation({ summary: "Balance of an account" })
	async balance(
		@Param("asset") asset: string,
		@Param("account") account: string,
	): Promise<ApiEnvelope<AssetBalanceOutDto>> {
		const balance = await this.book.balanceOf(asset, account);
		return envelope({ asset, account, balance: balance.toString() });
	}
}
