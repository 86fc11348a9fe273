import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	ParseIntPipe,
	Patch,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiHeader,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import type { Observable } from "rxjs";
import type { LedgerEvent } from "@collateral-ledger/ledger";

import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import { ACCOUNT_HEADER, AccountGuard, OwnerGuard } from "../common/auth/account.guard";
import { CallerAccount } from "../common/auth/account.decorator";
import {
	type SseEvent,
	ServerSentEventsService,
} from "../common/server-sent-events.service";
import {
	CreateMarketInDto,
	UpdateFeeRecipientInDto,
} from "./dto/create-market.dto";
import { GetMarketDto } from "./dto/get-market.dto";
import { MarketsService } from "./markets.service";

@ApiTags("1 - Markets")
@ApiExtraModels(ApiEnvelopeShellDto, ApiPaginatedMetaDto, GetMarketDto)
@ApiHeader({ name: ACCOUNT_HEADER, required: false })
@Controller("api/v1/markets")
export class MarketsController {
	constructor(
		private readonly marketsService: MarketsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("")
	@UseGuards(AccountGuard, OwnerGuard)
	@ApiBody({ type: CreateMarketInDto })
	@ApiCreatedResponse({
		description: "Created successfully",
		schema: getSchemaPathForDto(GetMarketDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiForbiddenResponse({ description: "Caller is not the owner" })
	@ApiOperation({ summary: "Open a lending market (owner only)" })
	async create(
		@Body() dto: CreateMarketInDto,
		@CallerAccount() account: string,
	): Promise<ApiEnvelope<GetMarketDto>> {
		const data = await this.marketsService.create(dto, account);
		return envelope(data);
	}

	@Get("")
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiOkResponse({
		description: "A page of markets, newest first",
		schema: getSchemaPathForPaginatedDto(GetMarketDto),
	})
	@ApiOperation({ summary: "List markets" })
	async list(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetMarketDto[]>> {
		const { items, nextCursor, total } = await this.marketsService.list(
			limit,
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Get(":marketId")
	@ApiOkResponse({ schema: getSchemaPathForDto(GetMarketDto) })
	@ApiNotFoundResponse({ description: "Market not found" })
	@ApiOperation({ summary: "Configuration and pool totals of a market" })
	async getOne(
		@Param("marketId") marketId: string,
	): Promise<ApiEnvelope<GetMarketDto>> {
		return envelope(await this.marketsService.get(marketId));
	}

	@Patch(":marketId/fee-recipient")
	@HttpCode(HttpStatus.OK)
	@UseGuards(AccountGuard)
	@ApiBody({ type: UpdateFeeRecipientInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetMarketDto) })
	@ApiForbiddenResponse({ description: "Caller is not the market owner" })
	@ApiNotFoundResponse({ description: "Market not found" })
	@ApiOperation({ summary: "Change where closing fees are sent (owner only)" })
	async setFeeRecipient(
		@Param("marketId") marketId: string,
		@Body() dto: UpdateFeeRecipientInDto,
		@CallerAccount() account: string,
	): Promise<ApiEnvelope<GetMarketDto>> {
		const data = await this.marketsService.setFeeRecipient(
			marketId,
			account,
			dto.feeRecipient,
		);
		return envelope(data);
	}

	@Sse(":marketId/events")
	@ApiOperation({ summary: "Subscribe to a market's ledger events" })
	events(@Param("marketId") marketId: string): Observable<SseEvent<LedgerEvent>> {
		return this.sseService.marketEvents(marketId);
	}
}
