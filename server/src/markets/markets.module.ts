import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { Market } from "./market.entity";
import { BorrowerPosition, LenderPosition } from "./position.entity";
import { MarketsService } from "./markets.service";
import { MarketsController } from "./markets.controller";
import { LendingController } from "./lending.controller";
import { LedgerAuditListener } from "./ledger-audit.listener";
import { AssetsModule } from "../assets/assets.module";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { clockProvider } from "../common/clock";

@Module({
	imports: [
		TypeOrmModule.forFeature([Market, LenderPosition, BorrowerPosition]),
		AssetsModule,
	],
	providers: [
		MarketsService,
		LedgerAuditListener,
		ServerSentEventsService,
		clockProvider,
	],
	controllers: [MarketsController, LendingController],
	exports: [MarketsService],
})
export class MarketsModule {}
