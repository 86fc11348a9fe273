import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { AssetAllowance, AssetBalance } from "./asset-balance.entity";
import { AssetBookService } from "./asset-book.service";
import { AssetsController } from "./assets.controller";
import { TransactionsService } from "../common/transactions.service";

@Module({
	imports: [TypeOrmModule.forFeature([AssetBalance, AssetAllowance])],
	providers: [AssetBookService, TransactionsService],
	controllers: [AssetsController],
	exports: [AssetBookService, TransactionsService],
})
export class AssetsModule {}
