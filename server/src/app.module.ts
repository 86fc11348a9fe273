import { ConfigModule } from "@nestjs/config";
import { MiddlewareConsumer, Module, NestModule } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { HealthModule } from "./health.module";
import { AssetsModule } from "./assets/assets.module";
import { MarketsModule } from "./markets/markets.module";
import { MarketsController } from "./markets/markets.controller";
import { LendingController } from "./markets/lending.controller";
import { AssetsController } from "./assets/assets.controller";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		// Ledger events are namespaced `ledger.<name>`
		EventEmitterModule.forRoot({ wildcard: true, delimiter: "." }),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest
					? ":memory:"
					: (process.env.SQLITE_DB_PATH ?? "ledger.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		AssetsModule,
		MarketsModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(RequestLoggingMiddleware)
			.forRoutes(MarketsController, LendingController, AssetsController);
	}
}
