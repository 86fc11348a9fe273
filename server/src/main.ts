import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { ACCOUNT_HEADER } from "./common/auth/account.guard";

dotenv.config();

async function bootstrap() {
	const app = await NestFactory.create(AppModule);
	const logger = new Logger("Bootstrap");

	configureApp(app).enableCors();

	const config = new DocumentBuilder()
		.setTitle("Collateral Ledger API")
		.setDescription(
			`Over-collateralized lending markets. Identify the caller with the \`${ACCOUNT_HEADER}\` header.`,
		)
		.setVersion("0.1.0")
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	logger.log(`API listening on http://0.0.0.0:${port}`);
}

bootstrap().catch((err: unknown) => {
	const stack = err instanceof Error ? err.stack : String(err);
	new Logger("Bootstrap").error("Failed to start", stack);
	process.exit(1);
});
