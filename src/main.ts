import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";

dotenv.config();

async function bootstrap() {
	const app = await NestFactory.create(AppModule);

	configureApp(app);
	app.enableCors();

	const config = new DocumentBuilder()
		.setTitle("Compute Deal Escrow API")
		.setDescription("Custom header auth: `Authorization: Bearer <jwt>`")
		.setVersion("0.1.0")
		.addBearerAuth(
			{ type: "http", scheme: "bearer", bearerFormat: "JWT", in: "header" },
			"bearer",
		)
		.addBasicAuth()
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
			persistAuthorization: true,
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((e: unknown) => {
	Logger.error("Failed to start", e instanceof Error ? e.stack : String(e), "Bootstrap");
	process.exit(1);
});
