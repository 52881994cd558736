import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { AuthModule } from "./auth/auth.module";
import { HealthModule } from "./health.module";
import { EscrowModule } from "./escrow/escrow.module";
import { AdminModule } from "./admin/admin.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { BasicAuthMiddleware } from "./basic-auth.middleware";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest
					? ":memory:"
					: (process.env.SQLITE_DB_PATH ?? "escrow.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		AuthModule,
		EscrowModule,
		HealthModule,
		AdminModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(BasicAuthMiddleware)
			.forRoutes({ path: "api/admin/*", method: RequestMethod.ALL });

		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
