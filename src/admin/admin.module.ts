import { Module } from "@nestjs/common";
import { EscrowModule } from "../escrow/escrow.module";
import { AdminController } from "./admin.controller";
import { AdminService } from "./admin.service";

@Module({
	imports: [EscrowModule],
	controllers: [AdminController],
	providers: [AdminService],
})
export class AdminModule {}
