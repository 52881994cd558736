import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import {
	DealAgreementEntity,
	DealEntity,
	DealResultEntity,
} from "./deal.entity";
import { MemoryDealStore } from "./memory-deal-store";
import { TypeOrmDealStore } from "./typeorm-deal-store";

@Module({
	imports: [
		TypeOrmModule.forFeature([DealEntity, DealAgreementEntity, DealResultEntity]),
	],
	providers: [TypeOrmDealStore, MemoryDealStore],
	exports: [TypeOrmDealStore, MemoryDealStore],
})
export class DealsModule {}
