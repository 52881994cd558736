import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsIn,
	IsNotEmpty,
	IsOptional,
	IsString,
	IsUrl,
} from "class-validator";
import { DEAL_STORE_KINDS, DealStoreKind } from "../deals/deal-store";
import { DEAL_STATE, DealState } from "../deals/deal.types";
import { VALUE_LEDGER_KINDS, ValueLedgerKind } from "../ledger/value-ledger";

export class GetAdminStatsDto {
	@ApiProperty({ example: 42 })
	total!: number;

	@ApiProperty({
		description: "Number of deals per state",
		example: Object.fromEntries(DEAL_STATE.map((s) => [s, 0])),
	})
	byState!: Record<DealState, number>;
}

export class GetEscrowBalanceDto {
	@ApiProperty({ example: "escrow" })
	account!: string;

	@ApiProperty({ example: 300 })
	balance!: number;
}

export class GetBindingsDto {
	@ApiProperty({ example: "escrow" })
	escrowAccount!: string;

	@ApiProperty({ enum: DEAL_STORE_KINDS })
	dealStore!: DealStoreKind;

	@ApiProperty({ enum: VALUE_LEDGER_KINDS })
	valueLedger!: ValueLedgerKind;

	@ApiPropertyOptional({ example: "http://ledger.internal:8080" })
	valueLedgerUrl?: string;
}

export class ReconfigureBindingsInDto {
	@ApiProperty({ description: "Operator principal authorizing the change" })
	@IsString()
	@IsNotEmpty()
	operator!: string;

	@ApiPropertyOptional({ enum: DEAL_STORE_KINDS })
	@IsOptional()
	@IsIn(DEAL_STORE_KINDS)
	dealStore?: DealStoreKind;

	@ApiPropertyOptional({
		nullable: true,
		description:
			"Base URL of a REST ledger; null switches back to the in-memory ledger",
	})
	@IsOptional()
	@IsUrl({ require_tld: false })
	valueLedgerUrl?: string | null;
}
