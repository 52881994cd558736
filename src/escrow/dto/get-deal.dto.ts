import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { DEAL_STATE, DealRecord, DealState } from "../../deals/deal.types";
import { AgreementOutDto } from "./agree-deal.dto";
import { DealResultOutDto } from "./add-result.dto";

export class GetDealDto {
	@ApiProperty({ example: "deal-42" })
	dealId!: string;

	@ApiProperty()
	resourceProvider!: string;

	@ApiProperty()
	jobCreator!: string;

	@ApiProperty()
	instructionPrice!: number;

	@ApiProperty({ description: "Seconds" })
	timeout!: number;

	@ApiProperty()
	timeoutCollateral!: number;

	@ApiProperty()
	jobCollateral!: number;

	@ApiProperty()
	resultsCollateral!: number;

	@ApiProperty({ enum: DEAL_STATE })
	state!: DealState;

	@ApiProperty({ type: AgreementOutDto })
	agreement!: AgreementOutDto;

	@ApiPropertyOptional({ type: DealResultOutDto })
	result?: DealResultOutDto;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	createdAt!: number;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	updatedAt!: number;
}

export function toGetDealDto(record: DealRecord): GetDealDto {
	return {
		...record.deal,
		state: record.state,
		agreement: record.agreement,
		result: record.result,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
	};
}
