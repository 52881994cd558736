import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsString, Min } from "class-validator";
import { DealTerms } from "../../deals/deal.types";

export class AgreeDealInDto implements DealTerms {
	@ApiProperty({ example: "rp-7f3k", description: "Resource provider principal" })
	@IsString()
	@IsNotEmpty()
	resourceProvider!: string;

	@ApiProperty({ example: "jc-2m9q", description: "Job creator principal" })
	@IsString()
	@IsNotEmpty()
	jobCreator!: string;

	@ApiProperty({ minimum: 0, example: 10 })
	@IsInt()
	@Min(0)
	instructionPrice!: number;

	@ApiProperty({
		minimum: 0,
		example: 3600,
		description: "Seconds after the agreement within which results are accepted",
	})
	@IsInt()
	@Min(0)
	timeout!: number;

	@ApiProperty({
		minimum: 0,
		example: 100,
		description: "Posted by the resource provider when agreeing",
	})
	@IsInt()
	@Min(0)
	timeoutCollateral!: number;

	@ApiProperty({
		minimum: 0,
		example: 200,
		description: "Posted by the job creator when agreeing",
	})
	@IsInt()
	@Min(0)
	jobCollateral!: number;

	@ApiProperty({
		minimum: 0,
		example: 100,
		description: "Held from the resource provider once results are submitted",
	})
	@IsInt()
	@Min(0)
	resultsCollateral!: number;
}

export class AgreementOutDto {
	@ApiProperty({ example: "deal-42" })
	dealId!: string;

	@ApiProperty()
	resourceProviderAgreed!: boolean;

	@ApiProperty()
	jobCreatorAgreed!: boolean;

	@ApiProperty({
		description: "Unix seconds; 0 until both parties agreed",
		example: 1732690234,
	})
	dealAgreedAt!: number;
}
