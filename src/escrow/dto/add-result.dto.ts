import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsString, Min } from "class-validator";

export class AddResultInDto {
	@ApiProperty({ example: "res-91xz", description: "Identifier of the job output" })
	@IsString()
	@IsNotEmpty()
	resultsId!: string;

	@ApiProperty({ minimum: 0, example: 1000 })
	@IsInt()
	@Min(0)
	instructionCount!: number;
}

export class DealResultOutDto {
	@ApiProperty({ example: "deal-42" })
	dealId!: string;

	@ApiProperty({ example: "res-91xz" })
	resultsId!: string;

	@ApiProperty({ example: 1000 })
	instructionCount!: number;
}
