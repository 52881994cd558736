import {
	BadRequestException,
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	Param,
	ParseIntPipe,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBadGatewayResponse,
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";

import { AuthGuard } from "../auth/auth.guard";
import { PrincipalFromJwt } from "../auth/principal.decorator";
import {
	type ApiEnvelope,
	ApiPaginatedEnvelope,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import { DEAL_STATE, DealState } from "../deals/deal.types";
import { AddResultInDto, DealResultOutDto } from "./dto/add-result.dto";
import { AgreeDealInDto, AgreementOutDto } from "./dto/agree-deal.dto";
import { GetDealDto, toGetDealDto } from "./dto/get-deal.dto";
import { EscrowService, MAX_PAGE_SIZE } from "./escrow.service";

@ApiTags("1 - Deals")
@ApiExtraModels(GetDealDto, AgreementOutDto, DealResultOutDto)
@Controller("api/v1/deals")
export class EscrowController {
	constructor(
		private readonly service: EscrowService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "List deals the caller is a party to" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: `Max items to return (1-${MAX_PAGE_SIZE})`,
		schema: { type: "integer", minimum: 1, maximum: MAX_PAGE_SIZE, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiQuery({
		name: "state",
		required: false,
		description: "Filter by state",
		schema: { type: "string", enum: DEAL_STATE.slice(0) },
	})
	@ApiOkResponse({
		description: "A page of the caller's deals",
		schema: getSchemaPathForPaginatedDto(GetDealDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async getMine(
		@PrincipalFromJwt() principal: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
		@Query("state") state?: string,
	): Promise<ApiPaginatedEnvelope<GetDealDto[]>> {
		const { items, nextCursor, total } = await this.service.listDeals(
			principal,
			{ state: parseState(state), limit, cursor },
		);
		return paginatedEnvelope(items.map(toGetDealDto), { total, nextCursor });
	}

	@Sse("sse")
	@ApiOperation({ summary: "Subscribe to deal lifecycle events" })
	@ApiQuery({ name: "dealId", required: false })
	sse(@Query("dealId") dealId?: string): Observable<SseEvent> {
		return this.sseService.dealEvents(dealId).pipe(map((event) => ({ data: event })));
	}

	@Get(":dealId")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Retrieve a deal with its agreement and result" })
	@ApiParam({ name: "dealId" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetDealDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Caller is not a party to the deal" })
	@ApiNotFoundResponse({ description: "Deal not found" })
	async getOne(
		@PrincipalFromJwt() principal: string,
		@Param("dealId") dealId: string,
	): Promise<ApiEnvelope<GetDealDto>> {
		const record = await this.service.getDeal(dealId, principal);
		return envelope(toGetDealDto(record));
	}

	@Post(":dealId/agree")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({
		summary:
			"Agree to the deal terms and post collateral. The first agreement creates the deal",
	})
	@ApiParam({ name: "dealId" })
	@ApiBody({ type: AgreeDealInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(AgreementOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Caller is not a party to the terms" })
	@ApiConflictResponse({
		description: "Deal is past negotiation, or the terms differ from the stored deal",
	})
	@ApiUnprocessableEntityResponse({
		description: "Caller cannot cover or has not approved the collateral",
	})
	@ApiBadGatewayResponse({ description: "Ledger transfer failed" })
	async agree(
		@PrincipalFromJwt() principal: string,
		@Param("dealId") dealId: string,
		@Body() dto: AgreeDealInDto,
	): Promise<ApiEnvelope<AgreementOutDto>> {
		const agreement = await this.service.agree(dealId, dto, principal);
		return envelope(agreement);
	}

	@Post(":dealId/results")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({
		summary: "Submit the results of the job. Only the resource provider can do this",
	})
	@ApiParam({ name: "dealId" })
	@ApiBody({ type: AddResultInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(DealResultOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Caller is not the resource provider" })
	@ApiConflictResponse({ description: "Deal is not in agreement" })
	@ApiUnprocessableEntityResponse({ description: "Deal has timed out" })
	async addResult(
		@PrincipalFromJwt() principal: string,
		@Param("dealId") dealId: string,
		@Body() dto: AddResultInDto,
	): Promise<ApiEnvelope<DealResultOutDto>> {
		const result = await this.service.addResult(
			dealId,
			dto.resultsId,
			dto.instructionCount,
			principal,
		);
		return envelope(result);
	}

	@Post(":dealId/timeout-refund")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({
		summary:
			"Reclaim the job collateral after the results deadline. Only the job creator can do this",
	})
	@ApiParam({ name: "dealId" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetDealDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Caller is not the job creator" })
	@ApiConflictResponse({ description: "Deal is not in agreement" })
	@ApiUnprocessableEntityResponse({ description: "Deal has not timed out yet" })
	async refundTimeout(
		@PrincipalFromJwt() principal: string,
		@Param("dealId") dealId: string,
	): Promise<ApiEnvelope<GetDealDto>> {
		const record = await this.service.refundTimeout(dealId, principal);
		return envelope(toGetDealDto(record));
	}

	@Post(":dealId/results/accept")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Accept submitted results. Only the job creator can do this" })
	@ApiParam({ name: "dealId" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetDealDto) })
	@ApiForbiddenResponse({ description: "Caller is not the job creator" })
	@ApiConflictResponse({ description: "No results submitted" })
	async acceptResults(
		@PrincipalFromJwt() principal: string,
		@Param("dealId") dealId: string,
	): Promise<ApiEnvelope<GetDealDto>> {
		const record = await this.service.acceptResults(dealId, principal);
		return envelope(toGetDealDto(record));
	}

	@Post(":dealId/results/reject")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Reject submitted results. Only the job creator can do this" })
	@ApiParam({ name: "dealId" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetDealDto) })
	@ApiForbiddenResponse({ description: "Caller is not the job creator" })
	@ApiConflictResponse({ description: "No results submitted" })
	async rejectResults(
		@PrincipalFromJwt() principal: string,
		@Param("dealId") dealId: string,
	): Promise<ApiEnvelope<GetDealDto>> {
		const record = await this.service.rejectResults(dealId, principal);
		return envelope(toGetDealDto(record));
	}
}

export function parseState(state?: string): DealState | undefined {
	if (state === undefined || state === "") return undefined;
	const known = DEAL_STATE.find((s) => s === state);
	if (!known) {
		throw new BadRequestException(`Unknown state ${state}`);
	}
	return known;
}
