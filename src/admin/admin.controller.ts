import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	Param,
	ParseIntPipe,
	Put,
	Query,
	Sse,
} from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
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
import { DEAL_STATE } from "../deals/deal.types";
import { GetDealDto, toGetDealDto } from "../escrow/dto/get-deal.dto";
import { parseState } from "../escrow/escrow.controller";
import {
	GetAdminStatsDto,
	GetBindingsDto,
	GetEscrowBalanceDto,
	ReconfigureBindingsInDto,
} from "./admin.dto";
import { AdminService } from "./admin.service";

@ApiTags("Admin")
@ApiBasicAuth()
@ApiExtraModels(GetAdminStatsDto, GetBindingsDto, GetEscrowBalanceDto, GetDealDto)
@Controller("api/admin/v1")
export class AdminController {
	constructor(
		private readonly adminService: AdminService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@ApiOperation({ summary: "List all deals paginated" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
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
		schema: { type: "string", enum: DEAL_STATE.slice(0) },
	})
	@ApiOkResponse({
		description: "A page of all deals",
		schema: getSchemaPathForPaginatedDto(GetDealDto),
	})
	@Get("deals")
	async allDeals(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
		@Query("state") state?: string,
	): Promise<ApiPaginatedEnvelope<GetDealDto[]>> {
		const { items, nextCursor, total } = await this.adminService.findAll(
			limit,
			cursor,
			parseState(state),
		);
		return paginatedEnvelope(items.map(toGetDealDto), { total, nextCursor });
	}

	@Sse("deals/sse")
	sse(): Observable<SseEvent> {
		return this.sseService.adminEvents.pipe(map((event) => ({ data: event })));
	}

	@ApiOperation({ summary: "Retrieve all details for the given deal" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetDealDto) })
	@Get("deals/:dealId")
	async dealDetails(
		@Param("dealId") dealId: string,
	): Promise<ApiEnvelope<GetDealDto>> {
		const record = await this.adminService.getDealDetails(dealId);
		return envelope(toGetDealDto(record));
	}

	@ApiOperation({ summary: "Deal counts per state" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAdminStatsDto) })
	@Get("stats")
	async stats(): Promise<ApiEnvelope<GetAdminStatsDto>> {
		return envelope(await this.adminService.getStats());
	}

	@ApiOperation({ summary: "Balance held by the escrow account" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowBalanceDto) })
	@Get("escrow/balance")
	async escrowBalance(): Promise<ApiEnvelope<GetEscrowBalanceDto>> {
		return envelope(await this.adminService.getEscrowBalance());
	}

	@ApiOperation({ summary: "Deal store and ledger currently in use" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetBindingsDto) })
	@Get("bindings")
	bindings(): ApiEnvelope<GetBindingsDto> {
		return envelope(this.adminService.getBindings());
	}

	@ApiOperation({ summary: "Switch the deal store and/or the ledger" })
	@ApiBody({ type: ReconfigureBindingsInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetBindingsDto) })
	@ApiForbiddenResponse({ description: "Not the escrow operator" })
	@Put("bindings")
	reconfigure(
		@Body() dto: ReconfigureBindingsInDto,
	): ApiEnvelope<GetBindingsDto> {
		return envelope(
			this.adminService.reconfigure(dto.operator, {
				dealStore: dto.dealStore,
				valueLedgerUrl: dto.valueLedgerUrl,
			}),
		);
	}
}
