import { Injectable, Logger } from "@nestjs/common";
import { Cursor } from "../common/dto/envelopes";
import { DealPage } from "../deals/deal-store";
import { DealRecord, DealState } from "../deals/deal.types";
import {
	BindingsDescription,
	EscrowBindings,
	ReconfigureInput,
} from "../escrow/escrow-bindings";
import { EscrowService, EscrowStats } from "../escrow/escrow.service";

@Injectable()
export class AdminService {
	private readonly logger = new Logger(AdminService.name);

	constructor(
		private readonly escrow: EscrowService,
		private readonly bindings: EscrowBindings,
	) {}

	async findAll(
		limit: number,
		cursor: Cursor,
		state?: DealState,
	): Promise<DealPage> {
		return this.escrow.listDeals(undefined, { state, limit, cursor });
	}

	async getDealDetails(dealId: string): Promise<DealRecord> {
		return this.escrow.getDeal(dealId);
	}

	async getStats(): Promise<EscrowStats> {
		return this.escrow.getStats();
	}

	async getEscrowBalance(): Promise<{ account: string; balance: number }> {
		return this.escrow.escrowBalance();
	}

	getBindings(): BindingsDescription {
		return this.bindings.describe();
	}

	reconfigure(operator: string, input: ReconfigureInput): BindingsDescription {
		this.logger.log(`Reconfiguration requested by ${operator}`);
		return this.bindings.reconfigure(operator, input);
	}
}
