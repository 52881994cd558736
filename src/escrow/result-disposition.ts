import { Injectable } from "@nestjs/common";
import { EscrowError } from "../common/errors";
import { DealRecord } from "../deals/deal.types";

export const RESULT_DISPOSITION_POLICY = Symbol("RESULT_DISPOSITION_POLICY");

/**
 * Decides what happens to submitted results once the job creator accepts
 * or rejects them (settlement, mediation, ...).
 *
 * Called with the deal in `results-submitted` and the job creator as
 * caller. Resolving lets the escrow move the deal on; throwing leaves it
 * untouched.
 */
export interface ResultDispositionPolicy {
	accept(record: DealRecord, caller: string): Promise<void>;
	reject(record: DealRecord, caller: string): Promise<void>;
}

@Injectable()
export class NotImplementedDispositionPolicy implements ResultDispositionPolicy {
	async accept(record: DealRecord): Promise<void> {
		throw new EscrowError(
			"NotImplemented",
			"Accepting results is not supported yet",
			{ dealId: record.deal.dealId },
		);
	}

	async reject(record: DealRecord): Promise<void> {
		throw new EscrowError(
			"NotImplemented",
			"Rejecting results is not supported yet",
			{ dealId: record.deal.dealId },
		);
	}
}
