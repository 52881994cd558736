/**
 * In-Memory Deal Store
 *
 * Keeps deals in a Map. Useful for unit tests and for running the escrow
 * without a database; data is lost when the process exits.
 */

import { Injectable } from "@nestjs/common";
import { cursorToString, isAfterCursor } from "../common/dto/envelopes";
import { DealId } from "../common/deal.event";
import { EscrowError } from "../common/errors";
import { DealPage, DealQuery, DealStore } from "./deal-store";
import { nextState } from "./deal-state-machine";
import { diffTerms } from "./deal-terms";
import {
	Agreement,
	Deal,
	DealAction,
	DealRecord,
	DealResult,
	DealState,
	emptyCounts,
} from "./deal.types";

type StoredDeal = {
	id: number;
	record: DealRecord;
};

@Injectable()
export class MemoryDealStore implements DealStore {
	readonly kind = "memory";
	private readonly deals: Map<DealId, StoredDeal> = new Map();
	private sequence = 0;

	async isNegotiating(dealId: DealId): Promise<boolean> {
		return (await this.getState(dealId)) === "negotiating";
	}

	async hasDeal(dealId: DealId): Promise<boolean> {
		return this.deals.has(dealId);
	}

	async getDeal(dealId: DealId): Promise<Deal> {
		return copy(this.require(dealId).record.deal);
	}

	async addDeal(deal: Deal): Promise<Deal> {
		const existing = this.deals.get(deal.dealId);
		if (existing) {
			const mismatched = diffTerms(existing.record.deal, deal);
			if (mismatched.length > 0) {
				throw new EscrowError(
					"ParameterMismatch",
					`Deal ${deal.dealId} already exists with different ${mismatched.join(", ")}`,
					{ dealId: deal.dealId, mismatched },
				);
			}
			return copy(existing.record.deal);
		}
		const now = Date.now();
		this.sequence += 1;
		this.deals.set(deal.dealId, {
			id: this.sequence,
			record: {
				deal: copy(deal),
				agreement: {
					dealId: deal.dealId,
					resourceProviderAgreed: false,
					jobCreatorAgreed: false,
					dealAgreedAt: 0,
				},
				state: "negotiating",
				createdAt: now,
				updatedAt: now,
			},
		});
		return copy(deal);
	}

	async agreeResourceProvider(dealId: DealId, at: number): Promise<Agreement> {
		return this.agree(dealId, "resourceProviderAgreed", at);
	}

	async agreeJobCreator(dealId: DealId, at: number): Promise<Agreement> {
		return this.agree(dealId, "jobCreatorAgreed", at);
	}

	async isAgreement(dealId: DealId): Promise<boolean> {
		return (await this.getState(dealId)) === "agreement";
	}

	async getAgreement(dealId: DealId): Promise<Agreement> {
		return copy(this.require(dealId).record.agreement);
	}

	async addResult(
		dealId: DealId,
		resultsId: string,
		instructionCount: number,
	): Promise<DealResult> {
		const stored = this.require(dealId);
		const state = nextState(dealId, stored.record.state, "add-result");
		const result: DealResult = { dealId, resultsId, instructionCount };
		stored.record.result = result;
		this.setState(stored, state);
		return copy(result);
	}

	async getResult(dealId: DealId): Promise<DealResult | null> {
		const result = this.deals.get(dealId)?.record.result;
		return result ? copy(result) : null;
	}

	async timeoutResult(dealId: DealId): Promise<void> {
		this.transition(dealId, "timeout");
	}

	async acceptResult(dealId: DealId): Promise<void> {
		this.transition(dealId, "accept-results");
	}

	async rejectResult(dealId: DealId): Promise<void> {
		this.transition(dealId, "reject-results");
	}

	async getState(dealId: DealId): Promise<DealState> {
		return this.deals.get(dealId)?.record.state ?? "negotiating";
	}

	async getRecord(dealId: DealId): Promise<DealRecord | null> {
		const stored = this.deals.get(dealId);
		return stored ? copy(stored.record) : null;
	}

	async listDeals(query: DealQuery): Promise<DealPage> {
		const take = Math.min(query.limit, 100);
		let rows = Array.from(this.deals.values());

		if (query.party !== undefined) {
			const party = query.party;
			rows = rows.filter(
				(r) =>
					r.record.deal.resourceProvider === party ||
					r.record.deal.jobCreator === party,
			);
		}
		if (query.state !== undefined) {
			const state = query.state;
			rows = rows.filter((r) => r.record.state === state);
		}
		const total = rows.length;

		rows.sort((a, b) =>
			a.record.createdAt !== b.record.createdAt
				? b.record.createdAt - a.record.createdAt
				: b.id - a.id,
		);
		if (query.cursor) {
			const cursor = query.cursor;
			rows = rows.filter((r) =>
				isAfterCursor({ createdAt: r.record.createdAt, id: r.id }, cursor),
			);
		}
		const page = rows.slice(0, take);

		let nextCursor: string | undefined;
		if (page.length === take && rows.length > take) {
			const last = page[page.length - 1];
			nextCursor = cursorToString(last.record.createdAt, last.id);
		}
		return { items: page.map((r) => copy(r.record)), nextCursor, total };
	}

	async countByState(): Promise<Record<DealState, number>> {
		const counts = emptyCounts();
		for (const { record } of this.deals.values()) {
			counts[record.state] += 1;
		}
		return counts;
	}

	size(): number {
		return this.deals.size;
	}

	private agree(
		dealId: DealId,
		flag: "resourceProviderAgreed" | "jobCreatorAgreed",
		at: number,
	): Agreement {
		const stored = this.require(dealId);
		const { agreement } = stored.record;
		// validates the deal is still negotiating
		const whenComplete = nextState(dealId, stored.record.state, "agree");
		if (agreement[flag]) {
			throw new EscrowError(
				"InvalidState",
				`${flag === "resourceProviderAgreed" ? "Resource provider" : "Job creator"} already agreed to deal ${dealId}`,
				{ dealId },
			);
		}
		agreement[flag] = true;
		if (agreement.resourceProviderAgreed && agreement.jobCreatorAgreed) {
			agreement.dealAgreedAt = at;
			this.setState(stored, whenComplete);
		} else {
			stored.record.updatedAt = Date.now();
		}
		return copy(agreement);
	}

	private transition(dealId: DealId, action: DealAction): void {
		const stored = this.require(dealId);
		this.setState(stored, nextState(dealId, stored.record.state, action));
	}

	private setState(stored: StoredDeal, state: DealState): void {
		stored.record.state = state;
		stored.record.updatedAt = Date.now();
	}

	private require(dealId: DealId): StoredDeal {
		const stored = this.deals.get(dealId);
		if (!stored) {
			throw new EscrowError("DealNotFound", `Deal ${dealId} not found`, {
				dealId,
			});
		}
		return stored;
	}
}

// Copies in and out so callers cannot mutate stored records.
function copy<T>(value: T): T {
	return JSON.parse(JSON.stringify(value));
}
