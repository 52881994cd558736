import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";

import { CLOCK, Clock } from "../common/clock";
import {
	DEAL_AGREED_ID,
	DEAL_TIMEOUT_ID,
	DealAgreed,
	DealId,
	DealTimeout,
	JOB_CREATOR_AGREED_ID,
	JobCreatorAgreed,
	RESOURCE_PROVIDER_AGREED_ID,
	RESULT_ACCEPTED_ID,
	RESULT_ADDED_ID,
	RESULT_REJECTED_ID,
	ResourceProviderAgreed,
	ResultAccepted,
	ResultAdded,
	ResultRejected,
} from "../common/deal.event";
import { Cursor } from "../common/dto/envelopes";
import { EscrowError, toError } from "../common/errors";
import { KeyedLock } from "../common/keyed-lock";
import { DealPage, DealStore } from "../deals/deal-store";
import { diffTerms, toDeal, validateTerms } from "../deals/deal-terms";
import {
	Agreement,
	DealParty,
	DealRecord,
	DealResult,
	DealState,
	DealTerms,
} from "../deals/deal.types";
import { ValueTransferService } from "../ledger/value-transfer.service";
import { collateralDelta, hasTimedOut, resultsDeadline } from "./collateral";
import { EscrowBindings } from "./escrow-bindings";
import {
	RESULT_DISPOSITION_POLICY,
	ResultDispositionPolicy,
} from "./result-disposition";

export const MAX_PAGE_SIZE = 100;

export type ListDealsInput = {
	state?: DealState;
	limit: number;
	cursor?: Cursor;
};

export type EscrowStats = {
	total: number;
	byState: Record<DealState, number>;
};

/**
 * Runs the deal lifecycle: agreement, results, timeout refund and result
 * disposition.
 *
 * Every mutating operation holds the deal's lock, validates against the
 * store, moves value on the ledger, then commits to the store. When the
 * commit fails the transfer is reversed before the error propagates.
 */
@Injectable()
export class EscrowService {
	private readonly logger = new Logger(EscrowService.name);
	private readonly locks = new KeyedLock();

	constructor(
		private readonly bindings: EscrowBindings,
		private readonly transfers: ValueTransferService,
		@Inject(CLOCK) private readonly clock: Clock,
		@Inject(RESULT_DISPOSITION_POLICY)
		private readonly disposition: ResultDispositionPolicy,
		private readonly events: EventEmitter2,
	) {}

	private get store(): DealStore {
		return this.bindings.dealStore;
	}

	async agree(
		dealId: DealId,
		terms: DealTerms,
		caller: string,
	): Promise<Agreement> {
		return this.locks.run(dealId, async () => {
			const store = this.store;
			if (!(await store.isNegotiating(dealId))) {
				throw new EscrowError(
					"InvalidState",
					`Deal ${dealId} is no longer negotiating`,
					{ dealId, state: await store.getState(dealId) },
				);
			}
			validateTerms(dealId, terms);

			const exists = await store.hasDeal(dealId);
			if (exists) {
				const mismatched = diffTerms(await store.getDeal(dealId), terms);
				if (mismatched.length > 0) {
					throw new EscrowError(
						"ParameterMismatch",
						`Terms of deal ${dealId} differ in ${mismatched.join(", ")}`,
						{ dealId, fields: mismatched },
					);
				}
			}

			const party = partyOf(terms, caller);
			if (party === undefined) {
				throw new EscrowError(
					"Unauthorized",
					`${caller} is not a party to deal ${dealId}`,
					{ dealId, caller },
				);
			}

			if (exists) {
				const current = await store.getAgreement(dealId);
				if (hasAgreed(current, party)) {
					this.logger.debug(`${party} re-confirmed deal ${dealId}`);
					return current;
				}
			}

			const collateral =
				party === "resource-provider"
					? terms.timeoutCollateral
					: terms.jobCollateral;
			await this.transfers.payIn(caller, collateral);

			const now = this.clock.now();
			const agreement = await this.commitOrReverse(
				`agree ${dealId}`,
				async () => {
					if (!exists) {
						await store.addDeal(toDeal(dealId, terms));
					}
					return party === "resource-provider"
						? store.agreeResourceProvider(dealId, now)
						: store.agreeJobCreator(dealId, now);
				},
				() => this.transfers.payOut(caller, collateral),
			);

			const agreedAt = isoAt(now);
			if (party === "resource-provider") {
				this.events.emit(RESOURCE_PROVIDER_AGREED_ID, {
					eventId: nanoid(4),
					dealId,
					resourceProvider: caller,
					collateral,
					agreedAt,
				} satisfies ResourceProviderAgreed);
			} else {
				this.events.emit(JOB_CREATOR_AGREED_ID, {
					eventId: nanoid(4),
					dealId,
					jobCreator: caller,
					collateral,
					agreedAt,
				} satisfies JobCreatorAgreed);
			}
			this.logger.log(`${party} ${caller} agreed to deal ${dealId}`);

			if (agreement.resourceProviderAgreed && agreement.jobCreatorAgreed) {
				this.events.emit(DEAL_AGREED_ID, {
					eventId: nanoid(4),
					dealId,
					dealAgreedAt: agreement.dealAgreedAt,
					agreedAt: isoAt(agreement.dealAgreedAt),
				} satisfies DealAgreed);
				this.logger.log(
					`Deal ${dealId} agreed at ${agreement.dealAgreedAt}, results due by ${resultsDeadline(agreement.dealAgreedAt, terms.timeout)}`,
				);
			}
			return agreement;
		});
	}

	async addResult(
		dealId: DealId,
		resultsId: string,
		instructionCount: number,
		caller: string,
	): Promise<DealResult> {
		return this.locks.run(dealId, async () => {
			const store = this.store;
			await this.requireState(store, dealId, "agreement");
			const [deal, agreement] = await Promise.all([
				store.getDeal(dealId),
				store.getAgreement(dealId),
			]);
			const now = this.clock.now();
			if (hasTimedOut(agreement.dealAgreedAt, deal.timeout, now)) {
				throw new EscrowError(
					"DealTimedOut",
					`Results for deal ${dealId} were due by ${resultsDeadline(agreement.dealAgreedAt, deal.timeout)}`,
					{ dealId, dealAgreedAt: agreement.dealAgreedAt, timeout: deal.timeout, now },
				);
			}
			if (caller !== deal.resourceProvider) {
				throw new EscrowError(
					"Unauthorized",
					`Only the resource provider can add results to deal ${dealId}`,
					{ dealId, caller },
				);
			}

			const delta = collateralDelta(deal);
			const rp = deal.resourceProvider;
			if (delta > 0) {
				await this.transfers.payIn(rp, delta);
			} else if (delta < 0) {
				await this.transfers.payOut(rp, -delta);
			}

			const result = await this.commitOrReverse(
				`add result to ${dealId}`,
				() => store.addResult(dealId, resultsId, instructionCount),
				() =>
					delta > 0
						? this.transfers.payOut(rp, delta)
						: this.transfers.payIn(rp, -delta),
			);

			this.events.emit(RESULT_ADDED_ID, {
				eventId: nanoid(4),
				dealId,
				resultsId,
				instructionCount,
				collateralDelta: delta,
				addedAt: isoAt(now),
			} satisfies ResultAdded);
			this.logger.log(
				`Result ${resultsId} added to deal ${dealId} (collateral delta ${delta})`,
			);
			return result;
		});
	}

	/**
	 * Return the job creator's collateral once results are overdue. The
	 * resource provider's timeout collateral stays with the escrow.
	 */
	async refundTimeout(dealId: DealId, caller: string): Promise<DealRecord> {
		return this.locks.run(dealId, async () => {
			const store = this.store;
			await this.requireState(store, dealId, "agreement");
			const [deal, agreement] = await Promise.all([
				store.getDeal(dealId),
				store.getAgreement(dealId),
			]);
			const now = this.clock.now();
			if (!hasTimedOut(agreement.dealAgreedAt, deal.timeout, now)) {
				throw new EscrowError(
					"DealNotTimedOut",
					`Deal ${dealId} accepts results until ${resultsDeadline(agreement.dealAgreedAt, deal.timeout)}`,
					{ dealId, dealAgreedAt: agreement.dealAgreedAt, timeout: deal.timeout, now },
				);
			}
			if (caller !== deal.jobCreator) {
				throw new EscrowError(
					"Unauthorized",
					`Only the job creator can reclaim collateral of deal ${dealId}`,
					{ dealId, caller },
				);
			}

			const jc = deal.jobCreator;
			await this.transfers.payOut(jc, deal.jobCollateral);
			await this.commitOrReverse(
				`time out ${dealId}`,
				() => store.timeoutResult(dealId),
				() => this.transfers.payIn(jc, deal.jobCollateral),
			);

			this.events.emit(DEAL_TIMEOUT_ID, {
				eventId: nanoid(4),
				dealId,
				refunded: deal.jobCollateral,
				forfeited: deal.timeoutCollateral,
				timedOutAt: isoAt(now),
			} satisfies DealTimeout);
			this.logger.log(
				`Deal ${dealId} timed out: refunded ${deal.jobCollateral} to ${jc}, kept ${deal.timeoutCollateral}`,
			);
			return this.requireRecord(store, dealId);
		});
	}

	async acceptResults(dealId: DealId, caller: string): Promise<DealRecord> {
		return this.locks.run(dealId, async () => {
			const store = this.store;
			const record = await this.requireDisposable(store, dealId, caller);
			await this.disposition.accept(record, caller);
			await store.acceptResult(dealId);
			this.events.emit(RESULT_ACCEPTED_ID, {
				eventId: nanoid(4),
				dealId,
				acceptedAt: isoAt(this.clock.now()),
			} satisfies ResultAccepted);
			this.logger.log(`Results of deal ${dealId} accepted`);
			return this.requireRecord(store, dealId);
		});
	}

	async rejectResults(dealId: DealId, caller: string): Promise<DealRecord> {
		return this.locks.run(dealId, async () => {
			const store = this.store;
			const record = await this.requireDisposable(store, dealId, caller);
			await this.disposition.reject(record, caller);
			await store.rejectResult(dealId);
			this.events.emit(RESULT_REJECTED_ID, {
				eventId: nanoid(4),
				dealId,
				rejectedAt: isoAt(this.clock.now()),
			} satisfies ResultRejected);
			this.logger.log(`Results of deal ${dealId} rejected`);
			return this.requireRecord(store, dealId);
		});
	}

	/**
	 * @param caller when given, must be one of the deal's parties
	 * @throws EscrowError `DealNotFound`
	 */
	async getDeal(dealId: DealId, caller?: string): Promise<DealRecord> {
		const record = await this.requireRecord(this.store, dealId);
		if (
			caller !== undefined &&
			caller !== record.deal.resourceProvider &&
			caller !== record.deal.jobCreator
		) {
			throw new EscrowError(
				"Unauthorized",
				`${caller} is not a party to deal ${dealId}`,
				{ dealId, caller },
			);
		}
		return record;
	}

	async listDeals(
		party: string | undefined,
		input: ListDealsInput,
	): Promise<DealPage> {
		const limit = Math.min(Math.max(1, Math.floor(input.limit)), MAX_PAGE_SIZE);
		return this.store.listDeals({
			party,
			state: input.state,
			limit,
			cursor: input.cursor,
		});
	}

	async escrowBalance(): Promise<{ account: string; balance: number }> {
		const account = this.transfers.escrowAccount;
		return { account, balance: await this.transfers.balanceOf(account) };
	}

	async getStats(): Promise<EscrowStats> {
		const byState = await this.store.countByState();
		const total = Object.values(byState).reduce((sum, n) => sum + n, 0);
		return { total, byState };
	}

	private async requireState(
		store: DealStore,
		dealId: DealId,
		expected: DealState,
	): Promise<void> {
		const state = await store.getState(dealId);
		if (state !== expected) {
			throw new EscrowError(
				"InvalidState",
				`Deal ${dealId} is ${state}, expected ${expected}`,
				{ dealId, state, expected },
			);
		}
	}

	private async requireRecord(
		store: DealStore,
		dealId: DealId,
	): Promise<DealRecord> {
		const record = await store.getRecord(dealId);
		if (!record) {
			throw new EscrowError("DealNotFound", `Deal ${dealId} not found`, {
				dealId,
			});
		}
		return record;
	}

	private async requireDisposable(
		store: DealStore,
		dealId: DealId,
		caller: string,
	): Promise<DealRecord> {
		await this.requireState(store, dealId, "results-submitted");
		const record = await this.requireRecord(store, dealId);
		if (caller !== record.deal.jobCreator) {
			throw new EscrowError(
				"Unauthorized",
				`Only the job creator can dispose of results of deal ${dealId}`,
				{ dealId, caller },
			);
		}
		return record;
	}

	/**
	 * Run the store commit that follows a transfer. On failure, run the
	 * reverse transfer and rethrow the commit error.
	 *
	 * Reversing a pay-in returns the value but not the allowance it used:
	 * only the party can approve the escrow again, so a retry needs a new
	 * approval.
	 */
	private async commitOrReverse<T>(
		label: string,
		commit: () => Promise<T>,
		reverse: () => Promise<void>,
	): Promise<T> {
		try {
			return await commit();
		} catch (e) {
			this.logger.error(
				`${label}: store commit failed, reversing transfer`,
				toError(e).stack,
			);
			try {
				await reverse();
			} catch (reverseError) {
				this.logger.error(
					`${label}: reversing transfer failed, ledger and store disagree`,
					toError(reverseError).stack,
				);
			}
			throw e;
		}
	}
}

function partyOf(terms: DealTerms, caller: string): DealParty | undefined {
	if (caller === terms.resourceProvider) return "resource-provider";
	if (caller === terms.jobCreator) return "job-creator";
	return undefined;
}

function hasAgreed(agreement: Agreement, party: DealParty): boolean {
	return party === "resource-provider"
		? agreement.resourceProviderAgreed
		: agreement.jobCreatorAgreed;
}

function isoAt(unixSeconds: number): string {
	return new Date(unixSeconds * 1000).toISOString();
}
