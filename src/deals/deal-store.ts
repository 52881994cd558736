/**
 * Deal Store
 *
 * The authoritative record of deals, agreements and results. The escrow
 * core holds no durable state of its own and reaches the store only
 * through this interface, so any persistence can sit behind it.
 */

import { Cursor } from "../common/dto/envelopes";
import { DealId } from "../common/deal.event";
import {
	Agreement,
	Deal,
	DealRecord,
	DealResult,
	DealState,
} from "./deal.types";

export const DEAL_STORE_KINDS = ["typeorm", "memory"] as const;
export type DealStoreKind = (typeof DEAL_STORE_KINDS)[number];

export type DealQuery = {
	/** Only deals where this principal is the resource provider or job creator */
	party?: string;
	state?: DealState;
	limit: number;
	cursor?: Cursor;
};

export type DealPage = {
	items: DealRecord[];
	nextCursor?: string;
	total: number;
};

export interface DealStore {
	readonly kind: DealStoreKind;

	/**
	 * True when the deal is unknown or still waiting for an agreement.
	 */
	isNegotiating(dealId: DealId): Promise<boolean>;

	hasDeal(dealId: DealId): Promise<boolean>;

	/**
	 * @throws EscrowError `DealNotFound`
	 */
	getDeal(dealId: DealId): Promise<Deal>;

	/**
	 * Create the deal in the negotiating state.
	 *
	 * @throws EscrowError `ParameterMismatch` if the deal exists with other terms
	 */
	addDeal(deal: Deal): Promise<Deal>;

	/**
	 * Flag the resource provider as agreed. When this completes the
	 * agreement, `at` becomes `dealAgreedAt` and the deal moves to
	 * `agreement`.
	 *
	 * @throws EscrowError `InvalidState` if the party already agreed
	 */
	agreeResourceProvider(dealId: DealId, at: number): Promise<Agreement>;

	/**
	 * Job creator counterpart of {@link agreeResourceProvider}.
	 */
	agreeJobCreator(dealId: DealId, at: number): Promise<Agreement>;

	isAgreement(dealId: DealId): Promise<boolean>;

	/**
	 * @throws EscrowError `DealNotFound`
	 */
	getAgreement(dealId: DealId): Promise<Agreement>;

	/**
	 * Record the result and move the deal to `results-submitted`.
	 */
	addResult(
		dealId: DealId,
		resultsId: string,
		instructionCount: number,
	): Promise<DealResult>;

	getResult(dealId: DealId): Promise<DealResult | null>;

	/**
	 * Move the deal to `timed-out`.
	 */
	timeoutResult(dealId: DealId): Promise<void>;

	acceptResult(dealId: DealId): Promise<void>;

	rejectResult(dealId: DealId): Promise<void>;

	/**
	 * Current state; unknown deals are `negotiating`.
	 */
	getState(dealId: DealId): Promise<DealState>;

	getRecord(dealId: DealId): Promise<DealRecord | null>;

	/**
	 * Newest first, keyset-paginated.
	 */
	listDeals(query: DealQuery): Promise<DealPage>;

	countByState(): Promise<Record<DealState, number>>;
}
