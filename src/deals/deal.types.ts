import { DealId } from "../common/deal.event";

export const DEAL_STATE = [
	// terms proposed, at most one party has agreed
	"negotiating",
	// both parties agreed and posted collateral
	"agreement",
	// the resource provider submitted a result in time
	"results-submitted",
	// the job creator reclaimed their collateral after the deadline
	"timed-out",

	// reachable only through a result disposition policy
	"results-accepted",
	"results-rejected",
] as const;
export type DealState = (typeof DEAL_STATE)[number];

export const DEAL_ACTION = [
	"agree",
	"add-result",
	"timeout",
	"accept-results",
	"reject-results",
] as const;
export type DealAction = (typeof DEAL_ACTION)[number];

/**
 * Negotiated terms. Immutable once the deal exists.
 */
export type DealTerms = {
	resourceProvider: string;
	jobCreator: string;
	instructionPrice: number;
	/** Seconds after `dealAgreedAt` within which results are accepted */
	timeout: number;
	/** Posted by the resource provider on agreement */
	timeoutCollateral: number;
	/** Posted by the job creator on agreement */
	jobCollateral: number;
	/** Stake the resource provider must hold once results are in */
	resultsCollateral: number;
};

export const DEAL_TERM_FIELDS = [
	"resourceProvider",
	"jobCreator",
	"instructionPrice",
	"timeout",
	"timeoutCollateral",
	"jobCollateral",
	"resultsCollateral",
] as const satisfies readonly (keyof DealTerms)[];

export type Deal = DealTerms & {
	dealId: DealId;
};

export type Agreement = {
	dealId: DealId;
	resourceProviderAgreed: boolean;
	jobCreatorAgreed: boolean;
	/** Unix seconds; 0 until both parties agreed */
	dealAgreedAt: number;
};

export type DealResult = {
	dealId: DealId;
	resultsId: string;
	instructionCount: number;
};

export function emptyCounts(): Record<DealState, number> {
	return {
		negotiating: 0,
		agreement: 0,
		"results-submitted": 0,
		"timed-out": 0,
		"results-accepted": 0,
		"results-rejected": 0,
	};
}

export type DealParty = "resource-provider" | "job-creator";

/**
 * Everything known about one deal.
 */
export type DealRecord = {
	deal: Deal;
	agreement: Agreement;
	result?: DealResult;
	state: DealState;
	/** Unix epoch in milliseconds */
	createdAt: number;
	/** Unix epoch in milliseconds */
	updatedAt: number;
};
