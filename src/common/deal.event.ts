export type DealId = string;

type DealEventBase = {
	eventId: string;
	dealId: DealId;
};

export const RESOURCE_PROVIDER_AGREED_ID = "deal.resource-provider-agreed";
export type ResourceProviderAgreed = DealEventBase & {
	resourceProvider: string;
	collateral: number;
	agreedAt: string; // ISO timestamp
};

export const JOB_CREATOR_AGREED_ID = "deal.job-creator-agreed";
export type JobCreatorAgreed = DealEventBase & {
	jobCreator: string;
	collateral: number;
	agreedAt: string; // ISO timestamp
};

export const DEAL_AGREED_ID = "deal.agreed";
export type DealAgreed = DealEventBase & {
	dealAgreedAt: number; // unix seconds
	agreedAt: string;
};

export const RESULT_ADDED_ID = "deal.result-added";
export type ResultAdded = DealEventBase & {
	resultsId: string;
	instructionCount: number;
	collateralDelta: number;
	addedAt: string;
};

export const DEAL_TIMEOUT_ID = "deal.timeout";
export type DealTimeout = DealEventBase & {
	refunded: number;
	forfeited: number;
	timedOutAt: string;
};

export const RESULT_ACCEPTED_ID = "deal.result-accepted";
export type ResultAccepted = DealEventBase & {
	acceptedAt: string;
};

export const RESULT_REJECTED_ID = "deal.result-rejected";
export type ResultRejected = DealEventBase & {
	rejectedAt: string;
};

export const BINDINGS_RECONFIGURED_ID = "escrow.bindings-reconfigured";
export type BindingsReconfigured = {
	eventId: string;
	operator: string;
	dealStore: string;
	valueLedger: string;
	reconfiguredAt: string;
};
