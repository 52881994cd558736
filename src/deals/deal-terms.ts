import { EscrowError } from "../common/errors";
import { DEAL_TERM_FIELDS, Deal, DealTerms } from "./deal.types";

const AMOUNT_FIELDS = [
	"instructionPrice",
	"timeout",
	"timeoutCollateral",
	"jobCollateral",
	"resultsCollateral",
] as const satisfies readonly (keyof DealTerms)[];

/**
 * Reject malformed terms before anything touches the store or the ledger.
 */
export function validateTerms(dealId: string, terms: DealTerms): void {
	if (dealId.trim() === "") {
		throw new EscrowError("InvalidParty", "dealId must not be empty");
	}
	const rp = terms.resourceProvider;
	const jc = terms.jobCreator;
	if (rp === "" || jc === "") {
		throw new EscrowError(
			"InvalidParty",
			`Deal ${dealId} needs both a resource provider and a job creator`,
			{ dealId },
		);
	}
	// principals are matched byte for byte against the caller
	for (const party of [rp, jc]) {
		if (party.trim() !== party) {
			throw new EscrowError(
				"InvalidParty",
				`Deal ${dealId}: principal "${party}" has surrounding whitespace`,
				{ dealId, party },
			);
		}
	}
	if (rp === jc) {
		throw new EscrowError(
			"InvalidParty",
			`Resource provider and job creator of deal ${dealId} must be different`,
			{ dealId, party: rp },
		);
	}
	for (const field of AMOUNT_FIELDS) {
		const value = terms[field];
		if (!Number.isSafeInteger(value) || value < 0) {
			throw new EscrowError(
				"InvalidParty",
				`Deal ${dealId}: ${field} must be a non-negative integer`,
				{ dealId, field, value },
			);
		}
	}
}

/**
 * Names of the negotiated fields whose values differ.
 */
export function diffTerms(existing: DealTerms, proposed: DealTerms): string[] {
	return DEAL_TERM_FIELDS.filter((field) => existing[field] !== proposed[field]);
}

export function toDeal(dealId: string, terms: DealTerms): Deal {
	return {
		dealId,
		resourceProvider: terms.resourceProvider,
		jobCreator: terms.jobCreator,
		instructionPrice: terms.instructionPrice,
		timeout: terms.timeout,
		timeoutCollateral: terms.timeoutCollateral,
		jobCollateral: terms.jobCollateral,
		resultsCollateral: terms.resultsCollateral,
	};
}
