import { DealTerms } from "../deals/deal.types";

/**
 * What the resource provider owes (positive) or is owed (negative) when
 * results replace the timeout collateral with the results collateral.
 */
export function collateralDelta(
	terms: Pick<DealTerms, "resultsCollateral" | "timeoutCollateral">,
): number {
	return terms.resultsCollateral - terms.timeoutCollateral;
}

/**
 * Last second (inclusive) at which results are accepted.
 */
export function resultsDeadline(dealAgreedAt: number, timeout: number): number {
	return dealAgreedAt + timeout;
}

export function hasTimedOut(
	dealAgreedAt: number,
	timeout: number,
	now: number,
): boolean {
	return now > resultsDeadline(dealAgreedAt, timeout);
}
