import { isEscrowError } from "../common/errors";
import {
	canPerform,
	getAllowedActions,
	isFinalState,
	nextState,
} from "./deal-state-machine";

describe("deal state machine", () => {
	it("follows the deal lifecycle", () => {
		expect(nextState("d", "negotiating", "agree")).toBe("agreement");
		expect(nextState("d", "agreement", "add-result")).toBe("results-submitted");
		expect(nextState("d", "agreement", "timeout")).toBe("timed-out");
		expect(nextState("d", "results-submitted", "accept-results")).toBe(
			"results-accepted",
		);
		expect(nextState("d", "results-submitted", "reject-results")).toBe(
			"results-rejected",
		);
	});

	it("rejects actions the state does not allow", () => {
		expect(canPerform("negotiating", "add-result")).toBe(false);
		expect(canPerform("results-submitted", "timeout")).toBe(false);

		let caught: unknown;
		try {
			nextState("deal-9", "timed-out", "add-result");
		} catch (e) {
			caught = e;
		}
		expect(isEscrowError(caught, "InvalidState")).toBe(true);
		if (isEscrowError(caught)) {
			expect(caught.details).toEqual({
				dealId: "deal-9",
				action: "add-result",
				state: "timed-out",
				allowedActions: [],
			});
		}
	});

	it("marks terminal states", () => {
		expect(isFinalState("timed-out")).toBe(true);
		expect(isFinalState("results-accepted")).toBe(true);
		expect(isFinalState("results-rejected")).toBe(true);
		expect(isFinalState("results-submitted")).toBe(false);
		expect(getAllowedActions("agreement")).toEqual(["add-result", "timeout"]);
	});
});
