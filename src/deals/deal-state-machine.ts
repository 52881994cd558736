/**
 * Deal lifecycle
 *
 * Declarative states and transitions for a deal. Stores consult this
 * table before persisting any state change so every backend enforces the
 * same lifecycle.
 */

import { EscrowError } from "../common/errors";
import { DealAction, DealState } from "./deal.types";

export interface StateDefinition {
	name: DealState;
	allowedActions: DealAction[];
	isFinal: boolean;
	description?: string;
}

export interface StateTransition {
	from: DealState | DealState[];
	action: DealAction;
	to: DealState;
}

export interface StateMachineConfig {
	initialState: DealState;
	states: StateDefinition[];
	transitions: StateTransition[];
}

function createState(
	name: DealState,
	allowedActions: DealAction[],
	options: { isFinal?: boolean; description?: string } = {},
): StateDefinition {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal ?? false,
		description: options.description,
	};
}

function createTransition(
	from: DealState | DealState[],
	action: DealAction,
	to: DealState,
): StateTransition {
	return { from, action, to };
}

export const DEAL_STATE_MACHINE: StateMachineConfig = {
	initialState: "negotiating",
	states: [
		createState("negotiating", ["agree"], {
			description: "Terms proposed, waiting for both parties to agree",
		}),
		createState("agreement", ["add-result", "timeout"], {
			description: "Both parties agreed and posted collateral",
		}),
		createState("results-submitted", ["accept-results", "reject-results"], {
			description: "Results submitted within the deadline",
		}),
		createState("timed-out", [], {
			isFinal: true,
			description: "Job collateral refunded, timeout collateral forfeited",
		}),
		createState("results-accepted", [], { isFinal: true }),
		createState("results-rejected", [], { isFinal: true }),
	],
	transitions: [
		// the second agreement moves the deal on; the first keeps it negotiating
		createTransition("negotiating", "agree", "agreement"),
		createTransition("agreement", "add-result", "results-submitted"),
		createTransition("agreement", "timeout", "timed-out"),
		createTransition("results-submitted", "accept-results", "results-accepted"),
		createTransition("results-submitted", "reject-results", "results-rejected"),
	],
};

const stateMap = new Map<DealState, StateDefinition>(
	DEAL_STATE_MACHINE.states.map((s) => [s.name, s]),
);

const transitionMap = new Map<string, StateTransition>();
for (const transition of DEAL_STATE_MACHINE.transitions) {
	const froms = Array.isArray(transition.from)
		? transition.from
		: [transition.from];
	for (const from of froms) {
		transitionMap.set(`${from}:${transition.action}`, transition);
	}
}

export function canPerform(state: DealState, action: DealAction): boolean {
	return stateMap.get(state)?.allowedActions.includes(action) ?? false;
}

export function getAllowedActions(state: DealState): DealAction[] {
	return stateMap.get(state)?.allowedActions ?? [];
}

export function isFinalState(state: DealState): boolean {
	return stateMap.get(state)?.isFinal ?? false;
}

/**
 * Resolve the state an action leads to.
 *
 * @throws EscrowError `InvalidState` if the action is not allowed from `state`
 */
export function nextState(
	dealId: string,
	state: DealState,
	action: DealAction,
): DealState {
	const transition = canPerform(state, action)
		? transitionMap.get(`${state}:${action}`)
		: undefined;
	if (!transition) {
		throw new EscrowError(
			"InvalidState",
			`Action "${action}" is not allowed for deal ${dealId} in state "${state}"`,
			{ dealId, action, state, allowedActions: getAllowedActions(state) },
		);
	}
	return transition.to;
}
