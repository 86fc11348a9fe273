/**
 * State Machine
 *
 * A generic transition table for record lifecycles. The current state is
 * derived from a record, so the machine itself holds none: callers ask
 * where an action leads from a given state.
 */

/**
 * Generic state definition.
 */
export interface StateDefinition<TState extends string, TAction extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: TAction[];
	/** Human-readable description of this state */
	description?: string;
}

/**
 * State transition definition.
 */
export interface StateTransition<
	TState extends string,
	TAction extends string,
	TContext,
> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
	/** Optional guard condition that must hold for the transition */
	guard?: (context: TContext) => boolean;
}

/**
 * State machine configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
	TContext = void,
> {
	states: StateDefinition<TState, TAction>[];
	transitions: StateTransition<TState, TAction, TContext>[];
}

export type StateMachineErrorCode =
	| "UNKNOWN_STATE"
	| "ACTION_NOT_ALLOWED"
	| "TRANSITION_NOT_FOUND"
	| "GUARD_FAILED";

/**
 * Error thrown when a transition is rejected.
 */
export class StateMachineError extends Error {
	constructor(
		message: string,
		public readonly code: StateMachineErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StateMachineError";
	}
}

/**
 * Transition table over typed states and actions.
 *
 * @example
 * ```typescript
 * type LoanState = "no-loan" | "active";
 * type LoanAction = "borrow" | "close";
 *
 * const machine = new StateMachine<LoanState, LoanAction>({
 *   states: [
 *     { name: "no-loan", allowedActions: ["borrow"] },
 *     { name: "active", allowedActions: ["borrow", "close"] },
 *   ],
 *   transitions: [
 *     { from: ["no-loan", "active"], action: "borrow", to: "active" },
 *     { from: "active", action: "close", to: "no-loan" },
 *   ],
 * });
 *
 * machine.transition("no-loan", "borrow"); // "active"
 * ```
 */
export class StateMachine<
	TState extends string,
	TAction extends string,
	TContext = void,
> {
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<
		string,
		StateTransition<TState, TAction, TContext>
	>;

	constructor(config: StateMachineConfig<TState, TAction, TContext>) {
		this.stateMap = new Map();
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}

		this.transitionMap = new Map();
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}
	}

	/**
	 * Check if an action is allowed from a state.
	 */
	canPerform(state: TState, action: TAction): boolean {
		return this.stateMap.get(state)?.allowedActions.includes(action) ?? false;
	}

	getAllowedActions(state: TState): TAction[] {
		return this.stateMap.get(state)?.allowedActions ?? [];
	}

	/**
	 * Resolve the state an action leads to.
	 *
	 * @throws StateMachineError if the action is not allowed or the guard fails
	 */
	transition(state: TState, action: TAction, context: TContext): TState {
		if (!this.stateMap.has(state)) {
			throw new StateMachineError(`Unknown state: ${state}`, "UNKNOWN_STATE", {
				state,
			});
		}

		if (!this.canPerform(state, action)) {
			throw new StateMachineError(
				`Action "${action}" is not allowed from state "${state}"`,
				"ACTION_NOT_ALLOWED",
				{ action, state, allowedActions: this.getAllowedActions(state) },
			);
		}

		const transition = this.transitionMap.get(`${state}:${action}`);
		if (!transition) {
			throw new StateMachineError(
				`No transition found for action "${action}" from state "${state}"`,
				"TRANSITION_NOT_FOUND",
				{ action, state },
			);
		}

		if (transition.guard && !transition.guard(context)) {
			throw new StateMachineError(
				`Guard condition failed for action "${action}"`,
				"GUARD_FAILED",
				{ action, state },
			);
		}

		return transition.to;
	}
}
