import {
	EmptyStateSetError,
	InitialStateNotSetError,
	InvalidInitialStateError,
} from "./errors.ts";
import {
	defaultLogger,
	type EngineOptions,
	Machine,
	StatefulMachine,
	type Transition,
	type TransitionOptions,
	type TriggerContext,
} from "./fsm.ts";
import { type EventKey, TransitionTable } from "./table.ts";

/**
 * Builder configuration. Everything except `eventKey` is handed to each
 * machine the builder produces.
 */
export type MachineOptions<TEvent, TContext> = EngineOptions<TContext> & {
	/**
	 * Maps an event value to its lookup key (default: the value itself).
	 * Lets object events that carry their own hooks share one table row, e.g.
	 * `(e) => e.type`.
	 */
	eventKey?: EventKey<TEvent>;
};

/**
 * Factory function to create a machine builder.
 * Equivalent to calling `new MachineBuilder(options)`.
 *
 * @template TState - Type of the state values
 * @template TEvent - Type of the event values
 * @template TContext - Type of the context forwarded to guards and hooks
 *
 * @example
 * ```typescript
 * const machine = createMachineBuilder<"ON" | "OFF", "toggle">()
 *   .addStates("ON", "OFF")
 *   .addTransition("OFF", "ON", "toggle")
 *   .addTransition("ON", "OFF", "toggle")
 *   .build();
 * ```
 */
export function createMachineBuilder<
	TState,
	TEvent,
	TContext = TriggerContext
>(
	options: MachineOptions<TEvent, TContext> = {}
): MachineBuilder<TState, TEvent, TContext> {
	return new MachineBuilder<TState, TEvent, TContext>(options);
}

/**
 * Mutable accumulator of states and transitions.
 *
 * Nothing is validated while registering: transitions may reference states
 * that were never added, and registering a second transition for the same
 * `(from, event)` pair silently replaces the first. Validation happens in
 * `build()` / `buildStateful()`, which may be called any number of times;
 * each call snapshots the current registrations into an independent machine.
 */
export class MachineBuilder<TState, TEvent, TContext = TriggerContext> {
	#states = new Set<TState>();

	#transitions = new Map<
		TState,
		Map<unknown, Transition<TState, TEvent, TContext>>
	>();

	#initial: { state: TState } | null = null;

	readonly #eventKey: EventKey<TEvent>;

	constructor(
		public readonly options: MachineOptions<TEvent, TContext> = {}
	) {
		this.#eventKey = options.eventKey ?? ((event) => event);
	}

	#debugLog(...args: unknown[]): void {
		if (this.options.debug) {
			(this.options.logger ?? defaultLogger).debug("[FSM]", ...args);
		}
	}

	/** Adds a state. Adding a state twice is a no-op. */
	addState(state: TState): this {
		this.#states.add(state);
		return this;
	}

	/** Adds each of the given states. */
	addStates(...states: TState[]): this {
		for (const state of states) this.addState(state);
		return this;
	}

	/**
	 * Designates the initial state of stateful machines. Membership in the
	 * state set is checked by `buildStateful()`, not here.
	 */
	setInitialState(state: TState): this {
		this.#initial = { state };
		return this;
	}

	/**
	 * Registers (or replaces) the transition for `(from, event)`.
	 *
	 * @param from - Source state
	 * @param to - Target state
	 * @param event - Event value; looked up through `eventKey`
	 * @param options - Guard and hooks; later objects override earlier ones field by field
	 *
	 * @example
	 * ```typescript
	 * builder.addTransition("Closed", "Locked", "lock", {
	 *   guard: (ctx, from, to, event) => !isLocked,
	 *   after: () => audit("locked"),
	 * });
	 * ```
	 */
	addTransition(
		from: TState,
		to: TState,
		event: TEvent,
		...options: TransitionOptions<TState, TEvent, TContext>[]
	): this {
		const transition: Transition<TState, TEvent, TContext> = { from, to, event };

		for (const { guard, before, after } of options) {
			if (guard) transition.guard = guard;
			if (before) transition.before = before;
			if (after) transition.after = after;
		}

		let row = this.#transitions.get(from);
		if (!row) {
			row = new Map();
			this.#transitions.set(from, row);
		}
		if (row.has(this.#eventKey(event))) {
			this.#debugLog(
				`addTransition(): replacing transition for "${String(from)}" + "${String(this.#eventKey(event))}"`
			);
		}
		row.set(this.#eventKey(event), transition);

		return this;
	}

	#snapshot(): TransitionTable<TState, TEvent, TContext> {
		const transitions: Transition<TState, TEvent, TContext>[] = [];
		for (const row of this.#transitions.values()) {
			transitions.push(...row.values());
		}
		return new TransitionTable(this.#states, transitions, this.#eventKey);
	}

	#engineOptions(): EngineOptions<TContext> {
		const { context, debug, logger } = this.options;
		return { context, debug, logger };
	}

	/**
	 * Validates and freezes the registrations into a stateless machine.
	 * @throws EmptyStateSetError if no state was added
	 */
	build(): Machine<TState, TEvent, TContext> {
		if (!this.#states.size) throw new EmptyStateSetError();
		this.#debugLog(`build() with ${this.#states.size} state(s)`);
		return new Machine(this.#snapshot(), this.#engineOptions());
	}

	/**
	 * Validates and freezes the registrations into a stateful machine seeded
	 * with the initial state.
	 * @throws EmptyStateSetError if no state was added
	 * @throws InitialStateNotSetError if `setInitialState()` was never called
	 * @throws InvalidInitialStateError if the initial state was never added
	 */
	buildStateful(): StatefulMachine<TState, TEvent, TContext> {
		if (!this.#states.size) throw new EmptyStateSetError();
		if (!this.#initial) throw new InitialStateNotSetError();

		const { state } = this.#initial;
		if (!this.#states.has(state)) throw new InvalidInitialStateError(state);

		this.#debugLog(
			`buildStateful() with ${this.#states.size} state(s), initial "${String(state)}"`
		);
		return new StatefulMachine(this.#snapshot(), state, this.#engineOptions());
	}
}
