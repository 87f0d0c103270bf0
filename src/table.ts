import type { DiagramEdge, DiagramGraph } from "./diagram.ts";
import type { Transition, TransitionEntry } from "./fsm.ts";

/**
 * Maps an event value to the key it is stored under in the table.
 * Identity by default; useful when event values are objects carrying hooks.
 */
export type EventKey<TEvent> = (event: TEvent) => unknown;

const identity = <T>(value: T): T => value;

/**
 * Immutable `(state, event) → transition` lookup table.
 *
 * Created by the builder on every build from a snapshot of its registrations,
 * so tables never share mutable structure with the builder or with each other.
 */
export class TransitionTable<TState, TEvent, TContext> {
	readonly #states: ReadonlySet<TState>;
	readonly #rows = new Map<
		TState,
		Map<unknown, Readonly<Transition<TState, TEvent, TContext>>>
	>();
	readonly #eventKey: EventKey<TEvent>;

	/**
	 * @param states - The registered state set
	 * @param transitions - Transitions in registration order; a later entry for the same `(from, event)` replaces an earlier one
	 * @param eventKey - Event to lookup key mapping
	 */
	constructor(
		states: Iterable<TState>,
		transitions: Iterable<Transition<TState, TEvent, TContext>>,
		eventKey: EventKey<TEvent> = identity
	) {
		this.#states = new Set(states);
		this.#eventKey = eventKey;
		for (const transition of transitions) {
			let row = this.#rows.get(transition.from);
			if (!row) {
				row = new Map();
				this.#rows.set(transition.from, row);
			}
			row.set(eventKey(transition.event), Object.freeze({ ...transition }));
		}
	}

	/** Number of registered states. */
	get size(): number {
		return this.#states.size;
	}

	hasState(state: TState): boolean {
		return this.#states.has(state);
	}

	/** Registered states in registration order. */
	states(): TState[] {
		return [...this.#states];
	}

	/**
	 * All `(from, event) → to` triples, grouped by `from` in the order each
	 * source state was first registered; within a group, by first registration of the event.
	 */
	transitions(): TransitionEntry<TState, TEvent>[] {
		const out: TransitionEntry<TState, TEvent>[] = [];
		for (const row of this.#rows.values()) {
			for (const { from, event, to } of row.values()) {
				out.push({ from, event, to });
			}
		}
		return out;
	}

	/** The transition registered for `(from, event)`, if any. */
	lookup(
		from: TState,
		event: TEvent
	): Readonly<Transition<TState, TEvent, TContext>> | undefined {
		return this.#rows.get(from)?.get(this.#eventKey(event));
	}

	/** Events that have a registered transition out of `from`. */
	eventsFrom(from: TState): TEvent[] {
		const row = this.#rows.get(from);
		return row ? [...row.values()].map((t) => t.event) : [];
	}

	/** Human readable event name, as used in messages and diagrams. */
	eventLabel(event: TEvent): string {
		return String(this.#eventKey(event));
	}

	/**
	 * Label-only view of the table for the diagram generator.
	 * @param current - State to highlight, or `null` for none
	 */
	graph(current: TState | null): DiagramGraph {
		const transitions: DiagramEdge[] = this.transitions().map((t) => ({
			from: String(t.from),
			to: String(t.to),
			event: this.eventLabel(t.event),
		}));
		return {
			states: this.states().map((s) => String(s)),
			transitions,
			current: current === null ? null : String(current),
		};
	}
}
