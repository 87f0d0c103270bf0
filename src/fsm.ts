import { createPubSub } from "@marianmeres/pubsub";
import {
	type DiagramFormat,
	type DiagramGraph,
	generateDiagram,
} from "./diagram.ts";
import {
	GuardRejectedError,
	isTriggerError,
	NoTransitionError,
	type TriggerError,
} from "./errors.ts";
import { ReadWriteLock } from "./rw-lock.ts";
import type { TransitionTable } from "./table.ts";

/**
 * Logger interface compatible with console.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
export const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

export type MaybePromise<T> = T | Promise<T>;

/**
 * Default execution context. The engine never reads it; it is handed as is
 * to guards and hooks, which may honour the abort signal.
 */
export type TriggerContext = {
	signal?: AbortSignal;
};

/**
 * Predicate deciding whether a transition may proceed.
 * Should only read its arguments; side effects belong in hooks.
 */
export type Guard<TState, TEvent, TContext> = (
	context: TContext,
	from: TState,
	to: TState,
	event: TEvent
) => MaybePromise<boolean>;

/**
 * Side effect run right before or right after a transition commits.
 */
export type TransitionHook<TState, TEvent, TContext> = (
	context: TContext,
	from: TState,
	to: TState,
	event: TEvent
) => MaybePromise<void>;

/**
 * Optional knobs attached to a transition at registration time.
 * Several objects may be passed to `addTransition`; a later one setting a field
 * replaces the earlier value.
 */
export type TransitionOptions<TState, TEvent, TContext> = {
	guard?: Guard<TState, TEvent, TContext>;
	before?: TransitionHook<TState, TEvent, TContext>;
	after?: TransitionHook<TState, TEvent, TContext>;
};

/**
 * A single configured rule of the table.
 */
export type Transition<TState, TEvent, TContext> = {
	readonly from: TState;
	readonly to: TState;
	readonly event: TEvent;
} & TransitionOptions<TState, TEvent, TContext>;

/** Read-only `(from, event) → to` triple. */
export type TransitionEntry<TState, TEvent> = {
	from: TState;
	event: TEvent;
	to: TState;
};

/**
 * Event values implementing this get `beforeTransition` called once the guard
 * passed and before the state changes.
 */
export interface BeforeTransitionCapable<TContext = TriggerContext> {
	beforeTransition(context: TContext): MaybePromise<void>;
}

/**
 * Event values implementing this get `afterTransition` called once the state
 * changed.
 */
export interface AfterTransitionCapable<TContext = TriggerContext> {
	afterTransition(context: TContext): MaybePromise<void>;
}

/**
 * Runtime capability check, done on every trigger against the actual event
 * value, so single instances may opt in.
 */
export function isBeforeTransitionCapable<TContext = TriggerContext>(
	event: unknown
): event is BeforeTransitionCapable<TContext> {
	return (
		(typeof event === "object" || typeof event === "function") &&
		event !== null &&
		"beforeTransition" in event &&
		typeof event.beforeTransition === "function"
	);
}

/** @see isBeforeTransitionCapable */
export function isAfterTransitionCapable<TContext = TriggerContext>(
	event: unknown
): event is AfterTransitionCapable<TContext> {
	return (
		(typeof event === "object" || typeof event === "function") &&
		event !== null &&
		"afterTransition" in event &&
		typeof event.afterTransition === "function"
	);
}

/**
 * Engine configuration, shared by both machine modes.
 */
export type EngineOptions<TContext> = {
	/**
	 * Context used when a trigger call does not pass one. Accepts a value OR a
	 * factory function (called once per trigger).
	 */
	context?: TContext | (() => TContext);
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Outcome of `tryTrigger`. On failure `state` is the unchanged current state.
 */
export type TriggerResult<TState, TEvent> =
	| { ok: true; state: TState }
	| { ok: false; state: TState; error: TriggerError<TState, TEvent> };

/**
 * Published state data sent to subscribers of a stateful machine.
 * `previous` is null until the first committed transition (and after reset).
 */
export type PublishedState<TState> = {
	current: TState;
	previous: TState | null;
};

export type Unsubscriber = () => void;

type Runtime<TState, TEvent, TContext> = {
	table: TransitionTable<TState, TEvent, TContext>;
	debug: boolean;
	logger: Logger;
	debugLog: (...args: unknown[]) => void;
	initContext: () => TContext;
};

function createRuntime<TState, TEvent, TContext>(
	table: TransitionTable<TState, TEvent, TContext>,
	options: EngineOptions<TContext>
): Runtime<TState, TEvent, TContext> {
	const debug = options.debug ?? false;
	const logger = options.logger ?? defaultLogger;
	return {
		table,
		debug,
		logger,
		debugLog: (...args: unknown[]) => {
			if (debug) logger.debug("[FSM]", ...args);
		},
		initContext: () => {
			if (typeof options.context === "function") {
				return (options.context as () => TContext)();
			}
			return options.context ?? ({} as TContext);
		},
	};
}

/**
 * The trigger evaluation shared by both modes:
 * 1. table lookup
 * 2. guard
 * 3. transition `before` hook, then the event's `beforeTransition`
 * 4. `commit(to)`
 * 5. transition `after` hook, then the event's `afterTransition`
 *
 * Nothing is committed when 1-3 fail. Once committed, both after hooks run
 * even if the first one throws.
 */
async function evaluateTrigger<TState, TEvent, TContext>(
	runtime: Runtime<TState, TEvent, TContext>,
	from: TState,
	event: TEvent,
	context: TContext,
	commit: (to: TState) => void
): Promise<TState> {
	const { table, debugLog } = runtime;
	const label = table.eventLabel(event);
	debugLog(`trigger("${label}") called from state "${String(from)}"`);

	const transition = table.lookup(from, event);
	if (!transition) {
		debugLog(`trigger("${label}") failed: no matching transition`);
		throw new NoTransitionError(from, event, label);
	}

	const { to } = transition;

	if (transition.guard && !(await transition.guard(context, from, to, event))) {
		debugLog(`trigger("${label}") failed: guard rejected`);
		throw new GuardRejectedError(from, to, event, label);
	}

	// 1. before side effects
	if (typeof transition.before === "function") {
		debugLog(`trigger("${label}") executing before hook`);
		await transition.before(context, from, to, event);
	}
	if (isBeforeTransitionCapable<TContext>(event)) {
		debugLog(`trigger("${label}") executing event beforeTransition`);
		await event.beforeTransition(context);
	}

	// 2. commit
	debugLog(`trigger("${label}"): "${String(from)}" -> "${String(to)}"`);
	commit(to);

	// 3. after side effects
	try {
		if (typeof transition.after === "function") {
			debugLog(`trigger("${label}") executing after hook`);
			await transition.after(context, from, to, event);
		}
	} finally {
		if (isAfterTransitionCapable<TContext>(event)) {
			debugLog(`trigger("${label}") executing event afterTransition`);
			await event.afterTransition(context);
		}
	}

	return to;
}

async function evaluateGuard<TState, TEvent, TContext>(
	runtime: Runtime<TState, TEvent, TContext>,
	from: TState,
	event: TEvent,
	context: TContext
): Promise<boolean> {
	const transition = runtime.table.lookup(from, event);
	if (!transition) return false;
	if (!transition.guard) return true;
	return await transition.guard(context, from, transition.to, event);
}

/**
 * Stateless state machine: the caller passes the current state on every call
 * and stores the returned one.
 *
 * Instances are immutable once built and may be shared freely between
 * concurrent callers.
 *
 * @template TState - Type of the state values
 * @template TEvent - Type of the event values
 * @template TContext - Type of the context forwarded to guards and hooks
 *
 * @example
 * ```typescript
 * const door = createMachineBuilder<"Closed" | "Open", "open" | "close">()
 *   .addStates("Closed", "Open")
 *   .addTransition("Closed", "Open", "open")
 *   .addTransition("Open", "Closed", "close")
 *   .build();
 *
 * await door.trigger("Closed", "open"); // → "Open"
 * ```
 */
export class Machine<TState, TEvent, TContext = TriggerContext> {
	readonly #runtime: Runtime<TState, TEvent, TContext>;

	/**
	 * @param table - The frozen transition table
	 * @param options - Logging and default context
	 */
	constructor(
		table: TransitionTable<TState, TEvent, TContext>,
		options: EngineOptions<TContext> = {}
	) {
		this.#runtime = createRuntime(table, options);
		this.#runtime.debugLog(`Machine created with ${table.size} state(s)`);
	}

	/** Whether debug logging is active. */
	get debug(): boolean {
		return this.#runtime.debug;
	}

	/** The Logger instance used by this machine. */
	get logger(): Logger {
		return this.#runtime.logger;
	}

	hasState(state: TState): boolean {
		return this.#runtime.table.hasState(state);
	}

	/** Registered states in registration order. */
	states(): TState[] {
		return this.#runtime.table.states();
	}

	/** All `(from, event) → to` triples, grouped by source state. */
	transitions(): TransitionEntry<TState, TEvent>[] {
		return this.#runtime.table.transitions();
	}

	/**
	 * Events with a registered transition out of `from`. Guards are not evaluated.
	 */
	availableEvents(from: TState): TEvent[] {
		return this.#runtime.table.eventsFrom(from);
	}

	/**
	 * Evaluates `event` against `from`.
	 *
	 * @param from - The caller's current state
	 * @param event - The event value (its hooks, if any, run as well)
	 * @param context - Forwarded to guards and hooks; defaults to the configured context
	 * @returns The target state
	 * @throws NoTransitionError if nothing is registered for `(from, event)`
	 * @throws GuardRejectedError if the guard returned false
	 *
	 * @example
	 * ```typescript
	 * state = await machine.trigger(state, "open");
	 * ```
	 */
	async trigger(
		from: TState,
		event: TEvent,
		context?: TContext
	): Promise<TState> {
		return await evaluateTrigger(
			this.#runtime,
			from,
			event,
			context ?? this.#runtime.initContext(),
			() => {}
		);
	}

	/**
	 * Like `trigger`, but returns taxonomy failures as data instead of throwing.
	 * Errors raised by guards or hooks are still thrown.
	 */
	async tryTrigger(
		from: TState,
		event: TEvent,
		context?: TContext
	): Promise<TriggerResult<TState, TEvent>> {
		try {
			return { ok: true, state: await this.trigger(from, event, context) };
		} catch (error) {
			if (isTriggerError<TState, TEvent>(error)) {
				return { ok: false, state: from, error };
			}
			throw error;
		}
	}

	/**
	 * Checks whether `event` would be accepted in `from`, without running hooks.
	 * The guard (if any) is evaluated.
	 */
	async canTrigger(
		from: TState,
		event: TEvent,
		context?: TContext
	): Promise<boolean> {
		this.#runtime.debugLog(`canTrigger() called from state "${String(from)}"`);
		return await evaluateGuard(
			this.#runtime,
			from,
			event,
			context ?? this.#runtime.initContext()
		);
	}

	/**
	 * Label-only view of the table, for the `toMermaid` / `toDot` renderers.
	 * @param current - State to highlight, or `null` for none
	 */
	graph(current: TState | null = null): DiagramGraph {
		return this.#runtime.table.graph(current);
	}

	/**
	 * Renders the table with `current` highlighted.
	 * @throws Error for an unsupported format
	 */
	diagram(format: DiagramFormat, current: TState | null = null): string {
		return generateDiagram(this.graph(current), format);
	}

	/** Mermaid stateDiagram-v2 of the table. */
	toMermaid(current: TState | null = null): string {
		return this.diagram("mermaid", current);
	}

	/** Graphviz DOT of the table. */
	toDot(current: TState | null = null): string {
		return this.diagram("dot", current);
	}
}

/**
 * Stateful state machine: owns its current state and mutates it in place.
 *
 * Every `trigger` holds an exclusive lock for the whole evaluation (lookup,
 * guard, hooks and commit), so concurrent triggers are applied one after
 * another. A slow hook therefore delays every other caller of the same
 * instance. Triggering the same instance from inside one of its own hooks
 * waits on itself and never settles.
 *
 * @example
 * ```typescript
 * const player = createMachineBuilder<"Stopped" | "Playing", "play" | "stop">()
 *   .addStates("Stopped", "Playing")
 *   .setInitialState("Stopped")
 *   .addTransition("Stopped", "Playing", "play")
 *   .addTransition("Playing", "Stopped", "stop")
 *   .buildStateful();
 *
 * player.subscribe(({ current }) => console.log(current));
 * await player.trigger("play"); // logs "Playing"
 * ```
 */
export class StatefulMachine<TState, TEvent, TContext = TriggerContext> {
	readonly #runtime: Runtime<TState, TEvent, TContext>;

	readonly #initial: TState;

	/** Machine's current state */
	#state: TState;

	/** Machine's previous state */
	#previous: TState | null = null;

	#lock = new ReadWriteLock();

	/** Internal pub sub */
	#pubsub = createPubSub();

	/**
	 * @param table - The frozen transition table
	 * @param initial - Seed of the current state (validated by the builder)
	 * @param options - Logging and default context
	 */
	constructor(
		table: TransitionTable<TState, TEvent, TContext>,
		initial: TState,
		options: EngineOptions<TContext> = {}
	) {
		this.#runtime = createRuntime(table, options);
		this.#initial = initial;
		this.#state = initial;
		this.#runtime.debugLog(
			`StatefulMachine created with initial state "${String(initial)}"`
		);
	}

	/** Whether debug logging is active. */
	get debug(): boolean {
		return this.#runtime.debug;
	}

	/** The Logger instance used by this machine. */
	get logger(): Logger {
		return this.#runtime.logger;
	}

	/** The state the machine started in (and returns to on reset). */
	get initial(): TState {
		return this.#initial;
	}

	/**
	 * Current state, read without waiting for an in-flight trigger.
	 * Use `current()` to read it consistently with concurrent triggers.
	 */
	get state(): TState {
		return this.#state;
	}

	/** State before the last committed transition. */
	get previous(): TState | null {
		return this.#previous;
	}

	/**
	 * Current state, read under the shared lock (after any trigger already in
	 * progress or queued before this call).
	 */
	async current(): Promise<TState> {
		return await this.#lock.read(() => this.#state);
	}

	/** Checks whether the machine is currently in the given state. */
	is(state: TState): boolean {
		return this.#state === state;
	}

	hasState(state: TState): boolean {
		return this.#runtime.table.hasState(state);
	}

	/** Registered states in registration order. */
	states(): TState[] {
		return this.#runtime.table.states();
	}

	/** All `(from, event) → to` triples, grouped by source state. */
	transitions(): TransitionEntry<TState, TEvent>[] {
		return this.#runtime.table.transitions();
	}

	/** Events with a registered transition out of the current state. */
	availableEvents(): TEvent[] {
		return this.#runtime.table.eventsFrom(this.#state);
	}

	#getNotifyData(): PublishedState<TState> {
		return { current: this.#state, previous: this.#previous };
	}

	#notify() {
		this.#pubsub.publish("change", this.#getNotifyData());
	}

	/**
	 * Subscribes to state changes.
	 * The callback is invoked immediately with the current state and after every
	 * committed transition or reset (including self-loops).
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 */
	subscribe(cb: (data: PublishedState<TState>) => void): Unsubscriber {
		this.#runtime.debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", cb);
		cb(this.#getNotifyData());
		return unsub;
	}

	async #transition(event: TEvent, context?: TContext): Promise<TState> {
		return await this.#lock.write(async () => {
			let committed = false;
			try {
				return await evaluateTrigger(
					this.#runtime,
					this.#state,
					event,
					context ?? this.#runtime.initContext(),
					(to) => {
						this.#previous = this.#state;
						this.#state = to;
						committed = true;
					}
				);
			} finally {
				if (committed) this.#notify();
			}
		});
	}

	/**
	 * Evaluates `event` against the current state and commits the target state.
	 *
	 * @param event - The event value (its hooks, if any, run as well)
	 * @param context - Forwarded to guards and hooks; defaults to the configured context
	 * @throws NoTransitionError if nothing is registered for `(state, event)`
	 * @throws GuardRejectedError if the guard returned false
	 */
	async trigger(event: TEvent, context?: TContext): Promise<void> {
		await this.#transition(event, context);
	}

	/**
	 * Like `trigger`, but returns taxonomy failures as data instead of throwing.
	 * Errors raised by guards or hooks are still thrown.
	 */
	async tryTrigger(
		event: TEvent,
		context?: TContext
	): Promise<TriggerResult<TState, TEvent>> {
		try {
			return { ok: true, state: await this.#transition(event, context) };
		} catch (error) {
			if (isTriggerError<TState, TEvent>(error)) {
				return { ok: false, state: error.from, error };
			}
			throw error;
		}
	}

	/**
	 * Checks whether `event` would be accepted in the current state, without
	 * running hooks. Evaluated under the shared lock.
	 */
	async canTrigger(event: TEvent, context?: TContext): Promise<boolean> {
		return await this.#lock.read(() => {
			this.#runtime.debugLog(
				`canTrigger() called from state "${String(this.#state)}"`
			);
			return evaluateGuard(
				this.#runtime,
				this.#state,
				event,
				context ?? this.#runtime.initContext()
			);
		});
	}

	/**
	 * Returns to the initial state and clears `previous`. Subscribers are
	 * notified.
	 *
	 * @returns The machine instance for chaining
	 */
	async reset(): Promise<this> {
		await this.#lock.write(() => {
			this.#runtime.debugLog(
				`reset() called, returning to "${String(this.#initial)}"`
			);
			this.#state = this.#initial;
			this.#previous = null;
			this.#notify();
		});
		return this;
	}

	/**
	 * Label-only view of the table, highlighting the current state unless
	 * another one (or `null`) is given.
	 */
	graph(current: TState | null = this.#state): DiagramGraph {
		return this.#runtime.table.graph(current);
	}

	/**
	 * Renders the table with `current` (default: the current state) highlighted.
	 * @throws Error for an unsupported format
	 */
	diagram(format: DiagramFormat, current: TState | null = this.#state): string {
		return generateDiagram(this.graph(current), format);
	}

	/** Mermaid stateDiagram-v2 of the table. */
	toMermaid(current: TState | null = this.#state): string {
		return this.diagram("mermaid", current);
	}

	/** Graphviz DOT of the table. */
	toDot(current: TState | null = this.#state): string {
		return this.diagram("dot", current);
	}
}
