/**
 * Build-time configuration error codes.
 */
export type BuildErrorCode =
	| "EMPTY_STATE_SET"
	| "INITIAL_STATE_NOT_SET"
	| "INVALID_INITIAL_STATE";

/**
 * Trigger-time evaluation error codes.
 */
export type TriggerErrorCode = "NO_TRANSITION" | "GUARD_REJECTED";

/**
 * Base class of everything `build()` / `buildStateful()` throws.
 * A builder in this state can never produce a machine; fix the configuration.
 */
export class BuildError extends Error {
	readonly code: BuildErrorCode;

	constructor(code: BuildErrorCode, message: string) {
		super(message);
		this.name = "BuildError";
		this.code = code;
	}
}

/** No state was registered before building. */
export class EmptyStateSetError extends BuildError {
	constructor() {
		super("EMPTY_STATE_SET", "state machine must have at least one state");
		this.name = "EmptyStateSetError";
	}
}

/** `buildStateful()` was called without `setInitialState()`. */
export class InitialStateNotSetError extends BuildError {
	constructor() {
		super("INITIAL_STATE_NOT_SET", "initial state must be set");
		this.name = "InitialStateNotSetError";
	}
}

/** The designated initial state was never registered via `addState()`. */
export class InvalidInitialStateError<TState = unknown> extends BuildError {
	readonly state: TState;

	constructor(state: TState) {
		super(
			"INVALID_INITIAL_STATE",
			`initial state must be a valid state (state: ${String(state)})`
		);
		this.name = "InvalidInitialStateError";
		this.state = state;
	}
}

/**
 * Base class of the recoverable errors a trigger may fail with.
 *
 * When one of these is thrown the machine is guaranteed to be in the state it
 * was in before the call, so the caller may simply try another event.
 */
export class TriggerError<TState = unknown, TEvent = unknown> extends Error {
	readonly code: TriggerErrorCode;
	readonly from: TState;
	readonly event: TEvent;

	constructor(
		code: TriggerErrorCode,
		message: string,
		from: TState,
		event: TEvent
	) {
		super(message);
		this.name = "TriggerError";
		this.code = code;
		this.from = from;
		this.event = event;
	}
}

/** There is no transition registered for the `(from, event)` pair. */
export class NoTransitionError<
	TState = unknown,
	TEvent = unknown
> extends TriggerError<TState, TEvent> {
	constructor(from: TState, event: TEvent, eventLabel = String(event)) {
		// prettier-ignore
		super("NO_TRANSITION", `no transition found (from: ${String(from)}, event: ${eventLabel})`, from, event);
		this.name = "NoTransitionError";
	}
}

/** The transition exists but its guard returned `false`. */
export class GuardRejectedError<
	TState = unknown,
	TEvent = unknown
> extends TriggerError<TState, TEvent> {
	readonly to: TState;

	constructor(
		from: TState,
		to: TState,
		event: TEvent,
		eventLabel = String(event)
	) {
		// prettier-ignore
		super("GUARD_REJECTED", `guard condition not met (from: ${String(from)}, to: ${String(to)}, event: ${eventLabel})`, from, event);
		this.name = "GuardRejectedError";
		this.to = to;
	}
}

/**
 * Type guard for build-time errors.
 */
export function isBuildError(error: unknown): error is BuildError {
	return error instanceof BuildError;
}

/**
 * Type guard for trigger-time errors.
 */
export function isTriggerError<TState = unknown, TEvent = unknown>(
	error: unknown
): error is TriggerError<TState, TEvent> {
	return error instanceof TriggerError;
}
