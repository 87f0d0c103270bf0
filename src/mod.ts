/**
 * @module
 *
 * A generic, typed finite state machine engine.
 *
 * A builder collects states and `(from, event) → to` transitions, each with an
 * optional guard and before/after hooks, and freezes them into a validated table.
 * The table is evaluated by one of two machines sharing the same algorithm
 * (guard → before hooks → commit → after hooks):
 *
 * - `Machine`: stateless, the caller supplies the current state on every call.
 * - `StatefulMachine`: owns its current state behind a reader/writer lock.
 *
 * @example Stateless usage
 * ```typescript
 * import { createMachineBuilder } from "guarded-fsm";
 *
 * const door = createMachineBuilder<"Closed" | "Open" | "Locked", "open" | "close" | "lock">()
 *   .addStates("Closed", "Open", "Locked")
 *   .addTransition("Closed", "Open", "open")
 *   .addTransition("Open", "Closed", "close")
 *   .addTransition("Closed", "Locked", "lock", { guard: () => hasKey })
 *   .build();
 *
 * const next = await door.trigger("Closed", "open"); // → "Open"
 * ```
 *
 * @example Stateful usage
 * ```typescript
 * const player = createMachineBuilder<"Stopped" | "Playing", "play" | "stop">()
 *   .addStates("Stopped", "Playing")
 *   .setInitialState("Stopped")
 *   .addTransition("Stopped", "Playing", "play")
 *   .addTransition("Playing", "Stopped", "stop")
 *   .buildStateful();
 *
 * await player.trigger("play");
 * player.state; // → "Playing"
 * ```
 *
 * @example Diagrams
 * ```typescript
 * console.log(player.toMermaid());
 * console.log(door.toDot("Closed"));
 * ```
 */

export * from "./builder.ts";
export * from "./diagram.ts";
export * from "./errors.ts";
export * from "./fsm.ts";
export * from "./rw-lock.ts";
export * from "./table.ts";
