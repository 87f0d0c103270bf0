import assert from "node:assert/strict";
import { test } from "node:test";
import { createMachineBuilder } from "../src/builder.ts";
import { GuardRejectedError, NoTransitionError } from "../src/errors.ts";

test("door with a lock flag", async () => {
	type State = "Closed" | "Open" | "Locked";
	type Event = "OpenDoor" | "CloseDoor" | "LockDoor" | "UnlockDoor";
	let locked = false;

	const door = createMachineBuilder<State, Event>()
		.addStates("Closed", "Open", "Locked")
		.setInitialState("Closed")
		.addTransition("Closed", "Open", "OpenDoor", { guard: () => !locked })
		.addTransition("Open", "Closed", "CloseDoor")
		.addTransition("Closed", "Locked", "LockDoor", {
			after: () => {
				locked = true;
			},
		})
		.addTransition("Locked", "Closed", "UnlockDoor", {
			after: () => {
				locked = false;
			},
		})
		.buildStateful();

	await door.trigger("OpenDoor");
	await door.trigger("CloseDoor");
	await door.trigger("LockDoor");
	assert.equal(door.state, "Locked");
	assert.equal(locked, true);

	await assert.rejects(door.trigger("OpenDoor"), NoTransitionError);

	await door.trigger("UnlockDoor");
	assert.equal(locked, false);
	await door.trigger("OpenDoor");
	assert.equal(door.state, "Open");
});

test("door lock guarded by a caller flag", async () => {
	type State = "Closed" | "Open" | "Locked";
	type Event = "Open" | "Close" | "Lock" | "Unlock";
	let locked = true;

	const door = createMachineBuilder<State, Event>()
		.addStates("Closed", "Open", "Locked")
		.setInitialState("Closed")
		.addTransition("Closed", "Open", "Open")
		.addTransition("Open", "Closed", "Close")
		.addTransition("Closed", "Locked", "Lock", { guard: () => !locked })
		.addTransition("Locked", "Closed", "Unlock")
		.buildStateful();

	await assert.rejects(door.trigger("Lock"), {
		name: "GuardRejectedError",
		code: "GUARD_REJECTED",
		from: "Closed",
		to: "Locked",
		event: "Lock",
	});
	assert.equal(door.state, "Closed");
	assert.equal(door.previous, null);

	locked = false;
	await door.trigger("Lock");
	assert.equal(door.state, "Locked");
	assert.equal(door.previous, "Closed");

	// same table, driven statelessly
	const machine = createMachineBuilder<State, Event>()
		.addStates("Closed", "Open", "Locked")
		.addTransition("Closed", "Locked", "Lock", { guard: () => !locked })
		.build();
	assert.equal(await machine.trigger("Closed", "Lock"), "Locked");
	locked = true;
	await assert.rejects(machine.trigger("Closed", "Lock"), GuardRejectedError);
});

test("order lifecycle", async () => {
	type State =
		| "Created"
		| "PaymentPending"
		| "Paid"
		| "Shipped"
		| "Delivered"
		| "Cancelled";
	type Event =
		| "SubmitPayment"
		| "ConfirmPayment"
		| "Ship"
		| "Deliver"
		| "Cancel";
	type Order = { amount: number };

	const audit: string[] = [];
	const order = createMachineBuilder<State, Event, Order>({
		context: () => ({ amount: 0 }),
	})
		.addStates(
			"Created",
			"PaymentPending",
			"Paid",
			"Shipped",
			"Delivered",
			"Cancelled"
		)
		.setInitialState("Created")
		.addTransition("Created", "PaymentPending", "SubmitPayment")
		.addTransition("PaymentPending", "Paid", "ConfirmPayment", {
			guard: (ctx) => ctx.amount >= 100,
			after: (ctx, from, to) => {
				audit.push(`${from} -> ${to} (${ctx.amount})`);
			},
		})
		.addTransition("Paid", "Shipped", "Ship")
		.addTransition("Shipped", "Delivered", "Deliver")
		.addTransition("Created", "Cancelled", "Cancel")
		.addTransition("PaymentPending", "Cancelled", "Cancel")
		.buildStateful();

	await order.trigger("SubmitPayment");

	// default context has no amount
	await assert.rejects(order.trigger("ConfirmPayment"), GuardRejectedError);
	await assert.rejects(
		order.trigger("ConfirmPayment", { amount: 50 }),
		GuardRejectedError
	);
	assert.equal(order.state, "PaymentPending");
	assert.equal(await order.canTrigger("ConfirmPayment", { amount: 100 }), true);

	await order.trigger("ConfirmPayment", { amount: 150 });
	await order.trigger("Ship");
	await order.trigger("Deliver");

	assert.equal(order.state, "Delivered");
	assert.deepEqual(order.availableEvents(), []);
	assert.deepEqual(audit, ["PaymentPending -> Paid (150)"]);

	const result = await order.tryTrigger("Cancel");
	assert.equal(result.ok, false);
	assert.equal(result.state, "Delivered");
});

test("music player driven statelessly", async () => {
	type State = "Stopped" | "Playing" | "Paused";
	type Event = "Play" | "Pause" | "Stop" | "Next" | "Previous";
	let track = 0;

	const player = createMachineBuilder<State, Event>()
		.addStates("Stopped", "Playing", "Paused")
		.addTransition("Stopped", "Playing", "Play")
		.addTransition("Playing", "Paused", "Pause")
		.addTransition("Paused", "Playing", "Play")
		.addTransition("Playing", "Stopped", "Stop")
		.addTransition("Paused", "Stopped", "Stop")
		.addTransition("Playing", "Playing", "Next", {
			after: () => {
				track++;
			},
		})
		.addTransition("Playing", "Playing", "Previous", {
			guard: () => track > 0,
			after: () => {
				track--;
			},
		})
		.build();

	let state: State = "Stopped";
	for (const event of ["Play", "Next", "Next", "Previous", "Pause"] as const) {
		state = await player.trigger(state, event);
	}

	assert.equal(state, "Paused");
	assert.equal(track, 1);
	await assert.rejects(player.trigger(state, "Next"), NoTransitionError);

	assert.equal(await player.trigger("Playing", "Previous"), "Playing");
	assert.equal(track, 0);
	await assert.rejects(player.trigger("Playing", "Previous"), GuardRejectedError);

	assert.equal(
		player.toMermaid("Stopped"),
		`stateDiagram-v2
    Paused
    Playing
    Stopped : [*] Stopped
    Paused --> Playing : Play
    Paused --> Stopped : Stop
    Playing --> Paused : Pause
    Playing --> Playing : Next
    Playing --> Playing : Previous
    Playing --> Stopped : Stop
    Stopped --> Playing : Play
`
	);
});
