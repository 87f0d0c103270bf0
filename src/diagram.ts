/**
 * Supported diagram notations.
 * - `mermaid`: Mermaid `stateDiagram-v2`
 * - `dot`: Graphviz directed graph
 */
export type DiagramFormat = "mermaid" | "dot";

/** A single labelled edge. */
export type DiagramEdge = {
	from: string;
	to: string;
	event: string;
};

/**
 * Read-only, label-only view of a transition table.
 * Engines produce one via `TransitionTable.graph()`.
 */
export type DiagramGraph = {
	states: readonly string[];
	transitions: readonly DiagramEdge[];
	/** State to highlight, `null` for none */
	current: string | null;
};

/**
 * Anything that can produce a `DiagramGraph`. Both machines implement it:
 * `Machine` without a highlighted state, `StatefulMachine` with its current one.
 */
export interface DiagramSource {
	graph(): DiagramGraph;
}

/** Input accepted by the renderers: a graph, or a source to take one from. */
export type DiagramInput = DiagramGraph | DiagramSource;

function resolve(input: DiagramInput): DiagramGraph {
	return "graph" in input ? input.graph() : input;
}

// plain code unit comparison, independent of locale
const compare = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

function sortedStates(graph: DiagramGraph): string[] {
	return [...new Set(graph.states)].sort(compare);
}

function sortedTransitions(graph: DiagramGraph): DiagramEdge[] {
	return [...graph.transitions].sort(
		(a, b) =>
			compare(a.from, b.from) || compare(a.to, b.to) || compare(a.event, b.event)
	);
}

/**
 * Renders the graph as a Mermaid stateDiagram-v2.
 *
 * States are listed in sorted order, the current one as `STATE : [*] STATE`,
 * followed by transitions sorted by `(from, to, event)`. The output is
 * deterministic, so it can be diffed against stored text.
 *
 * @example
 * ```typescript
 * toMermaid(machine.graph("Closed"));
 * toMermaid(statefulMachine); // highlights its current state
 * // stateDiagram-v2
 * //     Closed : [*] Closed
 * //     Open
 * //     Closed --> Open : OpenDoor
 * //     Open --> Closed : CloseDoor
 * ```
 */
export function toMermaid(input: DiagramInput): string {
	const graph = resolve(input);
	let mermaid = "stateDiagram-v2\n";

	for (const state of sortedStates(graph)) {
		if (state === graph.current) {
			mermaid += `    ${state} : [*] ${state}\n`;
		} else {
			mermaid += `    ${state}\n`;
		}
	}

	for (const { from, to, event } of sortedTransitions(graph)) {
		mermaid += `    ${from} --> ${to} : ${event}\n`;
	}

	return mermaid;
}

/**
 * Renders the graph in Graphviz DOT notation. The current state is drawn as a
 * filled double circle. Same ordering rules as `toMermaid`.
 */
export function toDot(input: DiagramInput): string {
	const graph = resolve(input);
	let dot = "digraph StateMachine {\n";

	for (const state of sortedStates(graph)) {
		if (state === graph.current) {
			// prettier-ignore
			dot += `    "${quote(state)}" [shape=doublecircle, style=filled, fillcolor=lightblue];\n`;
		} else {
			dot += `    "${quote(state)}" [shape=circle];\n`;
		}
	}

	for (const { from, to, event } of sortedTransitions(graph)) {
		dot += `    "${quote(from)}" -> "${quote(to)}" [label="${quote(event)}"];\n`;
	}

	dot += "}";

	return dot;
}

/**
 * Renders the graph in the given notation. Takes any string so that formats
 * coming from configuration or user input can be passed through unchecked.
 * @throws Error if the format is not one of `DiagramFormat`
 */
export function generateDiagram(input: DiagramInput, format: string): string {
	switch (format) {
		case "mermaid":
			return toMermaid(input);
		case "dot":
			return toDot(input);
		default:
			throw new Error("unsupported diagram format");
	}
}

// backslashes before quotes
function quote(label: string): string {
	return label.replaceAll("\\", "\\\\").replaceAll('"', '\\"');
}
