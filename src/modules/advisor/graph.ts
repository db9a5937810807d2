import { logTrace, type CorrelationContext } from "../../observability/logger.js";
import type { AdvisorNodes } from "./agents.js";
import {
  END,
  type ConversationState,
  type GenerationNodeName,
  type GraphEvent,
  type NodeName,
  type StateUpdate,
  type Transition
} from "./types.js";

export const START_NODE: NodeName = "rewrite_query";

const GENERATION_NODES: ReadonlySet<NodeName> = new Set<GenerationNodeName>([
  "generate_grounded",
  "generate_rules",
  "generate_followup",
  "generate_general"
]);

export const isGenerationNode = (node: NodeName): node is GenerationNodeName => GENERATION_NODES.has(node);

/** Unknown or missing categories route to the general answer. */
export const routeByCategory = (category: string | undefined): GenerationNodeName | "extract_constraints" => {
  switch (category) {
    case "program_selection":
      return "extract_constraints";
    case "rules":
      return "generate_rules";
    case "follow_up":
      return "generate_followup";
    default:
      return "generate_general";
  }
};

export const nextNode = (current: NodeName, state: ConversationState): Transition => {
  switch (current) {
    case "rewrite_query":
      return "classify";
    case "classify":
      return routeByCategory(state.question_category);
    case "extract_constraints":
      return "retrieve";
    case "retrieve":
      return "generate_grounded";
    default:
      return END;
  }
};

export const applyUpdate = (state: ConversationState, update: StateUpdate | null): ConversationState =>
  update ? { ...state, ...update } : state;

/**
 * Runs one turn through the graph. Every node is bracketed by `node_start`
 * and `node_end`; generation nodes also emit one `token` event per chunk.
 * Resolves with the final state.
 */
export async function* runGraph(
  initialState: ConversationState,
  nodes: AdvisorNodes,
  context: CorrelationContext
): AsyncGenerator<GraphEvent, ConversationState, void> {
  let state = initialState;
  let current: Transition = START_NODE;

  while (current !== END) {
    const node: NodeName = current;
    yield { type: "node_start", node };
    logTrace("advisor.graph.node_start", context, { node });

    let update: StateUpdate | null = null;
    if (isGenerationNode(node)) {
      const generator = nodes.generators[node](state, context);
      while (true) {
        const step = await generator.next();
        if (step.done) {
          update = step.value;
          break;
        }
        yield { type: "token", node, token: step.value };
      }
    } else {
      update = await nodes.steps[node](state, context);
    }

    state = applyUpdate(state, update);
    yield { type: "node_end", node, update: update ?? {} };
    current = nextNode(node, state);
  }

  return state;
}
