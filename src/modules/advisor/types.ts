import type { PriceCampusInfo } from "../rag/types.js";

export type QuestionCategory = "program_selection" | "rules" | "follow_up" | "general";
export type RetrieverIntent = "NEW" | "REPEAT";
export type ResponseType = "text" | "programs";

export interface ConversationState {
  query: string;
  /** Prior turns rendered as text, see `formatHistory`. */
  messages: string;
  excluded_ids: string[];
  rewritten_query?: string;
  question_category?: QuestionCategory;
  program_type?: string[];
  price_campus_info?: PriceCampusInfo;
  entry_level?: string[];
  retriever_intent?: RetrieverIntent;
  content?: string[];
  response?: string;
  /** Program ids cited by grounded generation in this turn. */
  new_excluded_ids?: string[];
}

export type StateUpdate = Partial<Omit<ConversationState, "query" | "messages" | "excluded_ids">>;

export type StepNodeName = "rewrite_query" | "classify" | "extract_constraints" | "retrieve";
export type GenerationNodeName = "generate_grounded" | "generate_rules" | "generate_followup" | "generate_general";
export type NodeName = StepNodeName | GenerationNodeName;

export const END = "__end__";
export type Transition = NodeName | typeof END;

export type GraphEvent =
  | { type: "node_start"; node: NodeName }
  | { type: "token"; node: NodeName; token: string }
  | { type: "node_end"; node: NodeName; update: StateUpdate };

export interface StreamMetadata {
  response_type?: ResponseType;
  run_id?: string | null;
  rewritten_query?: string | null;
}

export type StreamEvent =
  | { type: "text_delta"; text: string }
  | { type: "metadata"; metadata: StreamMetadata }
  | { type: "school_logo"; url: string }
  | { type: "program_link"; url: string }
  | { type: "error"; error: string; message: string; run_id: string | null }
  | { type: "done" };

export interface HistoryMessage {
  role: "user" | "assistant" | "system";
  content: string;
  summary?: string | null;
}

export interface TurnInput {
  userMessage: string;
  excludedIds?: readonly string[];
  history?: readonly HistoryMessage[];
  username?: string | null;
  conversationId?: string | null;
}

export interface TurnSummary {
  completed: boolean;
  run_id: string | null;
  rewritten_query: string | null;
  excluded_ids: string[];
  response_type: ResponseType;
}
