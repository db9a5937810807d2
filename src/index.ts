export { config, ConfigurationError, type Config } from "./config/index.js";
export { getOpenAIClient } from "./clients/openai.js";
export { getQdrantClient } from "./clients/qdrant.js";
export { getMetricsSnapshot, resetMetrics } from "./observability/metrics.js";
export {
  getPrompt,
  PromptNotFoundError,
  PromptRegistry,
  PromptTemplate,
  PromptVariableError,
  promptRegistry,
  PROGRAM_SECTION_MARKER
} from "./prompts/index.js";
export { OpenAIChatModel, StructuredOutputError } from "./modules/llm/chat-model.js";
export type { ChatMessage, ChatModel, StructuredOutputSpec } from "./modules/llm/types.js";
export { buildFilters, buildSearchParams, PROGRAM_TYPE_CATALOG } from "./modules/rag/search-params.js";
export { ChildParentRetriever } from "./modules/rag/child-parent-retriever.js";
export { RetrieverHealthError } from "./modules/rag/errors.js";
export { formatContent, formatProgramForContext } from "./modules/rag/program-formatter.js";
export {
  createRetrieverResources,
  RetrieverResourceCache,
  retrieverResourceCache
} from "./modules/rag/retriever-cache.js";
export type {
  FilterExpr,
  MultipleInvokeResult,
  ProgramRetriever,
  RetrieverConfig,
  SearchParams
} from "./modules/rag/types.js";
export { AdvisorAgents, type AdvisorModels, type AdvisorNodes } from "./modules/advisor/agents.js";
export { nextNode, runGraph } from "./modules/advisor/graph.js";
export { assembleResponseStream, ProgramSectionSplitter } from "./modules/advisor/stream-assembler.js";
export { AdvisorWorkflow, createAdvisorWorkflow, type AdvisorTurn } from "./modules/advisor/workflow.js";
export type { StreamEvent, TurnInput, TurnSummary } from "./modules/advisor/types.js";
export { ChatService, type StreamChatInput } from "./modules/chat/chat-service.js";
export type { ConversationStore } from "./modules/chat/conversation-store.js";
export { summarizeResponse } from "./modules/chat/response-summary.js";
