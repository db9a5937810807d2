import { randomUUID } from "node:crypto";
import { getOpenAIClient } from "../../clients/openai.js";
import { config, type Config } from "../../config/index.js";
import { logInfo, type CorrelationContext } from "../../observability/logger.js";
import { recordStreamDuration } from "../../observability/metrics.js";
import { OpenAIChatModel } from "../llm/chat-model.js";
import { ChildParentRetriever } from "../rag/child-parent-retriever.js";
import { createRetrieverResources, RetrieverResourceCache, retrieverResourceCache } from "../rag/retriever-cache.js";
import { AdvisorAgents, type AdvisorNodes } from "./agents.js";
import { runGraph } from "./graph.js";
import { formatHistory } from "./history.js";
import { assembleResponseStream, TurnBookkeeping } from "./stream-assembler.js";
import type { ConversationState, StreamEvent, TurnInput, TurnSummary } from "./types.js";

export interface AdvisorTurn extends AsyncIterable<StreamEvent> {
  readonly runId: string;
  /** Meaningful once the event stream has been drained. */
  getSummary(): TurnSummary;
}

export interface AdvisorWorkflowDependencies {
  now?: () => number;
  generateRunId?: () => string;
  recordStreamDuration?: typeof recordStreamDuration;
  logInfo?: typeof logInfo;
}

const resolveDependencies = (dependencies?: AdvisorWorkflowDependencies) => ({
  now: dependencies?.now ?? Date.now,
  generateRunId: dependencies?.generateRunId ?? randomUUID,
  recordStreamDuration: dependencies?.recordStreamDuration ?? recordStreamDuration,
  logInfo: dependencies?.logInfo ?? logInfo
});

/**
 * Entry point of a conversation turn. Each call to `runTurn` owns its state;
 * nothing is shared between turns except the injected nodes.
 */
export class AdvisorWorkflow {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(
    private readonly nodes: AdvisorNodes,
    dependencies?: AdvisorWorkflowDependencies
  ) {
    this.dependencies = resolveDependencies(dependencies);
  }

  runTurn(input: TurnInput): AdvisorTurn {
    const runId = this.dependencies.generateRunId();
    const excludedIds = [...(input.excludedIds ?? [])];
    const bookkeeping = new TurnBookkeeping(excludedIds);
    const context: CorrelationContext = {
      runId,
      conversationId: input.conversationId ?? null,
      username: input.username ?? null
    };
    const initialState: ConversationState = {
      query: input.userMessage,
      messages: formatHistory(input.history ?? []),
      excluded_ids: excludedIds
    };

    const stream = this.stream(initialState, bookkeeping, context);
    return {
      runId,
      [Symbol.asyncIterator]: () => stream,
      getSummary: () => bookkeeping.toSummary(runId)
    };
  }

  private async *stream(
    initialState: ConversationState,
    bookkeeping: TurnBookkeeping,
    context: CorrelationContext
  ): AsyncGenerator<StreamEvent, void, void> {
    const startedAt = this.dependencies.now();
    this.dependencies.logInfo("advisor.turn.start", context, {
      excluded_count: initialState.excluded_ids.length,
      history_chars: initialState.messages.length
    });

    yield* assembleResponseStream(runGraph(initialState, this.nodes, context), {
      runId: context.runId ?? null,
      bookkeeping,
      log: context
    });

    const durationMs = this.dependencies.now() - startedAt;
    this.dependencies.recordStreamDuration(durationMs);
    const summary = bookkeeping.toSummary(context.runId ?? null);
    this.dependencies.logInfo("advisor.turn.complete", context, {
      duration_ms: durationMs,
      completed: summary.completed,
      response_type: summary.response_type,
      excluded_count: summary.excluded_ids.length
    });
  }
}

/** Wires the production models, retriever and prompts from configuration. */
export function createAdvisorWorkflow(settings: Config = config): AdvisorWorkflow {
  const model = (name: string, temperature = 0) =>
    new OpenAIChatModel({ model: name, temperature }, { getOpenAIClient: () => getOpenAIClient(settings) });
  const resourceCache =
    settings === config
      ? retrieverResourceCache
      : new RetrieverResourceCache(() => createRetrieverResources(settings));
  const agents = new AdvisorAgents({
    models: {
      rewrite: model(settings.OPENAI_REWRITE_MODEL),
      classifier: model(settings.OPENAI_CLASSIFIER_MODEL),
      extraction: model(settings.OPENAI_EXTRACTION_MODEL),
      intent: model(settings.OPENAI_INTENT_MODEL),
      general: model(settings.OPENAI_GENERAL_MODEL, 0.3),
      rules: model(settings.OPENAI_RULES_MODEL),
      followUp: model(settings.OPENAI_FOLLOW_UP_MODEL, 0.3),
      advisor: model(settings.OPENAI_ADVISOR_MODEL, 0.2)
    },
    retriever: new ChildParentRetriever(resourceCache),
    retrievalTopK: settings.RETRIEVAL_TOP_K,
    searchParamOptions: {
      kHeadroom: settings.SEARCH_K_HEADROOM,
      priceLowerTolerance: settings.PRICE_LOWER_TOLERANCE,
      priceUpperTolerance: settings.PRICE_UPPER_TOLERANCE
    }
  });
  return new AdvisorWorkflow(agents.nodes());
}
