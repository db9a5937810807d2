import { errorMessage, logError, logInfo, logWarn, type CorrelationContext } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import type { StreamEvent, TurnSummary } from "../advisor/types.js";
import type { AdvisorWorkflow } from "../advisor/workflow.js";
import { SAFE_STREAM_ERROR_MESSAGE, STREAM_INTERRUPTED } from "../advisor/stream-assembler.js";
import type { ConversationStore } from "./conversation-store.js";
import { buildFallbackSummary, summarizeResponse } from "./response-summary.js";

export const DONE_FRAME = "data: [DONE]\n\n";

export interface StreamChatInput {
  conversationId: string;
  userMessage: string;
  username?: string | null;
}

export interface ChatServiceDependencies {
  store: ConversationStore;
  workflow: Pick<AdvisorWorkflow, "runTurn">;
  summarize?: (response: string, context: CorrelationContext) => Promise<string>;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  logError?: typeof logError;
  recordErrorRate?: typeof recordErrorRate;
}

const resolveDependencies = (dependencies: ChatServiceDependencies) => ({
  store: dependencies.store,
  workflow: dependencies.workflow,
  summarize: dependencies.summarize ?? ((response: string, context: CorrelationContext) => summarizeResponse(response, context)),
  logInfo: dependencies.logInfo ?? logInfo,
  logWarn: dependencies.logWarn ?? logWarn,
  logError: dependencies.logError ?? logError,
  recordErrorRate: dependencies.recordErrorRate ?? recordErrorRate
});

export const formatSseFrame = (event: string, data: string): string =>
  `event: ${event}\n${data
    .split(/\r?\n/)
    .map((line) => `data: ${line}\n`)
    .join("")}\n`;

export const toSseFrame = (event: Exclude<StreamEvent, { type: "done" }>): string => {
  const { type, ...payload } = event;
  return formatSseFrame(type, JSON.stringify(payload));
};

/**
 * Text an event contributes to the stored assistant message. Logo and link
 * events are kept as JSON lines so a reloaded conversation still carries them.
 */
export const toStoredText = (event: StreamEvent): string => {
  switch (event.type) {
    case "text_delta":
      return event.text;
    case "school_logo":
      return `${JSON.stringify({ type: "school_logo", school_logo: event.url })}\n`;
    case "program_link":
      return `${JSON.stringify({ type: "program_link", program_link: event.url })}\n`;
    default:
      return "";
  }
};

/**
 * Drives one advisor turn for a stored conversation and frames it as
 * Server-Sent Events. Once the stream is drained the turn is persisted:
 * exclusion list first, then the user message, then the assistant message
 * with its summary. Persistence problems are logged and never reach the
 * client. The stream always ends with a `[DONE]` frame.
 */
export class ChatService {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(dependencies: ChatServiceDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async *streamChat(input: StreamChatInput): AsyncGenerator<string, void, void> {
    const { store, workflow } = this.dependencies;
    let context: CorrelationContext = { conversationId: input.conversationId, username: input.username ?? null };

    try {
      const [conversation, history] = await Promise.all([
        store.getConversation(input.conversationId),
        store.getConversationMessages(input.conversationId)
      ]);

      const turn = workflow.runTurn({
        userMessage: input.userMessage,
        excludedIds: conversation?.excludedIds ?? [],
        history,
        username: input.username ?? null,
        conversationId: input.conversationId
      });
      context = { ...context, runId: turn.runId };

      let response = "";
      for await (const event of turn) {
        if (event.type === "done") {
          continue;
        }
        response += toStoredText(event);
        yield toSseFrame(event);
      }

      const summary = turn.getSummary();
      if (summary.completed) {
        await this.persistTurn(input, summary, response, context);
      }
    } catch (error) {
      this.dependencies.recordErrorRate("chat.stream");
      this.dependencies.logError("chat.stream.failed", context, { error: errorMessage(error) });
      yield formatSseFrame(
        "error",
        JSON.stringify({ error: STREAM_INTERRUPTED, message: SAFE_STREAM_ERROR_MESSAGE, run_id: context.runId ?? null })
      );
    }

    yield DONE_FRAME;
  }

  private async persistTurn(
    input: StreamChatInput,
    summary: TurnSummary,
    response: string,
    context: CorrelationContext
  ): Promise<void> {
    const { store } = this.dependencies;

    await this.persist("excluded_ids", context, () =>
      store.updateExcludedIds(input.conversationId, summary.excluded_ids)
    );
    await this.persist("user_message", context, () =>
      store.saveMessage({
        conversationId: input.conversationId,
        role: "user",
        content: input.userMessage,
        summary: null,
        rewrittenQuery: summary.rewritten_query
      })
    );

    if (response.trim().length === 0) {
      return;
    }

    let responseSummary: string;
    try {
      responseSummary = await this.dependencies.summarize(response, context);
    } catch (error) {
      this.dependencies.logWarn("chat.summary.failed", context, { error: errorMessage(error) });
      responseSummary = buildFallbackSummary(response);
    }
    await this.persist("assistant_message", context, () =>
      store.saveMessage({
        conversationId: input.conversationId,
        role: "assistant",
        content: response,
        summary: responseSummary,
        rewrittenQuery: null
      })
    );

    this.dependencies.logInfo("chat.turn.persisted", context, {
      response_type: summary.response_type,
      excluded_count: summary.excluded_ids.length
    });
  }

  private async persist(step: string, context: CorrelationContext, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      this.dependencies.recordErrorRate(`chat.persist.${step}`);
      this.dependencies.logWarn("chat.persist.failed", context, { step, error: errorMessage(error) });
    }
  }
}
