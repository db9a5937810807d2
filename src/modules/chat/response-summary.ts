import { config } from "../../config/index.js";
import { errorMessage, logWarn, type CorrelationContext } from "../../observability/logger.js";
import { promptRegistry, type PromptRegistry } from "../../prompts/index.js";
import { OpenAIChatModel } from "../llm/chat-model.js";
import type { ChatModel } from "../llm/types.js";

const FALLBACK_SUMMARY_CHARS = 200;

export interface ResponseSummaryDependencies {
  model?: ChatModel;
  prompts?: Pick<PromptRegistry, "getPrompt">;
  logWarn?: typeof logWarn;
}

export const buildFallbackSummary = (response: string): string =>
  response.length > FALLBACK_SUMMARY_CHARS ? `${response.slice(0, FALLBACK_SUMMARY_CHARS)}...` : response;

/**
 * Short summary stored next to an assistant message and used as its history
 * entry on later turns. Falls back to a truncated copy of the response.
 */
export async function summarizeResponse(
  response: string,
  context: CorrelationContext = {},
  dependencies?: ResponseSummaryDependencies
): Promise<string> {
  const resolved = {
    model: dependencies?.model ?? new OpenAIChatModel({ model: config.OPENAI_SUMMARY_MODEL }),
    prompts: dependencies?.prompts ?? promptRegistry,
    logWarn: dependencies?.logWarn ?? logWarn
  };

  try {
    const messages = resolved.prompts.getPrompt("response-summary").formatMessages({ ai_response: response });
    const summary = (await resolved.model.invoke(messages)).trim();
    return summary.length > 0 ? summary : buildFallbackSummary(response);
  } catch (error) {
    resolved.logWarn("chat.summary.llm_failed", context, { error: errorMessage(error) });
    return buildFallbackSummary(response);
  }
}
