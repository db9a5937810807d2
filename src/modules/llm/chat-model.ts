import { getOpenAIClient } from "../../clients/openai.js";
import { logDebug } from "../../observability/logger.js";
import { recordModelLatency, recordModelUsage } from "../../observability/metrics.js";
import type { ChatMessage, ChatModel, StructuredChatModel, StructuredOutputSpec } from "./types.js";

export class StructuredOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructuredOutputError";
  }
}

export interface ChatModelDependencies {
  now?: () => number;
  getOpenAIClient?: typeof getOpenAIClient;
  recordModelLatency?: typeof recordModelLatency;
  recordModelUsage?: typeof recordModelUsage;
}

export interface OpenAIChatModelOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

interface CompletionUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

const resolveDependencies = (dependencies?: ChatModelDependencies) => ({
  now: dependencies?.now ?? Date.now,
  getOpenAIClient: dependencies?.getOpenAIClient ?? getOpenAIClient,
  recordModelLatency: dependencies?.recordModelLatency ?? recordModelLatency,
  recordModelUsage: dependencies?.recordModelUsage ?? recordModelUsage
});

const toCompletionMessages = (messages: ChatMessage[]) =>
  messages.map((message) => {
    switch (message.role) {
      case "system":
        return { role: "system" as const, content: message.content };
      case "assistant":
        return { role: "assistant" as const, content: message.content };
      default:
        return { role: "user" as const, content: message.content };
    }
  });

const stripCodeFence = (value: string): string => {
  const trimmed = value.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced?.[1] ?? trimmed;
};

export const parseStructuredContent = <T>(content: string, spec: StructuredOutputSpec<T>): T => {
  if (content.trim().length === 0) {
    throw new StructuredOutputError(`${spec.name}: model returned empty content.`);
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(stripCodeFence(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new StructuredOutputError(`${spec.name}: model returned invalid JSON: ${message}`);
  }

  const parsed = spec.schema.safeParse(parsedJson);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ");
    throw new StructuredOutputError(`${spec.name}: schema validation failed (${details}).`);
  }

  return parsed.data;
};

/**
 * Chat model backed by any OpenAI-compatible chat completions endpoint.
 * Each workflow role gets its own instance so cheap models can serve
 * classification while a stronger one handles grounded generation.
 */
export class OpenAIChatModel implements ChatModel {
  readonly model: string;

  private readonly temperature: number;

  private readonly maxTokens: number | undefined;

  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(options: OpenAIChatModelOptions, dependencies?: ChatModelDependencies) {
    this.model = options.model;
    this.temperature = options.temperature ?? 0;
    this.maxTokens = options.maxTokens;
    this.dependencies = resolveDependencies(dependencies);
  }

  async invoke(messages: ChatMessage[]): Promise<string> {
    return this.complete(messages, false);
  }

  async *stream(messages: ChatMessage[]): AsyncGenerator<string, void, void> {
    const startedAt = this.dependencies.now();
    const { client } = await this.dependencies.getOpenAIClient();
    const stream = await client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      messages: toCompletionMessages(messages),
      stream: true,
      stream_options: { include_usage: true }
    });

    for await (const chunk of stream) {
      const token = chunk.choices[0]?.delta?.content;
      if (typeof token === "string" && token.length > 0) {
        yield token;
      }
      if (chunk.usage) {
        this.recordUsage(chunk.usage);
      }
    }

    this.dependencies.recordModelLatency(this.model, this.dependencies.now() - startedAt);
  }

  withStructuredOutput<T>(spec: StructuredOutputSpec<T>): StructuredChatModel<T> {
    return {
      model: this.model,
      invoke: async (messages: ChatMessage[]): Promise<T> => {
        const content = await this.complete(
          [...messages, { role: "system", content: spec.instructions }],
          true
        );
        return parseStructuredContent(content, spec);
      }
    };
  }

  private async complete(messages: ChatMessage[], jsonMode: boolean): Promise<string> {
    const startedAt = this.dependencies.now();
    const { client } = await this.dependencies.getOpenAIClient();
    const response = await client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      messages: toCompletionMessages(messages),
      ...(jsonMode ? { response_format: { type: "json_object" as const } } : {})
    });

    const latencyMs = this.dependencies.now() - startedAt;
    this.dependencies.recordModelLatency(this.model, latencyMs);
    if (response.usage) {
      this.recordUsage(response.usage);
    }
    logDebug("llm.completion.complete", {}, { model: this.model, latency_ms: latencyMs, json_mode: jsonMode });

    return response.choices[0]?.message?.content ?? "";
  }

  private recordUsage(usage: CompletionUsage): void {
    this.dependencies.recordModelUsage({
      promptTokens: usage.prompt_tokens,
      completionTokens: usage.completion_tokens,
      totalTokens: usage.total_tokens
    });
  }
}
