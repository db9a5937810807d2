import type { z } from "zod";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface StructuredOutputSpec<T> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Appended as a system message; must describe the JSON object the model returns. */
  instructions: string;
}

export interface StructuredChatModel<T> {
  readonly model: string;
  invoke(messages: ChatMessage[]): Promise<T>;
}

export interface ChatModel {
  readonly model: string;
  invoke(messages: ChatMessage[]): Promise<string>;
  stream(messages: ChatMessage[]): AsyncIterable<string>;
  withStructuredOutput<T>(spec: StructuredOutputSpec<T>): StructuredChatModel<T>;
}
