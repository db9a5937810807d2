import type { HistoryMessage } from "./types.js";

/**
 * Renders stored turns for the prompts. Assistant turns are represented by
 * their summary so long program listings do not crowd the context.
 */
export const formatHistory = (messages: readonly HistoryMessage[]): string =>
  messages
    .map((message) => {
      if (message.role === "user") {
        return `\nuser: ${message.content}\n`;
      }
      if (message.role === "assistant") {
        const summary = message.summary?.trim();
        return `\nassistant summary: ${summary && summary.length > 0 ? summary : message.content}\n`;
      }
      return "";
    })
    .join("");
