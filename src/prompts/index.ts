import { logInfo, logWarn } from "../observability/logger.js";
import type { ChatMessage } from "../modules/llm/types.js";
import { PROMPT_NAMES, PROMPT_TEMPLATES, type PromptMessageTemplate, type PromptName } from "./templates.js";

export { PROGRAM_SECTION_MARKER, PROMPT_NAMES, type PromptName } from "./templates.js";

const VARIABLE_PATTERN = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g;

export class PromptNotFoundError extends Error {
  constructor(name: string) {
    super(`Prompt not found: ${name}`);
    this.name = "PromptNotFoundError";
  }
}

export class PromptVariableError extends Error {
  constructor(promptName: string, variable: string) {
    super(`Prompt ${promptName} is missing variable: ${variable}`);
    this.name = "PromptVariableError";
  }
}

export type PromptVariables = Record<string, string | number>;

export class PromptTemplate {
  readonly inputVariables: string[];

  constructor(
    readonly name: string,
    private readonly messages: PromptMessageTemplate[]
  ) {
    const variables = new Set<string>();
    for (const message of messages) {
      for (const match of message.template.matchAll(VARIABLE_PATTERN)) {
        variables.add(match[1]);
      }
    }
    this.inputVariables = [...variables];
  }

  formatMessages(variables: PromptVariables): ChatMessage[] {
    for (const variable of this.inputVariables) {
      if (!(variable in variables)) {
        throw new PromptVariableError(this.name, variable);
      }
    }

    return this.messages.map((message) => ({
      role: message.role,
      content: message.template.replace(VARIABLE_PATTERN, (_match, variable: string) =>
        String(variables[variable])
      )
    }));
  }
}

export type PromptSource = (name: string) => PromptMessageTemplate[] | undefined;

const PROMPT_NAME_SET: ReadonlySet<string> = new Set(PROMPT_NAMES);

const isPromptName = (name: string): name is PromptName => PROMPT_NAME_SET.has(name);

const builtInSource: PromptSource = (name) => (isPromptName(name) ? PROMPT_TEMPLATES[name] : undefined);

/**
 * Compiles prompt templates on first use and keeps them for the process lifetime.
 */
export class PromptRegistry {
  private readonly cache = new Map<string, PromptTemplate>();

  constructor(private readonly source: PromptSource = builtInSource) {}

  preload(names: readonly string[] = PROMPT_NAMES): { loaded: number; failed: string[] } {
    const failed: string[] = [];
    for (const name of names) {
      try {
        this.getPrompt(name);
      } catch (error) {
        failed.push(name);
        logWarn("prompts.preload.failed", {}, { prompt: name, error: error instanceof Error ? error.message : String(error) });
      }
    }
    logInfo("prompts.preload.complete", {}, { loaded: names.length - failed.length, total: names.length });
    return { loaded: names.length - failed.length, failed };
  }

  getPrompt(name: string): PromptTemplate {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const messages = this.source(name);
    if (!messages) {
      throw new PromptNotFoundError(name);
    }

    const template = new PromptTemplate(name, messages);
    this.cache.set(name, template);
    return template;
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): { cachedPrompts: number; promptNames: string[] } {
    return { cachedPrompts: this.cache.size, promptNames: [...this.cache.keys()] };
  }
}

export const promptRegistry = new PromptRegistry();

export const getPrompt = (name: string): PromptTemplate => promptRegistry.getPrompt(name);
