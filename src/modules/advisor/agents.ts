import { ConfigurationError } from "../../config/index.js";
import { errorMessage, logDebug, logWarn, type CorrelationContext } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { promptRegistry, type PromptName, type PromptRegistry, type PromptVariables } from "../../prompts/index.js";
import type { ChatMessage, ChatModel, StructuredOutputSpec } from "../llm/types.js";
import { formatContent, MISSING_PROGRAM_ID } from "../rag/program-formatter.js";
import {
  buildSearchParams,
  DEFAULT_SEARCH_PARAM_OPTIONS,
  PROGRAM_TYPE_CATALOG,
  type SearchParamOptions
} from "../rag/search-params.js";
import type { ProgramRetriever } from "../rag/types.js";
import {
  classificationSpec,
  entryLevelSpec,
  priceCampusSpec,
  programExtractionSpec,
  retrieverIntentSpec
} from "./schemas.js";
import type { ConversationState, GenerationNodeName, StateUpdate, StepNodeName } from "./types.js";

export const GENERATION_FALLBACK_MESSAGE =
  "I apologize, but I'm experiencing technical difficulties. Please try rephrasing your question or contact support if the issue persists.";

const DEFAULT_RETRIEVAL_TOP_K = 14;

const PROGRAM_ID_PATTERN = /Program Id:\s*([\w-]+(?:\/[\w-]+)*)/gi;

export type StepNode = (state: ConversationState, context: CorrelationContext) => Promise<StateUpdate | null>;
export type GenerationNode = (
  state: ConversationState,
  context: CorrelationContext
) => AsyncGenerator<string, StateUpdate, void>;

export interface AdvisorNodes {
  steps: Record<StepNodeName, StepNode>;
  generators: Record<GenerationNodeName, GenerationNode>;
}

/** One model per role; roles may share an instance. */
export interface AdvisorModels {
  rewrite: ChatModel;
  classifier: ChatModel;
  extraction: ChatModel;
  intent: ChatModel;
  general: ChatModel;
  rules: ChatModel;
  followUp: ChatModel;
  advisor: ChatModel;
}

export interface AdvisorAgentDependencies {
  models: AdvisorModels;
  retriever: ProgramRetriever;
  prompts?: Pick<PromptRegistry, "getPrompt">;
  retrievalTopK?: number;
  searchParamOptions?: SearchParamOptions;
  logWarn?: typeof logWarn;
  logDebug?: typeof logDebug;
  recordErrorRate?: typeof recordErrorRate;
}

const resolveDependencies = (dependencies: AdvisorAgentDependencies) => ({
  models: dependencies.models,
  retriever: dependencies.retriever,
  prompts: dependencies.prompts ?? promptRegistry,
  retrievalTopK: dependencies.retrievalTopK ?? DEFAULT_RETRIEVAL_TOP_K,
  searchParamOptions: dependencies.searchParamOptions ?? DEFAULT_SEARCH_PARAM_OPTIONS,
  logWarn: dependencies.logWarn ?? logWarn,
  logDebug: dependencies.logDebug ?? logDebug,
  recordErrorRate: dependencies.recordErrorRate ?? recordErrorRate
});

/** The query the downstream stages work on; the raw input when rewriting failed. */
export const effectiveQuery = (state: ConversationState): string => state.rewritten_query ?? state.query;

export const extractProgramIds = (response: string): string[] => {
  const ids = new Set<string>();
  for (const match of response.matchAll(PROGRAM_ID_PATTERN)) {
    if (match[1].toUpperCase() !== MISSING_PROGRAM_ID) {
      ids.add(match[1]);
    }
  }
  return [...ids];
};

/**
 * Node implementations of the advisor graph. Step nodes return a partial state
 * update; generation nodes stream tokens and return their update when done.
 * Model failures never escape a node: classification falls back to `general`,
 * extraction drops the failing field and generation yields a fixed apology.
 * A `ConfigurationError` is not a model failure and aborts the turn.
 */
export class AdvisorAgents {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(dependencies: AdvisorAgentDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  nodes(): AdvisorNodes {
    return {
      steps: {
        rewrite_query: (state, context) => this.rewriteQuery(state, context),
        classify: (state, context) => this.classifyQuestion(state, context),
        extract_constraints: (state, context) => this.extractConstraints(state, context),
        retrieve: (state, context) => this.retrievePrograms(state, context)
      },
      generators: {
        generate_grounded: (state, context) => this.generateGrounded(state, context),
        generate_rules: (state, context) => this.generateRules(state, context),
        generate_followup: (state, context) => this.generateFollowUp(state, context),
        generate_general: (state, context) => this.generateGeneral(state, context)
      }
    };
  }

  async rewriteQuery(state: ConversationState, context: CorrelationContext): Promise<StateUpdate | null> {
    try {
      const messages = this.dependencies.prompts
        .getPrompt("rewrite-query")
        .formatMessages({ user_input: state.query, chat_history: state.messages });
      const rewritten = (await this.dependencies.models.rewrite.invoke(messages)).trim();
      if (rewritten.length === 0) {
        this.dependencies.logWarn("advisor.rewrite.empty", context);
        return null;
      }
      this.dependencies.logDebug("advisor.rewrite.complete", context, { rewritten_query: rewritten });
      return { rewritten_query: rewritten };
    } catch (error) {
      this.degraded("rewrite_query", context, error);
      return null;
    }
  }

  async classifyQuestion(state: ConversationState, context: CorrelationContext): Promise<StateUpdate> {
    try {
      const messages = this.dependencies.prompts
        .getPrompt("query-classifier")
        .formatMessages({ rewritten_query: effectiveQuery(state), chat_history: state.messages });
      const { question_category: category } = await this.dependencies.models.classifier
        .withStructuredOutput(classificationSpec)
        .invoke(messages);
      this.dependencies.logDebug("advisor.classify.complete", context, { question_category: category });
      return { question_category: category };
    } catch (error) {
      this.degraded("classify", context, error);
      return { question_category: "general" };
    }
  }

  async extractConstraints(state: ConversationState, context: CorrelationContext): Promise<StateUpdate> {
    const { prompts, models } = this.dependencies;
    const userInput = effectiveQuery(state);
    const extract = async <T>(
      model: ChatModel,
      spec: StructuredOutputSpec<T>,
      prompt: PromptName,
      variables: PromptVariables
    ): Promise<T> => model.withStructuredOutput(spec).invoke(prompts.getPrompt(prompt).formatMessages(variables));

    const [programs, priceCampus, intent, entryLevel] = await Promise.allSettled([
      extract(models.extraction, programExtractionSpec, "program-extraction", { user_input: userInput }),
      extract(models.extraction, priceCampusSpec, "price-campus-extraction", { user_input: userInput }),
      extract(models.intent, retrieverIntentSpec, "retriever-selection", {
        user_input: userInput,
        chat_history: state.messages
      }),
      extract(models.extraction, entryLevelSpec, "entry-level-extraction", { user_input: userInput })
    ]);

    const update: StateUpdate = {};

    if (programs.status === "fulfilled") {
      update.program_type =
        programs.value.program_type.length > 0 ? programs.value.program_type : [...PROGRAM_TYPE_CATALOG];
    } else {
      this.degraded("extract_constraints.program_type", context, programs.reason);
    }

    if (priceCampus.status === "fulfilled") {
      update.price_campus_info = priceCampus.value;
    } else {
      this.degraded("extract_constraints.price_campus_info", context, priceCampus.reason);
    }

    if (intent.status === "fulfilled") {
      update.retriever_intent = intent.value.retriever_intent;
    } else {
      this.degraded("extract_constraints.retriever_intent", context, intent.reason);
    }

    if (entryLevel.status === "fulfilled") {
      update.entry_level = entryLevel.value.entry_level;
    } else {
      this.degraded("extract_constraints.entry_level", context, entryLevel.reason);
    }

    this.dependencies.logDebug("advisor.extract.complete", context, { extracted: Object.keys(update) });
    return update;
  }

  async retrievePrograms(state: ConversationState, context: CorrelationContext): Promise<StateUpdate> {
    const searchParams = buildSearchParams(
      {
        k: this.dependencies.retrievalTopK,
        programTypes: state.program_type ?? [],
        excludeIds: state.excluded_ids,
        exclude: (state.retriever_intent ?? "NEW") === "NEW",
        priceCampusInfo: state.price_campus_info,
        entryLevel: state.entry_level
      },
      this.dependencies.searchParamOptions
    );

    try {
      const result = await this.dependencies.retriever.multipleInvoke({
        rewritten_query: effectiveQuery(state),
        search_params: searchParams
      });
      this.dependencies.logDebug("advisor.retrieve.complete", context, {
        program_count: result.content.length,
        ids: result.ids
      });
      return { content: result.content };
    } catch (error) {
      this.degraded("retrieve", context, error);
      return { content: [] };
    }
  }

  async *generateGrounded(
    state: ConversationState,
    context: CorrelationContext
  ): AsyncGenerator<string, StateUpdate, void> {
    const response = yield* this.generate("generate_grounded", this.dependencies.models.advisor, context, () =>
      this.dependencies.prompts.getPrompt("program-advisor").formatMessages({
        user_input: effectiveQuery(state),
        chat_history: state.messages,
        content: formatContent(state.content ?? [])
      })
    );
    return { response, new_excluded_ids: extractProgramIds(response) };
  }

  async *generateRules(state: ConversationState, context: CorrelationContext): AsyncGenerator<string, StateUpdate, void> {
    const response = yield* this.generate("generate_rules", this.dependencies.models.rules, context, () =>
      this.dependencies.prompts.getPrompt("rules-agent").formatMessages({ user_input: effectiveQuery(state) })
    );
    return { response };
  }

  async *generateFollowUp(
    state: ConversationState,
    context: CorrelationContext
  ): AsyncGenerator<string, StateUpdate, void> {
    const response = yield* this.generate("generate_followup", this.dependencies.models.followUp, context, () =>
      this.dependencies.prompts
        .getPrompt("follow-up-questions")
        .formatMessages({ user_input: effectiveQuery(state), chat_history: state.messages })
    );
    return { response };
  }

  async *generateGeneral(
    state: ConversationState,
    context: CorrelationContext
  ): AsyncGenerator<string, StateUpdate, void> {
    const response = yield* this.generate("generate_general", this.dependencies.models.general, context, () =>
      this.dependencies.prompts
        .getPrompt("general-question")
        .formatMessages({ user_input: effectiveQuery(state), chat_history: state.messages })
    );
    return { response };
  }

  private async *generate(
    node: GenerationNodeName,
    model: ChatModel,
    context: CorrelationContext,
    buildMessages: () => ChatMessage[]
  ): AsyncGenerator<string, string, void> {
    let response = "";
    try {
      for await (const token of model.stream(buildMessages())) {
        response += token;
        yield token;
      }
      if (response.trim().length === 0) {
        throw new Error(`${model.model} returned an empty response`);
      }
      return response.trim();
    } catch (error) {
      this.degraded(node, context, error);
      const fallback = response.length > 0 ? `\n\n${GENERATION_FALLBACK_MESSAGE}` : GENERATION_FALLBACK_MESSAGE;
      response += fallback;
      yield fallback;
      return response.trim();
    }
  }

  private degraded(stage: string, context: CorrelationContext, error: unknown): void {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    this.dependencies.recordErrorRate(`advisor.${stage}`);
    this.dependencies.logWarn("advisor.stage.degraded", context, { stage, error: errorMessage(error) });
  }
}
