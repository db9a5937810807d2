import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../../src/config/index.js";
import {
  AdvisorAgents,
  extractProgramIds,
  GENERATION_FALLBACK_MESSAGE,
  type AdvisorModels
} from "../../src/modules/advisor/agents.js";
import type { ConversationState } from "../../src/modules/advisor/types.js";
import { PROGRAM_TYPE_CATALOG } from "../../src/modules/rag/search-params.js";
import type { ProgramRetriever, RetrieverConfig } from "../../src/modules/rag/types.js";
import { FakeChatModel } from "../../tests/helpers/fake-chat-model.js";
import { drain } from "../../tests/helpers/streams.js";

const CONTEXT = { runId: "run-1", conversationId: "conv-1" };

const STATE: ConversationState = {
  query: "business school in lyon",
  messages: "\nuser: hi\n",
  excluded_ids: ["p1"],
  rewritten_query: "Business schools in Lyon"
};

const makeModels = (overrides: Partial<AdvisorModels> = {}): AdvisorModels => {
  const unused = new FakeChatModel("unused");
  return {
    rewrite: unused,
    classifier: unused,
    extraction: unused,
    intent: unused,
    general: unused,
    rules: unused,
    followUp: unused,
    advisor: unused,
    ...overrides
  };
};

const makeRetriever = (
  multipleInvoke: (config: RetrieverConfig) => Promise<{ content: string[]; ids: string[] }> = async () => ({
    content: [],
    ids: []
  })
) => {
  const retriever: ProgramRetriever = { multipleInvoke: vi.fn(multipleInvoke) };
  return retriever;
};

const makeAgents = (models: Partial<AdvisorModels>, retriever: ProgramRetriever = makeRetriever()) => {
  const dependencies = {
    logWarn: vi.fn(),
    logDebug: vi.fn(),
    recordErrorRate: vi.fn()
  };
  const agents = new AdvisorAgents({ models: makeModels(models), retriever, ...dependencies });
  return { agents, ...dependencies };
};

describe("modules/advisor/agents", () => {
  describe("rewriteQuery", () => {
    it("returns the trimmed rewrite", async () => {
      const rewrite = new FakeChatModel("rewrite", { invoke: "  Business schools in Lyon  " });
      const { agents } = makeAgents({ rewrite });

      await expect(agents.rewriteQuery({ ...STATE, rewritten_query: undefined }, CONTEXT)).resolves.toEqual({
        rewritten_query: "Business schools in Lyon"
      });
      expect(rewrite.calls[0]?.messages.some((message) => message.content.includes("business school in lyon"))).toBe(
        true
      );
    });

    it("keeps the raw query when the model fails or answers nothing", async () => {
      const failing = makeAgents({ rewrite: new FakeChatModel("rewrite", { invoke: new Error("rate limited") }) });
      const empty = makeAgents({ rewrite: new FakeChatModel("rewrite", { invoke: "   " }) });

      await expect(failing.agents.rewriteQuery(STATE, CONTEXT)).resolves.toBeNull();
      await expect(empty.agents.rewriteQuery(STATE, CONTEXT)).resolves.toBeNull();
      expect(failing.recordErrorRate).toHaveBeenCalledWith("advisor.rewrite_query");
      expect(empty.logWarn).toHaveBeenCalledWith("advisor.rewrite.empty", CONTEXT);
    });
  });

  describe("classifyQuestion", () => {
    it("normalizes the category", async () => {
      const classifier = new FakeChatModel("classifier", {
        structured: { "query-classifier": '{"question_category": " Program_Selection "}' }
      });
      const { agents } = makeAgents({ classifier });

      await expect(agents.classifyQuestion(STATE, CONTEXT)).resolves.toEqual({ question_category: "program_selection" });
    });

    it("falls back to general on model errors and unknown categories", async () => {
      const failing = makeAgents({ classifier: new FakeChatModel("classifier") });
      const unknown = makeAgents({
        classifier: new FakeChatModel("classifier", {
          structured: { "query-classifier": '{"question_category": "weather"}' }
        })
      });

      await expect(failing.agents.classifyQuestion(STATE, CONTEXT)).resolves.toEqual({ question_category: "general" });
      await expect(unknown.agents.classifyQuestion(STATE, CONTEXT)).resolves.toEqual({ question_category: "general" });
      expect(failing.logWarn).toHaveBeenCalledWith("advisor.stage.degraded", CONTEXT, {
        stage: "classify",
        error: "classifier: no scripted reply for query-classifier"
      });
    });
  });

  describe("extractConstraints", () => {
    it("keeps the fields that succeeded when one extraction fails", async () => {
      const extraction = new FakeChatModel("extraction", {
        structured: {
          "program-extraction": '{"program_type": ["BBA", "Underwater Basket Weaving"]}',
          "price-campus-extraction":
            '{"price": "12 000", "price_condition": ">=", "languages": ["english"], "primos_arrivant": null, "school_rank": null}',
          "entry-level-extraction": '{"entry_level": ["bac"]}'
        }
      });
      const intent = new FakeChatModel("intent", {
        structured: { "retriever-selection": new Error("intent model down") }
      });
      const { agents, recordErrorRate } = makeAgents({ extraction, intent });

      const update = await agents.extractConstraints(STATE, CONTEXT);

      expect(update).toEqual({
        program_type: ["BBA"],
        price_campus_info: {
          price: 12000,
          price_condition: "gt",
          languages: ["english"],
          primos_arrivant: null,
          school_rank: null
        },
        entry_level: ["bac"]
      });
      expect(update).not.toHaveProperty("retriever_intent");
      expect(recordErrorRate).toHaveBeenCalledTimes(1);
      expect(recordErrorRate).toHaveBeenCalledWith("advisor.extract_constraints.retriever_intent");
    });

    it("widens an empty program-type extraction to the full catalog", async () => {
      const extraction = new FakeChatModel("extraction", {
        structured: {
          "program-extraction": '{"program_type": []}',
          "price-campus-extraction": "{}",
          "entry-level-extraction": '{"entry_level": null}'
        }
      });
      const intent = new FakeChatModel("intent", { structured: { "retriever-selection": '{"retriever_intent": "repeat"}' } });
      const { agents } = makeAgents({ extraction, intent });

      const update = await agents.extractConstraints(STATE, CONTEXT);

      expect(update.program_type).toEqual([...PROGRAM_TYPE_CATALOG]);
      expect(update.retriever_intent).toBe("REPEAT");
      expect(update.entry_level).toEqual([]);
      expect(update.price_campus_info?.price_condition).toBeNull();
    });
  });

  describe("retrievePrograms", () => {
    it("searches with previously shown programs excluded on a new request", async () => {
      const retriever = makeRetriever(async () => ({ content: ["Program: A"], ids: ["p2"] }));
      const { agents } = makeAgents({}, retriever);

      const update = await agents.retrievePrograms({ ...STATE, program_type: ["MBA"], retriever_intent: "NEW" }, CONTEXT);

      expect(update).toEqual({ content: ["Program: A"] });
      expect(retriever.multipleInvoke).toHaveBeenCalledWith({
        rewritten_query: "Business schools in Lyon",
        search_params: {
          search_kwargs: {
            k: 15,
            filter: {
              op: "and",
              conditions: [
                { op: "in", field: "new_program_type", values: ["MBA"] },
                { op: "nin", field: "program_id", values: ["p1"] }
              ]
            }
          }
        }
      });
    });

    it("lets earlier programs reappear on a repeat request", async () => {
      const retriever = makeRetriever();
      const { agents } = makeAgents({}, retriever);

      await agents.retrievePrograms({ ...STATE, program_type: ["MBA"], retriever_intent: "REPEAT" }, CONTEXT);

      expect(retriever.multipleInvoke).toHaveBeenCalledWith({
        rewritten_query: "Business schools in Lyon",
        search_params: {
          search_kwargs: { k: 15, filter: { op: "in", field: "new_program_type", values: ["MBA"] } }
        }
      });
    });

    it("degrades to empty content but surfaces configuration errors", async () => {
      const failing = makeAgents(
        {},
        makeRetriever(async () => {
          throw new Error("unexpected");
        })
      );
      const misconfigured = makeAgents(
        {},
        makeRetriever(async () => {
          throw new ConfigurationError("Configuration error: QDRANT_URL is missing.");
        })
      );

      await expect(failing.agents.retrievePrograms(STATE, CONTEXT)).resolves.toEqual({ content: [] });
      await expect(misconfigured.agents.retrievePrograms(STATE, CONTEXT)).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe("generation", () => {
    it("streams the grounded answer and collects cited program ids", async () => {
      const advisor = new FakeChatModel("advisor", {
        stream: ["Two options.\n", "Program Id: p7\n", "Program Id: p8\n", "program id: p7"]
      });
      const { agents } = makeAgents({ advisor });

      const { items, result } = await drain(agents.generateGrounded({ ...STATE, content: ["Program: A"] }, CONTEXT));

      expect(items).toEqual(["Two options.\n", "Program Id: p7\n", "Program Id: p8\n", "program id: p7"]);
      expect(result).toEqual({
        response: "Two options.\nProgram Id: p7\nProgram Id: p8\nprogram id: p7",
        new_excluded_ids: ["p7", "p8"]
      });
      expect(advisor.calls[0]?.messages.some((message) => message.content.includes("Program: A"))).toBe(true);
    });

    it("appends the fallback message when the stream breaks", async () => {
      const general = new FakeChatModel("general", { stream: ["Partial", new Error("connection reset")] });
      const { agents, recordErrorRate } = makeAgents({ general });

      const { items, result } = await drain(agents.generateGeneral(STATE, CONTEXT));

      expect(items).toEqual(["Partial", `\n\n${GENERATION_FALLBACK_MESSAGE}`]);
      expect(result).toEqual({ response: `Partial\n\n${GENERATION_FALLBACK_MESSAGE}` });
      expect(recordErrorRate).toHaveBeenCalledWith("advisor.generate_general");
    });

    it("answers with the fallback message when the model returns nothing", async () => {
      const followUp = new FakeChatModel("follow-up", { stream: ["  "] });
      const { agents } = makeAgents({ followUp });

      const { items, result } = await drain(agents.generateFollowUp(STATE, CONTEXT));

      expect(items).toEqual(["  ", `\n\n${GENERATION_FALLBACK_MESSAGE}`]);
      expect(result).toEqual({ response: GENERATION_FALLBACK_MESSAGE });
    });

    it("answers rules questions from the query alone", async () => {
      const rules = new FakeChatModel("rules", { stream: ["Apply before May."] });
      const { agents } = makeAgents({ rules });

      const { result } = await drain(agents.generateRules(STATE, CONTEXT));

      expect(result).toEqual({ response: "Apply before May." });
      expect(rules.calls[0]?.messages.some((message) => message.content.includes("user: hi"))).toBe(false);
    });
  });

  describe("missing configuration", () => {
    const missingKey = () => new ConfigurationError("Configuration error: OPENAI_API_KEY is missing.");

    it("aborts instead of degrading in every model-backed stage", async () => {
      const model = new FakeChatModel("unconfigured", {
        invoke: missingKey(),
        stream: [missingKey()],
        structured: {
          "query-classifier": missingKey(),
          "program-extraction": '{"program_type": ["MBA"]}',
          "price-campus-extraction": missingKey(),
          "retriever-selection": '{"retriever_intent": "NEW"}',
          "entry-level-extraction": '{"entry_level": []}'
        }
      });
      const { agents, recordErrorRate } = makeAgents({
        rewrite: model,
        classifier: model,
        extraction: model,
        intent: model,
        general: model
      });

      await expect(agents.rewriteQuery(STATE, CONTEXT)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(agents.classifyQuestion(STATE, CONTEXT)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(agents.extractConstraints(STATE, CONTEXT)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(drain(agents.generateGeneral(STATE, CONTEXT))).rejects.toThrow(
        "Configuration error: OPENAI_API_KEY is missing."
      );
      expect(recordErrorRate).not.toHaveBeenCalled();
    });
  });

  it("extracts program ids case-insensitively without duplicates", () => {
    expect(extractProgramIds("Program Id: a-1\nprogram ID:b_2\nProgram Id: a-1")).toEqual(["a-1", "b_2"]);
    expect(extractProgramIds("no ids here")).toEqual([]);
  });

  it("ignores the placeholder written for programs without an id", () => {
    expect(extractProgramIds("Program Id: N/A\nProgram Id: 42\nprogram id: n/a")).toEqual(["42"]);
  });
});
