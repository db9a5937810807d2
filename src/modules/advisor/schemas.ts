import { z } from "zod";
import type { StructuredOutputSpec } from "../llm/types.js";
import { PROGRAM_TYPE_CATALOG, type ProgramType } from "../rag/search-params.js";
import type { PriceCampusInfo, PriceCondition } from "../rag/types.js";
import type { QuestionCategory, RetrieverIntent } from "./types.js";

const PROGRAM_TYPES: ReadonlySet<string> = new Set(PROGRAM_TYPE_CATALOG);

const isProgramType = (value: string): value is ProgramType => PROGRAM_TYPES.has(value);

const upperCased = (value: unknown): unknown => (typeof value === "string" ? value.trim().toUpperCase() : value);

const numeric = (value: unknown): unknown => {
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.replace(/[\s,€]/g, ""));
    return Number.isFinite(parsed) ? parsed : value;
  }
  return value;
};

const optionalInteger = z.preprocess(numeric, z.number().int().nullable().optional());

const normalizePriceCondition = (value: string | null | undefined): PriceCondition | null => {
  switch (value?.trim().toLowerCase()) {
    case "gt":
    case "gte":
    case ">":
    case ">=":
      return "gt";
    case "lt":
    case "lte":
    case "<":
    case "<=":
      return "lt";
    default:
      return null;
  }
};

const stringList = z.array(z.string().trim().min(1));

export interface ClassificationOutput {
  question_category: QuestionCategory;
}

export const classificationSpec: StructuredOutputSpec<ClassificationOutput> = {
  name: "query-classifier",
  schema: z.object({
    question_category: z.preprocess(
      (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
      z.enum(["program_selection", "rules", "follow_up", "general"])
    )
  }),
  instructions:
    'Respond with a JSON object {"question_category": "program_selection" | "rules" | "follow_up" | "general"} and nothing else.'
};

export interface ProgramExtractionOutput {
  program_type: ProgramType[];
}

export const programExtractionSpec: StructuredOutputSpec<ProgramExtractionOutput> = {
  name: "program-extraction",
  schema: z.object({
    program_type: stringList
      .nullable()
      .optional()
      .transform((values) => (values ?? []).filter(isProgramType))
  }),
  instructions: 'Respond with a JSON object {"program_type": string[]} using only the allowed values.'
};

export const priceCampusSpec: StructuredOutputSpec<PriceCampusInfo> = {
  name: "price-campus-extraction",
  schema: z.object({
    price: optionalInteger,
    price_condition: z.string().nullable().optional().transform(normalizePriceCondition),
    languages: stringList.nullable().optional(),
    primos_arrivant: z.boolean().nullable().optional(),
    school_rank: optionalInteger
  }),
  instructions: [
    'Respond with a JSON object {"price": integer | null, "price_condition": "gt" | "lt" | null,',
    '"languages": string[] | null, "primos_arrivant": boolean | null, "school_rank": integer | null}.'
  ].join(" ")
};

export interface RetrieverIntentOutput {
  retriever_intent: RetrieverIntent;
}

export const retrieverIntentSpec: StructuredOutputSpec<RetrieverIntentOutput> = {
  name: "retriever-selection",
  schema: z.object({
    retriever_intent: z.preprocess(upperCased, z.enum(["NEW", "REPEAT"]))
  }),
  instructions: 'Respond with a JSON object {"retriever_intent": "NEW" | "REPEAT"} and nothing else.'
};

export interface EntryLevelOutput {
  entry_level: string[];
}

export const entryLevelSpec: StructuredOutputSpec<EntryLevelOutput> = {
  name: "entry-level-extraction",
  schema: z.object({
    entry_level: stringList.nullable().optional().transform((values) => values ?? [])
  }),
  instructions: 'Respond with a JSON object {"entry_level": string[]} and nothing else.'
};
