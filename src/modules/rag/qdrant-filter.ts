import type { QdrantCondition, QdrantFilter } from "../../clients/qdrant.js";
import type { FieldCondition, FilterExpr } from "./types.js";

const toFieldCondition = (condition: FieldCondition): QdrantCondition => {
  switch (condition.op) {
    case "eq":
      return { key: condition.field, match: { value: condition.value } };
    case "gte":
      return { key: condition.field, range: { gte: condition.value } };
    case "lte":
      return { key: condition.field, range: { lte: condition.value } };
    case "in":
      return { key: condition.field, match: { any: condition.values } };
    case "nin":
      return { key: condition.field, match: { except: condition.values } };
  }
};

const toCondition = (expr: FilterExpr): QdrantCondition => {
  if (expr.op === "and" || expr.op === "or") {
    return toQdrantFilter(expr);
  }
  return toFieldCondition(expr);
};

/**
 * Translates a filter tree into the Qdrant filter DSL. `and` maps to `must`,
 * `or` to `should`; nested combinators become nested filters.
 */
export const toQdrantFilter = (expr: FilterExpr): QdrantFilter => {
  switch (expr.op) {
    case "and":
      return { must: expr.conditions.map(toCondition) };
    case "or":
      return { should: expr.conditions.map(toCondition) };
    default:
      return { must: [toFieldCondition(expr)] };
  }
};
