import type { FieldCondition, FilterExpr, PriceCampusInfo, SearchParams } from "./types.js";

export const PROGRAM_TYPE_CATALOG = [
  "PGE",
  "BTS",
  "BBA",
  "MIM",
  "MBA",
  "Other",
  "Bachelor",
  "Cycle prépa",
  "Cycle d'Ingénieur",
  "Cycle Préparatoire",
  "Programme d'Ingénieur",
  "Master"
] as const;

export type ProgramType = (typeof PROGRAM_TYPE_CATALOG)[number];

export const FILTER_FIELDS = {
  programType: "new_program_type",
  price: "price",
  primosArrivant: "primos_arrivant",
  schoolRank: "school_rank",
  programId: "program_id"
} as const;

export interface FilterTolerances {
  /** Subtracted from the price when the student asks for more than a price. */
  priceLowerTolerance: number;
  /** Added to the price when the student asks for at most a price. */
  priceUpperTolerance: number;
}

export interface SearchParamOptions extends FilterTolerances {
  /** Extra results requested on top of k, leaving room for duplicates across partitions. */
  kHeadroom: number;
}

export const DEFAULT_SEARCH_PARAM_OPTIONS: SearchParamOptions = {
  priceLowerTolerance: 1000,
  priceUpperTolerance: 2000,
  kHeadroom: 1
};

export interface BuildFiltersInput {
  programTypes: readonly string[];
  excludeIds: readonly string[];
  /** False on REPEAT turns, so previously shown programs can come back. */
  exclude: boolean;
  priceCampusInfo?: PriceCampusInfo | null;
  entryLevel?: readonly string[] | null;
}

export interface BuildSearchParamsInput extends BuildFiltersInput {
  k: number;
}

const anyOf = (conditions: FieldCondition[]): FilterExpr =>
  conditions.length === 1 ? conditions[0] : { op: "or", conditions };

const flagConditions = (fields: readonly string[]): FieldCondition[] =>
  fields
    .map((field) => field.trim())
    .filter((field) => field.length > 0)
    .map((field) => ({ op: "eq", field, value: true }));

const isPositive = (value: number | null | undefined): value is number =>
  typeof value === "number" && Number.isFinite(value) && value > 0;

export const buildFilters = (
  input: BuildFiltersInput,
  tolerances: FilterTolerances = DEFAULT_SEARCH_PARAM_OPTIONS
): FilterExpr => {
  const conditions: FilterExpr[] = [];
  const info = input.priceCampusInfo ?? {};

  if (isPositive(info.price)) {
    if (info.price_condition === "gt") {
      conditions.push({ op: "gte", field: FILTER_FIELDS.price, value: info.price - tolerances.priceLowerTolerance });
    } else if (info.price_condition === "lt") {
      conditions.push({ op: "lte", field: FILTER_FIELDS.price, value: info.price + tolerances.priceUpperTolerance });
    }
  }

  if (info.primos_arrivant === true) {
    conditions.push({ op: "eq", field: FILTER_FIELDS.primosArrivant, value: true });
  }

  const languageConditions = flagConditions(info.languages ?? []);
  if (languageConditions.length > 0) {
    conditions.push(anyOf(languageConditions));
  }

  const entryLevelConditions = flagConditions(input.entryLevel ?? []);
  if (entryLevelConditions.length > 0) {
    conditions.push(anyOf(entryLevelConditions));
  }

  if (isPositive(info.school_rank)) {
    conditions.push({ op: "lte", field: FILTER_FIELDS.schoolRank, value: info.school_rank });
  }

  conditions.push({
    op: "in",
    field: FILTER_FIELDS.programType,
    values: input.programTypes.length > 0 ? [...input.programTypes] : [...PROGRAM_TYPE_CATALOG]
  });

  if (input.exclude && input.excludeIds.length > 0) {
    conditions.push({ op: "nin", field: FILTER_FIELDS.programId, values: [...input.excludeIds] });
  }

  return conditions.length === 1 ? conditions[0] : { op: "and", conditions };
};

export const buildSearchParams = (
  input: BuildSearchParamsInput,
  options: SearchParamOptions = DEFAULT_SEARCH_PARAM_OPTIONS
): SearchParams => ({
  search_kwargs: {
    k: input.k + options.kHeadroom,
    filter: buildFilters(input, options)
  }
});
