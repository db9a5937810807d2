export type ScalarValue = string | number | boolean;

export type FieldCondition =
  | { op: "eq"; field: string; value: ScalarValue }
  | { op: "gte" | "lte"; field: string; value: number }
  | { op: "in" | "nin"; field: string; values: string[] | number[] };

export type FilterExpr =
  | FieldCondition
  | { op: "and"; conditions: FilterExpr[] }
  | { op: "or"; conditions: FilterExpr[] };

export type SearchType = "similarity" | "mmr";

export interface SearchKwargs {
  k: number;
  filter?: FilterExpr;
  /** Candidate pool for mmr. */
  fetch_k?: number;
  /** 1 favours relevance, 0 favours diversity. */
  lambda_mult?: number;
}

export interface SearchParams {
  search_type?: SearchType;
  search_kwargs: SearchKwargs;
}

export interface RetrieverConfig {
  rewritten_query: string;
  search_params: SearchParams;
}

export type PriceCondition = "gt" | "lt";

export interface PriceCampusInfo {
  price?: number | null;
  price_condition?: PriceCondition | null;
  languages?: string[] | null;
  primos_arrivant?: boolean | null;
  school_rank?: number | null;
}

export interface ChildDocument {
  id: string;
  score: number;
  partition: PartitionName;
  metadata: Record<string, unknown>;
}

export type PartitionName = "general_track" | "specialized_track" | "specialization_track";

export interface MultipleInvokeResult {
  content: string[];
  ids: string[];
}

export interface ProgramRetriever {
  multipleInvoke(config: RetrieverConfig): Promise<MultipleInvokeResult>;
}
