import { z } from "zod";
import { ConfigurationError } from "../../config/index.js";
import { errorMessage, logInfo, logWarn } from "../../observability/logger.js";
import { recordRetrievalLatency } from "../../observability/metrics.js";
import { formatProgramForContext } from "./program-formatter.js";
import { retrieverResourceCache, type RetrieverResourceCache } from "./retriever-cache.js";
import type { ChildDocument, FilterExpr, MultipleInvokeResult, ProgramRetriever, RetrieverConfig } from "./types.js";

export interface ChildParentRetrieverDependencies {
  now?: () => number;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const resolveDependencies = (dependencies?: ChildParentRetrieverDependencies) => ({
  now: dependencies?.now ?? Date.now,
  recordRetrievalLatency: dependencies?.recordRetrievalLatency ?? recordRetrievalLatency,
  logInfo: dependencies?.logInfo ?? logInfo,
  logWarn: dependencies?.logWarn ?? logWarn
});

const fieldName = z.string().trim().min(1);

const filterExprSchema: z.ZodType<FilterExpr> = z.lazy(() =>
  z.union([
    z.object({ op: z.literal("eq"), field: fieldName, value: z.union([z.string(), z.number(), z.boolean()]) }),
    z.object({ op: z.enum(["gte", "lte"]), field: fieldName, value: z.number().finite() }),
    z.object({
      op: z.enum(["in", "nin"]),
      field: fieldName,
      values: z.union([z.array(z.string()).min(1), z.array(z.number()).min(1)])
    }),
    z.object({ op: z.literal("and"), conditions: z.array(filterExprSchema).min(1) }),
    z.object({ op: z.literal("or"), conditions: z.array(filterExprSchema).min(1) })
  ])
);

const retrieverConfigSchema = z.object({
  rewritten_query: z.string().trim().min(1),
  search_params: z.object({
    search_type: z.enum(["similarity", "mmr"]).optional(),
    search_kwargs: z.object({
      k: z.number().int().positive(),
      filter: filterExprSchema.optional(),
      fetch_k: z.number().int().positive().optional(),
      lambda_mult: z.number().min(0).max(1).optional()
    })
  })
});

const emptyResult = (): MultipleInvokeResult => ({ content: [], ids: [] });

const readProgramId = (document: ChildDocument): string | undefined => {
  const value = document.metadata.program_id;
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
};

/**
 * Two-stage retrieval: child documents are searched in every partition, then
 * their program ids are resolved to parent records and formatted for the
 * grounded-generation prompt.
 *
 * `multipleInvoke` never rejects on bad input or backend failures. The one
 * exception is a `ConfigurationError` raised while building the resources.
 */
export class ChildParentRetriever implements ProgramRetriever {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(
    private readonly resourceCache: RetrieverResourceCache = retrieverResourceCache,
    dependencies?: ChildParentRetrieverDependencies
  ) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async multipleInvoke(retrieverConfig: RetrieverConfig): Promise<MultipleInvokeResult> {
    const startedAt = this.dependencies.now();
    const parsed = retrieverConfigSchema.safeParse(retrieverConfig);
    if (!parsed.success) {
      this.dependencies.logWarn("rag.retrieve.invalid_config", {}, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      });
      return emptyResult();
    }

    try {
      const resources = await this.resourceCache.get();
      const { rewritten_query: query, search_params: searchParams } = parsed.data;
      const vector = await resources.embedQuery(query);
      const hitsByPartition = await Promise.all(
        resources.partitions.map((partition) => partition.search(vector, searchParams))
      );
      const hits = hitsByPartition.flat();

      const ids: string[] = [];
      const seen = new Set<string>();
      for (const hit of hits) {
        const programId = readProgramId(hit);
        if (programId && !seen.has(programId)) {
          seen.add(programId);
          ids.push(programId);
        }
      }

      const content: string[] = [];
      for (const programId of ids) {
        const parent = resources.parents.get(programId);
        if (parent) {
          content.push(formatProgramForContext(parent));
        }
      }

      const latencyMs = this.dependencies.now() - startedAt;
      this.dependencies.recordRetrievalLatency(latencyMs);
      this.dependencies.logInfo("rag.retrieve.complete", {}, {
        latency_ms: latencyMs,
        search_type: searchParams.search_type ?? "similarity",
        hit_count: hits.length,
        hits_by_partition: Object.fromEntries(
          resources.partitions.map((partition, index) => [partition.partition, hitsByPartition[index].length])
        ),
        program_count: ids.length,
        resolved_count: content.length
      });

      return { content, ids };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      this.dependencies.logWarn("rag.retrieve.failed", {}, { error: errorMessage(error) });
      return emptyResult();
    }
  }
}
