import type { QdrantScoredPoint, QdrantSearchRequest } from "../../clients/qdrant.js";
import { errorMessage, logWarn } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { maximalMarginalRelevance } from "./mmr.js";
import { toQdrantFilter } from "./qdrant-filter.js";
import type { ChildDocument, PartitionName, SearchParams } from "./types.js";

const DEFAULT_FETCH_K = 20;
const DEFAULT_LAMBDA_MULT = 0.5;

export interface VectorSearchClient {
  search(collection: string, request: QdrantSearchRequest): Promise<QdrantScoredPoint[]>;
}

export interface PartitionSearcher {
  readonly partition: PartitionName;
  search(vector: number[], params: SearchParams): Promise<ChildDocument[]>;
}

export interface PartitionRetrieverDependencies {
  logWarn?: typeof logWarn;
  recordErrorRate?: typeof recordErrorRate;
}

const resolveDependencies = (dependencies?: PartitionRetrieverDependencies) => ({
  logWarn: dependencies?.logWarn ?? logWarn,
  recordErrorRate: dependencies?.recordErrorRate ?? recordErrorRate
});

const isDenseVector = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((component) => typeof component === "number");

const toChildDocument = (partition: PartitionName, point: QdrantScoredPoint): ChildDocument => ({
  id: String(point.id),
  score: point.score,
  partition,
  metadata: point.payload ?? {}
});

/**
 * Child-document search over one Qdrant collection. Failures stay inside the
 * partition: the caller gets an empty hit list and a warning is logged.
 */
export class QdrantPartitionRetriever implements PartitionSearcher {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(
    readonly partition: PartitionName,
    private readonly collection: string,
    private readonly client: VectorSearchClient,
    dependencies?: PartitionRetrieverDependencies
  ) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async search(vector: number[], params: SearchParams): Promise<ChildDocument[]> {
    const { k, filter, fetch_k: fetchK, lambda_mult: lambdaMult } = params.search_kwargs;
    const useMmr = params.search_type === "mmr";

    try {
      const points = await this.client.search(this.collection, {
        vector,
        limit: useMmr ? Math.max(fetchK ?? DEFAULT_FETCH_K, k) : k,
        filter: filter ? toQdrantFilter(filter) : undefined,
        with_payload: true,
        with_vector: useMmr
      });

      const selected = useMmr ? this.selectDiverse(vector, points, k, lambdaMult ?? DEFAULT_LAMBDA_MULT) : points;
      return selected.map((point) => toChildDocument(this.partition, point));
    } catch (error) {
      this.dependencies.recordErrorRate(`rag.partition.${this.partition}`);
      this.dependencies.logWarn("rag.partition.search_failed", {}, {
        partition: this.partition,
        collection: this.collection,
        error: errorMessage(error)
      });
      return [];
    }
  }

  private selectDiverse(
    queryVector: number[],
    points: QdrantScoredPoint[],
    k: number,
    lambdaMult: number
  ): QdrantScoredPoint[] {
    const withVectors = points.flatMap((point) => (isDenseVector(point.vector) ? [{ point, vector: point.vector }] : []));
    const order = maximalMarginalRelevance(
      queryVector,
      withVectors.map((candidate) => candidate.vector),
      k,
      lambdaMult
    );
    return order.map((index) => withVectors[index].point);
  }
}
