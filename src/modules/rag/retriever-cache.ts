import { getOpenAIClient } from "../../clients/openai.js";
import { getQdrantClient } from "../../clients/qdrant.js";
import { config, requireSetting, type Config } from "../../config/index.js";
import { logInfo } from "../../observability/logger.js";
import { RetrieverHealthError } from "./errors.js";
import { loadParentDocuments, type ParentDocumentIndex } from "./parent-documents.js";
import { QdrantPartitionRetriever, type PartitionSearcher } from "./partition-retriever.js";

export interface RetrieverResources {
  embedQuery(query: string): Promise<number[]>;
  /** Searched in this order; hit order across partitions follows it. */
  partitions: readonly PartitionSearcher[];
  parents: ParentDocumentIndex;
}

export type RetrieverResourceLoader = () => Promise<RetrieverResources>;

/**
 * Holds the embedding client, partition retrievers and parent mapping for the
 * process lifetime. Concurrent first calls share one initialization; a failed
 * initialization is retried on the next call.
 */
export class RetrieverResourceCache {
  private resources: RetrieverResources | null = null;

  private initPromise: Promise<RetrieverResources> | null = null;

  constructor(private readonly loader: RetrieverResourceLoader) {}

  async get(): Promise<RetrieverResources> {
    if (this.resources) {
      return this.resources;
    }

    if (!this.initPromise) {
      this.initPromise = this.loader().catch((error: unknown) => {
        this.initPromise = null;
        throw error;
      });
    }

    this.resources = await this.initPromise;
    return this.resources;
  }

  isInitialized(): boolean {
    return this.resources !== null;
  }

  reset(): void {
    this.resources = null;
    this.initPromise = null;
  }
}

export interface RetrieverResourceDependencies {
  getOpenAIClient?: typeof getOpenAIClient;
  getQdrantClient?: typeof getQdrantClient;
  loadParentDocuments?: typeof loadParentDocuments;
  logInfo?: typeof logInfo;
}

export async function createRetrieverResources(
  settings: Config = config,
  dependencies: RetrieverResourceDependencies = {}
): Promise<RetrieverResources> {
  const collections = {
    general: requireSetting(settings.QDRANT_COLLECTION_GENERAL_TRACK, "QDRANT_COLLECTION_GENERAL_TRACK"),
    specialization: requireSetting(
      settings.QDRANT_COLLECTION_SPECIALIZATION_TRACK,
      "QDRANT_COLLECTION_SPECIALIZATION_TRACK"
    ),
    specialized: requireSetting(settings.QDRANT_COLLECTION_SPECIALIZED_TRACK, "QDRANT_COLLECTION_SPECIALIZED_TRACK")
  };
  const parentFile = requireSetting(settings.PARENT_DOCUMENTS_FILE, "PARENT_DOCUMENTS_FILE");
  const embeddingModel = settings.OPENAI_EMBEDDING_MODEL;

  const [{ client: openai }, qdrantSingleton, parents] = await Promise.all([
    (dependencies.getOpenAIClient ?? getOpenAIClient)(settings),
    (dependencies.getQdrantClient ?? getQdrantClient)(settings),
    (dependencies.loadParentDocuments ?? loadParentDocuments)(parentFile)
  ]);
  const qdrant = qdrantSingleton.client;

  const health = await Promise.all(
    Object.values(collections).map(async (name) => ({ name, ...(await qdrantSingleton.healthCheck(name)) }))
  );
  const unavailable = health.filter((entry) => entry.status === "error");
  if (unavailable.length > 0) {
    const details = unavailable.map((entry) => `${entry.name} (${entry.details ?? "unknown error"})`).join(", ");
    throw new RetrieverHealthError(`Qdrant collections unavailable: ${details}`);
  }

  (dependencies.logInfo ?? logInfo)("rag.resources.initialized", {}, {
    embedding_model: embeddingModel,
    parent_documents: parents.size,
    collections
  });

  return {
    async embedQuery(query: string) {
      const response = await openai.embeddings.create({ model: embeddingModel, input: query });
      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new RetrieverHealthError("Embedding response missing vector payload.");
      }
      return embedding;
    },
    partitions: [
      new QdrantPartitionRetriever("general_track", collections.general, qdrant),
      new QdrantPartitionRetriever("specialization_track", collections.specialization, qdrant),
      new QdrantPartitionRetriever("specialized_track", collections.specialized, qdrant)
    ],
    parents
  };
}

export const retrieverResourceCache = new RetrieverResourceCache(() => createRetrieverResources());
