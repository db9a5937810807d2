import { QdrantClient, type Schemas } from "@qdrant/js-client-rest";
import { config, requireSetting, type Config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";

type HealthStatus = "ok" | "error";

export type QdrantSearchRequest = Parameters<QdrantClient["search"]>[1];
export type QdrantFilter = Schemas["Filter"];
export type QdrantCondition = Schemas["Condition"];
export type QdrantScoredPoint = Awaited<ReturnType<QdrantClient["search"]>>[number];

export interface QdrantSingleton {
  client: QdrantClient;
  healthCheck: (collection: string) => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 5000;
const REQUEST_RETRIES = 3;
const REQUEST_RETRY_DELAY_MS = 250;

const clients = new Map<string, QdrantSingleton>();
const initPromises = new Map<string, Promise<QdrantSingleton>>();

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withRetries<T>(operation: () => Promise<T>): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= REQUEST_RETRIES; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < REQUEST_RETRIES) {
        await delay(REQUEST_RETRY_DELAY_MS * attempt);
      }
    }
  }

  throw lastError;
}

async function initialize(url: string, settings: Config): Promise<QdrantSingleton> {
  const client = new QdrantClient({
    url,
    apiKey: settings.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });

  await withRetries(async () => {
    await client.getCollections();
  });

  logInfo("clients.qdrant.initialized", {}, { url });

  return {
    client,
    async healthCheck(collection: string) {
      try {
        const { exists } = await client.collectionExists(collection);
        return exists ? { status: "ok" } : { status: "error", details: `collection ${collection} does not exist` };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

/** One connected client per URL and API key; concurrent first calls share the connection attempt. */
export async function getQdrantClient(settings: Config = config): Promise<QdrantSingleton> {
  const url = requireSetting(settings.QDRANT_URL, "QDRANT_URL");
  const key = JSON.stringify([url, settings.QDRANT_API_KEY ?? null]);

  const existing = clients.get(key);
  if (existing) {
    return existing;
  }

  let initPromise = initPromises.get(key);
  if (!initPromise) {
    initPromise = initialize(url, settings).then(
      (singleton) => {
        clients.set(key, singleton);
        initPromises.delete(key);
        return singleton;
      },
      (error: unknown) => {
        initPromises.delete(key);
        throw error;
      }
    );
    initPromises.set(key, initPromise);
  }

  return initPromise;
}

export function resetQdrantClientForTests(): void {
  clients.clear();
  initPromises.clear();
}
