import OpenAI from "openai";
import { config, requireSetting, type Config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";

export interface OpenAISingleton {
  client: OpenAI;
}

const REQUEST_TIMEOUT_MS = 30_000;
const REQUEST_RETRIES = 2;

const clients = new Map<string, OpenAISingleton>();

function initialize(apiKey: string, settings: Config): OpenAISingleton {
  const client = new OpenAI({
    apiKey,
    baseURL: settings.OPENAI_BASE_URL,
    maxRetries: REQUEST_RETRIES,
    timeout: REQUEST_TIMEOUT_MS
  });

  logInfo("clients.openai.initialized", {}, { base_url: settings.OPENAI_BASE_URL ?? null });

  return { client };
}

/** One client per API key and base URL; later calls with the same pair reuse it. */
export async function getOpenAIClient(settings: Config = config): Promise<OpenAISingleton> {
  const apiKey = requireSetting(settings.OPENAI_API_KEY, "OPENAI_API_KEY");
  const key = JSON.stringify([apiKey, settings.OPENAI_BASE_URL ?? null]);

  let singleton = clients.get(key);
  if (!singleton) {
    singleton = initialize(apiKey, settings);
    clients.set(key, singleton);
  }

  return singleton;
}

export function resetOpenAIClientForTests(): void {
  clients.clear();
}
