interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface ModelUsageSummary {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface MetricsState {
  streamDuration: LatencySummary;
  retrievalLatency: LatencySummary;
  modelLatency: Record<string, LatencySummary>;
  modelUsage: ModelUsageSummary;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createState = (): MetricsState => ({
  streamDuration: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  modelLatency: {},
  modelUsage: {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0
  },
  errorRates: {}
});

let state: MetricsState = createState();

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordStreamDuration = (durationMs: number): void => {
  recordLatency(state.streamDuration, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordModelLatency = (model: string, durationMs: number): void => {
  const summary = state.modelLatency[model] ?? createLatencySummary();
  state.modelLatency[model] = summary;
  recordLatency(summary, durationMs);
};

export const recordModelUsage = (usage: {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}): void => {
  state.modelUsage.promptTokens += usage.promptTokens ?? 0;
  state.modelUsage.completionTokens += usage.completionTokens ?? 0;
  state.modelUsage.totalTokens += usage.totalTokens ?? 0;
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  stream_duration: serializeLatency(state.streamDuration),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  model_latency: Object.fromEntries(
    Object.entries(state.modelLatency).map(([model, summary]) => [model, serializeLatency(summary)])
  ),
  model_usage: { ...state.modelUsage },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state = createState();
};
