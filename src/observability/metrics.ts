interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface MetricsState {
  retrievalLatency: LatencySummary;
  pipelineLatency: LatencySummary;
  openAITokens: number;
  routes: Record<string, number>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const state: MetricsState = {
  retrievalLatency: createLatencySummary(),
  pipelineLatency: createLatencySummary(),
  openAITokens: 0,
  routes: {},
  errorRates: {}
};

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

const increment = (counters: Record<string, number>, key: string): void => {
  counters[key] = (counters[key] ?? 0) + 1;
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordPipelineLatency = (durationMs: number): void => {
  recordLatency(state.pipelineLatency, durationMs);
};

export const recordOpenAIUsage = (totalTokens: number): void => {
  state.openAITokens += Number.isFinite(totalTokens) ? Math.max(0, totalTokens) : 0;
};

export const recordRoute = (route: string): void => {
  increment(state.routes, route);
};

export const recordErrorRate = (key: string): void => {
  increment(state.errorRates, key);
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  retrieval_latency: serializeLatency(state.retrievalLatency),
  pipeline_latency: serializeLatency(state.pipelineLatency),
  openai_total_tokens: state.openAITokens,
  routes: { ...state.routes },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state.retrievalLatency = createLatencySummary();
  state.pipelineLatency = createLatencySummary();
  state.openAITokens = 0;
  state.routes = {};
  state.errorRates = {};
};
