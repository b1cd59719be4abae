export * from "./matching/index.ts";
export { EVENTS, EVENT_NAMES } from "./observability/events.ts";
export {
  EVENT_CATALOG,
  type CanonicalEventName,
  type EventCatalogEntry,
} from "./observability/event-catalog.ts";
export {
  createLogger,
  isKnownEventName,
  logEvent,
  redactPII,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogEventInput,
  type StructuredLogger,
} from "./observability/logger.ts";
export {
  clearInMemoryMetrics,
  createInMemoryMetricAdapter,
  emitLatencyMetric,
  emitMetric,
  emitMetricBestEffort,
  getInMemoryMetrics,
  resetMetricAdapter,
  setMetricAdapter,
  type EmittedMetric,
  type InMemoryMetricAdapter,
  type MetricAdapter,
} from "./observability/metrics.ts";
export { isMetricName, METRIC_CATALOG, type MetricName } from "./observability/metrics-catalog.ts";
export {
  estimateLlmCostUsd,
  LLM_PRICING_VERSION,
  resolvePricingRule,
  type LlmCostEstimate,
  type LlmPricedProvider,
} from "./observability/llm-pricing.ts";
export { initializeNodeSentry } from "./observability/sentry-node.ts";
export { readEnv, type RuntimeEnv } from "./observability/runtime-env.ts";
