import {
  METRIC_CATALOG_BY_NAME,
  type MetricCatalogEntry,
  type MetricName,
  type MetricType,
} from "./metrics-catalog.ts";
import { containsPII } from "./redaction.ts";
import { resolveDeployEnv, type DeployEnv } from "./runtime-env.ts";

export type MetricTagValue = string | number | boolean | null | undefined;
export type MetricTags = Record<string, MetricTagValue>;

export type EmitMetricInput = {
  metric: MetricName;
  value: number;
  /** Only tags declared for the metric in the catalog are kept. */
  tags?: MetricTags;
  correlation_id?: string | null;
  ts?: string | Date;
};

export type EmittedMetric = {
  ts: string;
  metric: MetricName;
  type: MetricType;
  unit: string;
  value: number;
  env: DeployEnv;
  correlation_id: string | null;
  tags: Record<string, string>;
};

export type MetricAdapter = {
  emit(metric: EmittedMetric): void;
};

export type InMemoryMetricAdapter = MetricAdapter & {
  snapshot(limit?: number): EmittedMetric[];
  clear(): void;
};

const MAX_BUFFERED_METRICS = 2_000;
const MAX_TAG_VALUE_LENGTH = 96;
const CORRELATION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.:-]{0,127}$/;
const DIGITS_ONLY_PATTERN = /^\d+$/;

/** Ring buffer holding the most recent `maxEntries` metrics. */
export function createInMemoryMetricAdapter(maxEntries: number = MAX_BUFFERED_METRICS): InMemoryMetricAdapter {
  const buffer: EmittedMetric[] = [];
  return {
    emit(metric) {
      buffer.push(metric);
      if (buffer.length > maxEntries) {
        buffer.splice(0, buffer.length - maxEntries);
      }
    },
    snapshot(limit) {
      return !limit || limit <= 0 ? [...buffer] : buffer.slice(-limit);
    },
    clear() {
      buffer.length = 0;
    },
  };
}

const defaultAdapter = createInMemoryMetricAdapter();
let activeAdapter: MetricAdapter = defaultAdapter;

export function setMetricAdapter(adapter: MetricAdapter): void {
  activeAdapter = adapter;
}

export function resetMetricAdapter(): void {
  activeAdapter = defaultAdapter;
}

export function clearInMemoryMetrics(): void {
  defaultAdapter.clear();
}

export function getInMemoryMetrics(limit?: number): EmittedMetric[] {
  return defaultAdapter.snapshot(limit);
}

export function emitMetric(input: EmitMetricInput): EmittedMetric {
  const definition = METRIC_CATALOG_BY_NAME[input.metric];
  if (!definition) {
    throw new Error(`Unknown metric '${input.metric}'.`);
  }
  if (!Number.isFinite(input.value)) {
    throw new Error(`Metric '${input.metric}' needs a finite value, got ${input.value}.`);
  }

  const metric: EmittedMetric = {
    ts: toTimestamp(input.ts),
    metric: input.metric,
    type: definition.type,
    unit: definition.unit,
    value: roundForUnit(input.value, definition.unit),
    env: resolveDeployEnv(),
    correlation_id: toCorrelationId(input.correlation_id),
    tags: declaredTags(definition, input.tags),
  };

  activeAdapter.emit(metric);
  return metric;
}

/** Metrics never break the caller: invalid input is dropped and null returned. */
export function emitMetricBestEffort(input: EmitMetricInput): EmittedMetric | null {
  try {
    return emitMetric(input);
  } catch {
    return null;
  }
}

export function emitLatencyMetric(input: {
  component: string;
  operation: string;
  outcome: string;
  startedAtMs: number;
  correlation_id?: string | null;
}): EmittedMetric | null {
  return emitMetricBestEffort({
    metric: "system.request.latency",
    value: elapsedMetricMs(input.startedAtMs),
    correlation_id: input.correlation_id ?? null,
    tags: {
      component: input.component,
      operation: input.operation,
      outcome: input.outcome,
    },
  });
}

export function nowMetricMs(): number {
  return performance.now();
}

export function elapsedMetricMs(startedAtMs: number): number {
  const elapsed = nowMetricMs() - startedAtMs;
  return Number.isFinite(elapsed) && elapsed > 0 ? roundTo(elapsed, 3) : 0;
}

function roundForUnit(value: number, unit: string): number {
  switch (unit) {
    case "count":
    case "tokens":
      return Math.round(value);
    case "usd":
      return roundTo(value, 6);
    default:
      return roundTo(value, 3);
  }
}

function declaredTags(definition: MetricCatalogEntry, tags: MetricTags = {}): Record<string, string> {
  const output: Record<string, string> = {};
  for (const key of definition.tags) {
    const value = toTagValue(tags[key]);
    if (value !== null && !containsPII(value)) {
      output[key] = value.slice(0, MAX_TAG_VALUE_LENGTH);
    }
  }
  return output;
}

function toTagValue(value: MetricTagValue): string | null {
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}

/** Opaque ids only; a bare digit string could be a phone number. */
function toCorrelationId(value: string | null | undefined): string | null {
  const normalized = toTagValue(value);
  if (normalized === null || !CORRELATION_ID_PATTERN.test(normalized)) {
    return null;
  }
  return DIGITS_ONLY_PATTERN.test(normalized) ? null : normalized;
}

function toTimestamp(ts?: string | Date): string {
  const parsed = ts instanceof Date ? ts : new Date(ts ?? Date.now());
  return Number.isNaN(parsed.getTime()) ? new Date().toISOString() : parsed.toISOString();
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
