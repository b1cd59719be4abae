export type MetricType = "counter" | "histogram" | "gauge";

export type MetricCatalogEntry = {
  metric_name: string;
  type: MetricType;
  description: string;
  tags: readonly string[];
  unit: string;
};

export const METRIC_CATALOG = [
  {
    metric_name: "system.error.count",
    type: "counter",
    description: "Unhandled runtime errors across scripts and engine entry points.",
    tags: ["component", "phase", "error_name"],
    unit: "count",
  },
  {
    metric_name: "system.rpc.failure.count",
    type: "counter",
    description: "RPC failures from database-backed retrieval paths.",
    tags: ["component", "rpc_name"],
    unit: "count",
  },
  {
    metric_name: "system.request.latency",
    type: "histogram",
    description: "Latency for matching requests, retrieval, oracle and embedding calls.",
    tags: ["component", "operation", "outcome"],
    unit: "ms",
  },
  {
    metric_name: "matching.request.count",
    type: "counter",
    description: "Completed findMatches requests by cohort kind and outcome.",
    tags: ["component", "cohort_kind", "outcome"],
    unit: "count",
  },
  {
    metric_name: "matching.candidates.retrieved",
    type: "histogram",
    description: "Candidates returned by retrieval for one request.",
    tags: ["component", "source"],
    unit: "count",
  },
  {
    metric_name: "matching.pairings.created",
    type: "counter",
    description: "Pairing rows written by the orchestrator.",
    tags: ["component", "scope_kind", "category"],
    unit: "count",
  },
  {
    metric_name: "oracle.request.count",
    type: "counter",
    description: "Compatibility oracle calls by outcome.",
    tags: ["component", "provider", "model", "outcome"],
    unit: "count",
  },
  {
    metric_name: "oracle.fallback.count",
    type: "counter",
    description: "Oracle calls that degraded to the neutral fallback result.",
    tags: ["component", "error_code"],
    unit: "count",
  },
  {
    metric_name: "embedding.request.count",
    type: "counter",
    description: "Embedding provider calls by outcome.",
    tags: ["component", "model", "outcome"],
    unit: "count",
  },
  {
    metric_name: "llm.token.input",
    type: "counter",
    description: "Input tokens consumed by oracle and embedding calls.",
    tags: ["component", "provider", "model"],
    unit: "tokens",
  },
  {
    metric_name: "llm.token.output",
    type: "counter",
    description: "Output tokens produced by oracle calls.",
    tags: ["component", "provider", "model"],
    unit: "tokens",
  },
  {
    metric_name: "llm.cost.estimated_usd",
    type: "gauge",
    description: "Deterministic estimated USD cost for each oracle or embedding call.",
    tags: ["component", "provider", "model", "pricing_version"],
    unit: "usd",
  },
] as const satisfies readonly MetricCatalogEntry[];

export type MetricName = (typeof METRIC_CATALOG)[number]["metric_name"];

export const METRIC_CATALOG_BY_NAME: Readonly<Record<string, MetricCatalogEntry | undefined>> =
  Object.freeze(
    METRIC_CATALOG.reduce<Record<string, MetricCatalogEntry>>((accumulator, entry) => {
      accumulator[entry.metric_name] = entry;
      return accumulator;
    }, {}),
  );

export function isMetricName(value: string): value is MetricName {
  return METRIC_CATALOG.some((entry) => entry.metric_name === value);
}

const METRIC_NAME_PATTERN = /^[a-z][a-z0-9_]*(\.[a-z0-9_]+)+$/;
const TAG_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export function validateMetricCatalog(
  entries: readonly MetricCatalogEntry[] = METRIC_CATALOG,
): { valid: true } {
  const seenNames = new Set<string>();
  for (const entry of entries) {
    if (!METRIC_NAME_PATTERN.test(entry.metric_name)) {
      throw new Error(`Invalid metric_name '${entry.metric_name}'.`);
    }
    if (seenNames.has(entry.metric_name)) {
      throw new Error(`Duplicate metric_name '${entry.metric_name}'.`);
    }
    seenNames.add(entry.metric_name);

    if (entry.description.trim().length === 0) {
      throw new Error(`Metric '${entry.metric_name}' requires a non-empty description.`);
    }
    if (entry.unit.trim().length === 0) {
      throw new Error(`Metric '${entry.metric_name}' requires a non-empty unit.`);
    }

    const seenTags = new Set<string>();
    for (const tag of entry.tags) {
      if (!TAG_NAME_PATTERN.test(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has invalid tag '${tag}'.`);
      }
      if (seenTags.has(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has duplicate tag '${tag}'.`);
      }
      seenTags.add(tag);
    }
  }
  return { valid: true };
}

validateMetricCatalog(METRIC_CATALOG);
