import { EVENTS } from "../observability/events.ts";
import { logEvent } from "../observability/logger.ts";
import type { RuntimeEnv } from "../observability/runtime-env.ts";
import { readEnv } from "../observability/runtime-env.ts";

export const DEFAULT_COMPATIBILITY_THRESHOLD = 0.4;
/** Highest threshold validated against real cohorts; higher values are allowed but flagged. */
export const VALIDATED_MAX_THRESHOLD = 0.4;

export type MatchingConfig = {
  threshold: number;
  thresholdAboveValidatedRange: boolean;
  candidateLimit: number;
  vectorMinSimilarity: number;
  oracleTimeoutMs: number;
  retrievalTimeoutMs: number;
  embeddingTimeoutMs: number;
  cohortScanLimit: number;
};

export const DEFAULT_MATCHING_CONFIG: Readonly<MatchingConfig> = Object.freeze({
  threshold: DEFAULT_COMPATIBILITY_THRESHOLD,
  thresholdAboveValidatedRange: false,
  candidateLimit: 10,
  vectorMinSimilarity: 0.45,
  oracleTimeoutMs: 25_000,
  retrievalTimeoutMs: 15_000,
  embeddingTimeoutMs: 20_000,
  cohortScanLimit: 200,
});

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

function readUnitInterval(env: RuntimeEnv, name: string, fallback: number): number {
  const raw = readEnv(name, env);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(name, `${name} must be a number in [0,1], got '${raw}'.`);
  }
  return value;
}

function readPositiveInteger(env: RuntimeEnv, name: string, fallback: number): number {
  const raw = readEnv(name, env);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(name, `${name} must be a positive integer, got '${raw}'.`);
  }
  return value;
}

export function resolveMatchingConfig(
  env: RuntimeEnv = process.env,
  overrides: Partial<Omit<MatchingConfig, "thresholdAboveValidatedRange">> = {},
): MatchingConfig {
  const threshold = overrides.threshold ??
    readUnitInterval(env, "MATCH_THRESHOLD", DEFAULT_MATCHING_CONFIG.threshold);
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ConfigError("MATCH_THRESHOLD", `threshold must be a number in [0,1], got '${threshold}'.`);
  }

  const config: MatchingConfig = {
    threshold,
    thresholdAboveValidatedRange: threshold > VALIDATED_MAX_THRESHOLD,
    candidateLimit: overrides.candidateLimit ??
      readPositiveInteger(env, "MATCH_CANDIDATE_LIMIT", DEFAULT_MATCHING_CONFIG.candidateLimit),
    vectorMinSimilarity: overrides.vectorMinSimilarity ??
      readUnitInterval(env, "MATCH_VECTOR_MIN_SIMILARITY", DEFAULT_MATCHING_CONFIG.vectorMinSimilarity),
    oracleTimeoutMs: overrides.oracleTimeoutMs ??
      readPositiveInteger(env, "MATCH_ORACLE_TIMEOUT_MS", DEFAULT_MATCHING_CONFIG.oracleTimeoutMs),
    retrievalTimeoutMs: overrides.retrievalTimeoutMs ??
      readPositiveInteger(env, "MATCH_RETRIEVAL_TIMEOUT_MS", DEFAULT_MATCHING_CONFIG.retrievalTimeoutMs),
    embeddingTimeoutMs: overrides.embeddingTimeoutMs ??
      readPositiveInteger(env, "MATCH_EMBEDDING_TIMEOUT_MS", DEFAULT_MATCHING_CONFIG.embeddingTimeoutMs),
    cohortScanLimit: overrides.cohortScanLimit ??
      readPositiveInteger(env, "MATCH_COHORT_SCAN_LIMIT", DEFAULT_MATCHING_CONFIG.cohortScanLimit),
  };

  if (config.thresholdAboveValidatedRange) {
    logEvent({
      level: "warn",
      event: EVENTS.config.thresholdAboveValidatedRange,
      payload: {
        threshold: config.threshold,
        validated_max: VALIDATED_MAX_THRESHOLD,
      },
    });
  }

  return config;
}
