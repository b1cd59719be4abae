import {
  COMPATIBILITY_PROMPT_VERSION,
  COMPATIBILITY_SYSTEM_PROMPT,
} from "./prompts/compatibility-system-prompt.ts";
import {
  OracleParseError,
  parseCompatibilityOutput,
} from "./schemas/compatibility-output.schema.ts";
import {
  getDefaultLlmProvider,
  isAbortError,
  LlmProviderError,
  type LlmProvider,
  type LlmProviderResponse,
} from "./provider.ts";
import { validateModelOutput } from "./output-validator.ts";
import type { CompatibilityResult } from "../../db/src/types/compatibility.ts";
import type { Profile } from "../../db/src/types/profile.ts";
import { EVENTS } from "../../core/src/observability/events.ts";
import { logEvent } from "../../core/src/observability/logger.ts";
import {
  emitLatencyMetric,
  emitMetricBestEffort,
  nowMetricMs,
} from "../../core/src/observability/metrics.ts";
import { estimateLlmCostUsd } from "../../core/src/observability/llm-pricing.ts";
import { captureSentryException } from "../../core/src/observability/sentry.ts";

export type CompatibilityContext = {
  /** Plain-language cohort description, e.g. "Both people are at the same event." */
  description?: string | null;
  correlationId?: string | null;
  signal?: AbortSignal;
};

export interface CompatibilityOracle {
  analyze(
    a: Profile,
    b: Profile,
    context?: CompatibilityContext,
  ): Promise<CompatibilityResult | null>;
}

export type OracleFailureCode =
  | "timeout"
  | "cancelled"
  | "provider_transient"
  | "provider_non_transient"
  | "invalid_json"
  | "schema_invalid"
  | "guardrail_violation";

export const FALLBACK_COMPATIBILITY_RESULT: Readonly<CompatibilityResult> = Object.freeze({
  score: 0.5,
  category: "friendship",
  rationale: "You share interests that could make for a good conversation.",
  starter: "What brought you here, and what are you hoping to find?",
  source: "fallback",
});

export const DEFAULT_ORACLE_TIMEOUT_MS = 25_000;

class OracleOutputRejectedError extends Error {
  readonly code: OracleFailureCode;

  constructor(message: string, code: OracleFailureCode) {
    super(message);
    this.name = "OracleOutputRejectedError";
    this.code = code;
  }
}

export type OracleLogger = {
  info(event: string, data: Record<string, unknown>): void;
  warn(event: string, data: Record<string, unknown>): void;
};

export type CreateLlmCompatibilityOracleOptions = {
  provider?: LlmProvider;
  timeoutMs?: number;
  logger?: OracleLogger;
};

function createDefaultLogger(): OracleLogger {
  return {
    info(event, data) {
      logEvent({
        level: "info",
        event,
        correlation_id: typeof data.correlation_id === "string" ? data.correlation_id : null,
        payload: data,
      });
    },
    warn(event, data) {
      logEvent({
        level: "warn",
        event,
        correlation_id: typeof data.correlation_id === "string" ? data.correlation_id : null,
        payload: data,
      });
    },
  };
}

function describeProfile(label: string, profile: Profile): string {
  return [
    `=== ${label} ===`,
    `About: ${profile.bio || "(not specified)"}`,
    `Looking for: ${profile.seeking || "(not specified)"}`,
    `Can help with: ${profile.offers || "(not specified)"}`,
    `Interests: ${profile.interests.join(", ") || "(none)"}`,
    `Goals: ${profile.goals.join(", ") || "(none)"}`,
    `Locality: ${profile.locality ?? "(not specified)"}`,
  ].join("\n");
}

/** Only explicit profile fields go into the prompt; never names, ids or embeddings. */
export function buildCompatibilityUserPrompt(
  a: Profile,
  b: Profile,
  context: CompatibilityContext = {},
): string {
  const lines = [
    `PromptVersion: ${COMPATIBILITY_PROMPT_VERSION}`,
    describeProfile("PERSON A", a),
    describeProfile("PERSON B", b),
  ];
  const description = context.description?.trim();
  if (description) {
    lines.push(`Context: ${description}`);
  }
  return lines.join("\n\n");
}

function createTimeoutSignal(
  timeoutMs: number,
  parent?: AbortSignal,
): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort();
  const timeoutId = setTimeout(abort, timeoutMs);
  if (parent) {
    if (parent.aborted) {
      controller.abort();
    } else {
      parent.addEventListener("abort", abort, { once: true });
    }
  }
  return {
    signal: controller.signal,
    clear: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener("abort", abort);
    },
  };
}

/** Settles as soon as the signal aborts, even when the underlying call ignores it. */
function raceWithAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      const error = new Error("Compatibility oracle call aborted.");
      error.name = "AbortError";
      reject(error);
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export function classifyOracleFailure(
  error: unknown,
  options: { cancelled?: boolean } = {},
): OracleFailureCode {
  if (error instanceof OracleOutputRejectedError) {
    return error.code;
  }
  if (error instanceof OracleParseError) {
    return "schema_invalid";
  }
  if (isAbortError(error) || (error instanceof LlmProviderError && error.timedOut)) {
    return options.cancelled ? "cancelled" : "timeout";
  }
  if (error instanceof LlmProviderError) {
    return error.transient ? "provider_transient" : "provider_non_transient";
  }
  if (error instanceof SyntaxError) {
    return "invalid_json";
  }
  return "provider_non_transient";
}

function recordUsage(response: LlmProviderResponse, correlationId: string | null): void {
  const costEstimate = estimateLlmCostUsd({
    provider: response.provider,
    model: response.model,
    input_tokens: response.usage?.input_tokens ?? 0,
    output_tokens: response.usage?.output_tokens ?? 0,
  });
  const tags = {
    component: "compatibility_oracle",
    provider: response.provider,
    model: response.model,
  };

  emitMetricBestEffort({
    metric: "llm.token.input",
    value: costEstimate.input_tokens,
    correlation_id: correlationId,
    tags,
  });
  emitMetricBestEffort({
    metric: "llm.token.output",
    value: costEstimate.output_tokens,
    correlation_id: correlationId,
    tags,
  });
  emitMetricBestEffort({
    metric: "llm.cost.estimated_usd",
    value: costEstimate.estimated_cost_usd,
    correlation_id: correlationId,
    tags: {
      ...tags,
      model: costEstimate.pricing_model,
      pricing_version: costEstimate.pricing_version,
    },
  });
}

/**
 * LLM-backed oracle. Every failure (timeout, transport, invalid output) degrades to
 * a copy of FALLBACK_COMPATIBILITY_RESULT, so `analyze` never rejects.
 */
export function createLlmCompatibilityOracle(
  options: CreateLlmCompatibilityOracleOptions = {},
): CompatibilityOracle {
  const timeoutMs = options.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
  const logger = options.logger ?? createDefaultLogger();

  return {
    async analyze(a, b, context = {}) {
      const provider = options.provider ?? getDefaultLlmProvider();
      const correlationId = context.correlationId ?? null;
      const startedAtMs = nowMetricMs();
      const timeout = createTimeoutSignal(timeoutMs, context.signal);
      let providerName = "anthropic";
      let model = "unknown";

      try {
        const response = await raceWithAbort(
          provider.generateText({
            systemPrompt: COMPATIBILITY_SYSTEM_PROMPT,
            userPrompt: buildCompatibilityUserPrompt(a, b, context),
            timeoutMs,
            signal: timeout.signal,
          }),
          timeout.signal,
        );
        providerName = response.provider;
        model = response.model;
        recordUsage(response, correlationId);

        const validation = validateModelOutput({ rawText: response.text, requireJson: true });
        if (!validation.ok) {
          const invalidJson = validation.violations.some((entry) =>
            entry.code === "invalid_json" || entry.code === "empty_output"
          );
          throw new OracleOutputRejectedError(
            `Model output rejected: ${validation.violations.map((entry) => entry.code).join(", ")}.`,
            invalidJson ? "invalid_json" : "guardrail_violation",
          );
        }

        const parsed = parseCompatibilityOutput(validation.parsedJson);

        logger.info(EVENTS.oracle.callCompleted, {
          correlation_id: correlationId,
          prompt_version: COMPATIBILITY_PROMPT_VERSION,
          model,
          score: parsed.score,
          category: parsed.category,
          wrapper_stripped: validation.wrapperStripped,
        });
        emitMetricBestEffort({
          metric: "oracle.request.count",
          value: 1,
          correlation_id: correlationId,
          tags: { component: "compatibility_oracle", provider: providerName, model, outcome: "success" },
        });
        emitLatencyMetric({
          component: "compatibility_oracle",
          operation: "analyze",
          outcome: "success",
          startedAtMs,
          correlation_id: correlationId,
        });

        return { ...parsed, source: "oracle" };
      } catch (error) {
        const code = classifyOracleFailure(error, { cancelled: context.signal?.aborted === true });

        logger.warn(EVENTS.oracle.fallbackUsed, {
          correlation_id: correlationId,
          prompt_version: COMPATIBILITY_PROMPT_VERSION,
          model,
          error_code: code,
          error_message: error instanceof Error ? error.message : "unknown_error",
        });
        emitMetricBestEffort({
          metric: "oracle.request.count",
          value: 1,
          correlation_id: correlationId,
          tags: { component: "compatibility_oracle", provider: providerName, model, outcome: code },
        });
        emitLatencyMetric({
          component: "compatibility_oracle",
          operation: "analyze",
          outcome: "fallback",
          startedAtMs,
          correlation_id: correlationId,
        });
        if (code === "invalid_json" || code === "schema_invalid") {
          captureSentryException(error, {
            level: "warn",
            event: "oracle.invalid_output",
            context: {
              category: "compatibility_oracle",
              correlation_id: correlationId,
              tags: { error_code: code, prompt_version: COMPATIBILITY_PROMPT_VERSION },
            },
          });
        }

        return { ...FALLBACK_COMPATIBILITY_RESULT };
      } finally {
        timeout.clear();
      }
    },
  };
}

export type StaticCompatibilityResolver = (
  a: Profile,
  b: Profile,
  context: CompatibilityContext,
) => CompatibilityResult | null | Promise<CompatibilityResult | null>;

/** Deterministic oracle for tests and offline runs. */
export function createStaticCompatibilityOracle(
  resolve: StaticCompatibilityResolver,
): CompatibilityOracle {
  return {
    async analyze(a, b, context = {}) {
      return await resolve(a, b, context);
    },
  };
}
