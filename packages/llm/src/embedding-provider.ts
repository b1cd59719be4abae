import { isAbortError } from "./provider.ts";
import {
  EMBEDDING_DIMENSION,
  type Profile,
  type ProfileEmbedding,
} from "../../db/src/types/profile.ts";
import { EVENTS } from "../../core/src/observability/events.ts";
import { estimateLlmCostUsd } from "../../core/src/observability/llm-pricing.ts";
import { logEvent } from "../../core/src/observability/logger.ts";
import {
  emitLatencyMetric,
  emitMetricBestEffort,
  nowMetricMs,
} from "../../core/src/observability/metrics.ts";
import { readEnv } from "../../core/src/observability/runtime-env.ts";

const OPENAI_EMBEDDINGS_ENDPOINT = "https://api.openai.com/v1/embeddings";
const OPENAI_DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

export const DEFAULT_EMBEDDING_TIMEOUT_MS = 20_000;

export type EmbeddableProfile = Pick<
  Profile,
  "id" | "bio" | "seeking" | "offers" | "interests" | "goals"
>;

export type EmbeddingFailureCode =
  | "missing_api_key"
  | "timeout"
  | "network_error"
  | "http_error"
  | "invalid_response"
  | "dimension_mismatch";

export interface EmbeddingProvider {
  /** Resolves to null on any failure; the profile then keeps no embedding. */
  embedProfile(
    profile: EmbeddableProfile,
    options?: { correlationId?: string | null; signal?: AbortSignal },
  ): Promise<ProfileEmbedding | null>;
}

class EmbeddingRequestError extends Error {
  readonly code: EmbeddingFailureCode;
  readonly status: number | null;

  constructor(message: string, code: EmbeddingFailureCode, status: number | null = null) {
    super(message);
    this.name = "EmbeddingRequestError";
    this.code = code;
    this.status = status;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function joinParts(parts: Array<string | null>, empty: string): string {
  const present = parts.filter((part): part is string => !!part);
  return present.length > 0 ? present.join(" | ") : empty;
}

/** The three texts embedded per profile: whole profile, interests, expertise. */
export function buildEmbeddingTexts(profile: EmbeddableProfile): [string, string, string] {
  const interests = profile.interests.length > 0
    ? `Interests: ${profile.interests.join(", ")}`
    : null;
  const goals = profile.goals.length > 0 ? `Goals: ${profile.goals.join(", ")}` : null;
  const seeking = profile.seeking ? `Looking for: ${profile.seeking}` : null;
  const offers = profile.offers ? `Can help with: ${profile.offers}` : null;

  return [
    joinParts(
      [profile.bio ? `About: ${profile.bio}` : null, seeking, offers, interests, goals],
      "New user",
    ),
    joinParts([interests, goals, seeking], "General networking"),
    joinParts(
      [offers, profile.bio ? `Background: ${profile.bio.slice(0, 200)}` : null],
      "Open to connecting",
    ),
  ];
}

type EmbeddingResponse = {
  embedding: ProfileEmbedding;
  promptTokens: number;
};

function readPromptTokens(value: Record<string, unknown>): number {
  const usage = value.usage;
  if (!isRecord(usage)) {
    return 0;
  }
  const tokens = Number(usage.prompt_tokens ?? usage.total_tokens ?? 0);
  return Number.isFinite(tokens) && tokens > 0 ? tokens : 0;
}

function parseEmbeddingResponse(value: unknown, dimension: number): EmbeddingResponse {
  if (!isRecord(value) || !Array.isArray(value.data)) {
    throw new EmbeddingRequestError("Embedding response is missing data array.", "invalid_response");
  }

  const vectors: Array<number[] | undefined> = [];
  for (const [position, entry] of value.data.entries()) {
    if (!isRecord(entry) || !Array.isArray(entry.embedding)) {
      throw new EmbeddingRequestError("Embedding entry has no vector.", "invalid_response");
    }
    const index = typeof entry.index === "number" ? entry.index : position;
    const vector: number[] = [];
    for (const component of entry.embedding) {
      if (typeof component !== "number" || !Number.isFinite(component)) {
        throw new EmbeddingRequestError("Embedding vector has a non-numeric value.", "invalid_response");
      }
      vector.push(component);
    }
    if (vector.length !== dimension) {
      throw new EmbeddingRequestError(
        `Embedding vector has ${vector.length} dimensions, expected ${dimension}.`,
        "dimension_mismatch",
      );
    }
    vectors[index] = vector;
  }

  const [profile, interests, expertise] = vectors;
  if (!profile || !interests || !expertise) {
    throw new EmbeddingRequestError("Embedding response must contain three vectors.", "invalid_response");
  }
  return {
    embedding: { profile, interests, expertise },
    promptTokens: readPromptTokens(value),
  };
}

function recordEmbeddingUsage(model: string, promptTokens: number, correlationId: string | null): void {
  const estimate = estimateLlmCostUsd({ provider: "openai", model, input_tokens: promptTokens });
  const tags = { component: "embedding_provider", provider: "openai", model };

  emitMetricBestEffort({
    metric: "llm.token.input",
    value: estimate.input_tokens,
    correlation_id: correlationId,
    tags,
  });
  emitMetricBestEffort({
    metric: "llm.cost.estimated_usd",
    value: estimate.estimated_cost_usd,
    correlation_id: correlationId,
    tags: { ...tags, model: estimate.pricing_model, pricing_version: estimate.pricing_version },
  });
}

export function createOpenAiEmbeddingProvider(params?: {
  apiKey?: string | null;
  model?: string;
  timeoutMs?: number;
  dimension?: number;
  fetchImpl?: typeof fetch;
}): EmbeddingProvider {
  const apiKey = params?.apiKey ?? readEnv("OPENAI_API_KEY");
  const model = params?.model ?? OPENAI_DEFAULT_EMBEDDING_MODEL;
  const timeoutMs = params?.timeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS;
  const dimension = params?.dimension ?? EMBEDDING_DIMENSION;
  const fetchImpl = params?.fetchImpl ?? fetch;

  async function requestEmbeddings(texts: string[], signal: AbortSignal): Promise<EmbeddingResponse> {
    if (!apiKey) {
      throw new EmbeddingRequestError("OPENAI_API_KEY is not configured.", "missing_api_key");
    }

    let response: Response;
    try {
      response = await fetchImpl(OPENAI_EMBEDDINGS_ENDPOINT, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({ model, input: texts }),
        signal,
      });
    } catch (error) {
      throw isAbortError(error)
        ? new EmbeddingRequestError("Embedding call timed out.", "timeout")
        : new EmbeddingRequestError("Embedding provider network failure.", "network_error");
    }

    const rawText = await response.text();
    if (!response.ok) {
      throw new EmbeddingRequestError(
        "Embedding provider returned non-OK status.",
        "http_error",
        response.status,
      );
    }

    let parsedBody: unknown;
    try {
      parsedBody = JSON.parse(rawText);
    } catch {
      throw new EmbeddingRequestError("Embedding provider returned non-JSON payload.", "invalid_response");
    }
    return parseEmbeddingResponse(parsedBody, dimension);
  }

  return {
    async embedProfile(profile, options = {}) {
      const correlationId = options.correlationId ?? null;
      const startedAtMs = nowMetricMs();
      const controller = new AbortController();
      const abort = () => controller.abort();
      const timeoutId = setTimeout(abort, timeoutMs);
      options.signal?.addEventListener("abort", abort, { once: true });

      try {
        const { embedding, promptTokens } = await requestEmbeddings(
          buildEmbeddingTexts(profile),
          controller.signal,
        );
        recordEmbeddingUsage(model, promptTokens, correlationId);
        emitMetricBestEffort({
          metric: "embedding.request.count",
          value: 1,
          correlation_id: correlationId,
          tags: { component: "embedding_provider", model, outcome: "success" },
        });
        emitLatencyMetric({
          component: "embedding_provider",
          operation: "embed_profile",
          outcome: "success",
          startedAtMs,
          correlation_id: correlationId,
        });
        return embedding;
      } catch (error) {
        const code: EmbeddingFailureCode = error instanceof EmbeddingRequestError
          ? error.code
          : "invalid_response";
        logEvent({
          level: "warn",
          event: EVENTS.embedding.generationFailed,
          correlation_id: correlationId,
          profile_id: profile.id,
          payload: {
            profile_id: profile.id,
            error_code: code,
            status: error instanceof EmbeddingRequestError ? error.status : null,
            model,
          },
        });
        emitMetricBestEffort({
          metric: "embedding.request.count",
          value: 1,
          correlation_id: correlationId,
          tags: { component: "embedding_provider", model, outcome: code },
        });
        emitLatencyMetric({
          component: "embedding_provider",
          operation: "embed_profile",
          outcome: "error",
          startedAtMs,
          correlation_id: correlationId,
        });
        return null;
      } finally {
        clearTimeout(timeoutId);
        options.signal?.removeEventListener("abort", abort);
      }
    },
  };
}
