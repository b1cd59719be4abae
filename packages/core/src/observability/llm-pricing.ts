export type LlmPricedProvider = "anthropic" | "openai";

/** Prices in nano-USD per token; embeddings bill input tokens only. */
export type LlmPricingRule = {
  provider: LlmPricedProvider;
  pricing_model: string;
  model_prefix: string;
  input_nano_usd_per_token: number;
  output_nano_usd_per_token: number;
};

export type LlmCostEstimate = {
  pricing_version: string;
  provider: LlmPricedProvider;
  pricing_model: string;
  input_tokens: number;
  output_tokens: number;
  total_nano_usd: number;
  estimated_cost_usd: number;
};

export const LLM_PRICING_VERSION = "2026-10-01.v2";

// Most specific prefix first within a provider; the first rule of each provider is its default.
export const LLM_PRICING_RULES: readonly LlmPricingRule[] = Object.freeze([
  {
    provider: "anthropic",
    pricing_model: "claude-3-5-haiku",
    model_prefix: "claude-3-5-haiku",
    input_nano_usd_per_token: 800,
    output_nano_usd_per_token: 4_000,
  },
  {
    provider: "anthropic",
    pricing_model: "claude-3-5-sonnet",
    model_prefix: "claude-3-5-sonnet",
    input_nano_usd_per_token: 3_000,
    output_nano_usd_per_token: 15_000,
  },
  {
    provider: "openai",
    pricing_model: "text-embedding-3-small",
    model_prefix: "text-embedding-3-small",
    input_nano_usd_per_token: 20,
    output_nano_usd_per_token: 0,
  },
  {
    provider: "openai",
    pricing_model: "text-embedding-3-large",
    model_prefix: "text-embedding-3-large",
    input_nano_usd_per_token: 130,
    output_nano_usd_per_token: 0,
  },
]);

const NANO_USD_PER_USD = 1_000_000_000;

/** Unknown or blank models bill at the provider's default rule. */
export function resolvePricingRule(provider: LlmPricedProvider, model: string): LlmPricingRule {
  const normalized = model.trim().toLowerCase();
  const rules = LLM_PRICING_RULES.filter((rule) => rule.provider === provider);
  const matched = normalized
    ? rules.find((rule) => normalized.startsWith(rule.model_prefix))
    : undefined;
  const rule = matched ?? rules[0];
  if (!rule) {
    throw new Error(`No pricing rules configured for provider '${provider}'.`);
  }
  return rule;
}

export function estimateLlmCostUsd(input: {
  provider: LlmPricedProvider;
  model: string;
  input_tokens: number;
  output_tokens?: number;
}): LlmCostEstimate {
  const rule = resolvePricingRule(input.provider, input.model);
  const inputTokens = toTokenCount(input.input_tokens);
  const outputTokens = toTokenCount(input.output_tokens ?? 0);
  const totalNanoUsd = inputTokens * rule.input_nano_usd_per_token +
    outputTokens * rule.output_nano_usd_per_token;

  return {
    pricing_version: LLM_PRICING_VERSION,
    provider: rule.provider,
    pricing_model: rule.pricing_model,
    input_tokens: inputTokens,
    output_tokens: outputTokens,
    total_nano_usd: totalNanoUsd,
    estimated_cost_usd: Number((totalNanoUsd / NANO_USD_PER_USD).toFixed(9)),
  };
}

function toTokenCount(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}
