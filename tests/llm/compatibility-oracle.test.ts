import { afterEach, describe, expect, it, vi } from "vitest";
import {
  buildCompatibilityUserPrompt,
  createLlmCompatibilityOracle,
  createStaticCompatibilityOracle,
  FALLBACK_COMPATIBILITY_RESULT,
  type OracleLogger,
} from "../../packages/llm/src/compatibility-oracle";
import {
  LlmProviderError,
  type LlmProvider,
  type LlmProviderRequest,
} from "../../packages/llm/src/provider";
import { parseCompatibilityOutput } from "../../packages/llm/src/schemas/compatibility-output.schema";
import { makeProfile } from "../helpers/profiles";

const PERSON_A = makeProfile({
  id: "profile_a",
  bio: "Backend engineer",
  seeking: "a designer",
  offers: "API reviews",
  interests: ["Rust", "Climbing"],
  locality: "Lisbon",
});

const PERSON_B = makeProfile({
  id: "profile_b",
  goals: ["Launch a zine"],
});

function providerReturning(text: string): LlmProvider {
  return {
    async generateText() {
      return {
        text,
        model: "claude-3-5-haiku-latest",
        provider: "anthropic",
        usage: { input_tokens: 400, output_tokens: 80 },
      };
    },
  };
}

function createLoggerSpy() {
  const info = vi.fn<OracleLogger["info"]>();
  const warn = vi.fn<OracleLogger["warn"]>();
  return { logger: { info, warn }, info, warn };
}

describe("compatibility oracle", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds a prompt from explicit profile fields only", () => {
    expect(
      buildCompatibilityUserPrompt(PERSON_A, PERSON_B, {
        description: "Both people are attending the same event.",
      }),
    ).toBe([
      "PromptVersion: compatibility_oracle_v1",
      "",
      "=== PERSON A ===",
      "About: Backend engineer",
      "Looking for: a designer",
      "Can help with: API reviews",
      "Interests: Rust, Climbing",
      "Goals: (none)",
      "Locality: Lisbon",
      "",
      "=== PERSON B ===",
      "About: (not specified)",
      "Looking for: (not specified)",
      "Can help with: (not specified)",
      "Interests: (none)",
      "Goals: Launch a zine",
      "Locality: (not specified)",
      "",
      "Context: Both people are attending the same event.",
    ].join("\n"));
  });

  it("returns a parsed oracle result for valid JSON", async () => {
    const spy = createLoggerSpy();
    const requests: LlmProviderRequest[] = [];
    const provider: LlmProvider = {
      async generateText(request) {
        requests.push(request);
        return providerReturning(JSON.stringify({
          score: 0.82,
          category: " Professional ",
          rationale: " Both of you build developer tools. ",
          starter: "What is the last CLI you enjoyed using?",
        })).generateText(request);
      },
    };
    const oracle = createLlmCompatibilityOracle({ provider, logger: spy.logger });

    await expect(oracle.analyze(PERSON_A, PERSON_B)).resolves.toEqual({
      score: 0.82,
      category: "professional",
      rationale: "Both of you build developer tools.",
      starter: "What is the last CLI you enjoyed using?",
      source: "oracle",
    });
    expect(requests[0]?.timeoutMs).toBe(25_000);
    expect(spy.info).toHaveBeenCalledWith("oracle.call_completed", {
      correlation_id: null,
      prompt_version: "compatibility_oracle_v1",
      model: "claude-3-5-haiku-latest",
      score: 0.82,
      category: "professional",
      wrapper_stripped: false,
    });
    expect(spy.warn).not.toHaveBeenCalled();
  });

  it("accepts fenced JSON and legacy key names", async () => {
    const spy = createLoggerSpy();
    const oracle = createLlmCompatibilityOracle({
      provider: providerReturning([
        "```json",
        "{\"compatibility_score\": 0.61, \"match_type\": \"creative\", \"explanation\": \"Both of you make music.\", \"icebreaker\": \"What are you recording?\"}",
        "```",
      ].join("\n")),
      logger: spy.logger,
    });

    await expect(oracle.analyze(PERSON_A, PERSON_B)).resolves.toEqual({
      score: 0.61,
      category: "creative",
      rationale: "Both of you make music.",
      starter: "What are you recording?",
      source: "oracle",
    });
    expect(spy.info.mock.calls[0]?.[1]).toMatchObject({ wrapper_stripped: true });
  });

  it("falls back when the provider does not answer before the timeout", async () => {
    const spy = createLoggerSpy();
    const provider: LlmProvider = {
      generateText: () => new Promise(() => undefined),
    };
    const oracle = createLlmCompatibilityOracle({ provider, timeoutMs: 5, logger: spy.logger });

    const result = await oracle.analyze(PERSON_A, PERSON_B, { correlationId: "corr_timeout" });

    expect(result).toEqual({ ...FALLBACK_COMPATIBILITY_RESULT });
    expect(result).not.toBe(FALLBACK_COMPATIBILITY_RESULT);
    expect(spy.warn).toHaveBeenCalledWith("oracle.fallback_used", {
      correlation_id: "corr_timeout",
      prompt_version: "compatibility_oracle_v1",
      model: "unknown",
      error_code: "timeout",
      error_message: "Compatibility oracle call aborted.",
    });
  });

  it("reports cancellation when the caller's signal is already aborted", async () => {
    const spy = createLoggerSpy();
    const controller = new AbortController();
    controller.abort();
    const oracle = createLlmCompatibilityOracle({
      provider: { generateText: () => new Promise(() => undefined) },
      logger: spy.logger,
    });

    await expect(
      oracle.analyze(PERSON_A, PERSON_B, { signal: controller.signal }),
    ).resolves.toMatchObject({ source: "fallback" });
    expect(spy.warn.mock.calls[0]?.[1]).toMatchObject({ error_code: "cancelled" });
  });

  it.each([
    ["schema_invalid", JSON.stringify({ score: 1.4, category: "friendship", rationale: "r", starter: "s" })],
    ["invalid_json", "I think they would get along."],
    ["invalid_json", "   "],
    [
      "guardrail_violation",
      JSON.stringify({ score: 0.9, category: "romantic", rationale: "A perfect match.", starter: "Hi?" }),
    ],
  ])("falls back with %s for rejected output", async (expectedCode, text) => {
    const spy = createLoggerSpy();
    const oracle = createLlmCompatibilityOracle({
      provider: providerReturning(text),
      logger: spy.logger,
    });

    await expect(oracle.analyze(PERSON_A, PERSON_B)).resolves.toEqual({
      score: 0.5,
      category: "friendship",
      rationale: "You share interests that could make for a good conversation.",
      starter: "What brought you here, and what are you hoping to find?",
      source: "fallback",
    });
    expect(spy.warn.mock.calls[0]?.[1]).toMatchObject({
      error_code: expectedCode,
      model: "claude-3-5-haiku-latest",
    });
  });

  it("classifies provider errors by transience", async () => {
    const spy = createLoggerSpy();
    const oracle = createLlmCompatibilityOracle({
      provider: {
        async generateText() {
          throw new LlmProviderError("LLM provider returned non-OK status.", {
            transient: true,
            status: 429,
          });
        },
      },
      logger: spy.logger,
    });

    await oracle.analyze(PERSON_A, PERSON_B);

    expect(spy.warn.mock.calls[0]?.[1]).toMatchObject({
      error_code: "provider_transient",
      error_message: "LLM provider returned non-OK status.",
    });
  });

  it("delegates to a static resolver", async () => {
    const oracle = createStaticCompatibilityOracle((a, b) => ({
      score: a.id === "profile_a" && b.id === "profile_b" ? 0.9 : 0.1,
      category: "friendship",
      rationale: "r",
      starter: "s",
      source: "static",
    }));

    await expect(oracle.analyze(PERSON_A, PERSON_B)).resolves.toMatchObject({ score: 0.9 });
  });
});

describe("compatibility output schema", () => {
  it("rejects a score outside the unit interval", () => {
    expect(() =>
      parseCompatibilityOutput({ score: -0.1, category: "friendship", rationale: "r", starter: "s" })
    ).toThrow("output.score must be a finite number in [0,1].");
  });

  it("rejects an unknown category", () => {
    expect(() =>
      parseCompatibilityOutput({ score: 0.4, category: "business", rationale: "r", starter: "s" })
    ).toThrow("output.category must be one of friendship, professional, romantic, creative.");
  });

  it("caps rationale length at 600 characters", () => {
    const parsed = parseCompatibilityOutput({
      score: 0.4,
      category: "friendship",
      rationale: "a".repeat(700),
      starter: "s",
    });
    expect(parsed.rationale).toHaveLength(600);
  });
});
