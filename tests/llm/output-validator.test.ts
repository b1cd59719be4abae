import { describe, expect, it } from "vitest";
import {
  stripMarkdownFence,
  validateModelOutput,
} from "../../packages/llm/src/output-validator";

describe("output validator", () => {
  it("accepts plain JSON output when JSON is required", () => {
    const result = validateModelOutput({
      rawText: JSON.stringify({ score: 0.7, category: "friendship" }),
      requireJson: true,
    });

    expect(result).toEqual({
      ok: true,
      sanitizedText: "{\"score\":0.7,\"category\":\"friendship\"}",
      parsedJson: { score: 0.7, category: "friendship" },
      wrapperStripped: false,
    });
  });

  it("extracts JSON from a prose wrapper and reports the strip", () => {
    const result = validateModelOutput({
      rawText: "Sure. Here's the JSON:\n{\"score\":0.3} Hope that helps.",
      requireJson: true,
    });

    expect(result).toEqual({
      ok: true,
      sanitizedText: "{\"score\":0.3}",
      parsedJson: { score: 0.3 },
      wrapperStripped: true,
    });
  });

  it("rejects prohibited language in any string leaf", () => {
    const result = validateModelOutput({
      rawText: JSON.stringify({
        rationale: "Our matching engine picked you both.",
        nested: ["This is guaranteed to work."],
      }),
      requireJson: true,
    });

    expect(result.ok).toBe(false);
    if (result.ok) {
      throw new Error("expected validator to fail");
    }
    expect(result.violations.map((violation) => violation.code)).toEqual([
      "no_guarantees",
      "no_feature_explaining",
    ]);
  });

  it("reports empty output", () => {
    const result = validateModelOutput({ rawText: "\n  \n", requireJson: true });
    expect(result).toEqual({
      ok: false,
      violations: [{ code: "empty_output", message: "Model output is empty." }],
    });
  });

  it("scans raw text when JSON is not required", () => {
    const result = validateModelOutput({ rawText: "Your personality score is high." });
    expect(result.ok).toBe(false);
  });
});

describe("stripMarkdownFence", () => {
  it("removes a json fence", () => {
    expect(stripMarkdownFence("```json\n{\"a\":1}\n```")).toEqual({ text: "{\"a\":1}", wrapped: true });
  });

  it("leaves unfenced text alone", () => {
    expect(stripMarkdownFence("  {\"a\":1} ")).toEqual({ text: "{\"a\":1}", wrapped: false });
  });
});
