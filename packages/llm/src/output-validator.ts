export const OUTPUT_VALIDATOR_VERSION = "output_validator_v2";
export const PAIRING_TEXT_PROHIBITED_PATTERNS_VERSION = "pairing_text_prohibited_patterns_v1";

export type OutputViolation = {
  code: string;
  message: string;
};

export type ValidateModelOutputArgs = {
  rawText: string;
  requireJson?: boolean;
};

type ProhibitedPattern = {
  code: string;
  message: string;
  pattern: RegExp;
};

/** Phrases that must never reach a person through a rationale or a starter. */
export const PAIRING_TEXT_PROHIBITED_PATTERNS: readonly ProhibitedPattern[] = [
  {
    code: "no_guarantees",
    message: "Guarantees or certainty promises are not allowed.",
    pattern: /\b(guarantee(?:d|s)?|i promise|always works|never fails|100%\s*match|perfect match)\b/i,
  },
  {
    code: "no_feature_explaining",
    message: "Feature-explaining language is not allowed.",
    pattern: /\b(my algorithm|matching engine|llm|language model|embedding|similarity score|compatibility score)\b/i,
  },
  {
    code: "no_personality_scoring_language",
    message: "Personality scoring language is not allowed.",
    pattern: /\b(personality score|type score|you are an introvert|you are an extrovert)\b/i,
  },
] as const;

type ValidateModelOutputOk = {
  ok: true;
  sanitizedText: string;
  parsedJson: unknown;
  wrapperStripped: boolean;
};

type ValidateModelOutputFailed = {
  ok: false;
  sanitizedText?: string;
  violations: OutputViolation[];
};

export type ValidateModelOutputResult = ValidateModelOutputOk | ValidateModelOutputFailed;

function collectStringLeaves(value: unknown): string[] {
  if (typeof value === "string") {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.flatMap((entry) => collectStringLeaves(entry));
  }
  if (value && typeof value === "object") {
    return Object.values(value).flatMap((entry) => collectStringLeaves(entry));
  }
  return [];
}

export function stripMarkdownFence(text: string): { text: string; wrapped: boolean } {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```") || !trimmed.endsWith("```")) {
    return { text: trimmed, wrapped: false };
  }

  const inner = trimmed
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/i, "");
  return { text: inner.trim(), wrapped: true };
}

function extractWrappedJson(text: string): { jsonText: string; parsed: unknown } | null {
  const firstObject = text.indexOf("{");
  const firstArray = text.indexOf("[");
  const firstIndex = [firstObject, firstArray]
    .filter((index) => index >= 0)
    .reduce((minimum, current) => (minimum < 0 ? current : Math.min(minimum, current)), -1);

  if (firstIndex < 0) {
    return null;
  }

  const endChar = text[firstIndex] === "{" ? "}" : "]";
  const lastIndex = text.lastIndexOf(endChar);
  if (lastIndex <= firstIndex) {
    return null;
  }

  const candidate = text.slice(firstIndex, lastIndex + 1).trim();
  if (!candidate) {
    return null;
  }

  try {
    return { jsonText: candidate, parsed: JSON.parse(candidate) };
  } catch {
    return null;
  }
}

function checkProhibitedPatterns(stringsToScan: readonly string[]): OutputViolation[] {
  const violations: OutputViolation[] = [];

  for (const pattern of PAIRING_TEXT_PROHIBITED_PATTERNS) {
    const matched = stringsToScan.some((value) => pattern.pattern.test(value));
    if (!matched) {
      continue;
    }
    violations.push({
      code: pattern.code,
      message: pattern.message,
    });
  }

  return violations;
}

/**
 * Validate raw model text. With `requireJson`, markdown fences and prose around a
 * single JSON value are stripped (reported through `wrapperStripped`) and the
 * string leaves of the parsed value are scanned for prohibited phrasing.
 */
export function validateModelOutput(args: ValidateModelOutputArgs): ValidateModelOutputResult {
  const trimmed = args.rawText.trim();
  const requireJson = args.requireJson ?? false;

  if (!trimmed) {
    return {
      ok: false,
      violations: [{ code: "empty_output", message: "Model output is empty." }],
    };
  }

  let sanitizedText = trimmed;
  let parsedJson: unknown = null;
  let wrapperStripped = false;

  if (requireJson) {
    const unwrapped = stripMarkdownFence(trimmed);
    sanitizedText = unwrapped.text;
    wrapperStripped = unwrapped.wrapped;

    try {
      parsedJson = JSON.parse(sanitizedText);
    } catch {
      const wrappedJson = extractWrappedJson(sanitizedText);
      if (!wrappedJson) {
        return {
          ok: false,
          sanitizedText,
          violations: [{ code: "invalid_json", message: "Model output is not valid JSON." }],
        };
      }

      parsedJson = wrappedJson.parsed;
      sanitizedText = wrappedJson.jsonText;
      wrapperStripped = true;
    }
  }

  const stringsToScan = requireJson ? collectStringLeaves(parsedJson) : [sanitizedText];
  const violations = checkProhibitedPatterns(stringsToScan);
  if (violations.length > 0) {
    return {
      ok: false,
      sanitizedText,
      violations,
    };
  }

  return {
    ok: true,
    sanitizedText,
    parsedJson,
    wrapperStripped,
  };
}
