const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+?\d[\d().\-\s]{8,}\d)/g;

const FORBIDDEN_PROFILE_TEXT_KEY_PATTERN =
  /(^|[_-])(bio|seeking|offers|looking_for|can_help_with|self_description)$/i;
const FORBIDDEN_ORACLE_TEXT_KEY_PATTERN =
  /(^|[_-])(rationale|starter|prompt|user_prompt|raw_output|response_text)$/i;
const FORBIDDEN_SECRET_KEY_PATTERN = /(api[_-]?key|secret|(^|[_-])token$|authorization|password)/i;

export const REDACTED_PROFILE_TEXT = "[REDACTED_PROFILE_TEXT]";
export const REDACTED_ORACLE_TEXT = "[REDACTED_ORACLE_TEXT]";
export const REDACTED_SECRET = "[REDACTED]";

export function redactPII<T>(input: T): T {
  const seen = new WeakSet<object>();
  return redactValue(input, "", seen) as T;
}

/** True when a free-form value carries an email address or phone number. */
export function containsPII(value: string): boolean {
  return redactString(value) !== value;
}

function redactValue(input: unknown, keyName: string, seen: WeakSet<object>): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (FORBIDDEN_SECRET_KEY_PATTERN.test(keyName)) {
    return REDACTED_SECRET;
  }
  if (FORBIDDEN_PROFILE_TEXT_KEY_PATTERN.test(keyName)) {
    return REDACTED_PROFILE_TEXT;
  }
  if (FORBIDDEN_ORACLE_TEXT_KEY_PATTERN.test(keyName)) {
    return REDACTED_ORACLE_TEXT;
  }

  if (typeof input === "string") {
    return redactString(input);
  }

  if (typeof input !== "object") {
    return input;
  }

  if (input instanceof Error) {
    return input;
  }

  if (seen.has(input)) {
    return "[Circular]";
  }
  seen.add(input);

  if (Array.isArray(input)) {
    return input.map((value) => redactValue(value, keyName, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [childKey, childValue] of Object.entries(input)) {
    output[childKey] = redactValue(childValue, childKey, seen);
  }
  return output;
}

function redactString(input: string): string {
  let redacted = input.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]");
  redacted = redacted.replace(PHONE_PATTERN, (candidate) => {
    const digits = candidate.replace(/\D/g, "");
    if (digits.length < 10 || digits.length > 15) {
      return candidate;
    }
    return "[REDACTED_PHONE]";
  });
  return redacted;
}
