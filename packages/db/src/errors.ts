export const DB_ERROR_CODES = {
  MISSING_ENV: "DB_MISSING_ENV",
  INVALID_ENV: "DB_INVALID_ENV",
  CLIENT_INIT_FAILED: "DB_CLIENT_INIT_FAILED",
  QUERY_FAILED: "DB_QUERY_FAILED",
  UNEXPECTED_RESPONSE: "DB_UNEXPECTED_RESPONSE",
  UNIQUE_VIOLATION: "DB_UNIQUE_VIOLATION",
} as const;

export type DbErrorCode = (typeof DB_ERROR_CODES)[keyof typeof DB_ERROR_CODES];

const SENSITIVE_KEY_PATTERN =
  /(api[_-]?key|role[_-]?key|anon[_-]?key|secret|token|authorization|password|supabase_url)/i;
const REDACTED = "[REDACTED]";

/** Deep-copy a value with secret-looking keys replaced by a placeholder. */
export function sanitizeForError(value: unknown): unknown {
  return sanitizeValue(value, new WeakSet<object>());
}

function sanitizeValue(value: unknown, seen: WeakSet<object>): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeValue(entry, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    output[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : sanitizeValue(entry, seen);
  }
  return output;
}

export class DbError extends Error {
  readonly code: DbErrorCode;
  readonly status: number;
  readonly context: unknown;

  constructor(
    code: DbErrorCode,
    message: string,
    options: {
      status?: number;
      context?: unknown;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DbError";
    this.code = code;
    this.status = options.status ?? 500;
    this.context = sanitizeForError(options.context ?? null);
  }

  toJSON(): {
    name: string;
    code: DbErrorCode;
    message: string;
    status: number;
    context: unknown;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
      context: this.context,
    };
  }

  static fromUnknown(params: {
    code: DbErrorCode;
    message: string;
    error: unknown;
    status?: number;
    context?: unknown;
  }): DbError {
    if (params.error instanceof DbError) {
      return params.error;
    }
    return new DbError(params.code, params.message, {
      status: params.status,
      context: params.context,
      cause: params.error,
    });
  }
}

export function assertRequiredEnv(name: string, value: string | undefined | null): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new DbError(DB_ERROR_CODES.MISSING_ENV, `Missing required env var: ${name}`, {
      status: 500,
      context: { env_var: name },
    });
  }
  return value.trim();
}

/** Postgres unique_violation surfaced through PostgREST. */
export function isUniqueViolation(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }
  return "code" in error && error.code === "23505";
}
