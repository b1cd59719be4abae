import { describe, expect, it } from "vitest";

import { DB_ERROR_CODES, DbError, isUniqueViolation } from "../../packages/db/src/errors";

describe("DbError", () => {
  it("serializes with safe redaction", () => {
    const error = new DbError(DB_ERROR_CODES.QUERY_FAILED, "query failed", {
      status: 500,
      context: {
        supabase_url: "https://example.supabase.co",
        service_role_key: "test-secret",
        authorization: "Bearer test-token",
        nested: {
          token: "test-token",
          ok: "value",
        },
      },
    });

    expect(error.toJSON()).toEqual({
      name: "DbError",
      code: "DB_QUERY_FAILED",
      message: "query failed",
      status: 500,
      context: {
        supabase_url: "[REDACTED]",
        service_role_key: "[REDACTED]",
        authorization: "[REDACTED]",
        nested: {
          token: "[REDACTED]",
          ok: "value",
        },
      },
    });
  });

  it("wraps unknown errors with stable code", () => {
    const cause = new Error("boom");
    const wrapped = DbError.fromUnknown({
      code: DB_ERROR_CODES.CLIENT_INIT_FAILED,
      message: "client init failed",
      error: cause,
      context: {
        secret: "test-secret",
      },
    });

    expect(wrapped).toBeInstanceOf(DbError);
    expect(wrapped.code).toBe("DB_CLIENT_INIT_FAILED");
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.toJSON().context).toEqual({
      secret: "[REDACTED]",
    });
  });

  it("passes an existing DbError through unchanged", () => {
    const original = new DbError(DB_ERROR_CODES.UNIQUE_VIOLATION, "duplicate", { status: 409 });
    expect(
      DbError.fromUnknown({ code: DB_ERROR_CODES.QUERY_FAILED, message: "wrapped", error: original }),
    ).toBe(original);
  });

  it("recognizes the postgres unique_violation code", () => {
    expect(isUniqueViolation({ code: "23505", message: "duplicate key" })).toBe(true);
    expect(isUniqueViolation({ code: "23503" })).toBe(false);
    expect(isUniqueViolation("23505")).toBe(false);
  });
});
