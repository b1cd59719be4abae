import type { PairingScope } from "./types/cohort.ts";

export const GLOBAL_SCOPE_KEY = "global";

export function normalizeLocality(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim().replace(/\s+/g, " ").toLowerCase();
  return normalized.length > 0 ? normalized : null;
}

/** Stable text key used for the per-scope uniqueness of a pairing. */
export function toScopeKey(scope: PairingScope): string {
  switch (scope.kind) {
    case "event":
      return `event:${scope.event_id}`;
    case "locality":
      return `locality:${normalizeLocality(scope.locality) ?? ""}`;
    case "global":
      return GLOBAL_SCOPE_KEY;
  }
}

export function fromScopeKey(scopeKey: string): PairingScope | null {
  if (scopeKey === GLOBAL_SCOPE_KEY) {
    return { kind: "global" };
  }
  if (scopeKey.startsWith("event:") && scopeKey.length > "event:".length) {
    return { kind: "event", event_id: scopeKey.slice("event:".length) };
  }
  if (scopeKey.startsWith("locality:") && scopeKey.length > "locality:".length) {
    return { kind: "locality", locality: scopeKey.slice("locality:".length) };
  }
  return null;
}

export function scopeColumns(scope: PairingScope): {
  scope_key: string;
  event_id: string | null;
  locality: string | null;
} {
  return {
    scope_key: toScopeKey(scope),
    event_id: scope.kind === "event" ? scope.event_id : null,
    locality: scope.kind === "locality" ? normalizeLocality(scope.locality) : null,
  };
}

