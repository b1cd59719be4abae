import { DB_ERROR_CODES, DbError, isUniqueViolation } from "../errors.ts";
import { fromScopeKey, scopeColumns } from "../scope.ts";
import {
  PAIRING_CATEGORIES,
  PAIRING_STATUSES,
  type CreatePairingInput,
  type Pairing,
  type PairingCategory,
  type PairingSide,
  type PairingStatus,
} from "../types/pairing.ts";
import type { DbClient } from "../types.ts";

export const PAIRINGS_TABLE = "pairings";

const PAIRING_COLUMNS = [
  "id",
  "profile_a_id",
  "profile_b_id",
  "scope_key",
  "event_id",
  "locality",
  "score",
  "category",
  "rationale",
  "starter",
  "status",
  "profile_a_notified",
  "profile_b_notified",
  "created_at",
].join(",");

/**
 * True when the two profiles already share a pairing in this scope, in either order.
 * Self-pairs never exist, so matching both columns against the same two ids is exact.
 */
export async function pairingExists(
  db: DbClient,
  input: { profileIdA: string; profileIdB: string; scopeKey: string },
): Promise<boolean> {
  const ids = [input.profileIdA, input.profileIdB];
  const { data, error } = await db
    .from(PAIRINGS_TABLE)
    .select("id")
    .eq("scope_key", input.scopeKey)
    .in("profile_a_id", ids)
    .in("profile_b_id", ids)
    .limit(1);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to check pairing existence.", {
      status: 500,
      cause: error,
      context: { scope_key: input.scopeKey, table: PAIRINGS_TABLE },
    });
  }

  return Array.isArray(data) && data.length > 0;
}

/** Insert a pending pairing. A concurrent duplicate surfaces as DB_UNIQUE_VIOLATION. */
export async function createPairing(
  db: DbClient,
  input: CreatePairingInput,
): Promise<Pairing> {
  const columns = scopeColumns(input.scope);
  const { data, error } = await db
    .from(PAIRINGS_TABLE)
    .insert({
      profile_a_id: input.profile_a_id,
      profile_b_id: input.profile_b_id,
      scope_key: columns.scope_key,
      event_id: columns.event_id,
      locality: columns.locality,
      score: input.score,
      category: input.category,
      rationale: input.rationale,
      starter: input.starter,
      status: "pending",
      profile_a_notified: false,
      profile_b_notified: false,
    })
    .select(PAIRING_COLUMNS)
    .single();

  if (error) {
    if (isUniqueViolation(error)) {
      throw new DbError(DB_ERROR_CODES.UNIQUE_VIOLATION, "Pairing already exists for this scope.", {
        status: 409,
        cause: error,
        context: { scope_key: columns.scope_key, table: PAIRINGS_TABLE },
      });
    }
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to create pairing.", {
      status: 500,
      cause: error,
      context: { scope_key: columns.scope_key, table: PAIRINGS_TABLE },
    });
  }

  return requirePairing(data, "createPairing");
}

export async function getPairingById(
  db: DbClient,
  pairingId: string,
): Promise<Pairing | null> {
  const { data, error } = await db
    .from(PAIRINGS_TABLE)
    .select(PAIRING_COLUMNS)
    .eq("id", pairingId)
    .maybeSingle();

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to load pairing.", {
      status: 500,
      cause: error,
      context: { pairing_id: pairingId, table: PAIRINGS_TABLE },
    });
  }

  return data ? requirePairing(data, "getPairingById") : null;
}

/** Double-quoted PostgREST filter value; commas and parentheses inside stay literal. */
export function quoteFilterValue(value: string): string {
  return `"${value.replace(/[\\"]/g, (character) => `\\${character}`)}"`;
}

/** Pairings where the profile is on either side, best score first. */
export async function listPairingsForProfile(
  db: DbClient,
  profileId: string,
  filters: { status?: PairingStatus; scopeKey?: string; limit?: number } = {},
): Promise<Pairing[]> {
  const quotedId = quoteFilterValue(profileId);
  let query = db
    .from(PAIRINGS_TABLE)
    .select(PAIRING_COLUMNS)
    .or(`profile_a_id.eq.${quotedId},profile_b_id.eq.${quotedId}`);

  if (filters.status) {
    query = query.eq("status", filters.status);
  }
  if (filters.scopeKey) {
    query = query.eq("scope_key", filters.scopeKey);
  }

  const { data, error } = await query
    .order("score", { ascending: false })
    .order("created_at", { ascending: true })
    .limit(filters.limit ?? 100);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to list pairings for profile.", {
      status: 500,
      cause: error,
      context: { profile_id: profileId, table: PAIRINGS_TABLE },
    });
  }

  return toPairingList(data, "listPairingsForProfile");
}

/**
 * Compare-and-set status update. Returns null when the row was not in `from` status
 * at write time, so a concurrent transition is never overwritten.
 */
export async function setPairingStatus(
  db: DbClient,
  input: { pairingId: string; from: PairingStatus; to: PairingStatus },
): Promise<Pairing | null> {
  const { data, error } = await db
    .from(PAIRINGS_TABLE)
    .update({ status: input.to })
    .eq("id", input.pairingId)
    .eq("status", input.from)
    .select(PAIRING_COLUMNS)
    .maybeSingle();

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to update pairing status.", {
      status: 500,
      cause: error,
      context: { pairing_id: input.pairingId, next_status: input.to, table: PAIRINGS_TABLE },
    });
  }

  return data ? requirePairing(data, "setPairingStatus") : null;
}

export async function markPairingNotified(
  db: DbClient,
  pairingId: string,
  side: PairingSide,
): Promise<Pairing | null> {
  const patch = side === "a" ? { profile_a_notified: true } : { profile_b_notified: true };
  const { data, error } = await db
    .from(PAIRINGS_TABLE)
    .update(patch)
    .eq("id", pairingId)
    .select(PAIRING_COLUMNS)
    .maybeSingle();

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to mark pairing notified.", {
      status: 500,
      cause: error,
      context: { pairing_id: pairingId, side, table: PAIRINGS_TABLE },
    });
  }

  return data ? requirePairing(data, "markPairingNotified") : null;
}

/** Pending pairings where at least one side has not been told yet, oldest first. */
export async function listUnnotifiedPairings(
  db: DbClient,
  limit: number,
): Promise<Pairing[]> {
  const { data, error } = await db
    .from(PAIRINGS_TABLE)
    .select(PAIRING_COLUMNS)
    .eq("status", "pending")
    .or("profile_a_notified.eq.false,profile_b_notified.eq.false")
    .order("created_at", { ascending: true })
    .limit(limit);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to list unnotified pairings.", {
      status: 500,
      cause: error,
      context: { table: PAIRINGS_TABLE },
    });
  }

  return toPairingList(data, "listUnnotifiedPairings");
}

export function toPairing(value: unknown): Pairing | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  const row: Record<string, unknown> = { ...value };

  if (
    typeof row.id !== "string" ||
    typeof row.profile_a_id !== "string" ||
    typeof row.profile_b_id !== "string" ||
    typeof row.scope_key !== "string" ||
    typeof row.created_at !== "string"
  ) {
    return null;
  }

  const scope = fromScopeKey(row.scope_key);
  const category = toCategory(row.category);
  const status = toStatus(row.status);
  const score = Number(row.score);
  if (!scope || !category || !status || !Number.isFinite(score)) {
    return null;
  }

  return {
    id: row.id,
    profile_a_id: row.profile_a_id,
    profile_b_id: row.profile_b_id,
    scope,
    scope_key: row.scope_key,
    score,
    category,
    rationale: typeof row.rationale === "string" ? row.rationale : "",
    starter: typeof row.starter === "string" ? row.starter : "",
    status,
    profile_a_notified: row.profile_a_notified === true,
    profile_b_notified: row.profile_b_notified === true,
    created_at: row.created_at,
  };
}

function requirePairing(value: unknown, operation: string): Pairing {
  const pairing = toPairing(value);
  if (!pairing) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Pairing row has an unexpected shape.", {
      status: 500,
      context: { operation, table: PAIRINGS_TABLE },
    });
  }
  return pairing;
}

function toPairingList(data: unknown, operation: string): Pairing[] {
  if (!Array.isArray(data)) {
    return [];
  }
  return data.map((row) => requirePairing(row, operation));
}

function toCategory(value: unknown): PairingCategory | null {
  return PAIRING_CATEGORIES.find((category) => category === value) ?? null;
}

function toStatus(value: unknown): PairingStatus | null {
  return PAIRING_STATUSES.find((status) => status === value) ?? null;
}
