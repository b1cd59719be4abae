import { DB_ERROR_CODES, DbError } from "../errors.ts";
import { normalizeLocality } from "../scope.ts";
import type { CohortRef } from "../types/cohort.ts";
import {
  EMBEDDING_DIMENSION,
  type Profile,
  type ProfileEmbedding,
} from "../types/profile.ts";
import type { DbClient } from "../types.ts";

export const PROFILES_TABLE = "profiles";
export const MATCH_PROFILES_RPC = "match_profiles";

const PROFILE_COLUMNS = [
  "id",
  "display_name",
  "bio",
  "seeking",
  "offers",
  "interests",
  "goals",
  "locality",
  "current_event_id",
  "globally_eligible",
  "profile_embedding",
  "interests_embedding",
  "expertise_embedding",
].join(",");

export type SimilarProfileHit = {
  profile_id: string;
  similarity: number;
};

/** Load one active profile by id. */
export async function getProfileById(
  db: DbClient,
  profileId: string,
): Promise<Profile | null> {
  const { data, error } = await db
    .from(PROFILES_TABLE)
    .select(PROFILE_COLUMNS)
    .eq("id", profileId)
    .eq("is_active", true)
    .maybeSingle();

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to load profile.", {
      status: 500,
      cause: error,
      context: { profile_id: profileId, table: PROFILES_TABLE },
    });
  }

  return data ? toProfile(data) : null;
}

type CohortFilter = { op: "eq" | "neq"; column: string; value: string | boolean };

/** Equality filters selecting the active members of a cohort, minus one optional profile. */
export function cohortFilters(cohort: CohortRef, excludeProfileId: string | null): CohortFilter[] {
  const filters: CohortFilter[] = [{ op: "eq", column: "is_active", value: true }];
  if (excludeProfileId !== null) {
    filters.push({ op: "neq", column: "id", value: excludeProfileId });
  }

  switch (cohort.kind) {
    case "event":
      filters.push({ op: "eq", column: "current_event_id", value: cohort.event_id });
      break;
    case "locality":
      filters.push({ op: "eq", column: "locality_key", value: normalizeLocality(cohort.locality) ?? "" });
      break;
    case "global":
      filters.push({ op: "eq", column: "globally_eligible", value: true });
      break;
  }
  return filters;
}

/** List active members of a cohort; `excludeProfileId` null keeps every member. */
export async function listCohortMembers(
  db: DbClient,
  input: {
    cohort: CohortRef;
    excludeProfileId: string | null;
    limit: number;
  },
): Promise<Profile[]> {
  let query = db.from(PROFILES_TABLE).select(PROFILE_COLUMNS);
  for (const filter of cohortFilters(input.cohort, input.excludeProfileId)) {
    query = filter.op === "eq"
      ? query.eq(filter.column, filter.value)
      : query.neq(filter.column, filter.value);
  }

  const { data, error } = await query.order("id", { ascending: true }).limit(input.limit);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to list cohort members.", {
      status: 500,
      cause: error,
      context: { cohort_kind: input.cohort.kind, table: PROFILES_TABLE },
    });
  }

  return toProfileList(data);
}

/** Count active cohort members without loading any rows. */
export async function countCohortMembers(
  db: DbClient,
  input: {
    cohort: CohortRef;
    excludeProfileId: string | null;
  },
): Promise<number> {
  let query = db.from(PROFILES_TABLE).select("id", { count: "exact", head: true });
  for (const filter of cohortFilters(input.cohort, input.excludeProfileId)) {
    query = filter.op === "eq"
      ? query.eq(filter.column, filter.value)
      : query.neq(filter.column, filter.value);
  }

  const { count, error } = await query;

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to count cohort members.", {
      status: 500,
      cause: error,
      context: { cohort_kind: input.cohort.kind, table: PROFILES_TABLE },
    });
  }

  if (typeof count !== "number") {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Cohort count query returned no count.", {
      status: 500,
      context: { cohort_kind: input.cohort.kind, table: PROFILES_TABLE },
    });
  }
  return count;
}

/** Vector similarity search over one cohort, weighted across the three embeddings. */
export async function findSimilarProfiles(
  db: DbClient,
  input: {
    embedding: ProfileEmbedding;
    cohort: CohortRef;
    excludeProfileId: string;
    minSimilarity: number;
    limit: number;
  },
): Promise<SimilarProfileHit[]> {
  const { data, error } = await db.rpc(MATCH_PROFILES_RPC, {
    query_profile_embedding: input.embedding.profile,
    query_interests_embedding: input.embedding.interests,
    query_expertise_embedding: input.embedding.expertise,
    exclude_profile_id: input.excludeProfileId,
    cohort_kind: input.cohort.kind,
    cohort_event_id: input.cohort.kind === "event" ? input.cohort.event_id : null,
    cohort_locality: input.cohort.kind === "locality"
      ? normalizeLocality(input.cohort.locality)
      : null,
    similarity_threshold: input.minSimilarity,
    limit_count: input.limit,
  });

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Vector similarity query failed.", {
      status: 500,
      cause: error,
      context: { rpc: MATCH_PROFILES_RPC, cohort_kind: input.cohort.kind },
    });
  }

  if (!Array.isArray(data)) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Vector similarity query returned no rows array.", {
      status: 500,
      context: { rpc: MATCH_PROFILES_RPC },
    });
  }

  const hits: SimilarProfileHit[] = [];
  for (const entry of data) {
    const hit = toSimilarProfileHit(entry);
    if (hit && hit.profile_id !== input.excludeProfileId) {
      hits.push(hit);
    }
  }
  return hits;
}

/** Store freshly generated embeddings; the latest write wins. */
export async function updateProfileEmbedding(
  db: DbClient,
  profileId: string,
  embedding: ProfileEmbedding,
): Promise<void> {
  const { error } = await db
    .from(PROFILES_TABLE)
    .update({
      profile_embedding: embedding.profile,
      interests_embedding: embedding.interests,
      expertise_embedding: embedding.expertise,
    })
    .eq("id", profileId);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to store profile embeddings.", {
      status: 500,
      cause: error,
      context: { profile_id: profileId, table: PROFILES_TABLE },
    });
  }
}

/** Active profiles that still have no profile embedding. */
export async function listProfilesMissingEmbedding(
  db: DbClient,
  limit: number,
): Promise<Profile[]> {
  const { data, error } = await db
    .from(PROFILES_TABLE)
    .select(PROFILE_COLUMNS)
    .eq("is_active", true)
    .is("profile_embedding", null)
    .order("id", { ascending: true })
    .limit(limit);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to list profiles missing embeddings.", {
      status: 500,
      cause: error,
      context: { table: PROFILES_TABLE },
    });
  }

  return toProfileList(data);
}

export function toProfile(value: unknown, dimension: number = EMBEDDING_DIMENSION): Profile | null {
  if (!isRecord(value) || typeof value.id !== "string" || value.id.length === 0) {
    return null;
  }

  return {
    id: value.id,
    display_name: readNullableString(value.display_name),
    bio: readString(value.bio),
    seeking: readString(value.seeking),
    offers: readString(value.offers),
    interests: dedupeTags(value.interests),
    goals: dedupeTags(value.goals),
    locality: readNullableString(value.locality),
    embedding: toProfileEmbedding(
      {
        profile: value.profile_embedding,
        interests: value.interests_embedding,
        expertise: value.expertise_embedding,
      },
      dimension,
    ),
    current_event_id: readNullableString(value.current_event_id),
    globally_eligible: value.globally_eligible === true,
  };
}

/**
 * Map raw vector columns to an embedding. All three vectors must be present and share
 * the expected dimension; anything else is treated as "no embedding yet".
 */
export function toProfileEmbedding(
  raw: { profile: unknown; interests: unknown; expertise: unknown },
  dimension: number = EMBEDDING_DIMENSION,
): ProfileEmbedding | null {
  const profile = parseVector(raw.profile);
  const interests = parseVector(raw.interests);
  const expertise = parseVector(raw.expertise);
  if (!profile || !interests || !expertise) {
    return null;
  }
  if (
    profile.length !== dimension ||
    interests.length !== dimension ||
    expertise.length !== dimension
  ) {
    return null;
  }
  return { profile, interests, expertise };
}

export function dedupeTags(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const seen = new Set<string>();
  const tags: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") {
      continue;
    }
    const tag = entry.trim();
    const key = tag.toLowerCase();
    if (!tag || seen.has(key)) {
      continue;
    }
    seen.add(key);
    tags.push(tag);
  }
  return tags;
}

function toProfileList(data: unknown): Profile[] {
  if (!Array.isArray(data)) {
    return [];
  }
  const profiles: Profile[] = [];
  for (const row of data) {
    const profile = toProfile(row);
    if (profile) {
      profiles.push(profile);
    }
  }
  return profiles;
}

function toSimilarProfileHit(value: unknown): SimilarProfileHit | null {
  if (!isRecord(value) || typeof value.profile_id !== "string") {
    return null;
  }
  const similarity = Number(value.similarity);
  if (!Number.isFinite(similarity)) {
    return null;
  }
  return { profile_id: value.profile_id, similarity };
}

function parseVector(value: unknown): number[] | null {
  let candidate: unknown = value;
  if (typeof value === "string") {
    try {
      candidate = JSON.parse(value);
    } catch {
      return null;
    }
  }
  if (!Array.isArray(candidate) || candidate.length === 0) {
    return null;
  }
  const vector: number[] = [];
  for (const entry of candidate) {
    if (typeof entry !== "number" || !Number.isFinite(entry)) {
      return null;
    }
    vector.push(entry);
  }
  return vector;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function readString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function readNullableString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
