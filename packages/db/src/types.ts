import type { SupabaseClient } from "@supabase/supabase-js";

export type DbClient = SupabaseClient;

export type { CohortKind, CohortRef, PairingScope } from "./types/cohort.ts";
export type { CompatibilityResult, CompatibilityResultSource } from "./types/compatibility.ts";
export {
  PAIRING_CATEGORIES,
  PAIRING_STATUSES,
  type CreatePairingInput,
  type Pairing,
  type PairingCategory,
  type PairingSide,
  type PairingStatus,
} from "./types/pairing.ts";
export {
  EMBEDDING_DIMENSION,
  type Profile,
  type ProfileEmbedding,
} from "./types/profile.ts";
