import type { CohortRef, PairingScope } from "../../../db/src/types/cohort.ts";
import type {
  CreatePairingInput,
  Pairing,
  PairingSide,
  PairingStatus,
} from "../../../db/src/types/pairing.ts";
import type { Profile, ProfileEmbedding } from "../../../db/src/types/profile.ts";

export type SimilarProfileQuery = {
  embedding: ProfileEmbedding;
  cohort: CohortRef;
  excludeProfileId: string;
  minSimilarity: number;
  limit: number;
};

export type SimilarProfile = {
  profile_id: string;
  similarity: number;
};

export interface ProfileStore {
  getProfile(profileId: string): Promise<Profile | null>;
  /** `excludeProfileId` null lists the whole cohort. */
  listCohortMembers(cohort: CohortRef, excludeProfileId: string | null, limit: number): Promise<Profile[]>;
  countCohortMembers(cohort: CohortRef, excludeProfileId: string | null): Promise<number>;
  /** Best first, already filtered by `minSimilarity`. */
  findSimilarProfiles(query: SimilarProfileQuery): Promise<SimilarProfile[]>;
  updateEmbedding(profileId: string, embedding: ProfileEmbedding): Promise<void>;
  listProfilesMissingEmbedding(limit: number): Promise<Profile[]>;
}

export type ListPairingsFilter = {
  status?: PairingStatus;
  scope?: PairingScope;
  limit?: number;
};

export interface PairingStore {
  /** Symmetric: `exists(s, a, b) === exists(s, b, a)`. */
  exists(scope: PairingScope, profileIdA: string, profileIdB: string): Promise<boolean>;
  /** Rejects with a DB_UNIQUE_VIOLATION DbError when the unordered pair already exists in scope. */
  create(input: CreatePairingInput): Promise<Pairing>;
  getById(pairingId: string): Promise<Pairing | null>;
  listForProfile(profileId: string, filter?: ListPairingsFilter): Promise<Pairing[]>;
  /** Compare-and-set; null when the row was no longer in `from`. */
  setStatus(pairingId: string, from: PairingStatus, to: PairingStatus): Promise<Pairing | null>;
  markNotified(pairingId: string, side: PairingSide): Promise<Pairing | null>;
  listUnnotified(limit: number): Promise<Pairing[]>;
}
