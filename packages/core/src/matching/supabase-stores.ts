import {
  countCohortMembers,
  findSimilarProfiles,
  getProfileById,
  listCohortMembers,
  listProfilesMissingEmbedding,
  updateProfileEmbedding,
} from "../../../db/src/queries/profiles.ts";
import {
  createPairing,
  getPairingById,
  listPairingsForProfile,
  listUnnotifiedPairings,
  markPairingNotified,
  pairingExists,
  setPairingStatus,
} from "../../../db/src/queries/pairings.ts";
import { toScopeKey } from "../../../db/src/scope.ts";
import type { DbClient } from "../../../db/src/types.ts";
import type { PairingStore, ProfileStore } from "./ports.ts";

export function createSupabaseProfileStore(db: DbClient): ProfileStore {
  return {
    getProfile: (profileId) => getProfileById(db, profileId),
    listCohortMembers: (cohort, excludeProfileId, limit) =>
      listCohortMembers(db, { cohort, excludeProfileId, limit }),
    countCohortMembers: (cohort, excludeProfileId) =>
      countCohortMembers(db, { cohort, excludeProfileId }),
    findSimilarProfiles: (query) => findSimilarProfiles(db, query),
    updateEmbedding: (profileId, embedding) => updateProfileEmbedding(db, profileId, embedding),
    listProfilesMissingEmbedding: (limit) => listProfilesMissingEmbedding(db, limit),
  };
}

export function createSupabasePairingStore(db: DbClient): PairingStore {
  return {
    exists: (scope, profileIdA, profileIdB) =>
      pairingExists(db, { profileIdA, profileIdB, scopeKey: toScopeKey(scope) }),
    create: (input) => createPairing(db, input),
    getById: (pairingId) => getPairingById(db, pairingId),
    listForProfile: (profileId, filter = {}) =>
      listPairingsForProfile(db, profileId, {
        status: filter.status,
        scopeKey: filter.scope ? toScopeKey(filter.scope) : undefined,
        limit: filter.limit,
      }),
    setStatus: (pairingId, from, to) => setPairingStatus(db, { pairingId, from, to }),
    markNotified: (pairingId, side) => markPairingNotified(db, pairingId, side),
    listUnnotified: (limit) => listUnnotifiedPairings(db, limit),
  };
}
