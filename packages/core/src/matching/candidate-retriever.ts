import type { CohortRef } from "../../../db/src/types/cohort.ts";
import type { Profile } from "../../../db/src/types/profile.ts";
import { EVENTS } from "../observability/events.ts";
import { logEvent, type StructuredLogger } from "../observability/logger.ts";
import { emitMetricBestEffort } from "../observability/metrics.ts";
import { DEFAULT_MATCHING_CONFIG } from "./config.ts";
import { scoreHeuristicPair } from "./heuristic-score.ts";
import type { ProfileStore } from "./ports.ts";

/** Fraction of the threshold a heuristic score needs to survive fallback retrieval. */
export const FALLBACK_RETRIEVAL_GATE = 0.7;

export type CandidateSource = "vector" | "heuristic";

export type Candidate = {
  profile: Profile;
  similarity: number;
  source: CandidateSource;
};

export type RetrievalSource = CandidateSource | "none";

export type RetrievalResult = {
  candidates: Candidate[];
  source: RetrievalSource;
  /** Cohort members other than the requester; null when the cohort could not be counted or listed. */
  cohortSize: number | null;
  degradedReason: string | null;
};

export type RetrieveCandidatesInput = {
  profile: Profile;
  cohort: CohortRef;
  limit?: number;
  correlationId?: string | null;
};

export type CandidateRetrieverOptions = {
  profileStore: ProfileStore;
  threshold?: number;
  minSimilarity?: number;
  retrievalTimeoutMs?: number;
  cohortScanLimit?: number;
  log?: StructuredLogger;
};

export type CandidateRetriever = {
  retrieveCandidates(input: RetrieveCandidatesInput): Promise<RetrievalResult>;
};

export class RetrievalTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Vector retrieval exceeded ${timeoutMs}ms.`);
    this.name = "RetrievalTimeoutError";
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  createError: () => Error,
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(createError()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createCandidateRetriever(options: CandidateRetrieverOptions): CandidateRetriever {
  const threshold = options.threshold ?? DEFAULT_MATCHING_CONFIG.threshold;
  const minSimilarity = options.minSimilarity ?? DEFAULT_MATCHING_CONFIG.vectorMinSimilarity;
  const retrievalTimeoutMs = options.retrievalTimeoutMs ?? DEFAULT_MATCHING_CONFIG.retrievalTimeoutMs;
  const cohortScanLimit = options.cohortScanLimit ?? DEFAULT_MATCHING_CONFIG.cohortScanLimit;
  const log = options.log ?? logEvent;
  const store = options.profileStore;

  function logDegraded(
    profileId: string,
    reason: string,
    correlationId: string | null,
    error?: unknown,
  ): void {
    log({
      level: "warn",
      event: EVENTS.matching.retrievalDegraded,
      profile_id: profileId,
      correlation_id: correlationId,
      payload: {
        profile_id: profileId,
        reason,
        error_name: error instanceof Error ? error.name : null,
        error_message: error instanceof Error ? error.message : null,
      },
    });
  }

  async function vectorCandidates(
    profile: Profile,
    cohort: CohortRef,
    limit: number,
  ): Promise<Candidate[]> {
    if (!profile.embedding) {
      return [];
    }

    const hits = await withTimeout(
      store.findSimilarProfiles({
        embedding: profile.embedding,
        cohort,
        excludeProfileId: profile.id,
        minSimilarity,
        limit,
      }),
      retrievalTimeoutMs,
      () => new RetrievalTimeoutError(retrievalTimeoutMs),
    );

    const accepted = hits
      .filter((hit) => hit.profile_id !== profile.id && hit.similarity >= minSimilarity)
      .slice(0, limit);
    const loaded = await Promise.all(accepted.map((hit) => store.getProfile(hit.profile_id)));

    const candidates: Candidate[] = [];
    accepted.forEach((hit, index) => {
      const member = loaded[index];
      if (member) {
        candidates.push({ profile: member, similarity: hit.similarity, source: "vector" });
      }
    });
    return candidates;
  }

  /** Resolves to null instead of rejecting; a missing count never blocks vector retrieval. */
  async function countCohort(
    profile: Profile,
    cohort: CohortRef,
    correlationId: string | null,
  ): Promise<number | null> {
    try {
      return await store.countCohortMembers(cohort, profile.id);
    } catch (error) {
      logDegraded(profile.id, "cohort_count_failed", correlationId, error);
      return null;
    }
  }

  async function heuristicFallback(
    profile: Profile,
    cohort: CohortRef,
    limit: number,
    degradedReason: string,
    correlationId: string | null,
  ): Promise<RetrievalResult> {
    let members: Profile[];
    try {
      members = (await store.listCohortMembers(cohort, profile.id, cohortScanLimit))
        .filter((member) => member.id !== profile.id);
    } catch (error) {
      logDegraded(profile.id, "cohort_listing_failed", correlationId, error);
      return {
        candidates: [],
        source: "none",
        cohortSize: null,
        degradedReason: "cohort_listing_failed",
      };
    }

    if (members.length === 0) {
      return { candidates: [], source: "none", cohortSize: 0, degradedReason: null };
    }
    return {
      candidates: heuristicCandidates(profile, members, limit),
      source: "heuristic",
      cohortSize: members.length,
      degradedReason,
    };
  }

  function heuristicCandidates(
    profile: Profile,
    members: readonly Profile[],
    limit: number,
  ): Candidate[] {
    const gate = threshold * FALLBACK_RETRIEVAL_GATE;
    return members
      .map((member) => ({
        profile: member,
        similarity: scoreHeuristicPair(profile, member).score,
        source: "heuristic" as const,
      }))
      .filter((candidate) => candidate.similarity >= gate)
      .sort((left, right) => right.similarity - left.similarity)
      .slice(0, limit);
  }

  function recordRetrieved(result: RetrievalResult, correlationId: string | null): RetrievalResult {
    emitMetricBestEffort({
      metric: "matching.candidates.retrieved",
      value: result.candidates.length,
      correlation_id: correlationId,
      tags: { component: "candidate_retriever", source: result.source },
    });
    return result;
  }

  return {
    async retrieveCandidates(input) {
      const limit = input.limit ?? DEFAULT_MATCHING_CONFIG.candidateLimit;
      const correlationId = input.correlationId ?? null;
      const { profile, cohort } = input;

      let degradedReason = "missing_embedding";
      if (profile.embedding) {
        const sizing = countCohort(profile, cohort, correlationId);
        try {
          const [candidates, cohortSize] = await Promise.all([
            vectorCandidates(profile, cohort, limit),
            sizing,
          ]);
          return recordRetrieved({
            candidates,
            source: "vector",
            cohortSize,
            degradedReason: cohortSize === null ? "cohort_count_failed" : null,
          }, correlationId);
        } catch (error) {
          degradedReason = error instanceof RetrievalTimeoutError
            ? "vector_search_timeout"
            : "vector_search_failed";
          logDegraded(profile.id, degradedReason, correlationId, error);
          log({
            level: "error",
            event: EVENTS.system.rpcFailure,
            correlation_id: correlationId,
            payload: { rpc_name: "match_profiles", reason: degradedReason },
          });
        }
      } else {
        logDegraded(profile.id, degradedReason, correlationId);
      }

      return recordRetrieved(
        await heuristicFallback(profile, cohort, limit, degradedReason, correlationId),
        correlationId,
      );
    },
  };
}
