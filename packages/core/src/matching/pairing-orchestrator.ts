import { DB_ERROR_CODES, DbError } from "../../../db/src/errors.ts";
import { toScopeKey } from "../../../db/src/scope.ts";
import type { CohortRef, PairingScope } from "../../../db/src/types/cohort.ts";
import type { CompatibilityResult } from "../../../db/src/types/compatibility.ts";
import type { Pairing } from "../../../db/src/types/pairing.ts";
import type { Profile } from "../../../db/src/types/profile.ts";
import {
  FALLBACK_COMPATIBILITY_RESULT,
  type CompatibilityOracle,
} from "../../../llm/src/compatibility-oracle.ts";
import { EVENTS } from "../observability/events.ts";
import { logEvent, type StructuredLogger } from "../observability/logger.ts";
import { emitLatencyMetric, nowMetricMs } from "../observability/metrics.ts";
import { setSentryContext, startSentrySpan } from "../observability/sentry.ts";
import {
  createCandidateRetriever,
  type Candidate,
  type CandidateRetriever,
  type RetrievalSource,
} from "./candidate-retriever.ts";
import { describeCohortForOracle, validateCohort } from "./cohort.ts";
import { DEFAULT_MATCHING_CONFIG, type MatchingConfig } from "./config.ts";
import { MatchingError } from "./errors.ts";
import { scoreHeuristicPair } from "./heuristic-score.ts";
import type { PairingStore, ProfileStore } from "./ports.ts";

/** Fraction of the threshold a heuristic score needs before the oracle is asked. */
export const PRE_FILTER_GATE = 0.5;
export const DEFAULT_MATCH_RESULT_LIMIT = 3;

/** Result limits must be positive integers; absent means the default. */
export function resolveResultLimit(limit: number | undefined): number {
  if (limit === undefined) {
    return DEFAULT_MATCH_RESULT_LIMIT;
  }
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new MatchingError("invalid_limit", `Result limit must be a positive integer, got ${limit}.`);
  }
  return limit;
}

export type MatchOutcome =
  | "matched"
  | "cohort_too_small"
  | "no_candidates"
  | "all_already_paired"
  | "below_threshold";

export type FindMatchesInput = {
  profileId: string;
  /** Validated at runtime; an unknown kind or blank id raises `invalid_cohort`. */
  cohort: CohortRef;
  limit?: number;
  signal?: AbortSignal;
  correlationId?: string;
};

export type PairingMatch = {
  pairing: Pairing;
  profile: Profile;
  result: CompatibilityResult;
};

export type FindMatchesStats = {
  cohortSize: number | null;
  retrieved: number;
  alreadyPaired: number;
  preFiltered: number;
  scored: number;
  fallbackScored: number;
  aboveThreshold: number;
  created: number;
  skippedDuplicates: number;
  retrievalSource: RetrievalSource;
};

export type FindMatchesResult = {
  matches: PairingMatch[];
  outcome: MatchOutcome;
  stats: FindMatchesStats;
};

export type CreateEventPairingsResult = {
  processed: number;
  created: number;
  failed: number;
};

export type TopPairing = {
  pairing: Pairing;
  profile: Profile;
};

export type PairingOrchestratorDeps = {
  profileStore: ProfileStore;
  pairingStore: PairingStore;
  oracle: CompatibilityOracle;
  config?: MatchingConfig;
  retriever?: CandidateRetriever;
  log?: StructuredLogger;
  createCorrelationId?: () => string;
};

export type PairingOrchestrator = {
  findMatches(input: FindMatchesInput): Promise<FindMatchesResult>;
  createEventPairings(input: { eventId: string; limit?: number }): Promise<CreateEventPairingsResult>;
  getTopPairingsForProfile(input: {
    profileId: string;
    scope?: PairingScope;
    limit?: number;
  }): Promise<TopPairing[]>;
};

type ScoredCandidate = {
  candidate: Candidate;
  retrievalIndex: number;
  result: CompatibilityResult;
};

function createCorrelationId(): string {
  return crypto.randomUUID();
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new MatchingError("cancelled", "Matching request was cancelled.");
  }
}

function isUsableResult(result: CompatibilityResult | null): result is CompatibilityResult {
  return !!result && Number.isFinite(result.score) && result.score >= 0 && result.score <= 1;
}

function resolveOutcome(stats: FindMatchesStats): MatchOutcome {
  if (stats.created > 0) {
    return "matched";
  }
  if (stats.cohortSize === 0) {
    return "cohort_too_small";
  }
  if (stats.retrieved === 0) {
    return "no_candidates";
  }
  if (
    stats.alreadyPaired === stats.retrieved ||
    (stats.aboveThreshold > 0 && stats.skippedDuplicates === stats.aboveThreshold)
  ) {
    return "all_already_paired";
  }
  return "below_threshold";
}

export function createPairingOrchestrator(deps: PairingOrchestratorDeps): PairingOrchestrator {
  const config = deps.config ?? DEFAULT_MATCHING_CONFIG;
  const log = deps.log ?? logEvent;
  const correlationFactory = deps.createCorrelationId ?? createCorrelationId;
  const retriever = deps.retriever ?? createCandidateRetriever({
    profileStore: deps.profileStore,
    threshold: config.threshold,
    minSimilarity: config.vectorMinSimilarity,
    retrievalTimeoutMs: config.retrievalTimeoutMs,
    cohortScanLimit: config.cohortScanLimit,
    log,
  });

  function logDropped(
    profileId: string,
    candidateId: string,
    stage: string,
    correlationId: string,
    error?: unknown,
  ): void {
    log({
      level: error ? "warn" : "debug",
      event: EVENTS.matching.candidateDropped,
      profile_id: profileId,
      correlation_id: correlationId,
      payload: {
        profile_id: profileId,
        candidate_id: candidateId,
        stage,
        error_name: error instanceof Error ? error.name : null,
        error_message: error instanceof Error ? error.message : null,
      },
    });
  }

  function logSkipped(
    profileId: string,
    candidateId: string,
    reason: string,
    correlationId: string,
  ): void {
    log({
      level: "info",
      event: EVENTS.matching.pairingSkipped,
      profile_id: profileId,
      correlation_id: correlationId,
      payload: { profile_id: profileId, candidate_id: candidateId, reason },
    });
  }

  async function filterExisting(
    profile: Profile,
    scope: PairingScope,
    candidates: readonly Candidate[],
    correlationId: string,
  ): Promise<{ fresh: Array<{ candidate: Candidate; retrievalIndex: number }>; alreadyPaired: number }> {
    const checks = await Promise.all(candidates.map(async (candidate, retrievalIndex) => {
      try {
        const exists = await deps.pairingStore.exists(scope, profile.id, candidate.profile.id);
        return { candidate, retrievalIndex, state: exists ? "paired" : "fresh" } as const;
      } catch (error) {
        logDropped(profile.id, candidate.profile.id, "filter_existing", correlationId, error);
        return { candidate, retrievalIndex, state: "error" } as const;
      }
    }));

    return {
      fresh: checks
        .filter((check) => check.state === "fresh")
        .map(({ candidate, retrievalIndex }) => ({ candidate, retrievalIndex })),
      alreadyPaired: checks.filter((check) => check.state === "paired").length,
    };
  }

  async function scoreCandidate(
    profile: Profile,
    candidate: Candidate,
    cohort: CohortRef,
    correlationId: string,
    signal: AbortSignal | undefined,
  ): Promise<CompatibilityResult> {
    let errorCode: string;
    let errorMessage: string | null = null;
    try {
      const result = await deps.oracle.analyze(profile, candidate.profile, {
        description: describeCohortForOracle(cohort),
        correlationId,
        signal,
      });
      if (isUsableResult(result)) {
        return result;
      }
      errorCode = result ? "invalid_result" : "no_result";
    } catch (error) {
      errorCode = "oracle_threw";
      errorMessage = error instanceof Error ? error.message : "unknown_error";
    }

    log({
      level: "warn",
      event: EVENTS.oracle.fallbackUsed,
      profile_id: profile.id,
      correlation_id: correlationId,
      payload: {
        error_code: errorCode,
        error_message: errorMessage,
        candidate_id: candidate.profile.id,
      },
    });
    return { ...FALLBACK_COMPATIBILITY_RESULT };
  }

  async function persistRanked(
    profile: Profile,
    scope: PairingScope,
    ranked: readonly ScoredCandidate[],
    stats: FindMatchesStats,
    correlationId: string,
  ): Promise<PairingMatch[]> {
    const created: PairingMatch[] = [];

    for (const { candidate, result } of ranked) {
      const candidateId = candidate.profile.id;
      try {
        if (await deps.pairingStore.exists(scope, profile.id, candidateId)) {
          stats.skippedDuplicates += 1;
          logSkipped(profile.id, candidateId, "already_exists", correlationId);
          continue;
        }

        const pairing = await deps.pairingStore.create({
          profile_a_id: profile.id,
          profile_b_id: candidateId,
          scope,
          score: result.score,
          category: result.category,
          rationale: result.rationale,
          starter: result.starter,
        });

        stats.created += 1;
        created.push({ pairing, profile: candidate.profile, result });
        log({
          level: "info",
          event: EVENTS.matching.pairingCreated,
          profile_id: profile.id,
          pairing_id: pairing.id,
          correlation_id: correlationId,
          payload: {
            pairing_id: pairing.id,
            scope_key: pairing.scope_key,
            scope_kind: scope.kind,
            score: pairing.score,
            category: pairing.category,
            result_source: result.source,
          },
        });
      } catch (error) {
        if (error instanceof DbError && error.code === DB_ERROR_CODES.UNIQUE_VIOLATION) {
          stats.skippedDuplicates += 1;
          logSkipped(profile.id, candidateId, "unique_violation", correlationId);
          continue;
        }
        logDropped(profile.id, candidateId, "persist", correlationId, error);
      }
    }

    return created;
  }

  async function findMatches(input: FindMatchesInput): Promise<FindMatchesResult> {
    const correlationId = input.correlationId ?? correlationFactory();
    const limit = resolveResultLimit(input.limit);
    const startedAtMs = nowMetricMs();
    const cohort = validateCohort(input.cohort);
    throwIfAborted(input.signal);

    setSentryContext({
      category: "matching",
      correlation_id: correlationId,
      profile_id: input.profileId,
      tags: { cohort_kind: cohort.kind },
    });

    const profile = await deps.profileStore.getProfile(input.profileId);
    if (!profile) {
      throw new MatchingError("profile_not_found", `Profile '${input.profileId}' was not found.`);
    }

    log({
      level: "info",
      event: EVENTS.matching.requestStarted,
      profile_id: profile.id,
      correlation_id: correlationId,
      payload: { profile_id: profile.id, cohort_kind: cohort.kind, limit },
    });

    const retrieval = await retriever.retrieveCandidates({
      profile,
      cohort,
      limit: config.candidateLimit,
      correlationId,
    });
    throwIfAborted(input.signal);

    const stats: FindMatchesStats = {
      cohortSize: retrieval.cohortSize,
      retrieved: retrieval.candidates.length,
      alreadyPaired: 0,
      preFiltered: 0,
      scored: 0,
      fallbackScored: 0,
      aboveThreshold: 0,
      created: 0,
      skippedDuplicates: 0,
      retrievalSource: retrieval.source,
    };

    const { fresh, alreadyPaired } = await filterExisting(
      profile,
      cohort,
      retrieval.candidates,
      correlationId,
    );
    stats.alreadyPaired = alreadyPaired;
    throwIfAborted(input.signal);

    const preFilterGate = config.threshold * PRE_FILTER_GATE;
    const survivors = fresh.filter(({ candidate }) => {
      const heuristic = candidate.source === "heuristic"
        ? candidate.similarity
        : scoreHeuristicPair(profile, candidate.profile).score;
      if (heuristic < preFilterGate) {
        stats.preFiltered += 1;
        logDropped(profile.id, candidate.profile.id, "pre_filter", correlationId);
        return false;
      }
      return true;
    });

    const results = await Promise.all(survivors.map(({ candidate }) =>
      scoreCandidate(profile, candidate, cohort, correlationId, input.signal)
    ));
    throwIfAborted(input.signal);

    const scored: ScoredCandidate[] = survivors.map((survivor, index) => ({
      ...survivor,
      result: results[index] ?? { ...FALLBACK_COMPATIBILITY_RESULT },
    }));
    stats.scored = scored.length;
    stats.fallbackScored = scored.filter((entry) => entry.result.source === "fallback").length;

    const ranked = scored
      .filter((entry) => entry.result.score >= config.threshold)
      .sort((left, right) =>
        right.result.score - left.result.score || left.retrievalIndex - right.retrievalIndex
      );
    stats.aboveThreshold = ranked.length;

    const created = await persistRanked(profile, cohort, ranked, stats, correlationId);
    const outcome = resolveOutcome(stats);

    log({
      level: "info",
      event: EVENTS.matching.requestCompleted,
      profile_id: profile.id,
      correlation_id: correlationId,
      payload: {
        profile_id: profile.id,
        cohort_kind: cohort.kind,
        scope_key: toScopeKey(cohort),
        outcome,
        cohort_size: stats.cohortSize,
        retrieved: stats.retrieved,
        already_paired: stats.alreadyPaired,
        pre_filtered: stats.preFiltered,
        scored: stats.scored,
        fallback_scored: stats.fallbackScored,
        above_threshold: stats.aboveThreshold,
        created: stats.created,
        skipped_duplicates: stats.skippedDuplicates,
        retrieval_source: stats.retrievalSource,
      },
    });
    emitLatencyMetric({
      component: "pairing_orchestrator",
      operation: "find_matches",
      outcome,
      startedAtMs,
      correlation_id: correlationId,
    });

    return {
      matches: created.slice(0, limit),
      outcome,
      stats,
    };
  }

  return {
    findMatches: (input) =>
      startSentrySpan(
        { name: "matching.find_matches", op: "matching", attributes: { profile_id: input.profileId } },
        () => findMatches(input),
      ),

    async createEventPairings(input) {
      const cohort = validateCohort({ kind: "event", event_id: input.eventId });
      const limit = resolveResultLimit(input.limit);
      const members = await deps.profileStore.listCohortMembers(cohort, null, config.cohortScanLimit);
      const summary: CreateEventPairingsResult = { processed: 0, created: 0, failed: 0 };

      for (const member of members) {
        try {
          const result = await findMatches({ profileId: member.id, cohort, limit });
          summary.processed += 1;
          summary.created += result.stats.created;
        } catch (error) {
          summary.failed += 1;
          log({
            level: "error",
            event: EVENTS.system.unhandledError,
            profile_id: member.id,
            payload: {
              phase: "create_event_pairings",
              error_name: error instanceof Error ? error.name : "Error",
              error_message: error instanceof Error ? error.message : "unknown_error",
            },
          });
        }
      }

      return summary;
    },

    async getTopPairingsForProfile(input) {
      const limit = resolveResultLimit(input.limit);
      const pairings = await deps.pairingStore.listForProfile(input.profileId, {
        scope: input.scope,
      });
      const top = [...pairings]
        .sort((left, right) => right.score - left.score)
        .slice(0, limit);

      const entries: TopPairing[] = [];
      for (const pairing of top) {
        const otherId = pairing.profile_a_id === input.profileId
          ? pairing.profile_b_id
          : pairing.profile_a_id;
        const profile = await deps.profileStore.getProfile(otherId);
        if (profile) {
          entries.push({ pairing, profile });
        }
      }
      return entries;
    },
  };
}
