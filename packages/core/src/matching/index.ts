export {
  createCandidateRetriever,
  FALLBACK_RETRIEVAL_GATE,
  RetrievalTimeoutError,
  withTimeout,
  type Candidate,
  type CandidateRetriever,
  type CandidateRetrieverOptions,
  type CandidateSource,
  type RetrievalResult,
  type RetrievalSource,
  type RetrieveCandidatesInput,
} from "./candidate-retriever.ts";
export { describeCohortForOracle, validateCohort } from "./cohort.ts";
export {
  ConfigError,
  DEFAULT_COMPATIBILITY_THRESHOLD,
  DEFAULT_MATCHING_CONFIG,
  resolveMatchingConfig,
  VALIDATED_MAX_THRESHOLD,
  type MatchingConfig,
} from "./config.ts";
export {
  createEmbeddingRefresher,
  type BackfillEmbeddingsResult,
  type EmbeddingRefresher,
  type EmbeddingRefreshResult,
  type EmbeddingRefreshStatus,
} from "./embedding-refresh.ts";
export {
  MatchingError,
  PairingTransitionError,
  type MatchingErrorCode,
  type PairingTransitionErrorCode,
} from "./errors.ts";
export {
  HEURISTIC_SCORE_VERSION,
  HEURISTIC_WEIGHTS,
  scoreHeuristicPair,
  tokenize,
  tokensMatch,
  type HeuristicProfile,
  type HeuristicScoreBreakdown,
  type HeuristicScoreResult,
} from "./heuristic-score.ts";
export {
  createPairingLifecycle,
  sideOf,
  type PairingLifecycle,
  type TerminalPairingStatus,
} from "./pairing-lifecycle.ts";
export {
  createPairingOrchestrator,
  DEFAULT_MATCH_RESULT_LIMIT,
  PRE_FILTER_GATE,
  resolveResultLimit,
  type CreateEventPairingsResult,
  type FindMatchesInput,
  type FindMatchesResult,
  type FindMatchesStats,
  type MatchOutcome,
  type PairingMatch,
  type PairingOrchestrator,
  type PairingOrchestratorDeps,
  type TopPairing,
} from "./pairing-orchestrator.ts";
export type {
  ListPairingsFilter,
  PairingStore,
  ProfileStore,
  SimilarProfile,
  SimilarProfileQuery,
} from "./ports.ts";
export { createSupabasePairingStore, createSupabaseProfileStore } from "./supabase-stores.ts";
