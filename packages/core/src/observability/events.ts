import { EVENT_CATALOG } from "./event-catalog.ts";

export const EVENTS = {
  matching: {
    requestStarted: "matching.request_started",
    requestCompleted: "matching.request_completed",
    retrievalDegraded: "matching.retrieval_degraded",
    candidateDropped: "matching.candidate_dropped",
    pairingCreated: "matching.pairing_created",
    pairingSkipped: "matching.pairing_skipped",
  },
  oracle: {
    callCompleted: "oracle.call_completed",
    fallbackUsed: "oracle.fallback_used",
  },
  embedding: {
    generationFailed: "embedding.generation_failed",
    refreshed: "embedding.refreshed",
    storeFailed: "embedding.store_failed",
  },
  pairing: {
    statusChanged: "pairing.status_changed",
  },
  config: {
    thresholdAboveValidatedRange: "config.threshold_above_validated_range",
  },
  system: {
    unhandledError: "system.unhandled_error",
    rpcFailure: "system.rpc_failure",
  },
} as const;

export const EVENT_NAMES = EVENT_CATALOG.map((entry) => entry.event_name);
