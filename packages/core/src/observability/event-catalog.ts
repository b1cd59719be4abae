export type EventCategory = "matching" | "oracle" | "embedding" | "pairing" | "system";

export type EventCatalogEntry = {
  event_name: string;
  category: EventCategory;
  description: string;
  required_fields: readonly string[];
};

export const EVENT_CATALOG = [
  {
    event_name: "matching.request_started",
    category: "matching",
    description: "A findMatches request was accepted for a profile and cohort.",
    required_fields: ["profile_id", "cohort_kind"],
  },
  {
    event_name: "matching.request_completed",
    category: "matching",
    description: "A findMatches request finished, with its outcome and stage counters.",
    required_fields: ["profile_id", "cohort_kind", "outcome", "created"],
  },
  {
    event_name: "matching.retrieval_degraded",
    category: "matching",
    description: "Retrieval degraded: heuristic fallback, or a cohort that could not be counted or listed.",
    required_fields: ["profile_id", "reason"],
  },
  {
    event_name: "matching.candidate_dropped",
    category: "matching",
    description: "A single candidate was dropped because a per-candidate step failed.",
    required_fields: ["profile_id", "candidate_id", "stage"],
  },
  {
    event_name: "matching.pairing_created",
    category: "matching",
    description: "A new pending pairing row was written.",
    required_fields: ["pairing_id", "scope_key", "score"],
  },
  {
    event_name: "matching.pairing_skipped",
    category: "matching",
    description: "A ranked candidate was not persisted because the pairing already exists.",
    required_fields: ["profile_id", "candidate_id", "reason"],
  },
  {
    event_name: "oracle.call_completed",
    category: "oracle",
    description: "The compatibility oracle returned a parsed result.",
    required_fields: ["model", "score", "category"],
  },
  {
    event_name: "oracle.fallback_used",
    category: "oracle",
    description: "The compatibility oracle failed and the neutral fallback result was substituted.",
    required_fields: ["error_code"],
  },
  {
    event_name: "embedding.generation_failed",
    category: "embedding",
    description: "Embedding generation failed; the profile keeps no embedding.",
    required_fields: ["profile_id", "error_code"],
  },
  {
    event_name: "embedding.refreshed",
    category: "embedding",
    description: "Embeddings were regenerated and stored for a profile.",
    required_fields: ["profile_id", "dimension"],
  },
  {
    event_name: "embedding.store_failed",
    category: "embedding",
    description: "A generated embedding could not be written; the profile keeps its old value.",
    required_fields: ["profile_id", "error_name"],
  },
  {
    event_name: "pairing.status_changed",
    category: "pairing",
    description: "A pairing moved out of pending.",
    required_fields: ["pairing_id", "previous_status", "next_status"],
  },
  {
    event_name: "config.threshold_above_validated_range",
    category: "system",
    description: "The configured compatibility threshold is above the validated ceiling.",
    required_fields: ["threshold", "validated_max"],
  },
  {
    event_name: "system.unhandled_error",
    category: "system",
    description: "An error escaped a script or entry point.",
    required_fields: ["phase", "error_name"],
  },
  {
    event_name: "system.rpc_failure",
    category: "system",
    description: "A database RPC failed.",
    required_fields: ["rpc_name"],
  },
] as const satisfies readonly EventCatalogEntry[];

export type CanonicalEventName = (typeof EVENT_CATALOG)[number]["event_name"];

export const EVENT_CATALOG_BY_NAME: Readonly<Record<string, EventCatalogEntry | undefined>> =
  Object.freeze(
    EVENT_CATALOG.reduce<Record<string, EventCatalogEntry>>((accumulator, entry) => {
      accumulator[entry.event_name] = entry;
      return accumulator;
    }, {}),
  );
