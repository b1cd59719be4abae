import { normalizeLocality } from "../../../db/src/scope.ts";
import type { CohortRef } from "../../../db/src/types/cohort.ts";
import { MatchingError } from "./errors.ts";

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/** Validate an untrusted cohort reference and return it normalized. */
export function validateCohort(value: unknown): CohortRef {
  if (!isRecord(value)) {
    throw new MatchingError("invalid_cohort", "Cohort reference must be an object.");
  }

  switch (value.kind) {
    case "event": {
      const eventId = typeof value.event_id === "string" ? value.event_id.trim() : "";
      if (!eventId) {
        throw new MatchingError("invalid_cohort", "Event cohort requires a non-empty event_id.");
      }
      return { kind: "event", event_id: eventId };
    }
    case "locality": {
      const locality = typeof value.locality === "string" ? normalizeLocality(value.locality) : null;
      if (!locality) {
        throw new MatchingError("invalid_cohort", "Locality cohort requires a non-empty locality.");
      }
      return { kind: "locality", locality };
    }
    case "global":
      return { kind: "global" };
    default:
      throw new MatchingError(
        "invalid_cohort",
        `Unknown cohort kind '${String(value.kind)}'.`,
      );
  }
}

/** Context line handed to the oracle; never includes ids. */
export function describeCohortForOracle(cohort: CohortRef): string {
  switch (cohort.kind) {
    case "event":
      return "Both people are attending the same event.";
    case "locality":
      return "Both people live in or near the same city.";
    case "global":
      return "Both people opted in to meeting anyone, anywhere.";
  }
}
