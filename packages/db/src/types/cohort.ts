export type CohortRef =
  | { kind: "event"; event_id: string }
  | { kind: "locality"; locality: string }
  | { kind: "global" };

export type CohortKind = CohortRef["kind"];

/** Pairings are scoped exactly like the cohort they were drawn from. */
export type PairingScope = CohortRef;
