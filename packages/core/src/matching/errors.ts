export type MatchingErrorCode =
  | "profile_not_found"
  | "invalid_cohort"
  | "invalid_limit"
  | "cancelled";

/** The only errors that abort a whole findMatches request. */
export class MatchingError extends Error {
  readonly code: MatchingErrorCode;

  constructor(code: MatchingErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MatchingError";
    this.code = code;
  }
}

export type PairingTransitionErrorCode =
  | "invalid_transition"
  | "pairing_not_found"
  | "not_a_participant";

export class PairingTransitionError extends Error {
  readonly code: PairingTransitionErrorCode;
  readonly pairingId: string;

  constructor(code: PairingTransitionErrorCode, pairingId: string, message: string) {
    super(message);
    this.name = "PairingTransitionError";
    this.code = code;
    this.pairingId = pairingId;
  }
}
