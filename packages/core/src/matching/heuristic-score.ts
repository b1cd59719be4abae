import { normalizeLocality } from "../../../db/src/scope.ts";
import type { Profile } from "../../../db/src/types/profile.ts";

export const HEURISTIC_SCORE_VERSION = "heuristic_v1";

export const HEURISTIC_WEIGHTS = Object.freeze({
  valueExchange: 0.4,
  completeness: 0.1,
  perSharedInterest: 0.1,
  maxSharedInterests: 0.3,
  perSharedGoal: 0.1,
  maxSharedGoals: 0.2,
  locality: 0.1,
});

const MIN_TOKEN_LENGTH = 3;
const MIN_PREFIX_LENGTH = 4;
const ROUND_DIGITS = 6;

const STOPWORDS: ReadonlySet<string> = new Set([
  "the", "and", "for", "with", "you", "your", "our", "are", "but", "not",
  "that", "this", "have", "has", "from", "who", "what", "will", "would", "about",
  "into", "any", "all", "some", "also", "just", "more", "like", "want", "need",
]);

export type HeuristicProfile = Pick<Profile, "seeking" | "offers" | "interests" | "goals" | "locality">;

export type HeuristicScoreBreakdown = {
  value_exchange: number;
  completeness: number;
  interests: number;
  goals: number;
  locality: number;
  total: number;
};

export type HeuristicScoreResult = {
  score: number;
  breakdown: HeuristicScoreBreakdown;
  version: string;
};

export function tokenize(text: string): string[] {
  const tokens = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length >= MIN_TOKEN_LENGTH && !STOPWORDS.has(token));
  return [...new Set(tokens)];
}

/** Equal tokens match; otherwise a shorter token of 4+ characters matches as a prefix of the longer. */
export function tokensMatch(left: string, right: string): boolean {
  if (left === right) {
    return true;
  }
  const [shorter, longer] = left.length <= right.length ? [left, right] : [right, left];
  return shorter.length >= MIN_PREFIX_LENGTH && longer.startsWith(shorter);
}

function textsOverlap(seeking: string, offers: string): boolean {
  const seekingTokens = tokenize(seeking);
  if (seekingTokens.length === 0) {
    return false;
  }
  const offerTokens = tokenize(offers);
  return seekingTokens.some((token) => offerTokens.some((offer) => tokensMatch(token, offer)));
}

function sharedTagCount(left: readonly string[], right: readonly string[]): number {
  const rightKeys = new Set(right.map((tag) => tag.trim().toLowerCase()).filter(Boolean));
  const leftKeys = new Set(left.map((tag) => tag.trim().toLowerCase()).filter(Boolean));
  let shared = 0;
  for (const key of leftKeys) {
    if (rightKeys.has(key)) {
      shared += 1;
    }
  }
  return shared;
}

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function round(value: number): number {
  return Number(value.toFixed(ROUND_DIGITS));
}

/**
 * Cheap, symmetric compatibility estimate in [0,1]. Gates oracle calls and ranks
 * candidates when no vector search is available.
 */
export function scoreHeuristicPair(a: HeuristicProfile, b: HeuristicProfile): HeuristicScoreResult {
  const valueExchange = textsOverlap(a.seeking, b.offers) || textsOverlap(b.seeking, a.offers)
    ? HEURISTIC_WEIGHTS.valueExchange
    : 0;

  const complete = !isBlank(a.seeking) && !isBlank(a.offers) && !isBlank(b.seeking) &&
    !isBlank(b.offers);
  const completeness = complete ? HEURISTIC_WEIGHTS.completeness : 0;

  const interests = round(Math.min(
    HEURISTIC_WEIGHTS.perSharedInterest * sharedTagCount(a.interests, b.interests),
    HEURISTIC_WEIGHTS.maxSharedInterests,
  ));
  const goals = round(Math.min(
    HEURISTIC_WEIGHTS.perSharedGoal * sharedTagCount(a.goals, b.goals),
    HEURISTIC_WEIGHTS.maxSharedGoals,
  ));

  const localityA = normalizeLocality(a.locality);
  const locality = localityA !== null && localityA === normalizeLocality(b.locality)
    ? HEURISTIC_WEIGHTS.locality
    : 0;

  const total = round(Math.min(1, valueExchange + completeness + interests + goals + locality));

  return {
    score: total,
    breakdown: {
      value_exchange: valueExchange,
      completeness,
      interests,
      goals,
      locality,
      total,
    },
    version: HEURISTIC_SCORE_VERSION,
  };
}
