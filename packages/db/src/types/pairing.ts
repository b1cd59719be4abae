import type { PairingScope } from "./cohort.ts";

export const PAIRING_CATEGORIES = ["friendship", "professional", "romantic", "creative"] as const;
export type PairingCategory = (typeof PAIRING_CATEGORIES)[number];

export const PAIRING_STATUSES = ["pending", "accepted", "declined"] as const;
export type PairingStatus = (typeof PAIRING_STATUSES)[number];

export type PairingSide = "a" | "b";

export type Pairing = {
  id: string;
  profile_a_id: string;
  profile_b_id: string;
  scope: PairingScope;
  scope_key: string;
  score: number;
  category: PairingCategory;
  rationale: string;
  starter: string;
  status: PairingStatus;
  profile_a_notified: boolean;
  profile_b_notified: boolean;
  created_at: string;
};

export type CreatePairingInput = {
  profile_a_id: string;
  profile_b_id: string;
  scope: PairingScope;
  score: number;
  category: PairingCategory;
  rationale: string;
  starter: string;
};
