import {
  PAIRING_CATEGORIES,
  type PairingCategory,
} from "../../../db/src/types/pairing.ts";

export const MAX_PAIRING_TEXT_LENGTH = 600;

export type CompatibilityOutput = {
  score: number;
  category: PairingCategory;
  rationale: string;
  starter: string;
};

/** Older prompt revisions answered with these key names. */
const LEGACY_KEY_ALIASES = {
  score: "compatibility_score",
  category: "match_type",
  rationale: "explanation",
  starter: "icebreaker",
} as const satisfies Record<keyof CompatibilityOutput, string>;

export class OracleParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OracleParseError";
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function readField(record: Record<string, unknown>, key: keyof CompatibilityOutput): unknown {
  if (record[key] !== undefined) {
    return record[key];
  }
  return record[LEGACY_KEY_ALIASES[key]];
}

function assertUnitInterval(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new OracleParseError(`${path} must be a finite number in [0,1].`);
  }
  return value;
}

function assertCategory(value: unknown, path: string): PairingCategory {
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : null;
  const category = PAIRING_CATEGORIES.find((entry) => entry === normalized);
  if (!category) {
    throw new OracleParseError(`${path} must be one of ${PAIRING_CATEGORIES.join(", ")}.`);
  }
  return category;
}

function assertText(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new OracleParseError(`${path} must be a string.`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new OracleParseError(`${path} must not be empty.`);
  }
  return trimmed.slice(0, MAX_PAIRING_TEXT_LENGTH);
}

export function parseCompatibilityOutput(value: unknown): CompatibilityOutput {
  if (!isPlainObject(value)) {
    throw new OracleParseError("output must be an object.");
  }

  return {
    score: assertUnitInterval(readField(value, "score"), "output.score"),
    category: assertCategory(readField(value, "category"), "output.category"),
    rationale: assertText(readField(value, "rationale"), "output.rationale"),
    starter: assertText(readField(value, "starter"), "output.starter"),
  };
}
