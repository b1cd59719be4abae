import type { Pairing, PairingSide } from "../../../db/src/types/pairing.ts";
import { EVENTS } from "../observability/events.ts";
import { logEvent, type StructuredLogger } from "../observability/logger.ts";
import { PairingTransitionError } from "./errors.ts";
import type { PairingStore } from "./ports.ts";

export type TerminalPairingStatus = "accepted" | "declined";

export type PairingLifecycle = {
  transitionPairingStatus(pairingId: string, target: TerminalPairingStatus): Promise<Pairing>;
  acceptPairing(pairingId: string): Promise<Pairing>;
  declinePairing(pairingId: string): Promise<Pairing>;
  markPairingNotified(pairingId: string, profileId: string): Promise<Pairing>;
  listUnnotifiedPairings(profileId: string): Promise<Pairing[]>;
};

export function sideOf(pairing: Pairing, profileId: string): PairingSide | null {
  if (pairing.profile_a_id === profileId) {
    return "a";
  }
  if (pairing.profile_b_id === profileId) {
    return "b";
  }
  return null;
}

function isNotified(pairing: Pairing, side: PairingSide): boolean {
  return side === "a" ? pairing.profile_a_notified : pairing.profile_b_notified;
}

export function createPairingLifecycle(deps: {
  pairingStore: PairingStore;
  log?: StructuredLogger;
}): PairingLifecycle {
  const store = deps.pairingStore;
  const log = deps.log ?? logEvent;

  async function requirePairing(pairingId: string): Promise<Pairing> {
    const pairing = await store.getById(pairingId);
    if (!pairing) {
      throw new PairingTransitionError(
        "pairing_not_found",
        pairingId,
        `Pairing '${pairingId}' was not found.`,
      );
    }
    return pairing;
  }

  function invalidTransition(pairing: Pairing, target: TerminalPairingStatus): PairingTransitionError {
    return new PairingTransitionError(
      "invalid_transition",
      pairing.id,
      `Pairing '${pairing.id}' is ${pairing.status} and cannot become ${target}.`,
    );
  }

  /** pending moves to the target once; replaying the same target is a no-op. */
  async function transitionPairingStatus(
    pairingId: string,
    target: TerminalPairingStatus,
  ): Promise<Pairing> {
    const current = await requirePairing(pairingId);
    if (current.status === target) {
      return current;
    }
    if (current.status !== "pending") {
      throw invalidTransition(current, target);
    }

    const updated = await store.setStatus(pairingId, "pending", target);
    if (!updated) {
      const latest = await requirePairing(pairingId);
      if (latest.status === target) {
        return latest;
      }
      throw invalidTransition(latest, target);
    }

    log({
      level: "info",
      event: EVENTS.pairing.statusChanged,
      pairing_id: updated.id,
      payload: {
        pairing_id: updated.id,
        previous_status: current.status,
        next_status: updated.status,
      },
    });
    return updated;
  }

  return {
    transitionPairingStatus,
    acceptPairing: (pairingId) => transitionPairingStatus(pairingId, "accepted"),
    declinePairing: (pairingId) => transitionPairingStatus(pairingId, "declined"),

    async markPairingNotified(pairingId, profileId) {
      const pairing = await requirePairing(pairingId);
      const side = sideOf(pairing, profileId);
      if (!side) {
        throw new PairingTransitionError(
          "not_a_participant",
          pairingId,
          `Profile '${profileId}' is not part of pairing '${pairingId}'.`,
        );
      }
      if (isNotified(pairing, side)) {
        return pairing;
      }

      const updated = await store.markNotified(pairingId, side);
      if (!updated) {
        throw new PairingTransitionError(
          "pairing_not_found",
          pairingId,
          `Pairing '${pairingId}' was not found.`,
        );
      }
      return updated;
    },

    async listUnnotifiedPairings(profileId) {
      const pending = await store.listForProfile(profileId, { status: "pending" });
      return pending.filter((pairing) => {
        const side = sideOf(pairing, profileId);
        return side !== null && !isNotified(pairing, side);
      });
    },
  };
}
