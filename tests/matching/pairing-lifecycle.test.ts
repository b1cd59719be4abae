import { beforeEach, describe, expect, it, vi } from "vitest";
import { PairingTransitionError } from "../../packages/core/src/matching/errors";
import { createPairingLifecycle } from "../../packages/core/src/matching/pairing-lifecycle";
import type { Pairing } from "../../packages/db/src/types/pairing";
import { InMemoryPairingStore } from "../helpers/in-memory-stores";
import { createLogRecorder, EVENT_COHORT } from "../helpers/matching-fixtures";

async function seed(store: InMemoryPairingStore, profileA: string, profileB: string): Promise<Pairing> {
  return store.create({
    profile_a_id: profileA,
    profile_b_id: profileB,
    scope: EVENT_COHORT,
    score: 0.7,
    category: "creative",
    rationale: "Both write music.",
    starter: "What are you recording lately?",
  });
}

describe("pairing lifecycle", () => {
  let store: InMemoryPairingStore;
  let recorder: ReturnType<typeof createLogRecorder>;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    store = new InMemoryPairingStore();
    recorder = createLogRecorder();
  });

  it("accepts a pending pairing and logs the change", async () => {
    const pairing = await seed(store, "profile_a", "profile_b");
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });

    const accepted = await lifecycle.acceptPairing(pairing.id);

    expect(accepted.status).toBe("accepted");
    expect(recorder.payloads("pairing.status_changed")).toEqual([
      { pairing_id: "pairing_1", previous_status: "pending", next_status: "accepted" },
    ]);
  });

  it("treats a repeated transition as a no-op", async () => {
    const pairing = await seed(store, "profile_a", "profile_b");
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });

    await lifecycle.declinePairing(pairing.id);
    const again = await lifecycle.declinePairing(pairing.id);

    expect(again.status).toBe("declined");
    expect(recorder.payloads("pairing.status_changed")).toHaveLength(1);
  });

  it("refuses to leave a terminal status", async () => {
    const pairing = await seed(store, "profile_a", "profile_b");
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });
    await lifecycle.acceptPairing(pairing.id);

    const rejection = lifecycle.declinePairing(pairing.id);

    await expect(rejection).rejects.toBeInstanceOf(PairingTransitionError);
    await expect(rejection).rejects.toMatchObject({
      code: "invalid_transition",
      pairingId: "pairing_1",
      message: "Pairing 'pairing_1' is accepted and cannot become declined.",
    });
  });

  it("reports an unknown pairing", async () => {
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });

    await expect(lifecycle.acceptPairing("pairing_404")).rejects.toMatchObject({
      code: "pairing_not_found",
      message: "Pairing 'pairing_404' was not found.",
    });
  });

  it("resolves a lost compare-and-set against the stored status", async () => {
    const pairing = await seed(store, "profile_a", "profile_b");
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });
    const setStatus = store.setStatus.bind(store);
    vi.spyOn(store, "setStatus").mockImplementationOnce(async (pairingId, from, to) => {
      await setStatus(pairingId, from, to);
      return null;
    });

    const accepted = await lifecycle.acceptPairing(pairing.id);

    expect(accepted.status).toBe("accepted");
    expect(recorder.payloads("pairing.status_changed")).toEqual([]);
  });

  it("rejects when a concurrent writer moved the pairing elsewhere", async () => {
    const pairing = await seed(store, "profile_a", "profile_b");
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });
    const setStatus = store.setStatus.bind(store);
    vi.spyOn(store, "setStatus").mockImplementationOnce(async (pairingId) => {
      await setStatus(pairingId, "pending", "declined");
      return null;
    });

    await expect(lifecycle.acceptPairing(pairing.id)).rejects.toMatchObject({
      code: "invalid_transition",
      message: "Pairing 'pairing_1' is declined and cannot become accepted.",
    });
  });

  it("marks the caller's side as notified", async () => {
    const pairing = await seed(store, "profile_a", "profile_b");
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });

    const updated = await lifecycle.markPairingNotified(pairing.id, "profile_b");

    expect(updated.profile_a_notified).toBe(false);
    expect(updated.profile_b_notified).toBe(true);
  });

  it("skips the write when the side is already notified", async () => {
    const pairing = await seed(store, "profile_a", "profile_b");
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });
    await lifecycle.markPairingNotified(pairing.id, "profile_a");
    const markNotified = vi.spyOn(store, "markNotified");

    const again = await lifecycle.markPairingNotified(pairing.id, "profile_a");

    expect(again.profile_a_notified).toBe(true);
    expect(markNotified).not.toHaveBeenCalled();
  });

  it("rejects a profile outside the pairing", async () => {
    const pairing = await seed(store, "profile_a", "profile_b");
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });

    await expect(lifecycle.markPairingNotified(pairing.id, "profile_z")).rejects.toMatchObject({
      code: "not_a_participant",
      message: "Profile 'profile_z' is not part of pairing 'pairing_1'.",
    });
  });

  it("lists pending pairings the profile has not been told about", async () => {
    const first = await seed(store, "profile_a", "profile_b");
    const second = await seed(store, "profile_c", "profile_a");
    const third = await seed(store, "profile_a", "profile_d");
    const lifecycle = createPairingLifecycle({ pairingStore: store, log: recorder.log });
    await lifecycle.markPairingNotified(first.id, "profile_a");
    await lifecycle.declinePairing(third.id);

    const unnotified = await lifecycle.listUnnotifiedPairings("profile_a");

    expect(unnotified.map((pairing) => pairing.id)).toEqual([second.id]);
  });
});
