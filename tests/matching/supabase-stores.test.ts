import { describe, expect, it } from "vitest";
import { createPairingOrchestrator } from "../../packages/core/src/matching/pairing-orchestrator";
import {
  createSupabasePairingStore,
  createSupabaseProfileStore,
} from "../../packages/core/src/matching/supabase-stores";
import { InMemoryPairingStore } from "../helpers/in-memory-stores";
import { createPairScoreOracle } from "../helpers/matching-fixtures";
import { createSupabaseMock } from "../helpers/supabase-mock";

describe("supabase profile store", () => {
  it("lists an event cohort for a whole-event run without an id exclusion", async () => {
    const mock = createSupabaseMock({ data: [], error: null });
    const orchestrator = createPairingOrchestrator({
      profileStore: createSupabaseProfileStore(mock.db as never),
      pairingStore: new InMemoryPairingStore(),
      oracle: createPairScoreOracle({}),
    });

    await expect(orchestrator.createEventPairings({ eventId: "event_1" })).resolves.toEqual({
      processed: 0,
      created: 0,
      failed: 0,
    });
    expect(mock.from).toHaveBeenCalledWith("profiles");
    expect(mock.filterCalls()).toEqual([
      ["eq", ["is_active", true]],
      ["eq", ["current_event_id", "event_1"]],
      ["order", ["id", { ascending: true }]],
      ["limit", [200]],
    ]);
  });

  it("counts a locality cohort on its normalized key", async () => {
    const mock = createSupabaseMock({ data: null, error: null, count: 4 });
    const store = createSupabaseProfileStore(mock.db as never);

    await expect(
      store.countCohortMembers({ kind: "locality", locality: " New  York " }, "profile_1"),
    ).resolves.toBe(4);
    expect(mock.filterCalls()).toEqual([
      ["eq", ["is_active", true]],
      ["neq", ["id", "profile_1"]],
      ["eq", ["locality_key", "new york"]],
    ]);
  });
});

describe("supabase pairing store", () => {
  it("checks existence by the scope key of a locality cohort", async () => {
    const mock = createSupabaseMock({ data: [], error: null });
    const store = createSupabasePairingStore(mock.db as never);

    await expect(
      store.exists({ kind: "locality", locality: "  New   York " }, "profile_1", "profile_2"),
    ).resolves.toBe(false);
    expect(mock.from).toHaveBeenCalledWith("pairings");
    expect(mock.filterCalls()).toEqual([
      ["eq", ["scope_key", "locality:new york"]],
      ["in", ["profile_a_id", ["profile_1", "profile_2"]]],
      ["in", ["profile_b_id", ["profile_1", "profile_2"]]],
      ["limit", [1]],
    ]);
  });

  it("turns a scope filter into a scope key filter", async () => {
    const mock = createSupabaseMock({ data: [], error: null });
    const store = createSupabasePairingStore(mock.db as never);

    await expect(
      store.listForProfile("profile_1", { scope: { kind: "global" }, limit: 5 }),
    ).resolves.toEqual([]);
    expect(mock.filterCalls()).toEqual([
      ["or", ['profile_a_id.eq."profile_1",profile_b_id.eq."profile_1"']],
      ["eq", ["scope_key", "global"]],
      ["order", ["score", { ascending: false }]],
      ["order", ["created_at", { ascending: true }]],
      ["limit", [5]],
    ]);
  });
});
