import { describe, expect, it } from "vitest";

import {
  countCohortMembers,
  findSimilarProfiles,
  getProfileById,
  listCohortMembers,
  listProfilesMissingEmbedding,
  toProfileEmbedding,
  updateProfileEmbedding,
} from "../../packages/db/src/queries/profiles";
import { DbError } from "../../packages/db/src/errors";
import { createSupabaseMock } from "../helpers/supabase-mock";

const PROFILE_ROW = {
  id: "profile_1",
  display_name: "   ",
  bio: " Product designer ",
  seeking: "a cofounder",
  offers: null,
  interests: ["Climbing", "climbing ", " Jazz", 7],
  goals: null,
  locality: " Lisbon ",
  current_event_id: "event_1",
  globally_eligible: true,
  profile_embedding: null,
  interests_embedding: null,
  expertise_embedding: null,
};

const EMBEDDING = {
  profile: [0.1, 0.2, 0.3],
  interests: [0.4, 0.5, 0.6],
  expertise: [0.7, 0.8, 0.9],
};

describe("profile query module", () => {
  it("loads an active profile and normalizes its fields", async () => {
    const mock = createSupabaseMock({ data: PROFILE_ROW, error: null });

    await expect(getProfileById(mock.db as never, "profile_1")).resolves.toEqual({
      id: "profile_1",
      display_name: null,
      bio: "Product designer",
      seeking: "a cofounder",
      offers: "",
      interests: ["Climbing", "Jazz"],
      goals: [],
      locality: "Lisbon",
      embedding: null,
      current_event_id: "event_1",
      globally_eligible: true,
    });
    expect(mock.from).toHaveBeenCalledWith("profiles");
    expect(mock.filterCalls()).toEqual([
      ["eq", ["id", "profile_1"]],
      ["eq", ["is_active", true]],
      ["maybeSingle", []],
    ]);
  });

  it("returns null for a missing profile", async () => {
    const mock = createSupabaseMock({ data: null, error: null });
    await expect(getProfileById(mock.db as never, "profile_404")).resolves.toBeNull();
  });

  it("throws DbError on query failure", async () => {
    const mock = createSupabaseMock({ data: null, error: { message: "broken" } });

    const rejection = getProfileById(mock.db as never, "profile_1");
    await expect(rejection).rejects.toBeInstanceOf(DbError);
    await expect(rejection).rejects.toMatchObject({
      code: "DB_QUERY_FAILED",
      message: "Unable to load profile.",
    });
  });

  it("filters locality cohorts on the normalized locality key", async () => {
    const mock = createSupabaseMock({
      data: [PROFILE_ROW, { display_name: "no id" }],
      error: null,
    });

    const members = await listCohortMembers(mock.db as never, {
      cohort: { kind: "locality", locality: "  San_Francisco   %" },
      excludeProfileId: "profile_9",
      limit: 50,
    });

    expect(members.map((member) => member.id)).toEqual(["profile_1"]);
    expect(mock.filterCalls()).toEqual([
      ["eq", ["is_active", true]],
      ["neq", ["id", "profile_9"]],
      ["eq", ["locality_key", "san_francisco %"]],
      ["order", ["id", { ascending: true }]],
      ["limit", [50]],
    ]);
  });

  it("lists the whole cohort without an id filter when nobody is excluded", async () => {
    const mock = createSupabaseMock({ data: [], error: null });

    await listCohortMembers(mock.db as never, {
      cohort: { kind: "event", event_id: "event_7" },
      excludeProfileId: null,
      limit: 500,
    });

    expect(mock.filterCalls()).toEqual([
      ["eq", ["is_active", true]],
      ["eq", ["current_event_id", "event_7"]],
      ["order", ["id", { ascending: true }]],
      ["limit", [500]],
    ]);
  });

  it("counts cohort members with a head-only exact count", async () => {
    const mock = createSupabaseMock({ data: null, error: null, count: 12 });

    await expect(
      countCohortMembers(mock.db as never, {
        cohort: { kind: "global" },
        excludeProfileId: "profile_1",
      }),
    ).resolves.toBe(12);
    expect(mock.calls).toEqual([
      ["select", ["id", { count: "exact", head: true }]],
      ["eq", ["is_active", true]],
      ["neq", ["id", "profile_1"]],
      ["eq", ["globally_eligible", true]],
    ]);
  });

  it("throws DbError when the count query fails or returns no count", async () => {
    const failing = createSupabaseMock({ data: null, error: { message: "timeout" } });
    await expect(
      countCohortMembers(failing.db as never, { cohort: { kind: "global" }, excludeProfileId: null }),
    ).rejects.toMatchObject({ code: "DB_QUERY_FAILED", message: "Unable to count cohort members." });

    const countless = createSupabaseMock({ data: null, error: null });
    await expect(
      countCohortMembers(countless.db as never, { cohort: { kind: "global" }, excludeProfileId: null }),
    ).rejects.toMatchObject({
      code: "DB_UNEXPECTED_RESPONSE",
      message: "Cohort count query returned no count.",
    });
  });

  it("filters event and global cohorts on their own columns", async () => {
    const eventMock = createSupabaseMock({ data: [], error: null });
    await listCohortMembers(eventMock.db as never, {
      cohort: { kind: "event", event_id: "event_7" },
      excludeProfileId: "profile_1",
      limit: 10,
    });
    expect(eventMock.filterCalls()[2]).toEqual(["eq", ["current_event_id", "event_7"]]);

    const globalMock = createSupabaseMock({ data: [], error: null });
    await listCohortMembers(globalMock.db as never, {
      cohort: { kind: "global" },
      excludeProfileId: "profile_1",
      limit: 10,
    });
    expect(globalMock.filterCalls()[2]).toEqual(["eq", ["globally_eligible", true]]);
  });

  it("calls match_profiles with the cohort filter and drops unusable rows", async () => {
    const mock = createSupabaseMock({
      data: [
        { profile_id: "profile_2", similarity: "0.8" },
        { profile_id: "profile_1", similarity: 0.99 },
        { profile_id: "profile_3", similarity: "not-a-number" },
        { similarity: 0.7 },
      ],
      error: null,
    });

    const hits = await findSimilarProfiles(mock.db as never, {
      embedding: EMBEDDING,
      cohort: { kind: "locality", locality: " Lisbon " },
      excludeProfileId: "profile_1",
      minSimilarity: 0.45,
      limit: 10,
    });

    expect(hits).toEqual([{ profile_id: "profile_2", similarity: 0.8 }]);
    expect(mock.rpc).toHaveBeenCalledWith("match_profiles", {
      query_profile_embedding: EMBEDDING.profile,
      query_interests_embedding: EMBEDDING.interests,
      query_expertise_embedding: EMBEDDING.expertise,
      exclude_profile_id: "profile_1",
      cohort_kind: "locality",
      cohort_event_id: null,
      cohort_locality: "lisbon",
      similarity_threshold: 0.45,
      limit_count: 10,
    });
  });

  it("rejects a similarity response that is not a row array", async () => {
    const mock = createSupabaseMock({ data: { rows: [] }, error: null });

    await expect(
      findSimilarProfiles(mock.db as never, {
        embedding: EMBEDDING,
        cohort: { kind: "global" },
        excludeProfileId: "profile_1",
        minSimilarity: 0.45,
        limit: 10,
      }),
    ).rejects.toMatchObject({ code: "DB_UNEXPECTED_RESPONSE" });
  });

  it("stores all three vectors in one update", async () => {
    const mock = createSupabaseMock({ data: null, error: null });

    await expect(
      updateProfileEmbedding(mock.db as never, "profile_1", EMBEDDING),
    ).resolves.toBeUndefined();
    expect(mock.calls).toEqual([
      [
        "update",
        [{
          profile_embedding: EMBEDDING.profile,
          interests_embedding: EMBEDDING.interests,
          expertise_embedding: EMBEDDING.expertise,
        }],
      ],
      ["eq", ["id", "profile_1"]],
    ]);
  });

  it("lists profiles without a profile embedding", async () => {
    const mock = createSupabaseMock({ data: [PROFILE_ROW], error: null });

    const profiles = await listProfilesMissingEmbedding(mock.db as never, 25);

    expect(profiles).toHaveLength(1);
    expect(mock.filterCalls()).toEqual([
      ["eq", ["is_active", true]],
      ["is", ["profile_embedding", null]],
      ["order", ["id", { ascending: true }]],
      ["limit", [25]],
    ]);
  });
});

describe("toProfileEmbedding", () => {
  it("parses pgvector text output", () => {
    expect(
      toProfileEmbedding({ profile: "[1,2]", interests: [3, 4], expertise: "[5,6]" }, 2),
    ).toEqual({ profile: [1, 2], interests: [3, 4], expertise: [5, 6] });
  });

  it("treats a partial or mis-sized embedding as absent", () => {
    expect(toProfileEmbedding({ profile: [1, 2], interests: null, expertise: [5, 6] }, 2)).toBeNull();
    expect(toProfileEmbedding({ profile: [1, 2, 3], interests: [3, 4], expertise: [5, 6] }, 2)).toBeNull();
  });
});
