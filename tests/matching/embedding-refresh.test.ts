import { beforeEach, describe, expect, it, vi } from "vitest";
import { createEmbeddingRefresher } from "../../packages/core/src/matching/embedding-refresh";
import type { EmbeddingProvider } from "../../packages/llm/src/embedding-provider";
import { InMemoryProfileStore } from "../helpers/in-memory-stores";
import { createLogRecorder } from "../helpers/matching-fixtures";
import { makeEmbedding, makeProfile } from "../helpers/profiles";

describe("embedding refresher", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  function setup(failFor: readonly string[] = []) {
    const profileStore = new InMemoryProfileStore([
      makeProfile({ id: "profile_1", bio: "Cellist." }),
      makeProfile({ id: "profile_2", bio: "Runner.", embedding: makeEmbedding(2) }),
      makeProfile({ id: "profile_3", bio: "Baker." }),
    ]);
    const embedProfile = vi.fn<EmbeddingProvider["embedProfile"]>(async (profile) =>
      failFor.includes(profile.id) ? null : makeEmbedding(7, 4)
    );
    const recorder = createLogRecorder();
    const refresher = createEmbeddingRefresher({
      profileStore,
      embeddingProvider: { embedProfile },
      log: recorder.log,
    });
    return { profileStore, embedProfile, recorder, refresher };
  }

  it("stores a fresh embedding for one profile", async () => {
    const { profileStore, recorder, refresher } = setup();

    await expect(refresher.refreshProfileEmbedding("profile_1")).resolves.toEqual({
      profileId: "profile_1",
      status: "refreshed",
    });
    expect(profileStore.profiles.get("profile_1")?.embedding).toEqual(makeEmbedding(7, 4));
    expect(recorder.payloads("embedding.refreshed")).toEqual([
      { profile_id: "profile_1", dimension: 4 },
    ]);
  });

  it("leaves the profile untouched when generation fails", async () => {
    const { profileStore, recorder, refresher } = setup(["profile_1"]);

    await expect(refresher.refreshProfileEmbedding("profile_1")).resolves.toEqual({
      profileId: "profile_1",
      status: "generation_failed",
    });
    expect(profileStore.profiles.get("profile_1")?.embedding).toBeNull();
    expect(recorder.payloads("embedding.refreshed")).toEqual([]);
  });

  it("reports a missing profile without calling the provider", async () => {
    const { embedProfile, refresher } = setup();

    await expect(refresher.refreshProfileEmbedding("profile_9")).resolves.toEqual({
      profileId: "profile_9",
      status: "profile_not_found",
    });
    expect(embedProfile).not.toHaveBeenCalled();
  });

  it("backfills only profiles that have no embedding", async () => {
    const { embedProfile, refresher } = setup(["profile_3"]);

    await expect(refresher.backfillMissingEmbeddings(10)).resolves.toEqual({
      scanned: 2,
      refreshed: 1,
      failed: 1,
    });
    expect(embedProfile.mock.calls.map(([profile]) => profile.id)).toEqual(["profile_1", "profile_3"]);
  });

  it("reports a failed write without storing anything", async () => {
    const { profileStore, recorder, refresher } = setup();
    profileStore.updateEmbeddingError = () => new Error("write conflict");

    await expect(refresher.refreshProfileEmbedding("profile_1")).resolves.toEqual({
      profileId: "profile_1",
      status: "store_failed",
    });
    expect(profileStore.profiles.get("profile_1")?.embedding).toBeNull();
    expect(recorder.payloads("embedding.store_failed")).toEqual([
      { profile_id: "profile_1", error_name: "Error", error_message: "write conflict" },
    ]);
    expect(recorder.payloads("embedding.refreshed")).toEqual([]);
  });

  it("keeps backfilling after one profile fails to store", async () => {
    const { profileStore, refresher } = setup();
    profileStore.updateEmbeddingError = (profileId) =>
      profileId === "profile_1" ? new Error("write conflict") : null;

    await expect(refresher.backfillMissingEmbeddings(10)).resolves.toEqual({
      scanned: 2,
      refreshed: 1,
      failed: 1,
    });
    expect(profileStore.profiles.get("profile_1")?.embedding).toBeNull();
    expect(profileStore.profiles.get("profile_3")?.embedding).toEqual(makeEmbedding(7, 4));
  });

  it("respects the backfill limit", async () => {
    const { refresher } = setup();

    await expect(refresher.backfillMissingEmbeddings(1)).resolves.toEqual({
      scanned: 1,
      refreshed: 1,
      failed: 0,
    });
  });
});
