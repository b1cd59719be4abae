import type { EmbeddingProvider } from "../../../llm/src/embedding-provider.ts";
import type { Profile } from "../../../db/src/types/profile.ts";
import { EVENTS } from "../observability/events.ts";
import { logEvent, type StructuredLogger } from "../observability/logger.ts";
import type { ProfileStore } from "./ports.ts";

export type EmbeddingRefreshStatus =
  | "refreshed"
  | "generation_failed"
  | "store_failed"
  | "profile_not_found";

export type EmbeddingRefreshResult = {
  profileId: string;
  status: EmbeddingRefreshStatus;
};

export type BackfillEmbeddingsResult = {
  scanned: number;
  refreshed: number;
  failed: number;
};

export type EmbeddingRefresher = {
  refreshProfileEmbedding(profileId: string): Promise<EmbeddingRefreshResult>;
  backfillMissingEmbeddings(limit: number): Promise<BackfillEmbeddingsResult>;
};

export function createEmbeddingRefresher(deps: {
  profileStore: ProfileStore;
  embeddingProvider: EmbeddingProvider;
  log?: StructuredLogger;
}): EmbeddingRefresher {
  const log = deps.log ?? logEvent;

  async function refresh(profile: Profile): Promise<EmbeddingRefreshStatus> {
    const embedding = await deps.embeddingProvider.embedProfile(profile);
    if (!embedding) {
      return "generation_failed";
    }

    // Concurrent refreshes of one profile race here; the last write wins.
    try {
      await deps.profileStore.updateEmbedding(profile.id, embedding);
    } catch (error) {
      log({
        level: "error",
        event: EVENTS.embedding.storeFailed,
        profile_id: profile.id,
        payload: {
          profile_id: profile.id,
          error_name: error instanceof Error ? error.name : "Error",
          error_message: error instanceof Error ? error.message : "unknown_error",
        },
      });
      return "store_failed";
    }
    log({
      level: "info",
      event: EVENTS.embedding.refreshed,
      profile_id: profile.id,
      payload: { profile_id: profile.id, dimension: embedding.profile.length },
    });
    return "refreshed";
  }

  return {
    async refreshProfileEmbedding(profileId) {
      const profile = await deps.profileStore.getProfile(profileId);
      if (!profile) {
        return { profileId, status: "profile_not_found" };
      }
      return { profileId, status: await refresh(profile) };
    },

    async backfillMissingEmbeddings(limit) {
      const profiles = await deps.profileStore.listProfilesMissingEmbedding(limit);
      const result: BackfillEmbeddingsResult = { scanned: profiles.length, refreshed: 0, failed: 0 };
      for (const profile of profiles) {
        if ((await refresh(profile)) === "refreshed") {
          result.refreshed += 1;
        } else {
          result.failed += 1;
        }
      }
      return result;
    },
  };
}
