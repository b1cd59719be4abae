/**
 * Generate embeddings for active profiles that have none yet.
 *
 *   tsx scripts/backfill-embeddings.ts [--limit 100]
 */

import { parseArgs } from "node:util";
import { createServiceRoleDbClient } from "../packages/db/src/client.ts";
import { createOpenAiEmbeddingProvider } from "../packages/llm/src/embedding-provider.ts";
import { resolveMatchingConfig } from "../packages/core/src/matching/config.ts";
import { createEmbeddingRefresher } from "../packages/core/src/matching/embedding-refresh.ts";
import { createSupabaseProfileStore } from "../packages/core/src/matching/supabase-stores.ts";
import { EVENTS } from "../packages/core/src/observability/events.ts";
import { logEvent } from "../packages/core/src/observability/logger.ts";
import { initializeNodeSentry } from "../packages/core/src/observability/sentry-node.ts";

const { values } = parseArgs({
  options: {
    limit: { type: "string", default: "100" },
  },
});

async function run(): Promise<void> {
  initializeNodeSentry("backfill-embeddings");
  const config = resolveMatchingConfig();
  const limit = Number(values.limit);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error("--limit must be a positive integer.");
  }

  const refresher = createEmbeddingRefresher({
    profileStore: createSupabaseProfileStore(createServiceRoleDbClient()),
    embeddingProvider: createOpenAiEmbeddingProvider({ timeoutMs: config.embeddingTimeoutMs }),
  });

  console.log("Backfilling profile embeddings...");
  const result = await refresher.backfillMissingEmbeddings(limit);
  console.log(`Scanned ${result.scanned}, refreshed ${result.refreshed}, failed ${result.failed}.`);
}

run().catch((error: unknown) => {
  logEvent({
    level: "fatal",
    event: EVENTS.system.unhandledError,
    payload: {
      phase: "backfill_embeddings",
      error_name: error instanceof Error ? error.name : "Error",
      error_message: error instanceof Error ? error.message : String(error),
    },
  });
  process.exit(1);
});
