/**
 * Run matching for one profile, or for every member of an event.
 *
 *   tsx scripts/run-matching.ts --profile <id> --event <id>
 *   tsx scripts/run-matching.ts --profile <id> --locality "Lisbon"
 *   tsx scripts/run-matching.ts --profile <id> --global
 *   tsx scripts/run-matching.ts --event <id> --all
 */

import { parseArgs } from "node:util";
import { createServiceRoleDbClient } from "../packages/db/src/client.ts";
import type { CohortRef } from "../packages/db/src/types/cohort.ts";
import { createLlmCompatibilityOracle } from "../packages/llm/src/compatibility-oracle.ts";
import { createAnthropicProvider } from "../packages/llm/src/provider.ts";
import { resolveMatchingConfig } from "../packages/core/src/matching/config.ts";
import { createPairingOrchestrator } from "../packages/core/src/matching/pairing-orchestrator.ts";
import {
  createSupabasePairingStore,
  createSupabaseProfileStore,
} from "../packages/core/src/matching/supabase-stores.ts";
import { EVENTS } from "../packages/core/src/observability/events.ts";
import { logEvent } from "../packages/core/src/observability/logger.ts";
import { initializeNodeSentry } from "../packages/core/src/observability/sentry-node.ts";

const { values } = parseArgs({
  options: {
    profile: { type: "string" },
    event: { type: "string" },
    locality: { type: "string" },
    global: { type: "boolean", default: false },
    all: { type: "boolean", default: false },
    limit: { type: "string" },
  },
});

function resolveCohort(): CohortRef {
  if (values.event) {
    return { kind: "event", event_id: values.event };
  }
  if (values.locality) {
    return { kind: "locality", locality: values.locality };
  }
  if (values.global) {
    return { kind: "global" };
  }
  throw new Error("Pass one of --event, --locality or --global.");
}

async function run(): Promise<void> {
  initializeNodeSentry("run-matching");
  const config = resolveMatchingConfig();
  const db = createServiceRoleDbClient();
  const orchestrator = createPairingOrchestrator({
    profileStore: createSupabaseProfileStore(db),
    pairingStore: createSupabasePairingStore(db),
    oracle: createLlmCompatibilityOracle({
      provider: createAnthropicProvider(),
      timeoutMs: config.oracleTimeoutMs,
    }),
    config,
  });
  const limit = values.limit === undefined ? undefined : Number(values.limit);
  if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
    throw new Error("--limit must be a positive integer.");
  }

  if (values.all) {
    if (!values.event) {
      throw new Error("--all requires --event.");
    }
    const summary = await orchestrator.createEventPairings({ eventId: values.event, limit });
    console.log(
      `Processed ${summary.processed} profiles, created ${summary.created} pairings, ${summary.failed} failed.`,
    );
    return;
  }

  if (!values.profile) {
    throw new Error("Pass --profile <id> or --event <id> --all.");
  }

  const result = await orchestrator.findMatches({
    profileId: values.profile,
    cohort: resolveCohort(),
    limit,
  });
  console.log(`Outcome: ${result.outcome}`);
  console.log(JSON.stringify(result.stats, null, 2));
  for (const match of result.matches) {
    console.log(`${match.pairing.id}  ${match.pairing.score.toFixed(2)}  ${match.pairing.category}`);
  }
}

run().catch((error: unknown) => {
  logEvent({
    level: "fatal",
    event: EVENTS.system.unhandledError,
    payload: {
      phase: "run_matching",
      error_name: error instanceof Error ? error.name : "Error",
      error_message: error instanceof Error ? error.message : String(error),
    },
  });
  process.exit(1);
});
