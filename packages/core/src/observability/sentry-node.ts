import * as Sentry from "@sentry/node";
import type { Scope } from "@sentry/node";
import { redactPII } from "./redaction.ts";
import { resolveSentryRuntimeConfigFromEnv } from "./sentry-config.ts";
import {
  registerSentryBridge,
  type SentryBridge,
  type SentryCaptureInput,
  type SentryContext,
  type SentrySpanOptions,
} from "./sentry.ts";
import type { RuntimeEnv } from "./runtime-env.ts";

type SentrySeverity = "debug" | "info" | "warning" | "error" | "fatal";

let initialized = false;

export function sanitizeSentryEvent<T>(event: T): T {
  return redactPII(event);
}

export function createSentryBeforeSend() {
  return function beforeSend<T>(event: T): T {
    return sanitizeSentryEvent(event);
  };
}

/** Initialize @sentry/node once per process and route the bridge through it. */
export function initializeNodeSentry(service: string, env: RuntimeEnv = process.env): boolean {
  if (initialized) {
    return true;
  }

  const config = resolveSentryRuntimeConfigFromEnv(env);
  if (!config.enabled) {
    return false;
  }

  Sentry.init({
    dsn: config.dsn ?? undefined,
    environment: config.environment,
    release: config.release ?? undefined,
    enabled: config.enabled,
    tracesSampleRate: config.tracesSampleRate,
    beforeSend: createSentryBeforeSend(),
    sendDefaultPii: false,
    initialScope: {
      tags: {
        runtime: "node",
        service,
      },
    },
  });

  registerSentryBridge(createNodeSentryBridge());
  initialized = true;
  return true;
}

function createNodeSentryBridge(): SentryBridge {
  return {
    captureException(error: unknown, input?: SentryCaptureInput): void {
      Sentry.withScope((scope) => {
        applySentryScope(scope, input);
        Sentry.captureException(normalizeError(error));
      });
    },
    captureMessage(message: string, input?: SentryCaptureInput): void {
      Sentry.withScope((scope) => {
        applySentryScope(scope, input);
        Sentry.captureMessage(message, toSeverity(input?.level));
      });
    },
    startSpan<T>(options: SentrySpanOptions, callback: () => T): T {
      return Sentry.startSpan(
        {
          name: options.name,
          op: options.op ?? options.name,
          attributes: normalizeSpanAttributes(options.attributes),
        },
        callback,
      );
    },
    setContext(context: SentryContext): void {
      applyScopeContext(Sentry.getCurrentScope(), context);
    },
  };
}

function applySentryScope(scope: Scope, input?: SentryCaptureInput): void {
  if (!input) {
    return;
  }

  applyScopeContext(scope, input.context);
  const severity = toSeverity(input.level);
  if (severity) {
    scope.setLevel(severity);
  }
  if (input.event) {
    scope.setTag("event", input.event);
  }
  if (input.payload) {
    scope.setContext("payload", normalizeContextPayload(input.payload));
  }
}

function applyScopeContext(scope: Scope, context?: SentryContext): void {
  if (!context) {
    return;
  }
  if (context.category) {
    scope.setTag("category", context.category);
  }
  if (context.correlation_id) {
    scope.setTag("correlation_id", context.correlation_id);
  }
  if (context.pairing_id) {
    scope.setTag("pairing_id", context.pairing_id);
  }
  if (context.profile_id) {
    scope.setUser({ id: context.profile_id });
  }
  for (const [key, value] of Object.entries(context.tags ?? {})) {
    if (value === null || value === undefined) {
      continue;
    }
    scope.setTag(key, String(value));
  }
}

function normalizeContextPayload(
  payload: Record<string, unknown>,
): Record<string, string | number | boolean | null> {
  const normalized: Record<string, string | number | boolean | null> = {};
  for (const [key, value] of Object.entries(redactPII(payload))) {
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      normalized[key] = value;
      continue;
    }
    normalized[key] = value === null || value === undefined ? null : JSON.stringify(value);
  }
  return normalized;
}

function normalizeSpanAttributes(
  attributes: Record<string, unknown> | undefined,
): Record<string, string | number | boolean> | undefined {
  if (!attributes) {
    return undefined;
  }
  const normalized: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      normalized[key] = value;
      continue;
    }
    if (value === null || value === undefined) {
      continue;
    }
    normalized[key] = JSON.stringify(value);
  }
  return normalized;
}

function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === "string" ? error : "Unknown error");
}

function toSeverity(level: string | undefined): SentrySeverity | undefined {
  if (level === "debug" || level === "info" || level === "warning" || level === "error" || level === "fatal") {
    return level;
  }
  if (level === "warn") {
    return "warning";
  }
  return undefined;
}
