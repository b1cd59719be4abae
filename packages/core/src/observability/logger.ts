import {
  EVENT_CATALOG_BY_NAME,
  type CanonicalEventName,
  type EventCatalogEntry,
} from "./event-catalog.ts";
import { emitMetricBestEffort } from "./metrics.ts";
import { redactPII } from "./redaction.ts";
import { captureSentryFromStructuredLog } from "./sentry.ts";
import { readEnv } from "./runtime-env.ts";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type StructuredLogEventInput = {
  event: CanonicalEventName | string;
  profile_id?: string | null;
  pairing_id?: string | null;
  correlation_id?: string | null;
  payload: Record<string, unknown>;
  level?: LogLevel;
};

export type StructuredLogEvent = {
  ts: string;
  level: LogLevel;
  event: string;
  category: string;
  env: string;
  correlation_id: string | null;
  profile_id: string | null;
  pairing_id: string | null;
  payload: Record<string, unknown>;
};

export type LoggerContext = {
  env?: string;
  correlation_id?: string | null;
  profile_id?: string | null;
  pairing_id?: string | null;
};

export type StructuredLogger = (input: StructuredLogEventInput) => StructuredLogEvent;

export function isKnownEventName(event: string): event is CanonicalEventName {
  return Boolean(EVENT_CATALOG_BY_NAME[event]);
}

export function createLogger(context: LoggerContext = {}): StructuredLogger {
  return (input) => logEvent({
    ...input,
    correlation_id: normalizeString(input.correlation_id) ??
      normalizeString(context.correlation_id) ??
      null,
    profile_id: normalizeString(input.profile_id) ?? normalizeString(context.profile_id) ?? null,
    pairing_id: normalizeString(input.pairing_id) ?? normalizeString(context.pairing_id) ?? null,
    payload: input.payload,
    level: input.level,
  }, context.env);
}

export function logEvent(input: StructuredLogEventInput, explicitEnv?: string): StructuredLogEvent {
  const eventDef = resolveEventDefinition(input.event);
  const payload = ensurePayloadObject(input.payload);
  assertRequiredFields(eventDef, payload);

  const redactedPayload = redactPII(payload);
  const correlationId = normalizeString(input.correlation_id) ??
    normalizeString(redactedPayload.correlation_id) ??
    null;
  const env = normalizeEnv(explicitEnv ?? detectRuntimeEnv());

  const event: StructuredLogEvent = {
    ts: new Date().toISOString(),
    level: input.level ?? "info",
    event: eventDef.event_name,
    category: eventDef.category,
    env,
    correlation_id: correlationId,
    profile_id: normalizeString(input.profile_id),
    pairing_id: normalizeString(input.pairing_id),
    payload: redactedPayload,
  };

  emitDerivedMetricsFromLog(event);
  console.info(JSON.stringify(event));
  captureSentryFromStructuredLog(event);
  return event;
}

export { redactPII } from "./redaction.ts";

function resolveEventDefinition(event: string): EventCatalogEntry {
  const normalized = event.trim();
  const eventDef = EVENT_CATALOG_BY_NAME[normalized];
  if (!eventDef) {
    throw new Error(`Unknown structured log event: '${event}'.`);
  }
  return eventDef;
}

function ensurePayloadObject(payload: Record<string, unknown>): Record<string, unknown> {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    throw new Error("Structured log payload must be an object.");
  }
  return payload;
}

function assertRequiredFields(
  eventDef: EventCatalogEntry,
  payload: Record<string, unknown>,
): void {
  for (const requiredField of eventDef.required_fields) {
    const value = payload[requiredField];
    if (isPresent(value)) {
      continue;
    }
    throw new Error(
      `Missing required field '${requiredField}' for log event '${eventDef.event_name}'.`,
    );
  }
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  return true;
}

function detectRuntimeEnv(): string {
  return readEnv("APP_ENV") ??
    readEnv("SENTRY_ENVIRONMENT") ??
    readEnv("NODE_ENV") ??
    "local";
}

function normalizeEnv(raw: string): string {
  const value = raw.trim().toLowerCase();
  if (value === "staging") {
    return "staging";
  }
  if (value === "production" || value === "prod") {
    return "production";
  }
  return "local";
}

function normalizeString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function emitDerivedMetricsFromLog(event: StructuredLogEvent): void {
  const payload = event.payload;
  switch (event.event) {
    case "system.unhandled_error":
      emitMetricBestEffort({
        metric: "system.error.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "structured_logger",
          phase: safeTagValue(payload.phase) ?? "unknown",
          error_name: safeTagValue(payload.error_name) ?? "Error",
        },
      });
      return;

    case "system.rpc_failure":
      emitMetricBestEffort({
        metric: "system.rpc.failure.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "structured_logger",
          rpc_name: safeTagValue(payload.rpc_name) ?? "unknown",
        },
      });
      return;

    case "matching.pairing_created":
      emitMetricBestEffort({
        metric: "matching.pairings.created",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "pairing_orchestrator",
          scope_kind: safeTagValue(payload.scope_kind) ?? "unknown",
          category: safeTagValue(payload.category) ?? "unknown",
        },
      });
      return;

    case "matching.request_completed":
      emitMetricBestEffort({
        metric: "matching.request.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "pairing_orchestrator",
          cohort_kind: safeTagValue(payload.cohort_kind) ?? "unknown",
          outcome: safeTagValue(payload.outcome) ?? "unknown",
        },
      });
      return;

    case "oracle.fallback_used":
      emitMetricBestEffort({
        metric: "oracle.fallback.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "compatibility_oracle",
          error_code: safeTagValue(payload.error_code) ?? "unknown",
        },
      });
      return;

    default:
      return;
  }
}

function safeTagValue(value: unknown): string | null {
  if (typeof value === "string") {
    const normalized = value.trim();
    return normalized.length > 0 ? normalized : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return null;
}
