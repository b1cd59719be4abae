export type RuntimeEnv = Record<string, string | undefined>;

/** Read a trimmed, non-empty environment variable. */
export function readEnv(name: string, env: RuntimeEnv = process.env): string | null {
  const value = env[name];
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export type DeployEnv = "local" | "staging" | "production";

export function resolveDeployEnv(env: RuntimeEnv = process.env): DeployEnv {
  const declared = (readEnv("APP_ENV", env) ?? readEnv("SENTRY_ENVIRONMENT", env) ?? "").toLowerCase();
  if (declared === "staging") {
    return "staging";
  }
  if (declared === "production" || declared === "prod") {
    return "production";
  }
  return "local";
}
