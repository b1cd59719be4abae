export * from "./types.ts";
export * from "./scope.ts";
export * from "./queries/profiles.ts";
export * from "./queries/pairings.ts";
export {
  assertRequiredEnv,
  DB_ERROR_CODES,
  DbError,
  isUniqueViolation,
  sanitizeForError,
  type DbErrorCode,
} from "./errors.ts";
export {
  createAnonDbClient,
  createDbClient,
  createServiceRoleDbClient,
  type CreateDbClientParams,
  type DbClientRole,
  type DbEnv,
} from "./client.ts";
