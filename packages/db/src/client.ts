import {
  createClient,
  type SupabaseClient,
  type SupabaseClientOptions,
} from "@supabase/supabase-js";
import { assertRequiredEnv, DB_ERROR_CODES, DbError } from "./errors.ts";

export type DbClientRole = "service" | "anon";

export type DbEnv = Record<string, string | undefined>;

export type DbCreateClientImpl = (
  supabaseUrl: string,
  supabaseKey: string,
  options: SupabaseClientOptions<"public">,
) => SupabaseClient;

export type CreateDbClientParams = {
  role?: DbClientRole;
  env?: DbEnv;
  authorization?: string | null;
  clientOptions?: SupabaseClientOptions<"public">;
  createClientImpl?: DbCreateClientImpl;
};

const KEY_ENV_BY_ROLE: Record<DbClientRole, string> = {
  service: "SUPABASE_SERVICE_ROLE_KEY",
  anon: "SUPABASE_ANON_KEY",
};

export function createDbClient(params: CreateDbClientParams = {}): SupabaseClient {
  const role = params.role ?? "service";
  const env = params.env ?? process.env;
  const supabaseUrl = assertRequiredEnv("SUPABASE_URL", env.SUPABASE_URL);
  const keyEnvName = KEY_ENV_BY_ROLE[role];
  const supabaseKey = assertRequiredEnv(keyEnvName, env[keyEnvName]);

  if (!/^https?:\/\//i.test(supabaseUrl)) {
    throw new DbError(DB_ERROR_CODES.INVALID_ENV, "SUPABASE_URL must be an http(s) URL.", {
      status: 500,
      context: { env_var: "SUPABASE_URL" },
    });
  }

  const headers: Record<string, string> = {
    ...(params.clientOptions?.global?.headers ?? {}),
  };
  if (params.authorization) {
    headers.Authorization = params.authorization;
  }

  const options: SupabaseClientOptions<"public"> = {
    ...params.clientOptions,
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      ...params.clientOptions?.auth,
    },
    global: {
      ...params.clientOptions?.global,
      headers,
    },
  };

  const createClientImpl: DbCreateClientImpl = params.createClientImpl ??
    ((url, key, clientOptions) => createClient(url, key, clientOptions));

  try {
    return createClientImpl(supabaseUrl, supabaseKey, options);
  } catch (error) {
    throw DbError.fromUnknown({
      code: DB_ERROR_CODES.CLIENT_INIT_FAILED,
      message: "Unable to initialize Supabase client.",
      error,
      context: { role },
    });
  }
}

export function createServiceRoleDbClient(
  params: Omit<CreateDbClientParams, "role"> = {},
): SupabaseClient {
  return createDbClient({ ...params, role: "service" });
}

export function createAnonDbClient(
  params: Omit<CreateDbClientParams, "role"> = {},
): SupabaseClient {
  return createDbClient({ ...params, role: "anon" });
}
