import { z } from "zod";
import { resolveApiKey } from "./auth.js";
import { DEFAULT_TIMEOUT_SECONDS } from "./constants.js";
import { ConfigurationError } from "./errors.js";
import type { AuthMethod } from "./types.js";

export interface WallhavenConfig {
  apiKey: string | undefined;
  authMethod: AuthMethod;
  timeoutMs: number;
  downloadDirectory: string;
  useAccountSettings: boolean;
  debug: boolean;
}

const flag = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) =>
      value === undefined ? defaultValue : value === "true" || value === "1"
    );

const EnvSchema = z.object({
  WALLHAVEN_AUTH_METHOD: z.enum(["header", "query"]).default("header"),
  WALLHAVEN_TIMEOUT: z.coerce
    .number()
    .positive("Timeout must be a positive number of seconds")
    .default(DEFAULT_TIMEOUT_SECONDS),
  WALLHAVEN_DOWNLOAD_DIR: z.string().min(1).default("."),
  WALLHAVEN_USE_ACCOUNT_SETTINGS: flag(true),
  WALLHAVEN_DEBUG: flag(false),
});

/**
 * Read the server configuration from environment variables.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): WallhavenConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      String(issue?.path[0] ?? "environment"),
      issue?.message ?? "invalid value"
    );
  }

  const values = parsed.data;
  return {
    apiKey: resolveApiKey(undefined, env),
    authMethod: values.WALLHAVEN_AUTH_METHOD,
    timeoutMs: values.WALLHAVEN_TIMEOUT * 1000,
    downloadDirectory: values.WALLHAVEN_DOWNLOAD_DIR,
    useAccountSettings: values.WALLHAVEN_USE_ACCOUNT_SETTINGS,
    debug: values.WALLHAVEN_DEBUG,
  };
}
