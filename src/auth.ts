import {
  API_KEY_ENV,
  API_KEY_HEADER,
  API_KEY_QUERY_PARAM,
} from "./constants.js";
import { AuthenticationRequiredError } from "./errors.js";
import type {
  AuthMethod,
  AuthRequirement,
  Operation,
  ParameterSet,
} from "./types.js";

export const OPERATION_AUTH: Readonly<Record<Operation, AuthRequirement>> = {
  // NSFW wallpapers are only visible with a key
  wallpaper: "auth-optional",
  tag: "no-auth-required",
  settings: "auth-required",
  collections: "no-auth-required",
  "all-collections": "auth-required",
  "collection-listing": "no-auth-required",
  "private-collection-listing": "auth-required",
  search: "auth-optional",
};

export interface AuthDecision {
  operation: Operation;
  requirement: AuthRequirement;
  attachKey: boolean;
}

function normalizeKey(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Explicit argument first, then the environment. Blank values count as
 * missing.
 */
export function resolveApiKey(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return normalizeKey(explicit) ?? normalizeKey(env[API_KEY_ENV]);
}

/**
 * Decide whether a request may go out and whether it carries the key.
 * Throws before any network activity when a required key is missing.
 */
export function authorize(
  operation: Operation,
  apiKey: string | undefined
): AuthDecision {
  const requirement = OPERATION_AUTH[operation];
  if (requirement === "auth-required" && !apiKey) {
    throw new AuthenticationRequiredError(operation);
  }
  return {
    operation,
    requirement,
    attachKey: requirement !== "no-auth-required" && apiKey !== undefined,
  };
}

export function applyCredentials(
  decision: AuthDecision,
  apiKey: string | undefined,
  method: AuthMethod,
  request: { headers: Record<string, string>; query?: ParameterSet }
): { headers: Record<string, string>; query?: ParameterSet } {
  if (!decision.attachKey || !apiKey) {
    return request;
  }
  if (method === "query") {
    return {
      headers: request.headers,
      query: { ...request.query, [API_KEY_QUERY_PARAM]: apiKey },
    };
  }
  return {
    headers: { ...request.headers, [API_KEY_HEADER]: apiKey },
    query: request.query,
  };
}
