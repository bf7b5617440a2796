import type { MalformedResponseError } from "./errors.js";

/**
 * Every request the client can make. Used for auth classification, logging
 * and error context.
 */
export type Operation =
  | "wallpaper"
  | "tag"
  | "settings"
  | "collections"
  | "all-collections"
  | "collection-listing"
  | "private-collection-listing"
  | "search";

export type AuthRequirement =
  | "no-auth-required"
  | "auth-optional"
  | "auth-required";

export type AuthMethod = "header" | "query";

/**
 * Final query parameters for one request. Built fresh per call and frozen.
 */
export type ParameterSet = Readonly<Record<string, string>>;

/**
 * Caller-owned override map. Keys are Wallhaven's query parameter names
 * (`categories`, `purity`, `sorting`, `topRange`, `q`, `page`, ...).
 */
export type SearchParameters = Record<string, string>;

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: MalformedResponseError };

export interface Thumbs {
  large: string;
  original: string;
  small: string;
}

export interface Uploader {
  username: string;
  group: string;
  avatar: Record<string, string>;
}

/**
 * Search meta carries a tag object instead of a string when the query was an
 * exact tag (`id:123`).
 */
export type ListingQuery = string | { id: number; tag: string } | null;

export interface ListingMeta {
  currentPage: number;
  lastPage: number;
  perPage: number;
  total: number;
  query: ListingQuery;
  seed: string | null;
}

export interface QueryOptions {
  keywords?: string[];
  include?: string[];
  exclude?: string[];
  user?: string;
  tagId?: number;
  type?: "png" | "jpg" | "jpeg";
  like?: string;
}

export interface SearchOptions {
  /** Overrides applied over `client.params` for this call only */
  parameters?: SearchParameters;
  /** Merge the account's browsing settings first; defaults to the client setting */
  useAccountSettings?: boolean;
}
