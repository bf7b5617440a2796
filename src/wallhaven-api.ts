/**
 * Wallhaven API v1 client
 */

import { applyCredentials, authorize, resolveApiKey } from "./auth.js";
import {
  DEFAULT_TIMEOUT_SECONDS,
  WALLHAVEN_API_BASE,
} from "./constants.js";
import {
  MalformedResponseError,
  NotFoundError,
  RateLimitedError,
  TransportError,
  UnauthorizedError,
} from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import {
  Collection,
  Listing,
  SearchResult,
  Tag,
  UserSettings,
  Wallpaper,
  decode,
  parseCollection,
  parseList,
  parseListing,
  parseSearchResult,
  parseTag,
  parseUserSettings,
  parseWallpaper,
  unwrap,
} from "./models.js";
import { resolveParameters, translateSettings } from "./params.js";
import { ListEnvelopeSchema, SingleEnvelopeSchema } from "./schemas.js";
import { FetchTransport, type Transport, type TransportResponse } from "./transport.js";
import type {
  AuthMethod,
  Operation,
  ParameterSet,
  SearchOptions,
  SearchParameters,
} from "./types.js";

export interface WallhavenClientOptions {
  /** Takes precedence over WALLHAVEN_API_KEY */
  apiKey?: string;
  transport?: Transport;
  authMethod?: AuthMethod;
  /** Merge the account's browsing settings into searches (needs a key). Default true. */
  useAccountSettings?: boolean;
  baseUrl?: string;
  /** Only used when no transport is given */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

interface RequestSpec {
  operation: Operation;
  path: string;
  /** What a NotFoundError should name */
  identifier: string;
  query?: ParameterSet;
}

export class WallhavenClient {
  /**
   * Overrides consulted by every `search()` call. Not synchronized: do not
   * mutate it while a search is resolving its parameters.
   */
  readonly params: SearchParameters = {};

  private readonly apiKey: string | undefined;
  private readonly transport: Transport;
  private readonly authMethod: AuthMethod;
  private readonly useAccountSettings: boolean;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(options: WallhavenClientOptions = {}) {
    this.apiKey = resolveApiKey(options.apiKey, options.env ?? process.env);
    this.transport =
      options.transport ??
      new FetchTransport(options.timeoutMs ?? DEFAULT_TIMEOUT_SECONDS * 1000);
    this.authMethod = options.authMethod ?? "header";
    this.useAccountSettings = options.useAccountSettings ?? true;
    this.baseUrl = (options.baseUrl ?? WALLHAVEN_API_BASE).replace(/\/+$/, "");
    this.logger = options.logger ?? silentLogger;
  }

  get hasApiKey(): boolean {
    return this.apiKey !== undefined;
  }

  /**
   * Fetch one wallpaper with its tags and uploader. NSFW wallpapers need a key.
   */
  async getWallpaper(id: string): Promise<Wallpaper> {
    const body = await this.request({
      operation: "wallpaper",
      path: `/w/${encodeURIComponent(id)}`,
      identifier: id,
    });
    return unwrap(parseWallpaper(this.single(body, "wallpaper"), this.transport));
  }

  async getTag(id: number | string): Promise<Tag> {
    const body = await this.request({
      operation: "tag",
      path: `/tag/${encodeURIComponent(String(id))}`,
      identifier: String(id),
    });
    return unwrap(parseTag(this.single(body, "tag")));
  }

  /**
   * Browsing settings of the key's owner. Requires an API key.
   */
  async getUserSettings(): Promise<UserSettings> {
    const body = await this.request({
      operation: "settings",
      path: "/settings",
      identifier: "settings",
    });
    return unwrap(parseUserSettings(this.single(body, "settings")));
  }

  /**
   * Public collections of `username`. Empty when the user's only collection
   * is private.
   */
  async getCollections(username: string): Promise<Collection[]> {
    const body = await this.request({
      operation: "collections",
      path: `/collections/${encodeURIComponent(username)}`,
      identifier: username,
    });
    return this.collections(body, username);
  }

  /**
   * All collections of the key's owner, private ones included.
   */
  async getAllCollections(): Promise<Collection[]> {
    const body = await this.request({
      operation: "all-collections",
      path: "/collections",
      identifier: "collections",
    });
    return this.collections(body, null);
  }

  async getCollectionListing(
    username: string,
    collectionId: number
  ): Promise<Listing> {
    return this.listing("collection-listing", username, collectionId);
  }

  /**
   * Same endpoint as `getCollectionListing`, but refuses to run without a key.
   */
  async getPrivateCollectionListing(
    username: string,
    collectionId: number
  ): Promise<Listing> {
    return this.listing("private-collection-listing", username, collectionId);
  }

  /**
   * Merge account settings, `params` and per-call overrides into the query a
   * search would send. Fetches the settings when a key is configured and
   * account settings are enabled.
   */
  async resolveSearchParameters(
    options: SearchOptions = {}
  ): Promise<ParameterSet> {
    const useSettings =
      (options.useAccountSettings ?? this.useAccountSettings) && this.hasApiKey;
    const settings = useSettings
      ? translateSettings(await this.getUserSettings())
      : undefined;
    return resolveParameters(settings, this.params, options.parameters);
  }

  /**
   * Run a search and return the first page of results. Paging means calling
   * again with a different `page` parameter.
   */
  async search(options: SearchOptions = {}): Promise<SearchResult> {
    const query = await this.resolveSearchParameters(options);
    const body = await this.request({
      operation: "search",
      path: "/search",
      identifier: query.q ?? "search",
      query,
    });
    return unwrap(parseSearchResult(body, this.transport));
  }

  private async listing(
    operation: "collection-listing" | "private-collection-listing",
    username: string,
    collectionId: number
  ): Promise<Listing> {
    const body = await this.request({
      operation,
      path: `/collections/${encodeURIComponent(username)}/${collectionId}`,
      identifier: `${username}/${collectionId}`,
    });
    return unwrap(parseListing(body, this.transport));
  }

  private collections(body: unknown, owner: string | null): Collection[] {
    const envelope = unwrap(decode(ListEnvelopeSchema, body, "collections"));
    return unwrap(
      parseList(envelope.data, "collections", (item) =>
        parseCollection(item, owner)
      )
    );
  }

  private single(body: unknown, entity: string): Record<string, unknown> {
    return unwrap(decode(SingleEnvelopeSchema, body, entity)).data;
  }

  /**
   * Gate, send exactly one GET, map the status and decode the JSON body.
   */
  private async request(call: RequestSpec): Promise<unknown> {
    const decision = authorize(call.operation, this.apiKey);
    const { headers, query } = applyCredentials(
      decision,
      this.apiKey,
      this.authMethod,
      { headers: { Accept: "application/json" }, query: call.query }
    );

    this.logger.debug("Requesting Wallhaven", {
      operation: call.operation,
      path: call.path,
      params: call.query ?? {},
      authenticated: decision.attachKey,
    });

    let response: TransportResponse;
    try {
      response = await this.transport.get({
        url: `${this.baseUrl}${call.path}`,
        query,
        headers,
      });
    } catch (error) {
      this.logger.error(`Request for ${call.operation} failed`, error);
      throw new TransportError(call.operation, { cause: error });
    }

    this.logger.debug("Wallhaven responded", {
      operation: call.operation,
      status: response.status,
    });

    const { status } = response;
    if (status < 200 || status >= 300) {
      await this.discard(call.operation, response);
      throw this.statusError(call, status, decision.attachKey);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      this.logger.error(`Reading the ${call.operation} response failed`, error);
      throw new TransportError(call.operation, { cause: error });
    }

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      throw new MalformedResponseError(
        call.operation,
        "(body)",
        error instanceof Error ? error.message : "invalid JSON"
      );
    }
  }

  private statusError(
    call: RequestSpec,
    status: number,
    keyProvided: boolean
  ): Error {
    switch (status) {
      case 401:
        return new UnauthorizedError(call.operation, call.identifier, keyProvided);
      case 404:
        return new NotFoundError(call.operation, call.identifier);
      case 429:
        return new RateLimitedError(call.operation);
      default:
        return new TransportError(call.operation, { status });
    }
  }

  /** Release the connection of a response whose body is not needed */
  private async discard(
    operation: Operation,
    response: TransportResponse
  ): Promise<void> {
    try {
      await response.cancel();
    } catch (error) {
      this.logger.error(`Could not release the ${operation} response`, error);
    }
  }
}
