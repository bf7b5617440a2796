export { WallhavenClient, type WallhavenClientOptions } from "./wallhaven-api.js";
export {
  Collection,
  Listing,
  SearchResult,
  Tag,
  UserSettings,
  Wallpaper,
  type SaveOptions,
  parseCollection,
  parseListing,
  parseSearchResult,
  parseTag,
  parseUserSettings,
  parseWallpaper,
} from "./models.js";
export {
  SETTINGS_PARAMETER_TABLE,
  buildQuery,
  resolveParameters,
  toBitmask,
  translateSettings,
} from "./params.js";
export { OPERATION_AUTH, authorize, resolveApiKey } from "./auth.js";
export { FetchTransport } from "./transport.js";
export type { Transport, TransportRequest, TransportResponse } from "./transport.js";
export { loadConfig, type WallhavenConfig } from "./config.js";
export { createLogger, type Logger } from "./log.js";
export * from "./errors.js";
export type * from "./types.js";
