// Wallhaven API v1 endpoint
export const WALLHAVEN_API_BASE = "https://wallhaven.cc/api/v1";

export const USER_AGENT = "wallhaven-mcp/1.0.0";

// Environment variable the API key is read from when none is passed explicitly
export const API_KEY_ENV = "WALLHAVEN_API_KEY";

// Wallhaven accepts the key either as a header or as a query parameter
export const API_KEY_HEADER = "X-API-Key";
export const API_KEY_QUERY_PARAM = "apikey";

// Requests per minute Wallhaven allows before answering 429
export const RATE_LIMIT_PER_MINUTE = 45;

export const DEFAULT_TIMEOUT_SECONDS = 20;

// Bit order of the `categories` and `purity` query parameters
export const CATEGORY_NAMES = ["general", "anime", "people"] as const;
export const PURITY_NAMES = ["sfw", "sketchy", "nsfw"] as const;

export const SORTING_OPTIONS = [
  "date_added",
  "relevance",
  "random",
  "views",
  "favorites",
  "toplist",
] as const;

export const SORTING_ORDERS = ["desc", "asc"] as const;

export const TOPLIST_RANGES = ["1d", "3d", "1w", "1M", "3M", "6M", "1y"] as const;

// Wallhaven's search palette; `colors` only accepts these, without the '#'
export const COLORS = [
  "660000", "990000", "cc0000", "cc3333", "ea4c88",
  "993399", "663399", "333399", "0066cc", "0099cc",
  "66cccc", "77cc33", "669900", "336600", "666600",
  "999900", "cccc33", "ffff00", "ffcc33", "ff9900",
  "ff6600", "cc6633", "996633", "663300", "000000",
  "999999", "cccccc", "ffffff", "424153",
] as const;

// Maximum character limit for tool responses to prevent overwhelming context
export const CHARACTER_LIMIT = 25000;

// Max width and max height of each thumbnail in the composite image
export const THUMBNAIL_SIZE = 256;

// Maximum number of wallpapers to include in the thumbnail composite
export const MAX_IMAGES_IN_COMPOSITE = 15;
