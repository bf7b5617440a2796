import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { CHARACTER_LIMIT } from "./constants.js";
import {
  formatCollections,
  formatListing,
  formatSearchResults,
  formatTag,
  formatUserSettings,
  formatWallpaper,
} from "./format.js";
import type { Logger } from "./log.js";
import { SearchResult } from "./models.js";
import { buildQuery } from "./params.js";
import {
  CollectionListingToolInputSchema,
  CollectionsToolInputSchema,
  DownloadToolInputSchema,
  SearchToolInputSchema,
  SettingsToolInputSchema,
  TagToolInputSchema,
  WallpaperToolInputSchema,
  type CollectionListingToolInput,
  type CollectionsToolInput,
  type DownloadToolInput,
  type SearchToolInput,
  type TagToolInput,
  type WallpaperToolInput,
} from "./schemas.js";
import { generateThumbnailComposite } from "./thumbnails.js";
import type { Transport } from "./transport.js";
import type { SearchParameters } from "./types.js";
import type { WallhavenClient } from "./wallhaven-api.js";

export interface ToolContext {
  client: WallhavenClient;
  /** Used for thumbnail fetches */
  transport: Transport;
  downloadDirectory: string;
  logger: Logger;
}

const text = (value: string): CallToolResult => ({
  content: [{ type: "text", text: value }],
});

function toolError(context: ToolContext, action: string, error: unknown): CallToolResult {
  context.logger.error(`Failed to ${action}`, error);
  const errorMessage =
    error instanceof Error ? error.message : "Unknown error occurred";
  return {
    content: [{ type: "text", text: `Error trying to ${action}: ${errorMessage}` }],
    isError: true,
  };
}

/**
 * Translate tool arguments into Wallhaven query parameters.
 */
export function toSearchParameters(input: SearchToolInput): SearchParameters {
  const params: SearchParameters = {};

  const q = [
    input.q?.trim(),
    buildQuery({
      include: input.include_tags,
      exclude: input.exclude_tags,
      user: input.uploader,
      like: input.similar_to,
    }),
  ]
    .filter((part): part is string => Boolean(part))
    .join(" ");
  if (q) params.q = q;

  if (input.categories) params.categories = input.categories;
  if (input.purity) params.purity = input.purity;
  if (input.sorting) params.sorting = input.sorting;
  if (input.order) params.order = input.order;
  if (input.topRange) params.topRange = input.topRange;
  if (input.atleast) params.atleast = input.atleast;
  if (input.resolutions?.length) params.resolutions = input.resolutions.join(",");
  if (input.ratios?.length) params.ratios = input.ratios.join(",");
  if (input.colors?.length) params.colors = [...new Set(input.colors)].join(",");
  if (input.page !== undefined) params.page = String(input.page);
  if (input.seed) params.seed = input.seed;

  return params;
}

export async function searchTool(
  context: ToolContext,
  input: SearchToolInput
): Promise<CallToolResult> {
  try {
    const result = await context.client.search({
      parameters: toSearchParameters(input),
      useAccountSettings: input.use_account_settings,
    });

    let textResponse = formatSearchResults(result);
    let shown = result;
    if (textResponse.length > CHARACTER_LIMIT) {
      shown = new SearchResult(
        result.wallpapers.slice(0, Math.floor(result.length / 2)),
        result.meta
      );
      textResponse =
        formatSearchResults(shown) +
        `\n\n⚠️ **Response Truncated**: Original response exceeded ${CHARACTER_LIMIT} characters. Showing first ${shown.length} results.`;
    }

    const content: CallToolResult["content"] = [
      { type: "text", text: textResponse },
    ];

    if (input.include_thumbnails && shown.length > 0) {
      const composite = await generateThumbnailComposite(
        shown.wallpapers,
        context.transport,
        context.logger
      );
      if (composite.length > 0) {
        content.push({ type: "image", data: composite, mimeType: "image/jpeg" });
      }
    }

    return { content };
  } catch (error) {
    return toolError(context, "search Wallhaven", error);
  }
}

export async function wallpaperTool(
  context: ToolContext,
  input: WallpaperToolInput
): Promise<CallToolResult> {
  try {
    return text(formatWallpaper(await context.client.getWallpaper(input.id)));
  } catch (error) {
    return toolError(context, `fetch wallpaper ${input.id}`, error);
  }
}

export async function tagTool(
  context: ToolContext,
  input: TagToolInput
): Promise<CallToolResult> {
  try {
    return text(formatTag(await context.client.getTag(input.id)));
  } catch (error) {
    return toolError(context, `fetch tag ${input.id}`, error);
  }
}

export async function settingsTool(context: ToolContext): Promise<CallToolResult> {
  try {
    return text(formatUserSettings(await context.client.getUserSettings()));
  } catch (error) {
    return toolError(context, "read browsing settings", error);
  }
}

export async function collectionsTool(
  context: ToolContext,
  input: CollectionsToolInput
): Promise<CallToolResult> {
  try {
    const collections = input.username
      ? await context.client.getCollections(input.username)
      : await context.client.getAllCollections();
    return text(formatCollections(collections));
  } catch (error) {
    return toolError(context, "list collections", error);
  }
}

export async function collectionListingTool(
  context: ToolContext,
  input: CollectionListingToolInput
): Promise<CallToolResult> {
  try {
    const listing = input.private
      ? await context.client.getPrivateCollectionListing(
          input.username,
          input.collection_id
        )
      : await context.client.getCollectionListing(
          input.username,
          input.collection_id
        );
    return text(formatListing(listing));
  } catch (error) {
    return toolError(
      context,
      `list collection ${input.username}/${input.collection_id}`,
      error
    );
  }
}

export async function downloadTool(
  context: ToolContext,
  input: DownloadToolInput
): Promise<CallToolResult> {
  try {
    const wallpaper = await context.client.getWallpaper(input.id);
    const path = await wallpaper.save(input.directory ?? context.downloadDirectory);
    context.logger.info(`Saved wallpaper ${wallpaper.id}`, { path });
    return text(
      `Saved wallpaper ${wallpaper.id} (${wallpaper.resolution}, ${wallpaper.readableSize}) to ${path}`
    );
  } catch (error) {
    return toolError(context, `download wallpaper ${input.id}`, error);
  }
}

const readOnly = { readOnlyHint: true, openWorldHint: true };

/**
 * Register every Wallhaven tool on the server
 */
export function registerTools(server: McpServer, context: ToolContext): void {
  server.registerTool(
    "wallhaven_search",
    {
      title: "Search Wallhaven Wallpapers",
      description:
        "Search wallpapers on Wallhaven. Returns the first page of results with ids, image URLs and metadata, plus an optional thumbnail composite for visual comparison. With an API key, the key owner's browsing settings are merged in unless use_account_settings is false; explicit arguments always win.",
      inputSchema: SearchToolInputSchema.shape,
      annotations: readOnly,
    },
    async (args) => searchTool(context, SearchToolInputSchema.parse(args))
  );

  server.registerTool(
    "wallhaven_get_wallpaper",
    {
      title: "Get Wallhaven Wallpaper",
      description:
        "Get the full metadata of one wallpaper, including tags and uploader. NSFW wallpapers require an API key.",
      inputSchema: WallpaperToolInputSchema.shape,
      annotations: readOnly,
    },
    async (args) => wallpaperTool(context, WallpaperToolInputSchema.parse(args))
  );

  server.registerTool(
    "wallhaven_get_tag",
    {
      title: "Get Wallhaven Tag",
      description: "Get a tag's name, aliases, category and purity by its id.",
      inputSchema: TagToolInputSchema.shape,
      annotations: readOnly,
    },
    async (args) => tagTool(context, TagToolInputSchema.parse(args))
  );

  server.registerTool(
    "wallhaven_get_settings",
    {
      title: "Get Wallhaven Browsing Settings",
      description:
        "Read the API key owner's browsing settings (categories, purity, per page, toplist range, blacklists). Requires an API key.",
      inputSchema: SettingsToolInputSchema.shape,
      annotations: readOnly,
    },
    async () => settingsTool(context)
  );

  server.registerTool(
    "wallhaven_get_collections",
    {
      title: "List Wallhaven Collections",
      description:
        "List a user's public collections, or all collections of the API key owner when no username is given.",
      inputSchema: CollectionsToolInputSchema.shape,
      annotations: readOnly,
    },
    async (args) => collectionsTool(context, CollectionsToolInputSchema.parse(args))
  );

  server.registerTool(
    "wallhaven_get_collection_listing",
    {
      title: "List Wallpapers in a Collection",
      description:
        "List the first page of wallpapers in a collection. Private collections require the owner's API key.",
      inputSchema: CollectionListingToolInputSchema.shape,
      annotations: readOnly,
    },
    async (args) =>
      collectionListingTool(context, CollectionListingToolInputSchema.parse(args))
  );

  server.registerTool(
    "wallhaven_download_wallpaper",
    {
      title: "Download Wallhaven Wallpaper",
      description:
        "Save a wallpaper's full-size image as <directory>/<id>.<ext>, creating the directory if needed.",
      inputSchema: DownloadToolInputSchema.shape,
      annotations: { readOnlyHint: false, openWorldHint: true },
    },
    async (args) => downloadTool(context, DownloadToolInputSchema.parse(args))
  );
}
