/**
 * Render client results as llm-friendly text for the MCP tools
 */

import yaml from "js-yaml";
import type {
  Collection,
  Listing,
  SearchResult,
  Tag,
  UserSettings,
  Wallpaper,
} from "./models.js";

const dump = (value: unknown): string =>
  yaml.dump(value, { indent: 2, lineWidth: 120, noRefs: true });

function summarize(wallpaper: Wallpaper) {
  return {
    id: wallpaper.id,
    url: wallpaper.url,
    image: wallpaper.path,
    thumbnail: wallpaper.thumbs.large,
    resolution: wallpaper.resolution,
    category: wallpaper.category,
    purity: wallpaper.purity,
    favorites: wallpaper.favorites,
    views: wallpaper.views,
    size: wallpaper.readableSize,
    type: wallpaper.fileType,
  };
}

function describeQuery(result: SearchResult): string | undefined {
  const { query } = result;
  if (query === null || query === "") return undefined;
  return typeof query === "string" ? query : `tag ${query.tag} (id:${query.id})`;
}

function listingLines(listing: Listing, noun: string): string[] {
  const { meta } = listing;
  const lines: string[] = [];

  if (listing.length === 0) {
    lines.push(`No ${noun} found.`);
    return lines;
  }

  lines.push(
    `Page ${meta.currentPage} of ${meta.lastPage} (${meta.total} total, ${meta.perPage} per page). Showing ${listing.length} wallpaper${listing.length !== 1 ? "s" : ""}:\n`
  );
  lines.push(dump(listing.wallpapers.map(summarize)));
  return lines;
}

/**
 * Format search results, with a hint on how to fetch the next page.
 */
export function formatSearchResults(result: SearchResult): string {
  const lines: string[] = [];

  const query = describeQuery(result);
  if (query) {
    lines.push(`Query: ${query}`);
  }
  lines.push(...listingLines(result, "wallpapers matching the search"));

  if (result.length === 0) {
    lines.push(
      "Try fewer keywords, more categories, or a wider purity filter (NSFW needs an API key)."
    );
    return lines.join("\n");
  }

  if (result.nextPage !== undefined) {
    const seed = result.seed ? ` and seed=${result.seed}` : "";
    lines.push(
      `More results are available: search again with page=${result.nextPage}${seed}.`
    );
  } else {
    lines.push("End of results.");
  }
  lines.push(
    "Use wallhaven_download_wallpaper with an id to save the full-size image."
  );
  return lines.join("\n");
}

export function formatListing(listing: Listing): string {
  const lines = listingLines(listing, "wallpapers in this collection");
  if (listing.nextPage !== undefined) {
    lines.push(
      `Only the first page is shown; the collection has ${listing.meta.lastPage} pages.`
    );
  }
  return lines.join("\n");
}

export function formatWallpaper(wallpaper: Wallpaper): string {
  const { tags, uploader, ...rest } = wallpaper.toJSON();
  return dump({
    ...rest,
    size: wallpaper.readableSize,
    tags: tags.map((tag) => `${tag.name} (id:${tag.id})`),
    uploader: uploader?.username ?? null,
  });
}

export function formatTag(tag: Tag): string {
  return dump(tag.toJSON());
}

export function formatUserSettings(settings: UserSettings): string {
  return dump(settings.toJSON());
}

export function formatCollections(collections: Collection[]): string {
  if (collections.length === 0) {
    return "No public collections found. Private collections are only listed for the API key owner.";
  }
  return dump(collections.map((collection) => collection.toJSON()));
}
