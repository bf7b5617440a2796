/**
 * Typed entities decoded from Wallhaven responses.
 *
 * Every entity has a parse function returning a `ParseResult`: either the
 * fully built entity or a `MalformedResponseError` naming the first bad
 * field. Nothing here touches the network except `Wallpaper.save`.
 */

import { createWriteStream } from "node:fs";
import { access, mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { z } from "zod";
import { DownloadError, MalformedResponseError } from "./errors.js";
import {
  CollectionDataSchema,
  ListingEnvelopeSchema,
  TagDataSchema,
  UserSettingsDataSchema,
  WallpaperDataSchema,
  type CollectionData,
  type ListingMetaData,
  type TagData,
  type UserSettingsData,
  type WallpaperData,
} from "./schemas.js";
import type { Transport, TransportResponse } from "./transport.js";
import type {
  ListingMeta,
  ListingQuery,
  ParseResult,
  Thumbs,
  Uploader,
} from "./types.js";

/**
 * Validate `raw` against `schema`, reporting the first issue as a
 * MalformedResponseError with a dotted field path.
 */
export function decode<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  entity: string
): ParseResult<z.infer<S>> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const path = (issue?.path ?? []).join(".");
  return {
    ok: false,
    error: new MalformedResponseError(
      entity,
      path || "(root)",
      issue?.message ?? "invalid value"
    ),
  };
}

/**
 * Throw the error of a failed parse, or return its value.
 */
export function unwrap<T>(result: ParseResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

export class Tag {
  readonly id: number;
  readonly name: string;
  readonly aliases: readonly string[];
  readonly categoryId: number;
  readonly category: string;
  readonly purity: TagData["purity"];
  readonly createdAt: string;

  constructor(data: TagData) {
    this.id = data.id;
    this.name = data.name;
    // Wallhaven sends aliases as one comma separated string
    this.aliases = Object.freeze(
      (data.alias ?? "")
        .split(",")
        .map((alias) => alias.trim())
        .filter(Boolean)
    );
    this.categoryId = data.category_id;
    this.category = data.category;
    this.purity = data.purity;
    this.createdAt = data.created_at;
    Object.freeze(this);
  }

  toJSON() {
    return {
      id: this.id,
      name: this.name,
      aliases: [...this.aliases],
      categoryId: this.categoryId,
      category: this.category,
      purity: this.purity,
      createdAt: this.createdAt,
    };
  }
}

export interface SaveOptions {
  /** Replace a file that already exists. Default true. */
  overwrite?: boolean;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

const SIZE_SCALES: Array<[number, string]> = [
  [1000 ** 5, "PB"],
  [1000 ** 4, "TB"],
  [1000 ** 3, "GB"],
  [1000 ** 2, "MB"],
  [1000, "kB"],
  [1, "B"],
];

export class Wallpaper {
  readonly id: string;
  readonly url: string;
  readonly shortUrl: string;
  readonly views: number;
  readonly favorites: number;
  readonly source: string;
  readonly purity: WallpaperData["purity"];
  readonly category: WallpaperData["category"];
  readonly width: number;
  readonly height: number;
  readonly resolution: string;
  readonly ratio: string;
  readonly fileSize: number;
  readonly fileType: string;
  readonly createdAt: string;
  readonly colors: readonly string[];
  /** Full-size image URL */
  readonly path: string;
  readonly thumbs: Readonly<Thumbs>;
  readonly tags: readonly Tag[];
  readonly uploader: Readonly<Uploader> | null;

  constructor(data: WallpaperData, private readonly downloader: Transport) {
    this.id = data.id;
    this.url = data.url;
    this.shortUrl = data.short_url;
    this.views = data.views;
    this.favorites = data.favorites;
    this.source = data.source;
    this.purity = data.purity;
    this.category = data.category;
    this.width = data.dimension_x;
    this.height = data.dimension_y;
    this.resolution = data.resolution;
    this.ratio = data.ratio;
    this.fileSize = data.file_size;
    this.fileType = data.file_type;
    this.createdAt = data.created_at;
    this.colors = Object.freeze([...data.colors]);
    this.path = data.path;
    this.thumbs = Object.freeze({ ...data.thumbs });
    this.tags = Object.freeze((data.tags ?? []).map((tag) => new Tag(tag)));
    this.uploader = data.uploader
      ? Object.freeze({
          username: data.uploader.username,
          group: data.uploader.group,
          avatar: { ...data.uploader.avatar },
        })
      : null;
    Object.freeze(this);
  }

  get tagIds(): number[] {
    return this.tags.map((tag) => tag.id);
  }

  /** `image/jpeg` gives `jpg`; other MIME types give their subtype */
  get extension(): string {
    const subtype = this.fileType.includes("/")
      ? this.fileType.slice(this.fileType.indexOf("/") + 1)
      : this.fileType;
    const normalized = subtype.trim().toLowerCase();
    return normalized === "jpeg" ? "jpg" : normalized;
  }

  get filename(): string {
    return `${this.id}.${this.extension}`;
  }

  get readableSize(): string {
    const match = SIZE_SCALES.find(([threshold]) => this.fileSize >= threshold);
    const [scale, unit]: [number, string] = match ?? [1, "B"];
    return `${(this.fileSize / scale).toFixed(2)}${unit}`;
  }

  /**
   * Stream the full-size image to `<directory>/<id>.<ext>`, creating the
   * directory when needed. Resolves with the file path. With
   * `overwrite: false` an existing file is kept and nothing is downloaded.
   */
  async save(directory: string, options: SaveOptions = {}): Promise<string> {
    const target = join(directory, this.filename);

    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new DownloadError(this.id, `cannot create ${directory}`, {
        cause: error,
      });
    }

    if (options.overwrite === false && (await fileExists(target))) {
      return target;
    }

    let response: TransportResponse;
    try {
      response = await this.downloader.get({ url: this.path });
    } catch (error) {
      throw new DownloadError(
        this.id,
        error instanceof Error ? error.message : "network failure",
        { cause: error }
      );
    }

    const { status } = response;
    if (status < 200 || status >= 300) {
      let cause: unknown;
      try {
        await response.cancel();
      } catch (error) {
        cause = error;
      }
      throw new DownloadError(this.id, `HTTP ${status}`, { status, cause });
    }

    try {
      await pipeline(Readable.from(response.stream()), createWriteStream(target));
    } catch (error) {
      // Never leave a truncated image behind
      await rm(target, { force: true });
      throw new DownloadError(
        this.id,
        error instanceof Error ? error.message : "write failed",
        { cause: error }
      );
    }

    return target;
  }

  toJSON() {
    return {
      id: this.id,
      url: this.url,
      shortUrl: this.shortUrl,
      views: this.views,
      favorites: this.favorites,
      source: this.source,
      purity: this.purity,
      category: this.category,
      width: this.width,
      height: this.height,
      resolution: this.resolution,
      ratio: this.ratio,
      fileSize: this.fileSize,
      fileType: this.fileType,
      createdAt: this.createdAt,
      colors: [...this.colors],
      path: this.path,
      thumbs: { ...this.thumbs },
      tags: this.tags.map((tag) => tag.toJSON()),
      uploader: this.uploader
        ? { ...this.uploader, avatar: { ...this.uploader.avatar } }
        : null,
    };
  }
}

export class UserSettings {
  readonly thumbSize: string;
  readonly perPage: number;
  readonly purity: readonly string[];
  readonly categories: readonly string[];
  readonly resolutions: readonly string[];
  readonly aspectRatios: readonly string[];
  readonly toplistRange: string;
  readonly tagBlacklist: readonly string[];
  readonly userBlacklist: readonly string[];
  /** Not part of every settings payload */
  readonly sorting: string | null;

  constructor(data: UserSettingsData) {
    this.thumbSize = data.thumb_size;
    this.perPage = data.per_page;
    this.purity = Object.freeze([...data.purity]);
    this.categories = Object.freeze([...data.categories]);
    this.resolutions = Object.freeze([...data.resolutions]);
    this.aspectRatios = Object.freeze([...data.aspect_ratios]);
    this.toplistRange = data.toplist_range;
    this.tagBlacklist = Object.freeze([...data.tag_blacklist]);
    this.userBlacklist = Object.freeze([...data.user_blacklist]);
    this.sorting = data.sorting ?? null;
    Object.freeze(this);
  }

  toJSON() {
    return {
      thumbSize: this.thumbSize,
      perPage: this.perPage,
      purity: [...this.purity],
      categories: [...this.categories],
      resolutions: [...this.resolutions],
      aspectRatios: [...this.aspectRatios],
      toplistRange: this.toplistRange,
      tagBlacklist: [...this.tagBlacklist],
      userBlacklist: [...this.userBlacklist],
      sorting: this.sorting,
    };
  }
}

export class Collection {
  readonly id: number;
  readonly owner: string | null;
  readonly label: string;
  readonly views: number;
  readonly isPublic: boolean;
  readonly count: number;

  constructor(data: CollectionData, owner: string | null) {
    this.id = data.id;
    this.owner = owner;
    this.label = data.label;
    this.views = data.views;
    // 1/0 from the API
    this.isPublic = Boolean(data.public);
    this.count = data.count;
    Object.freeze(this);
  }

  toJSON() {
    return {
      id: this.id,
      owner: this.owner,
      label: this.label,
      views: this.views,
      isPublic: this.isPublic,
      count: this.count,
    };
  }
}

/**
 * First page of wallpapers from a collection or a search. Re-iterable; no
 * further pages are fetched.
 */
export class Listing implements Iterable<Wallpaper> {
  readonly wallpapers: readonly Wallpaper[];
  readonly meta: Readonly<ListingMeta>;

  constructor(wallpapers: Wallpaper[], meta: ListingMeta) {
    this.wallpapers = Object.freeze([...wallpapers]);
    this.meta = Object.freeze({ ...meta });
  }

  get length(): number {
    return this.wallpapers.length;
  }

  get hasMore(): boolean {
    return this.meta.currentPage < this.meta.lastPage;
  }

  /** Page number to request next, if any. Informational only. */
  get nextPage(): number | undefined {
    return this.hasMore ? this.meta.currentPage + 1 : undefined;
  }

  [Symbol.iterator](): Iterator<Wallpaper> {
    return this.wallpapers[Symbol.iterator]();
  }

  toJSON() {
    return {
      wallpapers: this.wallpapers.map((wallpaper) => wallpaper.toJSON()),
      meta: { ...this.meta },
    };
  }
}

export class SearchResult extends Listing {
  get query(): ListingQuery {
    return this.meta.query;
  }

  /** Present when sorting is `random`; pass it back to page without repeats */
  get seed(): string | null {
    return this.meta.seed;
  }
}

export function parseTag(raw: unknown): ParseResult<Tag> {
  const result = decode(TagDataSchema, raw, "tag");
  return result.ok ? { ok: true, value: new Tag(result.value) } : result;
}

export function parseWallpaper(
  raw: unknown,
  downloader: Transport
): ParseResult<Wallpaper> {
  const result = decode(WallpaperDataSchema, raw, "wallpaper");
  return result.ok
    ? { ok: true, value: new Wallpaper(result.value, downloader) }
    : result;
}

export function parseUserSettings(raw: unknown): ParseResult<UserSettings> {
  const result = decode(UserSettingsDataSchema, raw, "settings");
  return result.ok ? { ok: true, value: new UserSettings(result.value) } : result;
}

export function parseCollection(
  raw: unknown,
  owner: string | null
): ParseResult<Collection> {
  const result = decode(CollectionDataSchema, raw, "collection");
  return result.ok
    ? { ok: true, value: new Collection(result.value, owner) }
    : result;
}

/**
 * Decode a list of records, failing on the first bad one with its index in
 * the field path (`data.3.id`).
 */
export function parseList<T>(
  items: readonly unknown[],
  entity: string,
  parseItem: (raw: unknown) => ParseResult<T>
): ParseResult<T[]> {
  const values: T[] = [];
  for (const [index, item] of items.entries()) {
    const result = parseItem(item);
    if (!result.ok) {
      return {
        ok: false,
        error: new MalformedResponseError(
          entity,
          result.error.field === "(root)"
            ? `data.${index}`
            : `data.${index}.${result.error.field}`,
          result.error.detail
        ),
      };
    }
    values.push(result.value);
  }
  return { ok: true, value: values };
}

function toListingMeta(meta: ListingMetaData): ListingMeta {
  return {
    currentPage: meta.current_page,
    lastPage: meta.last_page,
    perPage: meta.per_page,
    total: meta.total,
    query: meta.query ?? null,
    seed: meta.seed ?? null,
  };
}

function parsePage(
  body: unknown,
  downloader: Transport,
  entity: string
): ParseResult<{ wallpapers: Wallpaper[]; meta: ListingMeta }> {
  const envelope = decode(ListingEnvelopeSchema, body, entity);
  if (!envelope.ok) return envelope;

  const wallpapers = parseList(envelope.value.data, entity, (item) =>
    parseWallpaper(item, downloader)
  );
  if (!wallpapers.ok) return wallpapers;

  return {
    ok: true,
    value: {
      wallpapers: wallpapers.value,
      meta: toListingMeta(envelope.value.meta),
    },
  };
}

/** Parse a full `{ data, meta }` collection listing body */
export function parseListing(
  body: unknown,
  downloader: Transport
): ParseResult<Listing> {
  const page = parsePage(body, downloader, "listing");
  return page.ok
    ? { ok: true, value: new Listing(page.value.wallpapers, page.value.meta) }
    : page;
}

/** Parse a full `{ data, meta }` search body */
export function parseSearchResult(
  body: unknown,
  downloader: Transport
): ParseResult<SearchResult> {
  const page = parsePage(body, downloader, "search");
  return page.ok
    ? {
        ok: true,
        value: new SearchResult(page.value.wallpapers, page.value.meta),
      }
    : page;
}
