import { z } from "zod";
import {
  CATEGORY_NAMES,
  COLORS,
  PURITY_NAMES,
  SORTING_OPTIONS,
  SORTING_ORDERS,
  TOPLIST_RANGES,
} from "./constants.js";

// Raw payloads as documented at https://wallhaven.cc/help/api

export const TagDataSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  alias: z.string().nullable(),
  category_id: z.number().int(),
  category: z.string(),
  purity: z.enum(PURITY_NAMES),
  created_at: z.string(),
});

export const UploaderDataSchema = z.object({
  username: z.string(),
  group: z.string(),
  avatar: z.record(z.string()),
});

export const WallpaperDataSchema = z.object({
  id: z.string().min(1),
  url: z.string(),
  short_url: z.string(),
  views: z.number().int(),
  favorites: z.number().int(),
  source: z.string(),
  purity: z.enum(PURITY_NAMES),
  category: z.enum(CATEGORY_NAMES),
  dimension_x: z.number().int(),
  dimension_y: z.number().int(),
  resolution: z.string(),
  ratio: z.string(),
  file_size: z.number().int(),
  file_type: z.string().min(1),
  created_at: z.string(),
  colors: z.array(z.string()),
  path: z.string().min(1),
  thumbs: z.object({
    large: z.string(),
    original: z.string(),
    small: z.string(),
  }),
  // Search results and collection listings carry neither tags nor uploader
  tags: z.array(TagDataSchema).optional(),
  uploader: UploaderDataSchema.optional(),
});

export const UserSettingsDataSchema = z.object({
  thumb_size: z.string(),
  // Sent as a string ("24")
  per_page: z.coerce.number().int().positive(),
  purity: z.array(z.string()),
  categories: z.array(z.string()),
  resolutions: z.array(z.string()),
  aspect_ratios: z.array(z.string()),
  toplist_range: z.string(),
  tag_blacklist: z.array(z.string()),
  user_blacklist: z.array(z.string()),
  sorting: z.string().nullable().optional(),
});

export const CollectionDataSchema = z.object({
  id: z.number().int(),
  label: z.string(),
  views: z.number().int(),
  public: z.union([z.literal(0), z.literal(1), z.boolean()]),
  count: z.number().int(),
});

export const ListingMetaDataSchema = z.object({
  current_page: z.coerce.number().int(),
  last_page: z.coerce.number().int(),
  per_page: z.coerce.number().int(),
  total: z.coerce.number().int(),
  query: z
    .union([z.string(), z.object({ id: z.number().int(), tag: z.string() })])
    .nullable()
    .optional(),
  seed: z.string().nullable().optional(),
});

// Envelopes: every 200 response wraps its payload in `data`

export const SingleEnvelopeSchema = z.object({
  data: z.record(z.unknown()),
});

export const ListEnvelopeSchema = z.object({
  data: z.array(z.unknown()),
});

export const ListingEnvelopeSchema = z.object({
  data: z.array(z.unknown()),
  meta: ListingMetaDataSchema,
});

export type TagData = z.infer<typeof TagDataSchema>;
export type WallpaperData = z.infer<typeof WallpaperDataSchema>;
export type UserSettingsData = z.infer<typeof UserSettingsDataSchema>;
export type CollectionData = z.infer<typeof CollectionDataSchema>;
export type ListingMetaData = z.infer<typeof ListingMetaDataSchema>;

// MCP tool inputs

const bitmask = z
  .string()
  .regex(/^[01]{3}$/, "Must be a three-digit bitmask such as 110");

export const SearchToolInputSchema = z.object({
  q: z
    .string()
    .max(200, "Query must not exceed 200 characters")
    .optional()
    .describe(
      "Raw Wallhaven query: keywords, +tag, -tag, @username, id:<tag id>, type:png|jpg, like:<wallpaper id>. Combined with the structured fields below."
    ),
  include_tags: z
    .array(z.string().min(1))
    .optional()
    .describe("Tags that must be present (+tag)"),
  exclude_tags: z
    .array(z.string().min(1))
    .optional()
    .describe("Tags that must be absent (-tag)"),
  uploader: z
    .string()
    .min(1)
    .optional()
    .describe("Only wallpapers uploaded by this username"),
  similar_to: z
    .string()
    .min(1)
    .optional()
    .describe("Wallpaper ID to find similar wallpapers for"),
  categories: bitmask
    .optional()
    .describe("Category bitmask in general/anime/people order, e.g. 110"),
  purity: bitmask
    .optional()
    .describe("Purity bitmask in sfw/sketchy/nsfw order. NSFW needs an API key."),
  sorting: z.enum(SORTING_OPTIONS).optional(),
  order: z.enum(SORTING_ORDERS).optional(),
  topRange: z
    .enum(TOPLIST_RANGES)
    .optional()
    .describe("Toplist window. Ignored unless sorting is 'toplist'."),
  atleast: z
    .string()
    .regex(/^\d+x\d+$/, "Must look like 1920x1080")
    .optional()
    .describe("Minimum resolution"),
  resolutions: z
    .array(z.string().regex(/^\d+x\d+$/))
    .optional()
    .describe("Exact resolutions"),
  ratios: z
    .array(z.string().regex(/^\d+x\d+$/))
    .optional()
    .describe("Aspect ratios such as 16x9"),
  colors: z
    .array(
      z.preprocess(
        (value) =>
          typeof value === "string" ? value.trim().toLowerCase().replace(/^#/, "") : value,
        z.enum(COLORS)
      )
    )
    .optional()
    .describe(
      "Palette colors to search by, e.g. ['ff9900', '336600']. Only Wallhaven's palette is accepted: " +
        COLORS.join(", ")
    ),
  page: z.number().int().min(1).optional(),
  seed: z
    .string()
    .regex(/^[a-zA-Z0-9]{6}$/)
    .optional()
    .describe("Seed returned by a random search, to page without repeats"),
  use_account_settings: z
    .boolean()
    .optional()
    .describe("Merge the API key owner's browsing settings before these parameters"),
  include_thumbnails: z
    .boolean()
    .default(true)
    .describe(
      "If true, returns an additional composite image so you can visually compare the results."
    ),
});

export const WallpaperToolInputSchema = z.object({
  id: z.string().min(1).describe("Wallpaper ID, e.g. 94x38z"),
});

export const TagToolInputSchema = z.object({
  id: z.number().int().positive().describe("Tag ID"),
});

export const SettingsToolInputSchema = z.object({});

export const CollectionsToolInputSchema = z.object({
  username: z
    .string()
    .min(1)
    .optional()
    .describe(
      "Owner of the public collections. Omit to list the API key owner's collections, private ones included."
    ),
});

export const CollectionListingToolInputSchema = z.object({
  username: z.string().min(1),
  collection_id: z.number().int().positive(),
  private: z
    .boolean()
    .default(false)
    .describe("Set for a private collection; requires the owner's API key"),
});

export const DownloadToolInputSchema = z.object({
  id: z.string().min(1).describe("Wallpaper ID"),
  directory: z
    .string()
    .min(1)
    .optional()
    .describe("Target directory; defaults to WALLHAVEN_DOWNLOAD_DIR"),
});

export type SearchToolInput = z.infer<typeof SearchToolInputSchema>;
export type WallpaperToolInput = z.infer<typeof WallpaperToolInputSchema>;
export type TagToolInput = z.infer<typeof TagToolInputSchema>;
export type CollectionsToolInput = z.infer<typeof CollectionsToolInputSchema>;
export type CollectionListingToolInput = z.infer<
  typeof CollectionListingToolInputSchema
>;
export type DownloadToolInput = z.infer<typeof DownloadToolInputSchema>;
