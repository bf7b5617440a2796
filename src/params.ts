/**
 * Search parameter resolution.
 *
 * A search request is built from three layers, lowest priority first:
 * Wallhaven's own defaults (nothing emitted), the account's browsing
 * settings translated into query parameters, and caller overrides.
 */

import { CATEGORY_NAMES, PURITY_NAMES } from "./constants.js";
import type { UserSettings } from "./models.js";
import type { ParameterSet, QueryOptions, SearchParameters } from "./types.js";

/**
 * Build a `categories`/`purity` bitmask from the enabled names, in the order
 * Wallhaven expects. Returns undefined when nothing is enabled.
 */
export function toBitmask(
  names: readonly string[],
  order: readonly string[]
): string | undefined {
  const enabled = new Set(names.map((name) => name.trim().toLowerCase()));
  const mask = order.map((name) => (enabled.has(name) ? "1" : "0")).join("");
  return mask.includes("1") ? mask : undefined;
}

function joinList(values: readonly string[]): string | undefined {
  const list = values.map((value) => value.trim()).filter(Boolean);
  return list.length > 0 ? list.join(",") : undefined;
}

type SettingsField = Exclude<keyof UserSettings, "toJSON">;

export interface SettingsTranslation {
  setting: SettingsField;
  parameter: string;
  encode(settings: UserSettings): string | undefined;
}

function translation<K extends SettingsField>(
  setting: K,
  parameter: string,
  encode: (value: UserSettings[K]) => string | undefined
): SettingsTranslation {
  return { setting, parameter, encode: (settings) => encode(settings[setting]) };
}

/**
 * Which browsing setting feeds which query parameter. `thumbSize` and the
 * blacklists have no query parameter and are left out.
 */
export const SETTINGS_PARAMETER_TABLE: readonly SettingsTranslation[] = [
  translation("perPage", "per_page", (perPage) => String(perPage)),
  translation("categories", "categories", (categories) =>
    toBitmask(categories, CATEGORY_NAMES)
  ),
  translation("purity", "purity", (purity) => toBitmask(purity, PURITY_NAMES)),
  translation("sorting", "sorting", (sorting) => sorting ?? undefined),
  translation("toplistRange", "topRange", (range) => range || undefined),
  translation("resolutions", "resolutions", joinList),
  translation("aspectRatios", "ratios", joinList),
];

export function translateSettings(settings: UserSettings): ParameterSet {
  const params: Record<string, string> = {};
  for (const { parameter, encode } of SETTINGS_PARAMETER_TABLE) {
    const value = encode(settings);
    if (value !== undefined) {
      params[parameter] = value;
    }
  }
  return Object.freeze(params);
}

/**
 * Merge translated settings with override layers into one parameter set.
 *
 * Later layers win on exact key match. Empty values are dropped, and
 * `topRange` is dropped unless `sorting` resolves to "toplist".
 */
export function resolveParameters(
  settings: ParameterSet | undefined,
  ...overrides: Array<Readonly<SearchParameters> | undefined>
): ParameterSet {
  const merged: Record<string, string> = {};
  for (const layer of [settings, ...overrides]) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      merged[key] = value;
    }
  }

  for (const [key, value] of Object.entries(merged)) {
    if (value.trim() === "") {
      delete merged[key];
    }
  }

  if (merged.sorting !== "toplist") {
    delete merged.topRange;
  }

  return Object.freeze(merged);
}

/**
 * Compose a `q` value from structured options, e.g.
 * `{ keywords: ["forest"], exclude: ["cars"], type: "png" }` gives
 * `forest -cars type:png`.
 */
export function buildQuery(options: QueryOptions): string {
  const terms: string[] = [];

  for (const keyword of options.keywords ?? []) {
    terms.push(keyword.trim());
  }
  for (const tag of options.include ?? []) {
    terms.push(`+${tag.trim().replace(/^\+/, "")}`);
  }
  for (const tag of options.exclude ?? []) {
    terms.push(`-${tag.trim().replace(/^-/, "")}`);
  }
  if (options.user) {
    terms.push(`@${options.user.replace(/^@/, "")}`);
  }
  if (options.tagId !== undefined) {
    terms.push(`id:${options.tagId}`);
  }
  if (options.type) {
    terms.push(`type:${options.type}`);
  }
  if (options.like) {
    terms.push(`like:${options.like}`);
  }

  return terms.filter((term) => term.length > 0).join(" ");
}
