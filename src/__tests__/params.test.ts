import { describe, it, expect } from "@jest/globals";
import { CATEGORY_NAMES, PURITY_NAMES } from "../constants.js";
import { parseUserSettings, unwrap } from "../models.js";
import {
  SETTINGS_PARAMETER_TABLE,
  buildQuery,
  resolveParameters,
  toBitmask,
  translateSettings,
} from "../params.js";
import { settingsData } from "./helpers/fixtures.js";
import type { SearchParameters } from "../types.js";

describe("params", () => {
  describe("resolveParameters", () => {
    it("should merge toplist overrides with settings", () => {
      const resolved = resolveParameters(
        { purity: "100" },
        { sorting: "toplist", topRange: "1M", categories: "100" }
      );

      expect(resolved).toEqual({
        sorting: "toplist",
        topRange: "1M",
        categories: "100",
        purity: "100",
      });
    });

    it("should drop topRange when sorting is not toplist", () => {
      const resolved = resolveParameters(
        { topRange: "1w" },
        { sorting: "date_added" }
      );

      expect(resolved).toEqual({ sorting: "date_added" });
    });

    it("should drop topRange when no sorting is set", () => {
      expect(resolveParameters({ topRange: "1w" }, { topRange: "1d" })).toEqual(
        {}
      );
    });

    it("should keep topRange from settings when overrides pick toplist", () => {
      expect(
        resolveParameters({ topRange: "3M" }, { sorting: "toplist" })
      ).toEqual({ sorting: "toplist", topRange: "3M" });
    });

    it("should let overrides win on every overlapping key", () => {
      const settings = { categories: "111", purity: "110", per_page: "64" };
      const overrides: SearchParameters[] = [
        { categories: "010" },
        { purity: "100", per_page: "24" },
        { categories: "001", purity: "001", per_page: "32", q: "forest" },
      ];

      for (const override of overrides) {
        const resolved = resolveParameters(settings, override);
        for (const [key, value] of Object.entries(override)) {
          expect(resolved[key]).toBe(value);
        }
      }
    });

    it("should return the union of non-overlapping keys", () => {
      const resolved = resolveParameters(
        { categories: "101", per_page: "32" },
        { q: "mountains", page: "2" }
      );

      expect(resolved).toEqual({
        categories: "101",
        per_page: "32",
        q: "mountains",
        page: "2",
      });
    });

    it("should apply later override layers over earlier ones", () => {
      const resolved = resolveParameters(
        undefined,
        { sorting: "views", q: "city" },
        { sorting: "favorites" }
      );

      expect(resolved).toEqual({ sorting: "favorites", q: "city" });
    });

    it("should match keys exactly, case included", () => {
      const resolved = resolveParameters({ purity: "100" }, { Purity: "111" });

      expect(resolved).toEqual({ purity: "100", Purity: "111" });
    });

    it("should drop empty values", () => {
      expect(resolveParameters({ purity: "100" }, { purity: "", q: " " })).toEqual(
        {}
      );
    });

    it("should not mutate its inputs and should return a frozen set", () => {
      const settings = { topRange: "1w", purity: "100" };
      const overrides = { sorting: "random" };

      const resolved = resolveParameters(settings, overrides);

      expect(settings).toEqual({ topRange: "1w", purity: "100" });
      expect(overrides).toEqual({ sorting: "random" });
      expect(Object.isFrozen(resolved)).toBe(true);
    });
  });

  describe("translateSettings", () => {
    it("should translate settings fields into query parameters", () => {
      const settings = unwrap(parseUserSettings(settingsData()));

      expect(translateSettings(settings)).toEqual({
        per_page: "32",
        categories: "101",
        purity: "110",
        topRange: "1w",
        ratios: "16x9",
      });
    });

    it("should emit sorting when the settings carry one", () => {
      const settings = unwrap(
        parseUserSettings(settingsData({ sorting: "toplist", resolutions: ["2560x1440", "3840x2160"] }))
      );

      const params = translateSettings(settings);

      expect(params.sorting).toBe("toplist");
      expect(params.resolutions).toBe("2560x1440,3840x2160");
    });

    it("should map every settings field to a distinct parameter", () => {
      const pairs = SETTINGS_PARAMETER_TABLE.map((entry) => [
        entry.setting,
        entry.parameter,
      ]);

      expect(pairs).toEqual([
        ["perPage", "per_page"],
        ["categories", "categories"],
        ["purity", "purity"],
        ["sorting", "sorting"],
        ["toplistRange", "topRange"],
        ["resolutions", "resolutions"],
        ["aspectRatios", "ratios"],
      ]);
    });

    it("should encode each entry from its own settings field", () => {
      const settings = unwrap(parseUserSettings(settingsData({ per_page: "64" })));
      const encoded = Object.fromEntries(
        SETTINGS_PARAMETER_TABLE.map((entry) => [entry.setting, entry.encode(settings)])
      );

      expect(encoded).toEqual({
        perPage: "64",
        categories: "101",
        purity: "110",
        sorting: undefined,
        toplistRange: "1w",
        resolutions: undefined,
        aspectRatios: "16x9",
      });
    });
  });

  describe("toBitmask", () => {
    it("should follow the category order", () => {
      expect(toBitmask(["anime"], CATEGORY_NAMES)).toBe("010");
      expect(toBitmask(["people", "general"], CATEGORY_NAMES)).toBe("101");
    });

    it("should normalize case and whitespace", () => {
      expect(toBitmask(["NSFW", " sfw "], PURITY_NAMES)).toBe("101");
    });

    it("should return undefined when nothing is enabled", () => {
      expect(toBitmask([], PURITY_NAMES)).toBeUndefined();
      expect(toBitmask(["unknown"], PURITY_NAMES)).toBeUndefined();
    });
  });

  describe("buildQuery", () => {
    it("should compose every query operator", () => {
      const q = buildQuery({
        keywords: ["forest"],
        include: ["animals"],
        exclude: ["cars"],
        user: "@someone",
        tagId: 37,
        type: "png",
        like: "abc123",
      });

      expect(q).toBe("forest +animals -cars @someone id:37 type:png like:abc123");
    });

    it("should not double operator prefixes", () => {
      expect(buildQuery({ include: ["+sky"], exclude: ["-rain"] })).toBe(
        "+sky -rain"
      );
    });

    it("should return an empty string for no options", () => {
      expect(buildQuery({})).toBe("");
    });
  });
});
