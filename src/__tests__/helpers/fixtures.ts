export function tagData(overrides: Record<string, unknown> = {}) {
  return {
    id: 37,
    name: "nature",
    alias: "outdoors, scenery",
    category_id: 5,
    category: "Nature",
    purity: "sfw",
    created_at: "2014-02-04 11:02:52",
    ...overrides,
  };
}

export function wallpaperData(overrides: Record<string, unknown> = {}) {
  return {
    id: "abc123",
    url: "https://wallhaven.cc/w/abc123",
    short_url: "https://whvn.cc/abc123",
    views: 1200,
    favorites: 85,
    source: "",
    purity: "sfw",
    category: "general",
    dimension_x: 1920,
    dimension_y: 1080,
    resolution: "1920x1080",
    ratio: "1.78",
    file_size: 2500000,
    file_type: "image/jpeg",
    created_at: "2021-03-01 10:00:00",
    colors: ["#000000", "#ffffff"],
    path: "https://w.wallhaven.cc/full/ab/wallhaven-abc123.jpg",
    thumbs: {
      large: "https://th.wallhaven.cc/lg/ab/abc123.jpg",
      original: "https://th.wallhaven.cc/orig/ab/abc123.jpg",
      small: "https://th.wallhaven.cc/small/ab/abc123.jpg",
    },
    ...overrides,
  };
}

export function settingsData(overrides: Record<string, unknown> = {}) {
  return {
    thumb_size: "orig",
    per_page: "32",
    purity: ["sfw", "sketchy"],
    categories: ["general", "people"],
    resolutions: [],
    aspect_ratios: ["16x9"],
    toplist_range: "1w",
    tag_blacklist: ["cars"],
    user_blacklist: [],
    ...overrides,
  };
}

export function collectionData(overrides: Record<string, unknown> = {}) {
  return {
    id: 15,
    label: "Default",
    views: 38,
    public: 1,
    count: 10,
    ...overrides,
  };
}

export function listingBody(ids: string[], meta: Record<string, unknown> = {}) {
  return {
    data: ids.map((id) => wallpaperData({ id })),
    meta: {
      current_page: 1,
      last_page: 3,
      per_page: 24,
      total: 60,
      query: null,
      seed: null,
      ...meta,
    },
  };
}
