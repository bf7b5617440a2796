import { describe, it, expect } from "@jest/globals";
import { loadConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("config", () => {
  it("should fall back to defaults", () => {
    expect(loadConfig({})).toEqual({
      apiKey: undefined,
      authMethod: "header",
      timeoutMs: 20000,
      downloadDirectory: ".",
      useAccountSettings: true,
      debug: false,
    });
  });

  it("should read every variable", () => {
    const config = loadConfig({
      WALLHAVEN_API_KEY: "test-secret",
      WALLHAVEN_AUTH_METHOD: "query",
      WALLHAVEN_TIMEOUT: "5",
      WALLHAVEN_DOWNLOAD_DIR: "/tmp/walls",
      WALLHAVEN_USE_ACCOUNT_SETTINGS: "0",
      WALLHAVEN_DEBUG: "true",
    });

    expect(config).toEqual({
      apiKey: "test-secret",
      authMethod: "query",
      timeoutMs: 5000,
      downloadDirectory: "/tmp/walls",
      useAccountSettings: false,
      debug: true,
    });
  });

  it("should treat a blank key as missing", () => {
    expect(loadConfig({ WALLHAVEN_API_KEY: "   " }).apiKey).toBeUndefined();
  });

  it("should name the variable that failed validation", () => {
    expect(() => loadConfig({ WALLHAVEN_AUTH_METHOD: "cookie" })).toThrow(
      ConfigurationError
    );
    expect(() => loadConfig({ WALLHAVEN_TIMEOUT: "-3" })).toThrow(
      "Invalid WALLHAVEN_TIMEOUT: Timeout must be a positive number of seconds"
    );
  });

  it("should reject flags it cannot read", () => {
    let failure: unknown;
    try {
      loadConfig({ WALLHAVEN_DEBUG: "yes" });
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(ConfigurationError);
    expect(failure).toMatchObject({ variable: "WALLHAVEN_DEBUG" });
  });
});
