import { afterEach, describe, it, expect, jest } from "@jest/globals";
import { createLogger } from "../log.js";

describe("log", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should only write debug lines when enabled", () => {
    const write = jest.spyOn(console, "error").mockImplementation(() => {});

    createLogger("test").debug("hidden");
    createLogger("test", { debug: true }).debug("shown", { page: 2 });

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(
      /^\[.+\] \[test\] DEBUG shown \{"page":2\}$/
    );
  });
});
