import { afterEach, describe, expect, it, vi } from "vitest";
import { getTimeZone, isValidTimeZone } from "./runtime";

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("getTimeZone", () => {
  it("defaults to Amsterdam", () => {
    vi.stubEnv("WEEKUREN_TIMEZONE", "");
    expect(getTimeZone()).toBe("Europe/Amsterdam");
  });

  it("uses a configured zone", () => {
    vi.stubEnv("WEEKUREN_TIMEZONE", " UTC ");
    expect(getTimeZone()).toBe("UTC");
  });

  it("falls back to Amsterdam for an unknown zone and warns", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.stubEnv("LOG_LEVEL", "info");
    vi.stubEnv("WEEKUREN_TIMEZONE", "Mars/Olympus");
    expect(isValidTimeZone("Mars/Olympus")).toBe(false);
    expect(getTimeZone()).toBe("Europe/Amsterdam");
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
