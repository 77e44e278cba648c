import { resolve } from "path";
import { describe, expect, it } from "vitest";

import { logLevelFrom, parseEnv, resolveConfig } from "../src/config.js";
import { TagpressError } from "../src/errors.js";

describe("resolveConfig", () => {
  it("lays out the site under its root", () => {
    expect(resolveConfig("/site", {})).toEqual({
      baseUrl: "",
      title: "Blog",
      contentDir: resolve("/site/content/posts"),
      templatesDir: resolve("/site/templates"),
      outDir: resolve("/site/output"),
    });
  });

  it("reads the base URL and title from the environment", () => {
    const config = resolveConfig("/site", { BASE_URL: "https://example.com", SITE_TITLE: "Notes" });
    expect(config.baseUrl).toBe("https://example.com");
    expect(config.title).toBe("Notes");
  });

  it("lets overrides win over the environment", () => {
    const config = resolveConfig("/site", { BASE_URL: "https://example.com" }, { baseUrl: "/preview", title: "Draft" });
    expect(config.baseUrl).toBe("/preview");
    expect(config.title).toBe("Draft");
  });
});

describe("parseEnv", () => {
  it("rejects invalid values", () => {
    expect(() => parseEnv({ LOG_LEVEL: "loud" })).toThrow(TagpressError);
    expect(() => parseEnv({ LOG_LEVEL: "loud" })).toThrow("LOG_LEVEL");
    expect(() => parseEnv({ SITE_TITLE: "" })).toThrow("SITE_TITLE");
  });
});

describe("logLevelFrom", () => {
  it("falls back to info", () => {
    expect(logLevelFrom({})).toBe("info");
    expect(logLevelFrom({ LOG_LEVEL: "loud" })).toBe("info");
    expect(logLevelFrom({ LOG_LEVEL: "debug" })).toBe("debug");
  });
});
