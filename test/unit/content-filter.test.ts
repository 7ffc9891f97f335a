import { describe, it, expect } from "vitest";
import { DEFAULT_PERSONA, parseConfig } from "../../src/config/schema.js";
import type { ContentFilterConfig } from "../../src/config/types.js";
import { ContentFilter } from "../../src/policy/content-filter.js";

function filter(overrides: Partial<ContentFilterConfig> = {}): ContentFilter {
  return new ContentFilter({ ...parseConfig({}).policy.contentFilter, ...overrides });
}

describe("ContentFilter", () => {
  it("passes ordinary friendly text", () => {
    const f = filter();
    expect(f.check("Hi! How was your weekend? :)")).toEqual({ clean: true });
    for (const text of DEFAULT_PERSONA.followUps) {
      expect(f.check(text)).toEqual({ clean: true });
    }
  });

  describe("forbidden terms", () => {
    it("matches whole words regardless of case", () => {
      const f = filter({ forbiddenTerms: ["politics"] });
      expect(f.check("Let's talk about Politics today")).toEqual({
        clean: false,
        flag: "forbidden_term",
        match: "Politics",
      });
      expect(f.check("I read about geopolitics")).toEqual({ clean: true });
    });

    it("respects word boundaries outside the Latin alphabet", () => {
      const f = filter({ forbiddenTerms: ["политика"] });
      expect(f.check("Это политика.")).toMatchObject({ clean: false, match: "политика" });
      expect(f.check("Он политикан")).toEqual({ clean: true });
    });

    it("lets phrases span any whitespace", () => {
      const f = filter({ forbiddenTerms: ["crypto deal"] });
      expect(f.check("a crypto   deal for you")).toMatchObject({ flag: "forbidden_term" });
    });
  });

  it("applies configured patterns case-insensitively", () => {
    const f = filter({ forbiddenPatterns: ["\\bbuy now\\b"] });
    expect(f.check("Buy now and save")).toEqual({
      clean: false,
      flag: "forbidden_pattern",
      match: "Buy now",
    });
  });

  it("blocks links unless allowed", () => {
    expect(filter().check("see https://example.com/page")).toEqual({
      clean: false,
      flag: "link",
      match: "https://example.com/page",
    });
    expect(filter().check("visit www.example.com")).toMatchObject({ match: "www.example.com" });
    expect(filter({ blockLinks: false }).check("see https://example.com/page")).toEqual({
      clean: true,
    });
  });

  it("flags runs of punctuation and repeated characters", () => {
    expect(filter().check("Wow!!! Really")).toEqual({ clean: false, flag: "spam", match: "!!!" });
    expect(filter().check("Sooooo good")).toEqual({ clean: false, flag: "spam", match: "ooooo" });
    expect(filter().check("Well... maybe")).toEqual({ clean: true });
    expect(filter({ blockSpam: false }).check("Wow!!!")).toEqual({ clean: true });
  });

  it("reports forbidden terms before links", () => {
    const f = filter({ forbiddenTerms: ["politics"] });
    expect(f.check("politics at https://example.com")).toMatchObject({ flag: "forbidden_term" });
  });

  it("lets everything through when disabled", () => {
    const f = filter({ enabled: false, forbiddenTerms: ["politics"] });
    expect(f.check("politics at https://example.com!!!")).toEqual({ clean: true });
  });
});
