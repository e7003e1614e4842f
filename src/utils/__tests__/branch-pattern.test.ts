import { describe, expect, it } from "vitest";

import { matchesBranchPattern, matchesPattern, parseBranchPatterns } from "../branch-pattern";

describe("branch-pattern utilities", () => {
  describe("parseBranchPatterns", () => {
    it("should split on commas and drop blanks", () => {
      expect(parseBranchPatterns(" main , ,feature/* ")).toEqual(["main", "feature/*"]);
      expect(parseBranchPatterns("")).toEqual([]);
    });
  });

  describe("matchesPattern", () => {
    it("should require an exact match without a wildcard", () => {
      expect(matchesPattern("main", "main")).toBe(true);
      expect(matchesPattern("main-old", "main")).toBe(false);
      expect(matchesPattern("old-main", "main")).toBe(false);
    });

    it("should let * match any run of characters, including slashes", () => {
      expect(matchesPattern("feature/login", "feature/*")).toBe(true);
      expect(matchesPattern("feature/a/b", "feature/*")).toBe(true);
      expect(matchesPattern("feature", "feature/*")).toBe(false);
      expect(matchesPattern("feature/", "feature/*")).toBe(true);
      expect(matchesPattern("featurex", "feature/*")).toBe(false);
      expect(matchesPattern("anything", "*")).toBe(true);
      expect(matchesPattern("hotfix-12-final", "hotfix-*-final")).toBe(true);
    });

    it("should treat other regex characters literally", () => {
      expect(matchesPattern("v1.5", "v1.*")).toBe(true);
      expect(matchesPattern("v1x5", "v1.*")).toBe(false);
      expect(matchesPattern("fix+more", "fix+*")).toBe(true);
      expect(matchesPattern("fixxmore", "fix+*")).toBe(false);
    });
  });

  describe("matchesBranchPattern", () => {
    it("should match when any pattern in the set matches", () => {
      const patterns = "main,release/*";
      expect(matchesBranchPattern("main", patterns)).toBe(true);
      expect(matchesBranchPattern("release/1.0", patterns)).toBe(true);
      expect(matchesBranchPattern("release", patterns)).toBe(false);
      expect(matchesBranchPattern("dev", patterns)).toBe(false);
    });

    it("should match nothing for an empty set", () => {
      expect(matchesBranchPattern("main", "")).toBe(false);
    });
  });
});
