/**
 * Unit tests for PathMatcher
 */

import * as path from "path";
import { PathMatcher } from "./PathMatcher";

describe("PathMatcher", () => {
  it("should match nothing without patterns", () => {
    const matcher = new PathMatcher();
    expect(matcher.isEmpty()).toBe(true);
    expect(matcher.matches("a.txt")).toBe(false);
  });

  it("should match slash-less patterns against the basename at any depth", () => {
    const matcher = new PathMatcher(["*.log"]);
    expect(matcher.matches("app.log")).toBe(true);
    expect(matcher.matches(path.join("logs", "2024", "app.log"))).toBe(true);
    expect(matcher.matches(path.join("logs", "app.txt"))).toBe(false);
  });

  it("should match patterns with a slash against the whole relative path", () => {
    const matcher = new PathMatcher(["build/**"]);
    expect(matcher.matches(path.join("build", "out.js"))).toBe(true);
    expect(matcher.matches(path.join("src", "build", "out.js"))).toBe(false);
  });

  it("should match dotfiles", () => {
    const matcher = new PathMatcher([".git"]);
    expect(matcher.matches(".git")).toBe(true);
    expect(matcher.matches(path.join("nested", ".git"))).toBe(true);
  });

  it("should ignore blank patterns and the empty path", () => {
    const matcher = new PathMatcher(["", "  "]);
    expect(matcher.isEmpty()).toBe(true);
    expect(new PathMatcher(["*"]).matches("")).toBe(false);
  });
});
