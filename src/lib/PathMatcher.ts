/**
 * Glob matching for exclusions and blocked patterns
 */

import * as path from "path";
import { minimatch } from "minimatch";

export class PathMatcher {
  private readonly patterns: string[];

  constructor(patterns: string[] = []) {
    this.patterns = patterns.filter((pattern) => pattern.trim().length > 0);
  }

  /**
   * Check a path relative to the matching root.
   *
   * Patterns without a slash match the basename anywhere in the tree;
   * dotfiles are matched like any other name.
   */
  matches(relativePath: string): boolean {
    if (this.patterns.length === 0 || relativePath.length === 0) {
      return false;
    }

    const normalized = relativePath.split(path.sep).join("/");
    return this.patterns.some((pattern) =>
      minimatch(normalized, pattern, { dot: true, matchBase: true })
    );
  }

  isEmpty(): boolean {
    return this.patterns.length === 0;
  }
}
