/**
 * Security manager implementation
 * Confines tool paths to the configured workspace
 */

import * as fs from "fs";
import * as path from "path";
import { ILogger } from "../interfaces/ILogger";
import {
  ISecurityManager,
  PathOperation,
  SecurityConfig,
} from "../interfaces/ISecurityManager";
import { SecurityError, systemErrorCode } from "../types";
import { PathMatcher } from "./PathMatcher";

export class SecurityManager implements ISecurityManager {
  private readonly workspaceRoot: string;
  private readonly realWorkspaceRoot: string;
  private readonly blockedPaths: string[];
  private readonly blockedPatterns: PathMatcher;
  private readonly readOnly: boolean;
  private readonly logger?: ILogger;

  constructor(config: SecurityConfig, logger?: ILogger) {
    this.workspaceRoot = path.resolve(config.workspaceRoot);

    // Validate workspace root exists and is a directory
    if (!fs.existsSync(this.workspaceRoot)) {
      throw new Error(`Workspace root does not exist: ${this.workspaceRoot}`);
    }

    const stats = fs.statSync(this.workspaceRoot);
    if (!stats.isDirectory()) {
      throw new Error(
        `Workspace root is not a directory: ${this.workspaceRoot}`
      );
    }

    this.realWorkspaceRoot = fs.realpathSync(this.workspaceRoot);
    this.blockedPaths = config.blockedPaths.map((p) =>
      path.resolve(this.workspaceRoot, p)
    );
    this.blockedPatterns = new PathMatcher(config.blockedPatterns);
    this.readOnly = config.readOnly;
    this.logger = logger;
  }

  validatePath(filePath: string, operation: PathOperation): string {
    if (filePath.trim().length === 0) {
      throw new SecurityError("Path must not be empty");
    }

    const resolved = path.resolve(this.workspaceRoot, filePath);

    if (!this.isInside(resolved, this.workspaceRoot)) {
      this.auditViolation("workspace_escape", filePath, resolved);
      throw new SecurityError(
        "Path traversal detected - path outside workspace"
      );
    }

    if (filePath.split(/[\\/]/).includes("..")) {
      this.auditViolation("path_traversal", filePath, resolved);
      throw new SecurityError("Path contains traversal sequences");
    }

    if (this.blockedPaths.some((blocked) => this.isInside(resolved, blocked))) {
      this.auditViolation("blocked_path", filePath, resolved);
      throw new SecurityError("Path is blocked by security policy");
    }

    if (this.blockedPatterns.matches(path.relative(this.workspaceRoot, resolved))) {
      this.auditViolation("blocked_pattern", filePath, resolved);
      throw new SecurityError("Path matches blocked pattern");
    }

    if (operation === "write" && this.readOnly) {
      this.auditViolation("read_only", filePath, resolved);
      throw new SecurityError("Workspace is in read-only mode");
    }

    // The copier follows links, so the real location must stay inside too
    const real = this.realLocation(resolved);
    if (!this.isInside(real, this.realWorkspaceRoot)) {
      this.auditViolation("symlink_escape", filePath, real);
      throw new SecurityError(
        "Path traversal detected - symlink resolves outside workspace"
      );
    }

    return resolved;
  }

  getWorkspaceRoot(): string {
    return this.workspaceRoot;
  }

  /**
   * Real path of the deepest existing ancestor of `resolved`, with the
   * missing components appended. A dangling link resolves to its target.
   */
  private realLocation(resolved: string): string {
    const missing: string[] = [];
    let existing = resolved;
    while (fs.lstatSync(existing, { throwIfNoEntry: false }) === undefined) {
      const parent = path.dirname(existing);
      if (parent === existing) {
        break;
      }
      missing.unshift(path.basename(existing));
      existing = parent;
    }

    let real: string;
    try {
      real = fs.realpathSync(existing);
    } catch (error) {
      if (systemErrorCode(error) !== "ENOENT") {
        throw error;
      }
      real = path.resolve(
        fs.realpathSync(path.dirname(existing)),
        fs.readlinkSync(existing)
      );
    }
    return path.join(real, ...missing);
  }

  private isInside(candidate: string, root: string): boolean {
    return candidate === root || candidate.startsWith(root + path.sep);
  }

  private auditViolation(
    violation: string,
    input: string,
    resolved: string
  ): void {
    this.logger?.warn("Security violation", {
      violation,
      input,
      resolved,
      workspaceRoot: this.workspaceRoot,
    });
  }
}
