/**
 * Security manager interface for copy operations
 */

/**
 * Kind of access a path is validated for
 */
export type PathOperation = "read" | "write";

export interface SecurityConfig {
  /** Workspace root - all tool paths are confined to this directory */
  workspaceRoot: string;

  /** Paths that are explicitly blocked (e.g., .git, node_modules) */
  blockedPaths: string[];

  /** Blocked glob patterns (e.g., *.key, secrets/**) */
  blockedPatterns: string[];

  /** Reject every write when true */
  readOnly: boolean;
}

export interface ISecurityManager {
  /**
   * Validate and resolve a path against the workspace
   * @param filePath Absolute path, or path relative to the workspace root
   * @param operation Access the caller is about to perform
   * @returns Absolute resolved path
   * @throws SecurityError when the path violates the policy
   */
  validatePath(filePath: string, operation: PathOperation): string;

  getWorkspaceRoot(): string;
}
