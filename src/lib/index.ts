/**
 * Core library exports for treecopy
 */

export * from "./CopyDirectory";
export * from "./ProgressChannel";
export * from "./ProgressBar";
export * from "./Semaphore";
export * from "./PathMatcher";
export * from "./SecurityManager";
export * from "./Logger";
export * from "./ConfigLoader";
export * from "./CommandRunner";
export * from "./ErrorHandler";
export * from "./MCPTools";
export * from "./MCPServer";
