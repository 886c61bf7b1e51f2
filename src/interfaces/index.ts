/**
 * Core interfaces for treecopy
 */

export * from "./ICopyDirectory";
export * from "./IProgressSink";
export * from "./ISecurityManager";
export * from "./ILogger";
