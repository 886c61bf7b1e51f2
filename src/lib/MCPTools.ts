/**
 * MCP tool definitions for copy operations
 *
 * 1. fs_count_files - Count the files below a directory
 * 2. fs_copy_directory - Copy a directory tree
 * 3. fs_copy_multiple - Merge several directory trees into one destination
 */

import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import { CopyResult, ICopyDirectory } from "../interfaces/ICopyDirectory";
import { ILogger } from "../interfaces/ILogger";
import { ISecurityManager } from "../interfaces/ISecurityManager";
import { MCPErrorResponse, ValidationError } from "../types";
import { assertDestinationOutsideSources } from "./CopyDirectory";
import { ErrorHandler } from "./ErrorHandler";

export interface ToolSchema<S extends z.AnyZodObject = z.AnyZodObject> {
  name: string;
  description: string;
  inputSchema: S;
}

export interface CountFilesToolResult {
  status: "success";
  path: string;
  totalFiles: number;
}

export interface CopyToolResult {
  status: "success" | "incomplete";
  operationId: string;
  sources: string[];
  destination: string;
  filesCopied: number;
  totalFiles: number;
  duration: number;
  /** Set when status is "incomplete" */
  error?: MCPErrorResponse["error"];
}

export type ToolResult = CountFilesToolResult | CopyToolResult;

const countFilesSchema = {
  name: "fs_count_files",
  description: "Count the files below a directory (recursively)",
  inputSchema: z.object({
    path: z.string().min(1).describe("Directory to count"),
  }),
} satisfies ToolSchema;

const copyDirectorySchema = {
  name: "fs_copy_directory",
  description:
    "Copy a directory recursively; existing destination files are overwritten",
  inputSchema: z.object({
    source: z.string().min(1).describe("Source directory path"),
    destination: z.string().min(1).describe("Destination directory path"),
  }),
} satisfies ToolSchema;

const copyMultipleSchema = {
  name: "fs_copy_multiple",
  description:
    "Copy the contents of several directories into one destination directory",
  inputSchema: z.object({
    sources: z
      .array(z.string().min(1))
      .min(1)
      .describe("Source directory paths"),
    destination: z.string().min(1).describe("Destination directory path"),
  }),
} satisfies ToolSchema;

/**
 * MCP Tools class
 * Provides all tool implementations for the treecopy server
 */
export class MCPTools {
  private securityManager: ISecurityManager;
  private copyDirectory: ICopyDirectory;
  private logger: ILogger;

  constructor(
    securityManager: ISecurityManager,
    copyDirectory: ICopyDirectory,
    logger: ILogger
  ) {
    this.securityManager = securityManager;
    this.copyDirectory = copyDirectory;
    this.logger = logger;
  }

  /**
   * Dispatch a tool call by name
   */
  async callTool(name: string, args: unknown): Promise<ToolResult> {
    switch (name) {
      case countFilesSchema.name:
        return this.fsCountFiles(args);
      case copyDirectorySchema.name:
        return this.fsCopyDirectory(args);
      case copyMultipleSchema.name:
        return this.fsCopyMultiple(args);
      default:
        throw new ValidationError(`Unknown tool: ${name}`);
    }
  }

  /**
   * Tool 1: fs_count_files
   */
  async fsCountFiles(args: unknown): Promise<CountFilesToolResult> {
    const input = parseArguments(countFilesSchema, args);
    const directory = this.securityManager.validatePath(input.path, "read");

    const totalFiles = await this.copyDirectory.countFiles(directory);
    this.logger.debug("Counted files", { path: directory, totalFiles });

    return { status: "success", path: directory, totalFiles };
  }

  /**
   * Tool 2: fs_copy_directory
   */
  async fsCopyDirectory(args: unknown): Promise<CopyToolResult> {
    const input = parseArguments(copyDirectorySchema, args);
    const source = this.securityManager.validatePath(input.source, "read");
    const destination = this.securityManager.validatePath(
      input.destination,
      "write"
    );

    return this.runCopy([source], destination, () =>
      this.copyDirectory.copy(source, destination)
    );
  }

  /**
   * Tool 3: fs_copy_multiple
   */
  async fsCopyMultiple(args: unknown): Promise<CopyToolResult> {
    const input = parseArguments(copyMultipleSchema, args);
    const sources = input.sources.map((source) =>
      this.securityManager.validatePath(source, "read")
    );
    const destination = this.securityManager.validatePath(
      input.destination,
      "write"
    );

    return this.runCopy(sources, destination, () =>
      this.copyDirectory.copyMultiple(sources, destination)
    );
  }

  private async runCopy(
    sources: string[],
    destination: string,
    copy: () => Promise<CopyResult>
  ): Promise<CopyToolResult> {
    assertDestinationOutsideSources(sources, destination);

    const operationId = uuidv4();
    const log = this.logger.child({ operationId });
    log.info("Copy started", { sources, destination });

    const result = await copy();
    const summary = {
      operationId,
      sources,
      destination,
      filesCopied: result.filesCopied,
      totalFiles: result.totalFiles,
      duration: result.duration,
    };

    if (result.error) {
      log.error("Copy incomplete", {
        filesCopied: result.filesCopied,
        totalFiles: result.totalFiles,
        err: result.error,
      });
      return {
        status: "incomplete",
        ...summary,
        error: ErrorHandler.toMCPError(result.error).error,
      };
    }

    log.info("Copy complete", {
      filesCopied: result.filesCopied,
      duration: result.duration,
    });
    return { status: "success", ...summary };
  }

  /**
   * Get all tool schemas
   */
  static getAllSchemas(): ToolSchema[] {
    return [countFilesSchema, copyDirectorySchema, copyMultipleSchema];
  }
}

function parseArguments<S extends z.AnyZodObject>(
  schema: ToolSchema<S>,
  args: unknown
): z.infer<S> {
  const parsed = schema.inputSchema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid arguments for ${schema.name}: ${issues}`);
  }
  return parsed.data;
}
