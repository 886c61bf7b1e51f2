/**
 * Configuration loader for treecopy
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { LOG_LEVELS, LogLevel } from "../interfaces/ILogger";
import { SecurityConfig } from "../interfaces/ISecurityManager";
import { ValidationError } from "../types";
import {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_MAX_CONCURRENT_TRANSFERS,
} from "./CopyDirectory";
import { parseLogLevel } from "./Logger";

export const CONFIG_FILE_NAME = "treecopy-config.json";

export interface CopySettings {
  bufferSize: number;
  maxConcurrentTransfers: number;
  exclusions: string[];
}

export interface TreecopyConfig {
  copy: CopySettings;
  security: SecurityConfig;
  logLevel: LogLevel;
}

const logLevelSchema = z.enum(LOG_LEVELS);

const configFileSchema = z
  .object({
    copy: z
      .object({
        bufferSize: z.number().int().positive().optional(),
        maxConcurrentTransfers: z.number().int().positive().optional(),
        exclusions: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    security: z
      .object({
        workspaceRoot: z.string().min(1).optional(),
        blockedPaths: z.array(z.string()).optional(),
        blockedPatterns: z.array(z.string()).optional(),
        readOnly: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logLevel: logLevelSchema.optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export class ConfigLoader {
  /**
   * Load configuration from file and environment
   *
   * The file is `$TREECOPY_CONFIG` or `treecopy-config.json` in `cwd`; a
   * missing default file is not an error. `TREECOPY_WORKSPACE_ROOT`,
   * `TREECOPY_BUFFER_SIZE` and `TREECOPY_LOG_LEVEL` override the file.
   */
  static async loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
  ): Promise<TreecopyConfig> {
    const explicitPath = env["TREECOPY_CONFIG"];
    const configPath = explicitPath
      ? path.resolve(cwd, explicitPath)
      : path.join(cwd, CONFIG_FILE_NAME);

    let file: ConfigFile = {};
    if (fs.existsSync(configPath)) {
      file = this.parseConfigFile(
        await fs.promises.readFile(configPath, "utf-8"),
        configPath
      );
    } else if (explicitPath) {
      throw new ValidationError(`Config file not found: ${configPath}`);
    }

    return this.applyEnvironment(this.withDefaults(file, cwd), env, cwd);
  }

  /**
   * Parse and validate the text of a configuration file
   */
  static parseConfigFile(text: string, source = CONFIG_FILE_NAME): ConfigFile {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(
        `Invalid JSON in ${source}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    const parsed = configFileSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(`Invalid configuration in ${source}: ${issues}`);
    }
    return parsed.data;
  }

  private static withDefaults(file: ConfigFile, cwd: string): TreecopyConfig {
    return {
      copy: {
        bufferSize: file.copy?.bufferSize ?? DEFAULT_BUFFER_SIZE,
        maxConcurrentTransfers:
          file.copy?.maxConcurrentTransfers ??
          DEFAULT_MAX_CONCURRENT_TRANSFERS,
        exclusions: file.copy?.exclusions ?? [],
      },
      security: {
        workspaceRoot: path.resolve(cwd, file.security?.workspaceRoot ?? "."),
        blockedPaths: file.security?.blockedPaths ?? [".git", "node_modules"],
        blockedPatterns: file.security?.blockedPatterns ?? [],
        readOnly: file.security?.readOnly ?? false,
      },
      logLevel: file.logLevel ?? "info",
    };
  }

  private static applyEnvironment(
    config: TreecopyConfig,
    env: NodeJS.ProcessEnv,
    cwd: string
  ): TreecopyConfig {
    const workspaceRoot = env["TREECOPY_WORKSPACE_ROOT"];
    if (workspaceRoot) {
      config.security.workspaceRoot = path.resolve(cwd, workspaceRoot);
    }

    const bufferSize = env["TREECOPY_BUFFER_SIZE"];
    if (bufferSize) {
      const parsed = Number(bufferSize);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ValidationError(
          `TREECOPY_BUFFER_SIZE must be a positive integer, got "${bufferSize}"`
        );
      }
      config.copy.bufferSize = parsed;
    }

    const logLevel = env["TREECOPY_LOG_LEVEL"];
    if (logLevel) {
      const level = parseLogLevel(logLevel);
      if (!level) {
        throw new ValidationError(
          `TREECOPY_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`
        );
      }
      config.logLevel = level;
    }

    return config;
  }
}
