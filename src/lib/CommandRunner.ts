/**
 * Command-line front end: argument parsing and command dispatch
 */

import { parseArgs } from "util";
import { ILogger, LogLevel } from "../interfaces/ILogger";
import { ProgressSinkFactory } from "../interfaces/IProgressSink";
import { ReadError, ValidationError } from "../types";
import { TreecopyConfig } from "./ConfigLoader";
import {
  CopyDirectory,
  assertDestinationOutsideSources,
} from "./CopyDirectory";
import { Logger } from "./Logger";
import { SilentProgressSink, TerminalProgressBar } from "./ProgressBar";

export const USAGE = `Usage:
  treecopy count <directory>
  treecopy copy <source...> <destination> [--buffer-size <bytes>] [--exclude <glob>]... [--quiet]
  treecopy serve

Options:
  --buffer-size <bytes>  Bytes per transfer chunk (default: 1048576)
  --exclude <glob>       Skip matching entries; may be repeated
  -q, --quiet            Do not draw the progress bar
  -h, --help             Show this help
`;

export interface CliDependencies {
  stdout: NodeJS.WritableStream;
  /** Receives the progress bar and log records */
  stderr: NodeJS.WritableStream;
  loadConfig: () => Promise<TreecopyConfig>;
  startServer: () => Promise<unknown>;
  createLogger?: (level: LogLevel, stream: NodeJS.WritableStream) => ILogger;
}

interface ParsedCommand {
  command: string | undefined;
  operands: string[];
  bufferSize?: number;
  exclusions: string[];
  quiet: boolean;
  help: boolean;
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function runCli(
  argv: string[],
  deps: CliDependencies
): Promise<number> {
  let parsed: ParsedCommand;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    deps.stderr.write(`${message}\n\n${USAGE}`);
    return 2;
  }

  if (parsed.help || parsed.command === undefined) {
    (parsed.help ? deps.stdout : deps.stderr).write(USAGE);
    return parsed.help ? 0 : 2;
  }

  let config: TreecopyConfig;
  try {
    config = await deps.loadConfig();
  } catch (error) {
    if (error instanceof ValidationError) {
      deps.stderr.write(`${error.message}\n`);
      return 2;
    }
    throw error;
  }

  const logger = (
    deps.createLogger ??
    ((level, stream) => new Logger({ level, stream }))
  )(config.logLevel, deps.stderr);

  switch (parsed.command) {
    case "count":
      return runCount(parsed, config, logger, deps);
    case "copy":
      return runCopy(parsed, config, logger, deps);
    case "serve":
      await deps.startServer();
      return 0;
    default:
      deps.stderr.write(`Unknown command: ${parsed.command}\n\n${USAGE}`);
      return 2;
  }
}

export function parseCommandLine(argv: string[]): ParsedCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      "buffer-size": { type: "string" },
      exclude: { type: "string", multiple: true },
      quiet: { type: "boolean", short: "q" },
      help: { type: "boolean", short: "h" },
    },
  });

  let bufferSize: number | undefined;
  const rawBufferSize = values["buffer-size"];
  if (rawBufferSize !== undefined) {
    bufferSize = Number(rawBufferSize);
    if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
      throw new ValidationError(
        `--buffer-size must be a positive integer, got "${rawBufferSize}"`
      );
    }
  }

  const [command, ...operands] = positionals;
  return {
    command,
    operands,
    bufferSize,
    exclusions: values.exclude ?? [],
    quiet: values.quiet ?? false,
    help: values.help ?? false,
  };
}

async function runCount(
  parsed: ParsedCommand,
  config: TreecopyConfig,
  logger: ILogger,
  deps: CliDependencies
): Promise<number> {
  const [directory, ...extra] = parsed.operands;
  if (directory === undefined || extra.length > 0) {
    deps.stderr.write(`count takes exactly one directory\n\n${USAGE}`);
    return 2;
  }

  const copier = new CopyDirectory({
    exclusions: [...config.copy.exclusions, ...parsed.exclusions],
  });
  try {
    const total = await copier.countFiles(directory);
    deps.stdout.write(`${total}\n`);
    return 0;
  } catch (error) {
    if (error instanceof ReadError) {
      logger.error("Count failed", { path: directory, err: error });
      return 1;
    }
    throw error;
  }
}

async function runCopy(
  parsed: ParsedCommand,
  config: TreecopyConfig,
  logger: ILogger,
  deps: CliDependencies
): Promise<number> {
  if (parsed.operands.length < 2) {
    deps.stderr.write(
      `copy needs at least one source and a destination\n\n${USAGE}`
    );
    return 2;
  }

  const sources = parsed.operands.slice(0, -1);
  const destination = parsed.operands[parsed.operands.length - 1];
  try {
    assertDestinationOutsideSources(sources, destination);
  } catch (error) {
    if (error instanceof ValidationError) {
      deps.stderr.write(`${error.message}\n`);
      return 2;
    }
    throw error;
  }

  const createProgressSink: ProgressSinkFactory = parsed.quiet
    ? (total) => new SilentProgressSink(total)
    : (total) => new TerminalProgressBar(total, { stream: deps.stderr });

  const copier = new CopyDirectory({
    bufferSize: parsed.bufferSize ?? config.copy.bufferSize,
    maxConcurrentTransfers: config.copy.maxConcurrentTransfers,
    exclusions: [...config.copy.exclusions, ...parsed.exclusions],
    createProgressSink,
  });

  logger.debug("Copy started", { sources, destination });
  const result =
    sources.length === 1
      ? await copier.copy(sources[0], destination)
      : await copier.copyMultiple(sources, destination);

  if (result.error) {
    logger.error("Copy incomplete", {
      filesCopied: result.filesCopied,
      totalFiles: result.totalFiles,
      err: result.error,
    });
    return 1;
  }

  logger.info("Copy complete", {
    filesCopied: result.filesCopied,
    duration: result.duration,
  });
  deps.stdout.write(`${result.filesCopied} files copied\n`);
  return 0;
}
