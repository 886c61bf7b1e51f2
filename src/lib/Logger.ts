/**
 * Leveled structured logger writing one JSON record per line
 */

import {
  ILogger,
  LOG_LEVELS,
  LogFields,
  LogLevel,
} from "../interfaces/ILogger";

export interface LoggerOptions {
  /** Records below this level are dropped (default: info) */
  level?: LogLevel;
  /** Destination stream (default: stderr, stdout belongs to the MCP transport) */
  stream?: NodeJS.WritableStream;
  /** Fields added to every record */
  fields?: LogFields;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

export class Logger implements ILogger {
  private readonly level: LogLevel;
  private readonly stream: NodeJS.WritableStream;
  private readonly fields: LogFields;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.stream = options.stream ?? process.stderr;
    this.fields = options.fields ?? {};
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string, fields?: LogFields): void {
    this.log("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log("error", message, fields);
  }

  child(fields: LogFields): Logger {
    return new Logger({
      level: this.level,
      stream: this.stream,
      fields: { ...this.fields, ...fields },
      now: this.now,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const record: LogFields = {
      timestamp: this.now().toISOString(),
      level: level.toUpperCase(),
      message,
    };
    for (const [key, value] of Object.entries({ ...this.fields, ...fields })) {
      record[key] = serializeValue(value);
    }

    this.stream.write(`${JSON.stringify(record)}\n`);
  }
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return value.message;
  }
  return value;
}

/**
 * Parse a log level name, case-insensitively
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}
