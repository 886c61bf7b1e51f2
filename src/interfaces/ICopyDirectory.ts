/**
 * Directory copy interface
 */

import {
  DestinationError,
  DestinationOpenError,
  ReadError,
  SourceOpenError,
  TransferError,
} from "../types";
import { ProgressSinkFactory } from "./IProgressSink";

/**
 * Every failure a copy can report
 */
export type CopyFailure =
  | ReadError
  | DestinationError
  | SourceOpenError
  | DestinationOpenError
  | TransferError;

/**
 * Send side of a progress channel. One signal means one file copied.
 */
export interface ProgressSender {
  send(): Promise<void>;
}

export interface CopyDirectoryOptions {
  /** Bytes per transfer chunk; values that are unset or not positive mean 1 MiB */
  bufferSize?: number;
  /** Upper bound on file transfers open at the same time (default: 16) */
  maxConcurrentTransfers?: number;
  /** Glob patterns, relative to each copy root, of entries to skip */
  exclusions?: string[];
  /** Builds the progress sink for an orchestrated copy */
  createProgressSink?: ProgressSinkFactory;
}

/**
 * Outcome of one subtree copy.
 *
 * `filesCopied` counts the files copied before and concurrently with the
 * failure, so it is meaningful even when `error` is set.
 */
export interface TransferResult {
  filesCopied: number;
  error?: CopyFailure;
}

export interface CopyResult extends TransferResult {
  /** Files found by the counting pass */
  totalFiles: number;
  /** Milliseconds spent counting and copying */
  duration: number;
}

export interface ICopyDirectory {
  /**
   * Count the files below a directory
   * @throws ReadError when a directory cannot be listed
   */
  countFiles(directory: string): Promise<number>;

  /**
   * Copy one directory tree, sending a progress signal per copied file.
   * Never rejects for filesystem failures: they are reported in the result.
   */
  copyTree(
    sourceDirectory: string,
    destinationDirectory: string,
    progress: ProgressSender
  ): Promise<TransferResult>;

  /**
   * Count, then copy a directory tree while driving a progress sink
   */
  copy(source: string, destination: string): Promise<CopyResult>;

  /**
   * Copy several directory trees into one destination with a shared sink
   */
  copyMultiple(sources: string[], destination: string): Promise<CopyResult>;
}
