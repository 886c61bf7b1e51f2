/**
 * Concurrent recursive directory copy with progress reporting
 */

import * as fs from "fs";
import type { FileHandle } from "fs/promises";
import * as path from "path";
import {
  CopyDirectoryOptions,
  CopyFailure,
  CopyResult,
  ICopyDirectory,
  ProgressSender,
  TransferResult,
} from "../interfaces/ICopyDirectory";
import {
  IProgressSink,
  ProgressSinkFactory,
} from "../interfaces/IProgressSink";
import {
  DestinationError,
  DestinationOpenError,
  ReadError,
  SourceOpenError,
  TransferError,
  ValidationError,
} from "../types";
import { PathMatcher } from "./PathMatcher";
import { ProgressChannel, drainProgress } from "./ProgressChannel";
import { TerminalProgressBar } from "./ProgressBar";
import { Semaphore } from "./Semaphore";

export const DEFAULT_BUFFER_SIZE = 1024 * 1024;
export const DEFAULT_MAX_CONCURRENT_TRANSFERS = 16;

/**
 * Throw when `destination` is a source or lies inside one; such a copy would
 * keep walking into its own output.
 */
export function assertDestinationOutsideSources(
  sources: string[],
  destination: string
): void {
  const target = path.resolve(destination);
  for (const source of sources) {
    const root = path.resolve(source);
    if (target === root || target.startsWith(root + path.sep)) {
      throw new ValidationError(
        `Destination ${target} is inside source ${root}`
      );
    }
  }
}

export class CopyDirectory implements ICopyDirectory {
  private readonly bufferSize: number;
  private readonly transfers: Semaphore;
  private readonly exclusions: PathMatcher;
  private readonly createProgressSink: ProgressSinkFactory;

  constructor(options: CopyDirectoryOptions = {}) {
    this.bufferSize =
      options.bufferSize !== undefined && options.bufferSize > 0
        ? Math.floor(options.bufferSize)
        : DEFAULT_BUFFER_SIZE;
    this.transfers = new Semaphore(
      options.maxConcurrentTransfers ?? DEFAULT_MAX_CONCURRENT_TRANSFERS
    );
    this.exclusions = new PathMatcher(options.exclusions);
    this.createProgressSink =
      options.createProgressSink ??
      ((total) => new TerminalProgressBar(total));
  }

  getBufferSize(): number {
    return this.bufferSize;
  }

  async countFiles(directory: string): Promise<number> {
    return this.countLevel(directory, "");
  }

  async copyTree(
    sourceDirectory: string,
    destinationDirectory: string,
    progress: ProgressSender
  ): Promise<TransferResult> {
    return this.copyLevel(sourceDirectory, destinationDirectory, "", progress);
  }

  async copy(source: string, destination: string): Promise<CopyResult> {
    const startTime = Date.now();

    let totalFiles: number;
    try {
      totalFiles = await this.countFiles(source);
    } catch (error) {
      if (error instanceof ReadError) {
        return {
          filesCopied: 0,
          error,
          totalFiles: 0,
          duration: Date.now() - startTime,
        };
      }
      throw error;
    }

    const sink = this.createProgressSink(totalFiles);
    const { filesCopied, error } = await this.withProgress(sink, (channel) =>
      this.copyTree(source, destination, channel)
    );

    if (error) {
      return {
        filesCopied,
        error,
        totalFiles,
        duration: Date.now() - startTime,
      };
    }

    sink.finish();
    return { filesCopied, totalFiles, duration: Date.now() - startTime };
  }

  async copyMultiple(
    sources: string[],
    destination: string
  ): Promise<CopyResult> {
    const startTime = Date.now();

    let totalFiles = 0;
    for (const source of sources) {
      try {
        totalFiles += await this.countFiles(source);
      } catch (error) {
        if (error instanceof ReadError) {
          return {
            filesCopied: 0,
            error,
            totalFiles,
            duration: Date.now() - startTime,
          };
        }
        throw error;
      }
    }

    // One sink for every source, so their progress shares a single display
    const sink = this.createProgressSink(totalFiles);
    const outcome = await this.withProgress(
      sink,
      async (channel): Promise<TransferResult[] | DestinationError> => {
        try {
          await fs.promises.mkdir(destination, { recursive: true });
        } catch (error) {
          return new DestinationError(destination, error);
        }

        return Promise.all(
          sources.map((source) => this.copyTree(source, destination, channel))
        );
      }
    );

    const duration = Date.now() - startTime;
    if (outcome instanceof DestinationError) {
      return { filesCopied: 0, error: outcome, totalFiles, duration };
    }

    sink.finish();

    const filesCopied = outcome.reduce(
      (sum, result) => sum + result.filesCopied,
      0
    );
    // Results keep the order of `sources`, so the first listed failure wins
    const failed = outcome.find((result) => result.error !== undefined);
    return failed?.error
      ? { filesCopied, error: failed.error, totalFiles, duration }
      : { filesCopied, totalFiles, duration };
  }

  /**
   * Run `work` while a background task drains its progress signals into
   * `sink`. The channel is closed exactly once, after `work` settles, and the
   * drain is awaited before returning.
   */
  private async withProgress<T>(
    sink: IProgressSink,
    work: (channel: ProgressSender) => Promise<T>
  ): Promise<T> {
    const channel = new ProgressChannel();
    const draining = drainProgress(channel, sink);
    try {
      return await work(channel);
    } finally {
      channel.close();
      await draining;
    }
  }

  private async countLevel(
    directory: string,
    relativeDirectory: string
  ): Promise<number> {
    const entries = await this.listDirectory(directory);

    let count = 0;
    for (const entry of entries) {
      const relativePath = path.join(relativeDirectory, entry.name);
      if (this.exclusions.matches(relativePath)) {
        continue;
      }

      if (entry.isDirectory()) {
        count += await this.countLevel(
          path.join(directory, entry.name),
          relativePath
        );
      } else {
        count++;
      }
    }
    return count;
  }

  private async copyLevel(
    sourceDirectory: string,
    destinationDirectory: string,
    relativeDirectory: string,
    progress: ProgressSender
  ): Promise<TransferResult> {
    try {
      await fs.promises.mkdir(destinationDirectory, { recursive: true });
    } catch (error) {
      return {
        filesCopied: 0,
        error: new DestinationError(destinationDirectory, error),
      };
    }

    let entries: fs.Dirent[];
    try {
      entries = await this.listDirectory(sourceDirectory);
    } catch (error) {
      if (error instanceof ReadError) {
        return { filesCopied: 0, error };
      }
      throw error;
    }

    // Subtasks report back through their own results; merging happens in
    // this task's continuations, one at a time, in completion order.
    let filesCopied = 0;
    let firstError: CopyFailure | undefined;
    const subtasks: Promise<void>[] = [];

    for (const entry of entries) {
      const relativePath = path.join(relativeDirectory, entry.name);
      if (this.exclusions.matches(relativePath)) {
        continue;
      }

      const sourcePath = path.join(sourceDirectory, entry.name);
      const destinationPath = path.join(destinationDirectory, entry.name);

      if (entry.isDirectory()) {
        subtasks.push(
          this.copyLevel(
            sourcePath,
            destinationPath,
            relativePath,
            progress
          ).then((result) => {
            filesCopied += result.filesCopied;
            if (result.error && !firstError) {
              firstError = result.error;
            }
          })
        );
        continue;
      }

      const failure = await this.copyFile(sourcePath, destinationPath);
      if (failure) {
        if (!firstError) {
          firstError = failure;
        }
        // Remaining siblings are skipped; dispatched subtasks still finish
        break;
      }

      await progress.send();
      filesCopied++;
    }

    await Promise.all(subtasks);
    return firstError ? { filesCopied, error: firstError } : { filesCopied };
  }

  private async listDirectory(directory: string): Promise<fs.Dirent[]> {
    try {
      return await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw new ReadError(directory, error);
    }
  }

  private async copyFile(
    sourcePath: string,
    destinationPath: string
  ): Promise<CopyFailure | undefined> {
    return this.transfers.withPermit(() =>
      this.transferFile(sourcePath, destinationPath)
    );
  }

  private async transferFile(
    sourcePath: string,
    destinationPath: string
  ): Promise<CopyFailure | undefined> {
    let source: FileHandle;
    try {
      source = await fs.promises.open(sourcePath, "r");
    } catch (error) {
      return new SourceOpenError(sourcePath, error);
    }

    let destination: FileHandle;
    try {
      destination = await fs.promises.open(destinationPath, "w");
    } catch (error) {
      // The open failure is what gets reported for this file
      await Promise.allSettled([source.close()]);
      return new DestinationOpenError(destinationPath, error);
    }

    let failure: CopyFailure | undefined;
    try {
      await this.pump(source, destination);
    } catch (error) {
      failure = new TransferError(sourcePath, error);
    }

    const closed = await Promise.allSettled([
      source.close(),
      destination.close(),
    ]);
    const closeFailure = closed.find(
      (outcome): outcome is PromiseRejectedResult =>
        outcome.status === "rejected"
    );
    if (!failure && closeFailure) {
      failure = new TransferError(destinationPath, closeFailure.reason);
    }
    return failure;
  }

  private async pump(source: FileHandle, destination: FileHandle): Promise<void> {
    const buffer = Buffer.allocUnsafe(this.bufferSize);
    for (;;) {
      const { bytesRead } = await source.read(buffer, 0, buffer.length, null);
      if (bytesRead === 0) {
        return;
      }

      let offset = 0;
      while (offset < bytesRead) {
        const { bytesWritten } = await destination.write(
          buffer,
          offset,
          bytesRead - offset
        );
        offset += bytesWritten;
      }
    }
  }
}
