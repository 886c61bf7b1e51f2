/**
 * Progress sinks: a text progress bar and a silent recorder
 */

import { IProgressSink } from "../interfaces/IProgressSink";

export interface ProgressBarOptions {
  /** Stream the bar is drawn on (default: stderr) */
  stream?: NodeJS.WritableStream;
  /** Number of cells in the bar */
  width?: number;
  /** Text drawn before the percentage */
  description?: string;
}

export class TerminalProgressBar implements IProgressSink {
  private readonly total: number;
  private readonly stream: NodeJS.WritableStream;
  private readonly width: number;
  private readonly description: string;
  private current = 0;
  private finished = false;

  constructor(total: number, options: ProgressBarOptions = {}) {
    this.total = Math.max(0, total);
    this.stream = options.stream ?? process.stderr;
    this.width = options.width ?? 50;
    this.description = options.description ?? "Copying files: ";
  }

  increment(): void {
    if (this.finished) {
      return;
    }
    this.current++;
    this.render();
  }

  finish(): void {
    if (this.finished) {
      return;
    }
    this.current = Math.max(this.current, this.total);
    this.render();
    this.stream.write("\n");
    this.finished = true;
  }

  /**
   * Current line of the bar, without the carriage return
   */
  format(): string {
    const ratio =
      this.total === 0 ? 1 : Math.min(1, this.current / this.total);
    const filled = Math.round(ratio * this.width);
    const percent = String(Math.floor(ratio * 100)).padStart(3, " ");

    return (
      `${this.description}${percent}% ` +
      `|${"█".repeat(filled)}${" ".repeat(this.width - filled)}| ` +
      `(${this.current}/${this.total})`
    );
  }

  private render(): void {
    this.stream.write(`\r${this.format()}`);
  }
}

/**
 * Sink that draws nothing and remembers what it was told
 */
export class SilentProgressSink implements IProgressSink {
  readonly total: number;
  private completed = 0;
  private finished = false;

  constructor(total: number) {
    this.total = total;
  }

  increment(): void {
    this.completed++;
  }

  finish(): void {
    this.finished = true;
  }

  getCompleted(): number {
    return this.completed;
  }

  isFinished(): boolean {
    return this.finished;
  }
}
