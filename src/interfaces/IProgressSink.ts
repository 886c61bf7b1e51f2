/**
 * Progress sink interface
 */

export interface IProgressSink {
  /** Advance by one copied file */
  increment(): void;
  /** Mark the whole operation complete */
  finish(): void;
}

/**
 * Creates a sink for a copy of `total` files
 */
export type ProgressSinkFactory = (total: number) => IProgressSink;
