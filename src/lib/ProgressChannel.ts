/**
 * Progress channel between copying tasks and a single draining consumer
 */

import { ProgressSender } from "../interfaces/ICopyDirectory";
import { IProgressSink } from "../interfaces/IProgressSink";
import { ChannelClosedError } from "../types";

/**
 * Bounded queue of progress signals.
 *
 * With the default capacity of 0 the channel is unbuffered: `send()` settles
 * only once the consumer has taken the signal. Any number of tasks may send;
 * only one consumer may wait in `receive()` at a time.
 */
export class ProgressChannel implements ProgressSender {
  private readonly capacity: number;
  private buffered = 0;
  private readonly blockedSenders: Array<() => void> = [];
  private waitingReceiver: ((received: boolean) => void) | null = null;
  private closed = false;

  constructor(capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(
        `Channel capacity must be a non-negative integer, got ${capacity}`
      );
    }
    this.capacity = capacity;
  }

  send(): Promise<void> {
    if (this.closed) {
      return Promise.reject(
        new ChannelClosedError("Cannot send on a closed progress channel")
      );
    }

    if (this.waitingReceiver) {
      const receiver = this.waitingReceiver;
      this.waitingReceiver = null;
      receiver(true);
      return Promise.resolve();
    }

    if (this.buffered < this.capacity) {
      this.buffered++;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.blockedSenders.push(resolve);
    });
  }

  /**
   * Wait for the next signal.
   * Resolves false once the channel is closed and fully drained.
   */
  receive(): Promise<boolean> {
    if (this.buffered > 0) {
      this.buffered--;
      // A blocked sender takes the freed slot
      const sender = this.blockedSenders.shift();
      if (sender) {
        this.buffered++;
        sender();
      }
      return Promise.resolve(true);
    }

    const sender = this.blockedSenders.shift();
    if (sender) {
      sender();
      return Promise.resolve(true);
    }

    if (this.closed) {
      return Promise.resolve(false);
    }

    if (this.waitingReceiver) {
      return Promise.reject(
        new Error("Progress channel already has a waiting receiver")
      );
    }

    return new Promise((resolve) => {
      this.waitingReceiver = resolve;
    });
  }

  /**
   * Close the channel. Signals already sent are still delivered.
   * @throws ChannelClosedError when the channel is already closed
   */
  close(): void {
    if (this.closed) {
      throw new ChannelClosedError("Progress channel is already closed");
    }
    this.closed = true;

    if (this.waitingReceiver) {
      const receiver = this.waitingReceiver;
      this.waitingReceiver = null;
      receiver(false);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Advance `sink` once per signal until the channel is closed and drained
 */
export async function drainProgress(
  channel: ProgressChannel,
  sink: IProgressSink
): Promise<void> {
  while (await channel.receive()) {
    sink.increment();
  }
}
