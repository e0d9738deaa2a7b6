import { ChannelClosedError } from './errors';

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: ChannelClosedError) => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * An unbuffered channel. `send` resolves only once a receiver has taken the
 * value, so a sender runs at most one handoff ahead of the slowest receiver.
 * Senders and receivers are each served in FIFO order.
 */
export class HandoffChannel<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @throws {ChannelClosedError} (as a rejection) if the channel is closed
   * before a receiver takes the value.
   */
  send(value: T): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError());

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Resolves with the next value, or with `done: true` once the channel is
   * closed and no sender is waiting.
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ done: false, value: sender.value });
    }
    if (this.closed) return Promise.resolve({ done: true, value: undefined });

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Closes the channel. Waiting receivers finish; waiting senders are
   * rejected with `ChannelClosedError`. Closing twice is a no-op.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }
}
