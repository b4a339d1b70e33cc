/**
 * Unbuffered, closable channel of unit signals.
 *
 * A send completes only when a receiver takes the value, which gives the
 * watch pipeline end-to-end backpressure: a consumer that stops draining
 * stalls every producer upstream of it.
 */

type Receiver = (result: IteratorResult<void>) => void;
type Sender = (delivered: boolean) => void;

const VALUE: IteratorResult<void> = { value: undefined, done: false };
const DONE: IteratorResult<void> = { value: undefined, done: true };

/**
 * Receive-only view handed to consumers of a watch.
 */
export interface WatchHandle extends AsyncIterable<void> {
  /** Wait for the next signal; `done` once the handle has closed */
  receive(): Promise<IteratorResult<void>>;
  /** Resolves once the handle has closed */
  readonly closed: Promise<void>;
  readonly isClosed: boolean;
}

export class SignalChannel implements WatchHandle {
  private receivers: Receiver[] = [];
  private senders: Sender[] = [];
  private done = false;
  private resolveClosed: () => void = () => {};
  readonly closed: Promise<void>;

  constructor() {
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get isClosed(): boolean {
    return this.done;
  }

  /**
   * Offer one signal. Resolves true once a receiver took it, false when the
   * channel closed first. Concurrent senders are served in FIFO order.
   */
  send(): Promise<boolean> {
    if (this.done) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(VALUE);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.senders.push(resolve);
    });
  }

  receive(): Promise<IteratorResult<void>> {
    const sender = this.senders.shift();
    if (sender) {
      sender(true);
      return Promise.resolve(VALUE);
    }

    if (this.done) {
      return Promise.resolve(DONE);
    }

    return new Promise<IteratorResult<void>>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Close the channel. Pending sends resolve false, pending receives end.
   * Returns true only for the call that actually closed it.
   */
  close(): boolean {
    if (this.done) {
      return false;
    }
    this.done = true;

    for (const sender of this.senders.splice(0)) {
      sender(false);
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver(DONE);
    }

    this.resolveClosed();
    return true;
  }

  [Symbol.asyncIterator](): AsyncIterator<void> {
    return {
      next: () => this.receive()
    };
  }
}
