import fs from 'fs/promises';
import { SignalChannel } from './channel.js';
import { createChokidarNotifier } from './notifier.js';
import type { EventAction, FileNotifier, FileWatchOptions, NotifierEvent } from './types.js';
import { WATCHER_CONSTANTS } from '../config/constants.js';
import { FileNotFoundError } from '../utils/errors.js';
import { getErrorCode, getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

/**
 * Map a raw notifier event to what the watcher does with it:
 * - `change` (write, permission or metadata change): forward one signal
 * - `add`: some writers recreate the file instead of writing to it; ignored
 * - `unlink` (removal or rename away) and notifier errors: terminal
 */
export function classifyEvent(event: NotifierEvent): EventAction {
  switch (event.type) {
    case 'change':
      return 'forward';
    case 'add':
      return 'ignore';
    case 'unlink':
    case 'error':
      return 'terminal';
  }
}

/**
 * Watch the literal `filePath` for content changes.
 *
 * Resolves once the notifier subscription is live. The returned channel
 * carries one signal per forwarded raw event, in arrival order, and closes on
 * removal, rename, notifier error, event overflow or abort. The notifier is
 * released on every one of those paths.
 *
 * @throws FileNotFoundError when the path is gone once the subscription is live
 */
export async function watchFile(
  signal: AbortSignal,
  filePath: string,
  options: FileWatchOptions = {}
): Promise<SignalChannel> {
  const createNotifier = options.createNotifier ?? createChokidarNotifier;
  const notifier = createNotifier(filePath);

  try {
    await notifier.ready;
    // A removal before the subscription existed produces no unlink event
    await fs.stat(filePath);
  } catch (error) {
    await releaseNotifier(notifier, filePath);
    const code = getErrorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new FileNotFoundError(filePath, { cause: error });
    }
    throw error;
  }

  const maxPendingEvents = options.maxPendingEvents ?? WATCHER_CONSTANTS.MAX_PENDING_EVENTS;
  return new FileWatchTask(signal, filePath, notifier, maxPendingEvents).output;
}

class FileWatchTask {
  readonly output = new SignalChannel();
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;
  private released = false;

  constructor(
    private readonly signal: AbortSignal,
    private readonly filePath: string,
    private readonly notifier: FileNotifier,
    private readonly maxPendingEvents: number
  ) {
    if (signal.aborted) {
      this.stop();
      return;
    }

    signal.addEventListener('abort', this.onAbort, { once: true });
    notifier.onEvent((event) => this.enqueue(event));
  }

  private readonly onAbort = (): void => {
    this.stop();
  };

  /**
   * Events are handled one at a time so a terminal event cannot overtake a
   * change that arrived before it.
   */
  private enqueue(event: NotifierEvent): void {
    if (this.output.isClosed) {
      return;
    }

    // A consumer that stopped draining must not grow the backlog forever
    if (this.pending >= this.maxPendingEvents) {
      log.warn('File event backlog overflowed, closing watch', {
        path: this.filePath,
        maxPendingEvents: this.maxPendingEvents
      });
      this.stop();
      return;
    }

    this.pending++;
    this.queue = this.queue
      .then(() => this.handle(event))
      .finally(() => {
        this.pending--;
      });
  }

  private async handle(event: NotifierEvent): Promise<void> {
    if (this.output.isClosed) {
      return;
    }

    switch (classifyEvent(event)) {
      case 'forward':
        await this.output.send();
        return;
      case 'ignore':
        log.debug('Ignoring create event on watched file', { path: this.filePath });
        return;
      case 'terminal':
        if (event.type === 'error') {
          log.warn('File notifier failed, closing watch', { path: this.filePath, error: event.error.message });
        } else {
          log.info('Watched file removed or renamed, closing watch', { path: this.filePath });
        }
        this.stop();
        return;
    }
  }

  private stop(): void {
    this.output.close();
    if (this.released) {
      return;
    }
    this.released = true;
    this.signal.removeEventListener('abort', this.onAbort);
    void releaseNotifier(this.notifier, this.filePath);
  }
}

async function releaseNotifier(notifier: FileNotifier, filePath: string): Promise<void> {
  try {
    await notifier.close();
  } catch (error) {
    log.warn('Failed to release file notifier', {
      path: filePath,
      error: getErrorMessage(error)
    });
  }
}
