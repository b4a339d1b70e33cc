import { setTimeout as delay } from 'timers/promises';
import { watch as watchFile } from '../filewatch/watch.js';
import type { WatchHandle } from '../filewatch/channel.js';
import type { WatchOptions } from '../filewatch/types.js';
import { WATCHER_CONSTANTS } from '../config/constants.js';
import { ContentStore, readContent } from './content-store.js';
import { getErrorMessage, isAbortError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

export type WatchFunction = (signal: AbortSignal, filePath: string, options?: WatchOptions) => Promise<WatchHandle>;

export interface FileReloaderOptions {
  filePath: string;
  store: ContentStore;
  watchOptions?: WatchOptions;
  /** Delay before retrying a watch that could not be established */
  rewatchDelayMs?: number;
  /** Override the watch entry point */
  watchFn?: WatchFunction;
}

/**
 * Keeps a ContentStore in sync with a file on disk.
 *
 * Loads the file once, re-reads it on every change signal, and re-creates the
 * watch whenever it ends on its own (file replaced, symlink swapped). A watch
 * that ends within `rewatchDelayMs` of being established is retried only
 * after that delay. Runs until the signal passed to `start` aborts.
 */
export class FileReloader {
  private running: Promise<void> | null = null;
  private watching = false;
  private readonly rewatchDelayMs: number;
  private readonly watchFn: WatchFunction;

  constructor(private options: FileReloaderOptions) {
    this.rewatchDelayMs = options.rewatchDelayMs ?? WATCHER_CONSTANTS.REWATCH_DELAY_MS;
    this.watchFn = options.watchFn ?? watchFile;
  }

  /**
   * Load the file and start following it in the background.
   * @throws when the first load fails; nothing is started in that case
   */
  async start(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('FileReloader already started');
    }

    const data = await readContent(this.options.filePath);
    this.options.store.update(data);
    log.info('Loaded file', { path: this.options.filePath, bytes: data.length });

    this.running = this.run(signal);
  }

  isWatching(): boolean {
    return this.watching;
  }

  /**
   * Resolves once the background loop has exited (after abort)
   */
  async stopped(): Promise<void> {
    await this.running;
  }

  /**
   * Re-read the file into the store. Failures keep the previous content.
   */
  async reload(): Promise<boolean> {
    const { filePath, store } = this.options;

    try {
      const data = await readContent(filePath);
      store.update(data);
      log.info('File reloaded', { path: filePath, bytes: data.length });
      return true;
    } catch (error) {
      store.recordFailure();
      log.warn('Failed to reload file, keeping previous content', {
        path: filePath,
        error: getErrorMessage(error)
      });
      return false;
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { filePath, watchOptions } = this.options;
    let firstWatch = true;

    while (!signal.aborted) {
      let handle: WatchHandle;
      try {
        handle = await this.watchFn(signal, filePath, watchOptions);
      } catch (error) {
        log.warn('Cannot watch file, retrying', {
          path: filePath,
          error: getErrorMessage(error),
          retryInMs: this.rewatchDelayMs
        });
        if (!(await this.pause(signal))) {
          return;
        }
        continue;
      }

      this.watching = true;
      const establishedAt = Date.now();
      // Whatever happened while no watch was active was not signalled
      if (!firstWatch) {
        await this.reload();
      }
      firstWatch = false;

      while (!(await handle.receive()).done) {
        await this.reload();
      }
      this.watching = false;

      if (signal.aborted) {
        return;
      }

      const livedMs = Date.now() - establishedAt;
      if (livedMs < this.rewatchDelayMs) {
        log.warn('Watch ended right after it was established, backing off', {
          path: filePath,
          livedMs,
          retryInMs: this.rewatchDelayMs
        });
        if (!(await this.pause(signal))) {
          return;
        }
      } else {
        log.info('Watch ended, re-establishing', { path: filePath });
      }
    }
  }

  /**
   * Wait before the next attempt; false when aborted meanwhile
   */
  private async pause(signal: AbortSignal): Promise<boolean> {
    try {
      await delay(this.rewatchDelayMs, undefined, { signal });
      return true;
    } catch (error) {
      if (isAbortError(error)) {
        return false;
      }
      throw error;
    }
  }
}
