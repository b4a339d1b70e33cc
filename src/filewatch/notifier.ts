import path from 'path';
import chokidar from 'chokidar';
import type { FileNotifier, NotifierEvent, NotifierListener } from './types.js';

export interface ChokidarNotifierOptions {
  /** Keep the process alive while watching (default true) */
  persistent?: boolean;
}

/**
 * FileNotifier backed by chokidar, watching exactly one path.
 *
 * Options keep raw events as close to the OS as chokidar allows: no initial
 * `add`, no write-finish debouncing, and `atomic` off so a removal is
 * reported as `unlink` instead of being folded into a later `change`.
 * Events for any other path are dropped.
 *
 * chokidar throttles raw events per path for a few milliseconds, so changes
 * closer together than that are reported once.
 */
export function createChokidarNotifier(filePath: string, options: ChokidarNotifierOptions = {}): FileNotifier {
  const watchedPath = path.resolve(filePath);
  const watcher = chokidar.watch(filePath, {
    persistent: options.persistent ?? true,
    ignoreInitial: true,
    disableGlobbing: true,
    atomic: false,
    awaitWriteFinish: false
  });

  const listeners = new Set<NotifierListener>();
  let isReady = false;

  const emit = (event: NotifierEvent): void => {
    for (const listener of listeners) {
      listener(event);
    }
  };
  const emitFor = (eventPath: string, event: NotifierEvent): void => {
    if (path.resolve(eventPath) === watchedPath) {
      emit(event);
    }
  };

  const ready = new Promise<void>((resolve, reject) => {
    watcher.once('ready', () => {
      isReady = true;
      resolve();
    });
    watcher.on('error', (error) => {
      if (!isReady) {
        reject(error);
        return;
      }
      emit({ type: 'error', error });
    });
  });

  watcher.on('add', (eventPath) => emitFor(eventPath, { type: 'add' }));
  watcher.on('change', (eventPath) => emitFor(eventPath, { type: 'change' }));
  watcher.on('unlink', (eventPath) => emitFor(eventPath, { type: 'unlink' }));

  return {
    onEvent(listener) {
      listeners.add(listener);
    },
    ready,
    async close() {
      listeners.clear();
      await watcher.close();
    }
  };
}
