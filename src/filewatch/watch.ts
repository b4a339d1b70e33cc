import fs from 'fs/promises';
import { SignalChannel, type WatchHandle } from './channel.js';
import { watchChain } from './chain-watcher.js';
import { watchFile } from './file-watcher.js';
import { traceSymlinks } from './trace.js';
import type { WatchCloseReason, WatchOptions } from './types.js';
import { FileNotFoundError, WatcherSetupError } from '../utils/errors.js';
import { getErrorCode } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

/**
 * Watch a file for changes, following the symlinks that resolve to it.
 *
 * The returned handle:
 * - yields one signal each time the file may have changed and must be re-read
 * - closes when `signal` aborts
 * - closes when the file is removed or renamed, or when any symlink in its
 *   resolution chain is repointed; the watch must then be recreated by
 *   calling `watch` again with the same path
 *
 * Whether a closure was requested can only be told by checking `signal`.
 * Sends are unbuffered, so the consumer must drain the handle promptly. Once
 * more than `maxPendingEvents` raw events wait undelivered the handle closes.
 * Symlink changes are noticed within roughly one poll interval (1s by
 * default).
 *
 * Known limit of the chokidar notifier: it throttles raw events per path
 * (about 5ms), so two changes in quick succession can arrive as one signal.
 *
 * @throws FileNotFoundError when `filePath` does not exist, including when it
 *   disappears while the notifier is being set up
 * @throws WatcherSetupError when the change notifier cannot be started
 */
export async function watch(
  signal: AbortSignal,
  filePath: string,
  options: WatchOptions = {}
): Promise<WatchHandle> {
  try {
    await fs.stat(filePath);
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new FileNotFoundError(filePath, { cause: error });
    }
  }

  // Scopes both internal watchers; aborted whenever the handle closes
  const scope = new AbortController();
  const handle = new SignalChannel();

  const shutdown = (reason: WatchCloseReason): void => {
    if (!handle.close()) {
      return;
    }
    signal.removeEventListener('abort', onCancel);
    scope.abort();
    log.debug('Watch closed', { path: filePath, reason });
  };
  const onCancel = (): void => shutdown('cancelled');
  signal.addEventListener('abort', onCancel, { once: true });

  let fileSource: SignalChannel;
  try {
    fileSource = await watchFile(scope.signal, filePath, options);
  } catch (error) {
    signal.removeEventListener('abort', onCancel);
    scope.abort();
    handle.close();
    if (error instanceof FileNotFoundError) {
      throw error;
    }
    throw new WatcherSetupError(filePath, { cause: error });
  }

  const chain = await traceSymlinks(filePath);
  const chainSource = watchChain(scope.signal, chain, options);

  log.debug('Watching file', { path: filePath, symlinks: chain.length });

  void chainSource.closed.then(() => shutdown(signal.aborted ? 'cancelled' : 'symlink-drift'));
  void forwardSignals(fileSource, handle).then(() => shutdown(signal.aborted ? 'cancelled' : 'file-closed'));

  if (signal.aborted) {
    shutdown('cancelled');
  }

  return handle;
}

async function forwardSignals(source: SignalChannel, target: SignalChannel): Promise<void> {
  while (!(await source.receive()).done) {
    if (!(await target.send())) {
      return;
    }
  }
}
