/**
 * File watching that survives atomic symlink swaps
 *
 * - watch: public entry point, merges both sources into one handle
 * - watchFile: native change notifications on the literal path
 * - watchChain: polls the symlinks that resolve to the path
 * - traceSymlinks: discovers those symlinks
 */

export { watch } from './watch.js';
export { watchFile, classifyEvent } from './file-watcher.js';
export { watchChain, findDrift } from './chain-watcher.js';
export type { ChainDrift } from './chain-watcher.js';
export { traceSymlinks } from './trace.js';
export { createChokidarNotifier } from './notifier.js';
export { SignalChannel } from './channel.js';
export type { WatchHandle } from './channel.js';
export type {
  SymlinkEdge,
  SymlinkChain,
  NotifierEvent,
  NotifierListener,
  FileNotifier,
  NotifierFactory,
  EventAction,
  ChainWatchOptions,
  FileWatchOptions,
  WatchOptions,
  WatchCloseReason
} from './types.js';
export {
  MountwatchError,
  FileNotFoundError,
  WatcherSetupError
} from '../utils/errors.js';
