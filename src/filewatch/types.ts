/**
 * One hop in a path's resolution: `linkPath` was a symbolic link holding
 * `target` when the chain was traced.
 */
export interface SymlinkEdge {
  readonly linkPath: string;
  /** Raw link contents, not resolved */
  readonly target: string;
}

/** Links participating in a path's resolution, leaf-most first */
export type SymlinkChain = readonly SymlinkEdge[];

/** Raw events a notifier reports for the watched path */
export type NotifierEvent =
  | { type: 'add' }
  | { type: 'change' }
  | { type: 'unlink' }
  | { type: 'error'; error: Error };

export type NotifierListener = (event: NotifierEvent) => void;

/**
 * Native change-notification subscription on one literal path.
 * Owned by a single file watcher and released through `close()`.
 */
export interface FileNotifier {
  onEvent(listener: NotifierListener): void;
  /** Resolves once the subscription is live; rejects if it cannot be set up */
  readonly ready: Promise<void>;
  close(): Promise<void>;
}

export type NotifierFactory = (filePath: string) => FileNotifier;

/** What the file watcher does with a raw event */
export type EventAction = 'forward' | 'ignore' | 'terminal';

export interface ChainWatchOptions {
  /** Interval between link checks in milliseconds (default 1000) */
  pollIntervalMs?: number;
}

export interface FileWatchOptions {
  /** Override the chokidar-backed notifier */
  createNotifier?: NotifierFactory;
  /**
   * Raw events allowed to wait for the consumer before the watch is closed
   * as overflowed (default 1024)
   */
  maxPendingEvents?: number;
}

export interface WatchOptions extends ChainWatchOptions, FileWatchOptions {}

/** Why a watch ended; logged, never exposed on the handle */
export type WatchCloseReason = 'cancelled' | 'file-closed' | 'symlink-drift';
