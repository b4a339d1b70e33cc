import fs from 'fs/promises';
import { setTimeout as delay } from 'timers/promises';
import { SignalChannel } from './channel.js';
import type { ChainWatchOptions, SymlinkChain, SymlinkEdge } from './types.js';
import { WATCHER_CONSTANTS } from '../config/constants.js';
import { getErrorCode, isAbortError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

export interface ChainDrift {
  edge: SymlinkEdge;
  /** Target read now, or null when the link could not be read */
  observed: string | null;
  errorCode?: string;
}

/**
 * Compare every link of the chain against its recorded target.
 * Returns the first drifted edge, or null when all still match.
 */
export async function findDrift(chain: SymlinkChain): Promise<ChainDrift | null> {
  for (const edge of chain) {
    let observed: string;
    try {
      observed = await fs.readlink(edge.linkPath);
    } catch (error) {
      return { edge, observed: null, errorCode: getErrorCode(error) };
    }

    if (observed !== edge.target) {
      return { edge, observed };
    }
  }
  return null;
}

/**
 * Poll the links of `chain` and close the returned channel as soon as one of
 * them no longer points where it did at trace time, or cannot be read.
 *
 * The channel never carries a value; closing is the only signal. Drift is
 * terminal: the caller must trace again. With an empty chain there is nothing
 * to poll and the channel only closes on abort.
 *
 * Checks run every `pollIntervalMs` and never overlap, so a repointed link is
 * noticed roughly one interval after it happened.
 */
export function watchChain(
  signal: AbortSignal,
  chain: SymlinkChain,
  options: ChainWatchOptions = {}
): SignalChannel {
  const output = new SignalChannel();
  const intervalMs = options.pollIntervalMs ?? WATCHER_CONSTANTS.CHAIN_POLL_INTERVAL_MS;

  if (signal.aborted) {
    output.close();
    return output;
  }

  if (chain.length === 0) {
    signal.addEventListener('abort', () => output.close(), { once: true });
    return output;
  }

  void pollChain(signal, chain, intervalMs).finally(() => output.close());

  return output;
}

async function pollChain(signal: AbortSignal, chain: SymlinkChain, intervalMs: number): Promise<void> {
  try {
    while (!signal.aborted) {
      await delay(intervalMs, undefined, { signal });

      const drift = await findDrift(chain);
      if (drift) {
        log.info('Symlink chain changed, watch must be re-established', {
          link: drift.edge.linkPath,
          recordedTarget: drift.edge.target,
          observedTarget: drift.observed,
          errorCode: drift.errorCode
        });
        return;
      }
    }
  } catch (error) {
    if (isAbortError(error)) {
      return;
    }
    // Anything unexpected is treated like drift: the chain is no longer trusted
    log.error('Symlink chain polling failed', error);
  }
}
