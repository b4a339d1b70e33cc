import fs from 'fs/promises';
import path from 'path';
import type { SymlinkChain, SymlinkEdge } from './types.js';

/**
 * Discover every symbolic link involved in resolving `filePath`, including
 * links on ancestor directories (a mounted config volume swaps a directory
 * link, not the file itself).
 *
 * Starting from the absolute path, a link is recorded and followed to its
 * target; anything else (plain entry, missing entry) steps up to the parent
 * until the filesystem root. Relative targets are resolved against the
 * directory holding the link.
 */
export async function traceSymlinks(filePath: string): Promise<SymlinkChain> {
  const chain: SymlinkEdge[] = [];
  const visited = new Set<string>();
  let cursor = path.resolve(filePath);

  for (;;) {
    const target = await readLinkOrNull(cursor);

    if (target === null) {
      const parent = path.dirname(cursor);
      if (parent === cursor) {
        break;
      }
      cursor = parent;
      continue;
    }

    // Link loop: every link on it is already recorded
    if (visited.has(cursor)) {
      break;
    }
    visited.add(cursor);

    chain.push({ linkPath: cursor, target });
    cursor = path.resolve(path.dirname(cursor), target);
  }

  return chain;
}

async function readLinkOrNull(linkPath: string): Promise<string | null> {
  try {
    return await fs.readlink(linkPath);
  } catch {
    // EINVAL (not a link), ENOENT, EACCES: nothing more to follow here
    return null;
  }
}
