/**
 * Exclusive ownership of a destination root for the duration of a run.
 *
 * The lock is a file in the root holding the owner's pid and a unique token.
 * Lock files are published with link(), so they never appear half-written.
 * A lock left by a process that no longer exists is taken over, but only by
 * whoever holds the takeover marker, and only if the lock still holds the
 * exact contents that were judged stale.
 */
import { randomUUID } from 'node:crypto';
import { link, mkdir, open, readFile, rm } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { DestinationBusyError } from './errors.js';
import { errorCode, isMissingFile } from './utils/fs.js';

export const LOCK_FILE_NAME = '.patch.lock';
export const TAKEOVER_SUFFIX = '.takeover';

const MAX_ATTEMPTS = 50;
const CONTENTION_DELAY_MS = 10;

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return errorCode(error) === 'EPERM';
  }
}

function ownerOf(contents: string): number | undefined {
  const pid = Number.parseInt(contents.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : undefined;
}

async function readContents(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Creates `filePath` with `contents` unless it already exists.
 */
async function createExclusive(filePath: string, contents: string): Promise<boolean> {
  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await open(tempPath, 'w');
  try {
    await handle.writeFile(contents);
    await handle.sync();
  } finally {
    await handle.close();
  }
  try {
    await link(tempPath, filePath);
    return true;
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      return false;
    }
    throw error;
  } finally {
    await rm(tempPath, { force: true });
  }
}

export class RootLock {
  private released = false;

  private constructor(public readonly lockPath: string) {}

  /**
   * @throws {DestinationBusyError} If a live process holds the root
   */
  static async acquire(root: string): Promise<RootLock> {
    await mkdir(root, { recursive: true });
    const lockPath = path.join(root, LOCK_FILE_NAME);
    const contents = `${process.pid}\n${randomUUID()}\n`;

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      if (await createExclusive(lockPath, contents)) {
        return new RootLock(lockPath);
      }
      const current = await readContents(lockPath);
      if (current === undefined) {
        continue;
      }
      const owner = ownerOf(current);
      if (owner !== undefined && isProcessAlive(owner)) {
        throw new DestinationBusyError(root, owner);
      }
      await RootLock.removeStale(lockPath, current, owner);
    }

    const current = await readContents(lockPath);
    throw new DestinationBusyError(root, (current === undefined ? undefined : ownerOf(current)) ?? 0);
  }

  /**
   * Removes a stale lock while holding the takeover marker.
   */
  private static async removeStale(lockPath: string, staleContents: string, staleOwner: number | undefined): Promise<void> {
    const markerPath = `${lockPath}${TAKEOVER_SUFFIX}`;
    if (!(await createExclusive(markerPath, `${process.pid}\n`))) {
      const markerContents = await readContents(markerPath);
      const markerOwner = markerContents === undefined ? undefined : ownerOf(markerContents);
      if (markerOwner !== undefined && !isProcessAlive(markerOwner)) {
        console.warn(`Removing takeover marker ${markerPath} left by process ${markerOwner}`);
        await rm(markerPath, { force: true });
      } else {
        await sleep(CONTENTION_DELAY_MS);
      }
      return;
    }

    try {
      if ((await readContents(lockPath)) === staleContents) {
        console.warn(`Removing stale lock ${lockPath}${staleOwner === undefined ? '' : ` left by process ${staleOwner}`}`);
        await rm(lockPath, { force: true });
      }
    } finally {
      await rm(markerPath, { force: true });
    }
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await rm(this.lockPath, { force: true });
  }
}
