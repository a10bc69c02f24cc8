/**
 * Archive Merger - folds a patch's update archive into the client data archive
 *
 * New bytes are appended to the data file past the last byte the current
 * header references, then the header is replaced atomically. Bytes appended
 * by an attempt that died before the header swap sit past that point and are
 * truncated away by the next attempt.
 *
 * Compaction rewrites the pair into `.compact` siblings. The header sibling
 * appearing is the commit point: from then on `recover` rolls both files
 * forward, and before it an orphaned data sibling is discarded.
 */
import { open, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { ArchiveCodec } from './archive-codec.js';
import { ARCHIVE_FORMAT_VERSION, ARCHIVE_SIGNATURE } from './constants/archive-format.js';
import { TruncatedDataError } from './errors.js';
import type { ArchiveEntry } from './types/archive-entry.js';
import type { ArchiveHeader, ArchivePairPaths } from './types/archive-header.js';
import { toUInt32 } from './utils/convert.js';
import { isMissingFile, pathExists, writeFileDurable } from './utils/fs.js';
import { normalizeRelativePath, pathKey } from './utils/paths.js';

export interface MergeRequest {
  /** Client archive; created when absent. */
  readonly data: ArchivePairPaths;
  readonly update: ArchivePairPaths;
  /** Paths to drop from the client index, with everything beneath them. */
  readonly removePaths?: readonly string[];
  readonly onProgress?: (completed: number, total: number) => void;
}

export interface CompactRequest {
  readonly data: ArchivePairPaths;
  readonly onProgress?: (completed: number, total: number) => void;
}

export interface CompactResult {
  readonly entryCount: number;
  readonly bytesBefore: number;
  readonly bytesAfter: number;
}

export const COMPACT_SUFFIX = '.compact';

export interface MergeResult {
  readonly added: number;
  readonly replaced: number;
  readonly removed: number;
  readonly entryCount: number;
  readonly dataLength: number;
}

const EMPTY_HEADER: ArchiveHeader = {
  signature: ARCHIVE_SIGNATURE,
  formatVersion: ARCHIVE_FORMAT_VERSION,
  entryCount: 0,
  entries: [],
};

async function readHeaderOrEmpty(headerPath: string): Promise<ArchiveHeader> {
  try {
    const bytes = await readFile(headerPath);
    return ArchiveCodec.parseHeader({ bytes, source: headerPath });
  } catch (error) {
    if (isMissingFile(error)) {
      return EMPTY_HEADER;
    }
    throw error;
  }
}

/**
 * End of the last byte referenced by any file entry.
 */
export function committedEnd(entries: readonly ArchiveEntry[]): number {
  return entries.reduce(
    (end, entry) => (entry.isDirectory ? end : Math.max(end, entry.dataOffset + entry.dataLength)),
    0,
  );
}

function isRemoved(entryKey: string, removedKeys: ReadonlySet<string>): boolean {
  for (const removed of removedKeys) {
    if (entryKey === removed || entryKey.startsWith(`${removed}/`)) {
      return true;
    }
  }
  return false;
}

export class ArchiveMerger {
  /**
   * Merges the update pair (when present) into the client pair and drops removed paths.
   * Returns null when there is neither an update pair nor anything to remove.
   *
   * @throws {MalformedArchiveError} If either header is invalid
   * @throws {TruncatedDataError} If either data file is shorter than its header claims
   * @throws {DuplicateEntryError} If the merged index has a file where a folder is needed, or the reverse
   * @throws {OverflowError} If the merged data file would exceed 32-bit offsets
   */
  static async merge(request: MergeRequest): Promise<MergeResult | null> {
    const { data, update, onProgress } = request;
    await ArchiveMerger.recover(data);
    const removedKeys = new Set<string>();
    for (const raw of request.removePaths ?? []) {
      const normalized = normalizeRelativePath(raw);
      if (normalized !== null) {
        removedKeys.add(pathKey(normalized));
      }
    }

    const hasUpdate = (await pathExists(update.headerPath)) && (await pathExists(update.dataPath));
    if (!hasUpdate && removedKeys.size === 0) {
      return null;
    }

    const base = await readHeaderOrEmpty(data.headerPath);
    if (base === EMPTY_HEADER && !hasUpdate) {
      return null;
    }
    const updateHeader = hasUpdate ? await ArchiveCodec.readHeader({ headerPath: update.headerPath }) : EMPTY_HEADER;

    // Remove first, then let the update re-add anything it ships.
    const kept: ArchiveEntry[] = [];
    let removed = 0;
    for (const entry of base.entries) {
      if (isRemoved(pathKey(entry.relativePath), removedKeys)) {
        removed += 1;
      } else {
        kept.push(entry);
      }
    }

    const end = committedEnd(base.entries);
    const appended = await ArchiveMerger.appendUpdateData(data.dataPath, end, update.dataPath, updateHeader, onProgress);

    const merged = [...kept];
    const indexByKey = new Map<string, number>();
    merged.forEach((entry, index) => indexByKey.set(pathKey(entry.relativePath), index));
    let added = 0;
    let replaced = 0;
    for (const entry of appended) {
      const key = pathKey(entry.relativePath);
      const existing = indexByKey.get(key);
      if (existing === undefined) {
        indexByKey.set(key, merged.length);
        merged.push(entry);
        added += 1;
      } else {
        merged[existing] = entry;
        replaced += 1;
      }
    }

    // Appended bytes stay past the committed end until the header is swapped,
    // so a colliding index leaves the client archive as it was.
    ArchiveCodec.buildTree({
      header: { signature: base.signature, formatVersion: base.formatVersion, entryCount: merged.length, entries: merged },
    });
    await writeFileDurable(
      data.headerPath,
      ArchiveCodec.serializeHeader({ header: { formatVersion: base.formatVersion, entries: merged } }),
    );

    return {
      added,
      replaced,
      removed,
      entryCount: merged.length,
      dataLength: committedEnd(merged),
    };
  }

  /**
   * Rewrites the data file so it holds only the bytes the index references,
   * in index order. Returns null when there is no client archive.
   *
   * @throws {TruncatedDataError} If the data file is shorter than the index claims
   */
  static async compact(request: CompactRequest): Promise<CompactResult | null> {
    const { data, onProgress } = request;
    await ArchiveMerger.recover(data);
    if (!(await pathExists(data.headerPath))) {
      return null;
    }

    const header = await ArchiveCodec.readHeader({ headerPath: data.headerPath });
    const source = await ArchiveCodec.openDataFile({ dataPath: data.dataPath });
    const referenced = header.entries.reduce((sum, entry) => sum + (entry.isDirectory ? 0 : entry.dataLength), 0);
    if (referenced === source.size) {
      await source.handle.close();
      return { entryCount: header.entries.length, bytesBefore: source.size, bytesAfter: source.size };
    }

    const compactDataPath = `${data.dataPath}${COMPACT_SUFFIX}`;
    const entries: ArchiveEntry[] = [];
    let cursor = 0;
    try {
      const target = await open(compactDataPath, 'w');
      try {
        const total = header.entries.length;
        for (const [index, entry] of header.entries.entries()) {
          if (entry.isDirectory) {
            entries.push(entry);
          } else {
            const bytes = await ArchiveCodec.readEntryBytes({ dataFile: source, entry });
            await target.write(bytes, 0, bytes.length, cursor);
            entries.push({ ...entry, dataOffset: toUInt32(cursor) });
            cursor += bytes.length;
          }
          onProgress?.(index + 1, total);
        }
        await target.sync();
      } finally {
        await target.close();
      }
    } finally {
      await source.handle.close();
    }

    await writeFileDurable(
      `${data.headerPath}${COMPACT_SUFFIX}`,
      ArchiveCodec.serializeHeader({ header: { formatVersion: header.formatVersion, entries } }),
    );
    await ArchiveMerger.recover(data);
    return { entryCount: entries.length, bytesBefore: source.size, bytesAfter: cursor };
  }

  /**
   * Finishes a compaction that reached its commit point, or discards one that did not.
   * Returns true when a compacted pair was moved into place.
   */
  static async recover(data: ArchivePairPaths): Promise<boolean> {
    const compactHeaderPath = `${data.headerPath}${COMPACT_SUFFIX}`;
    const compactDataPath = `${data.dataPath}${COMPACT_SUFFIX}`;
    if (!(await pathExists(compactHeaderPath))) {
      await rm(compactDataPath, { force: true });
      return false;
    }
    if (await pathExists(compactDataPath)) {
      await rename(compactDataPath, data.dataPath);
    }
    await rename(compactHeaderPath, data.headerPath);
    return true;
  }

  /**
   * Truncates the client data file to `end`, appends every update file entry
   * and returns the update entries rebased onto the client data file.
   */
  private static async appendUpdateData(
    dataPath: string,
    end: number,
    updateDataPath: string,
    updateHeader: ArchiveHeader,
    onProgress?: (completed: number, total: number) => void,
  ): Promise<ArchiveEntry[]> {
    if (!(await pathExists(dataPath))) {
      await writeFile(dataPath, Buffer.alloc(0));
    }
    const target = await open(dataPath, 'r+');
    try {
      const { size } = await target.stat();
      if (size < end) {
        throw new TruncatedDataError(dataPath, end, size);
      }
      await target.truncate(end);

      if (updateHeader.entries.length === 0) {
        await target.sync();
        return [];
      }

      const rebased: ArchiveEntry[] = [];
      const total = updateHeader.entries.length;
      let cursor = end;
      const source = await ArchiveCodec.openDataFile({ dataPath: updateDataPath });
      try {
        for (const [index, entry] of updateHeader.entries.entries()) {
          if (entry.isDirectory) {
            rebased.push(entry);
          } else {
            const bytes = await ArchiveCodec.readEntryBytes({ dataFile: source, entry });
            const dataOffset = toUInt32(cursor);
            toUInt32(cursor + bytes.length);
            await target.write(bytes, 0, bytes.length, cursor);
            rebased.push({ ...entry, dataOffset });
            cursor += bytes.length;
          }
          onProgress?.(index + 1, total);
        }
      } finally {
        await source.handle.close();
      }
      await target.sync();
      return rebased;
    } finally {
      await target.close();
    }
  }
}
