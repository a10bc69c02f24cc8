/**
 * Parsed archive header with its entry table in file order.
 */
import type { ArchiveEntry } from './archive-entry.js';

export interface ArchiveHeader {
  readonly signature: string;
  readonly formatVersion: number;
  readonly entryCount: number;
  readonly entries: readonly ArchiveEntry[];
}

/**
 * Locations of a header file and its data file on disk.
 */
export interface ArchivePairPaths {
  readonly headerPath: string;
  readonly dataPath: string;
}
