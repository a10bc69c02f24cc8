/**
 * One record of an archive header's entry table.
 */
export interface ArchiveEntry {
  /** '/'-separated path relative to the archive root. */
  readonly relativePath: string;
  readonly dataOffset: number;
  readonly dataLength: number;
  /** Directory entries carry no bytes and only establish tree nodes. */
  readonly isDirectory: boolean;
}
