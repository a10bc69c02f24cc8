/**
 * Binary helpers for the header (.sah) / data (.saf) archive pair.
 */
import { open, readFile, writeFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import {
  ARCHIVE_FORMAT_VERSION,
  ARCHIVE_SIGNATURE,
  ENTRY_COUNT_OFFSET,
  ENTRY_TABLE_OFFSET,
  FORMAT_VERSION_OFFSET,
  MIN_ENTRY_SIZE,
  SIGNATURE_SIZE,
} from './constants/archive-format.js';
import { MalformedArchiveError, TruncatedDataError } from './errors.js';
import { FileTree } from './file-tree.js';
import type { ArchiveEntry } from './types/archive-entry.js';
import type { ArchiveHeader } from './types/archive-header.js';
import { toUInt32 } from './utils/convert.js';
import { normalizeRelativePath } from './utils/paths.js';

/**
 * An open data file together with its size at open time.
 */
export interface ArchiveDataFile {
  readonly path: string;
  readonly size: number;
  readonly handle: FileHandle;
}

/**
 * An entry to pack into a new archive pair.
 */
export interface ArchiveInput {
  readonly relativePath: string;
  /** Omitted for directory entries. */
  readonly data?: Buffer;
}

export interface ArchivePair {
  readonly header: Buffer;
  readonly data: Buffer;
}

/**
 * Sequential reader that turns every out-of-bounds read into a MalformedArchiveError.
 */
class HeaderReader {
  private offset: number;

  constructor(private readonly buffer: Buffer, offset: number, private readonly source: string) {
    this.offset = offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  readUint8(field: string): number {
    this.require(1, field);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint32(field: string): number {
    this.require(4, field);
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readPascalString32(field: string): string {
    const length = this.readUint32(`${field} length`);
    this.require(length, field);
    const value = this.buffer.toString('utf8', this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  private require(byteCount: number, field: string): void {
    if (byteCount > this.remaining) {
      throw new MalformedArchiveError(
        `Header ends while reading ${field} at offset ${this.offset} (${this.remaining} bytes left, ${byteCount} needed)`,
        this.source,
      );
    }
  }
}

/**
 * Growable little-endian writer for the header format.
 */
class HeaderWriter {
  private buffer: Buffer = Buffer.alloc(256);
  private offset = 0;

  writeAscii(value: string): void {
    this.ensureCapacity(value.length);
    this.buffer.write(value, this.offset, 'ascii');
    this.offset += value.length;
  }

  writeUint8(value: number): void {
    this.ensureCapacity(1);
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeUInt32LE(toUInt32(value), this.offset);
    this.offset += 4;
  }

  writePascalString32(value: string): void {
    const bytes = Buffer.from(value, 'utf8');
    this.writeUint32(bytes.length);
    this.ensureCapacity(bytes.length);
    bytes.copy(this.buffer, this.offset);
    this.offset += bytes.length;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const grown = Buffer.alloc(Math.max(requiredSize, this.buffer.length * 2));
      this.buffer.copy(grown);
      this.buffer = grown;
    }
  }
}

function parseEntry(reader: HeaderReader, index: number, source: string): ArchiveEntry {
  const rawPath = reader.readPascalString32(`entry ${index} path`);
  const dataOffset = reader.readUint32(`entry ${index} offset`);
  const dataLength = reader.readUint32(`entry ${index} length`);
  const directoryFlag = reader.readUint8(`entry ${index} directory flag`);

  if (directoryFlag > 1) {
    throw new MalformedArchiveError(`Entry ${index} has invalid directory flag ${directoryFlag}`, source);
  }
  const relativePath = normalizeRelativePath(rawPath);
  if (relativePath === null) {
    throw new MalformedArchiveError(`Entry ${index} has unsafe path "${rawPath}"`, source);
  }
  const isDirectory = directoryFlag === 1;
  if (isDirectory && dataLength !== 0) {
    throw new MalformedArchiveError(`Directory entry "${relativePath}" declares ${dataLength} data bytes`, source);
  }
  return { relativePath, dataOffset, dataLength, isDirectory };
}

/**
 * Header and data file processing for the packed archive format.
 */
export class ArchiveCodec {
  /**
   * Parses a header buffer into its entry table.
   *
   * @param bytes - Complete header file contents
   * @param source - Label used in error messages
   * @throws {MalformedArchiveError} On a bad signature, an entry count that cannot fit, or an invalid entry
   */
  static parseHeader({ bytes, source = 'header' }: { readonly bytes: Buffer; readonly source?: string }): ArchiveHeader {
    if (bytes.length < ENTRY_TABLE_OFFSET) {
      throw new MalformedArchiveError(`Header is ${bytes.length} bytes, shorter than the ${ENTRY_TABLE_OFFSET}-byte prologue`, source);
    }
    const signature = bytes.toString('ascii', 0, SIGNATURE_SIZE);
    if (signature !== ARCHIVE_SIGNATURE) {
      throw new MalformedArchiveError(`Invalid archive signature "${signature}"`, source);
    }
    const formatVersion = bytes.readUInt32LE(FORMAT_VERSION_OFFSET);
    const entryCount = bytes.readUInt32LE(ENTRY_COUNT_OFFSET);

    const reader = new HeaderReader(bytes, ENTRY_TABLE_OFFSET, source);
    if (entryCount * MIN_ENTRY_SIZE > reader.remaining) {
      throw new MalformedArchiveError(`Entry count ${entryCount} exceeds the ${reader.remaining} bytes of entry table`, source);
    }

    const entries: ArchiveEntry[] = [];
    for (let index = 0; index < entryCount; index++) {
      entries.push(parseEntry(reader, index, source));
    }
    if (reader.remaining !== 0) {
      throw new MalformedArchiveError(`${reader.remaining} trailing bytes after ${entryCount} entries`, source);
    }
    return { signature, formatVersion, entryCount, entries };
  }

  /**
   * Serializes a header. The entry count written is the length of `entries`.
   * @throws {OverflowError} If any numeric field exceeds 32 bits
   */
  static serializeHeader({ header }: { readonly header: Pick<ArchiveHeader, 'formatVersion' | 'entries'> }): Buffer {
    const writer = new HeaderWriter();
    writer.writeAscii(ARCHIVE_SIGNATURE);
    writer.writeUint32(header.formatVersion);
    writer.writeUint32(header.entries.length);
    for (const entry of header.entries) {
      writer.writePascalString32(entry.relativePath);
      writer.writeUint32(entry.dataOffset);
      writer.writeUint32(entry.dataLength);
      writer.writeUint8(entry.isDirectory ? 1 : 0);
    }
    return writer.toBuffer();
  }

  /**
   * Builds the folder/file tree for a header, walking entries in file order.
   * @throws {DuplicateEntryError} If two entries collide case-insensitively
   */
  static buildTree({ header }: { readonly header: ArchiveHeader }): FileTree {
    const tree = new FileTree();
    for (const entry of header.entries) {
      if (entry.isDirectory) {
        tree.addFolder(entry.relativePath);
      } else {
        tree.addFile(entry.relativePath, entry.dataOffset, entry.dataLength);
      }
    }
    return tree;
  }

  /**
   * Reads and parses a header file from disk.
   */
  static async readHeader({ headerPath }: { readonly headerPath: string }): Promise<ArchiveHeader> {
    const bytes = await readFile(headerPath);
    return ArchiveCodec.parseHeader({ bytes, source: headerPath });
  }

  /**
   * Opens a data file for bounds-checked entry reads. Close `handle` when done.
   */
  static async openDataFile({ dataPath }: { readonly dataPath: string }): Promise<ArchiveDataFile> {
    const handle = await open(dataPath, 'r');
    try {
      const { size } = await handle.stat();
      return { path: dataPath, size, handle };
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  /**
   * Reads the bytes of one entry.
   *
   * @throws {OverflowError} If the entry end does not fit in 32 bits
   * @throws {TruncatedDataError} If the data file holds fewer bytes than the entry claims
   */
  static async readEntryBytes({ dataFile, entry }: {
    readonly dataFile: ArchiveDataFile;
    readonly entry: Pick<ArchiveEntry, 'relativePath' | 'dataOffset' | 'dataLength'>;
  }): Promise<Buffer> {
    const end = toUInt32(entry.dataOffset + entry.dataLength);
    if (end > dataFile.size) {
      throw new TruncatedDataError(entry.relativePath, end, dataFile.size);
    }
    const buffer = Buffer.alloc(entry.dataLength);
    let filled = 0;
    while (filled < entry.dataLength) {
      const { bytesRead } = await dataFile.handle.read(buffer, filled, entry.dataLength - filled, entry.dataOffset + filled);
      if (bytesRead === 0) {
        throw new TruncatedDataError(entry.relativePath, end, entry.dataOffset + filled);
      }
      filled += bytesRead;
    }
    return buffer;
  }

  /**
   * Packs entries into a new header/data pair. Data is laid out in input order.
   * @throws {OverflowError} If the data blob would exceed 32-bit offsets
   */
  static build({ entries, formatVersion = ARCHIVE_FORMAT_VERSION }: {
    readonly entries: readonly ArchiveInput[];
    readonly formatVersion?: number;
  }): ArchivePair {
    const headerEntries: ArchiveEntry[] = [];
    const chunks: Buffer[] = [];
    let offset = 0;
    for (const input of entries) {
      const relativePath = normalizeRelativePath(input.relativePath);
      if (relativePath === null) {
        throw new MalformedArchiveError(`Cannot pack unsafe path "${input.relativePath}"`);
      }
      if (input.data === undefined) {
        headerEntries.push({ relativePath, dataOffset: 0, dataLength: 0, isDirectory: true });
        continue;
      }
      headerEntries.push({
        relativePath,
        dataOffset: toUInt32(offset),
        dataLength: toUInt32(input.data.length),
        isDirectory: false,
      });
      chunks.push(input.data);
      offset += input.data.length;
    }
    toUInt32(offset);
    return {
      header: ArchiveCodec.serializeHeader({ header: { formatVersion, entries: headerEntries } }),
      data: Buffer.concat(chunks),
    };
  }

  /**
   * Writes a packed pair to disk.
   */
  static async writeArchive({ pair, headerPath, dataPath }: {
    readonly pair: ArchivePair;
    readonly headerPath: string;
    readonly dataPath: string;
  }): Promise<void> {
    await writeFile(dataPath, pair.data);
    await writeFile(headerPath, pair.header);
  }
}
