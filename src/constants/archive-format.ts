/** Archive header signature. */
export const ARCHIVE_SIGNATURE = 'SAH';

/** Current header format version written by the serializer. */
export const ARCHIVE_FORMAT_VERSION = 0;

export const SIGNATURE_SIZE = 3;
export const FORMAT_VERSION_OFFSET = 3;
export const ENTRY_COUNT_OFFSET = 7;
export const ENTRY_TABLE_OFFSET = 11;

/** Smallest possible entry: length prefix, offset, length, flag. */
export const MIN_ENTRY_SIZE = 4 + 4 + 4 + 1;
