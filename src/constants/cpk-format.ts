/**
 * Fixed layout constants of the supported CPK archive version.
 */

/** Header label, the bytes `RST\x1A` read as a little-endian uint32. */
export const CPK_LABEL = 0x1a545352;

/** The only archive version this reader accepts. */
export const CPK_SUPPORTED_VERSION = 1;

/** 12 uint32 fields followed by 20 reserved uint32 slots. */
export const CPK_HEADER_SIZE = 128;

/** 7 uint32 fields per table record. */
export const CPK_RECORD_SIZE = 28;

/** Id of the synthetic root directory. */
export const CPK_ROOT_ID = 0;

/** Legacy code page used for names and for hashing paths. */
export const CPK_DEFAULT_ENCODING = 'gbk';

/** Separator the format uses when hashing virtual paths. */
export const CPK_DEFAULT_SEPARATOR = '\\';

/** Two zero bytes end a name inside its metadata block. */
export const CPK_NAME_TERMINATOR: readonly number[] = [0x00, 0x00];

/**
 * Byte offsets of header fields.
 */
export const HEADER_OFFSETS = {
  label: 0x00,
  version: 0x04,
  tableStart: 0x08,
  dataStart: 0x0c,
  maxFileNum: 0x10,
  fileNum: 0x14,
  isFormatted: 0x18,
  sizeOfHeader: 0x1c,
  validTableNum: 0x20,
  maxTableNum: 0x24,
  fragmentNum: 0x28,
  packageSize: 0x2c
} as const;

/**
 * Byte offsets of record fields, relative to the record start.
 */
export const RECORD_OFFSETS = {
  id: 0x00,
  flags: 0x04,
  parentId: 0x08,
  startOffset: 0x0c,
  packedSize: 0x10,
  originalSize: 0x14,
  extraInfoSize: 0x18
} as const;

/**
 * Bits of the record flags field.
 */
export const RECORD_FLAGS = {
  valid: 0x1,
  directory: 0x2,
  largeFile: 0x4,
  deleted: 0x10,
  notCompressed: 0x10000
} as const;
