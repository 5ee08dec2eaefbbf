import { open, type FileHandle } from "fs/promises";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ArchiveInspection {
  valid: boolean;
  sizeBytes: number;
  /** Number of central directory entries read, when the directory was found */
  entryCount?: number;
  /** Why the file was rejected */
  reason?: string;
}

export interface ArchiveValidator {
  /** Structural check; never throws */
  isValid(path: string): Promise<boolean>;
  /** Same check with the reason, for logs */
  inspect(path: string): Promise<ArchiveInspection>;
}

export interface ArchiveValidatorOptions {
  /** Files smaller than this are rejected without parsing */
  minBytes?: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Login and error pages are far below this; real archives far above */
export const DEFAULT_MIN_ARCHIVE_BYTES = 50_000;

const SIG = {
  LOCAL_FILE_HEADER: 0x04034b50,
  CD_FILE_HEADER: 0x02014b50,
  EOCD: 0x06054b50,
  ZIP64_EOCD_LOCATOR: 0x07064b50,
  ZIP64_EOCD: 0x06064b50,
} as const;

const EOCD_SIZE = 22;
const MAX_COMMENT_SIZE = 0xffff;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_EOCD_SIZE = 56;
const CD_HEADER_SIZE = 46;
const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

// ---------------------------------------------------------------------------
// Zip structure
// ---------------------------------------------------------------------------

class InvalidArchive extends Error {}

async function readAt(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  const { bytesRead } = await handle.read(buffer, 0, length, position);
  if (bytesRead !== length) {
    throw new InvalidArchive(`unexpected end of file at byte ${position + bytesRead}`);
  }
  return buffer;
}

/**
 * Scan backwards for the End Of Central Directory record. The record must
 * end exactly at the end of the file (its comment included).
 */
function findEndOfCentralDirectory(tail: Buffer): number {
  for (let i = tail.length - EOCD_SIZE; i >= 0; i--) {
    if (tail.readUInt32LE(i) !== SIG.EOCD) continue;
    const commentLength = tail.readUInt16LE(i + 20);
    if (i + EOCD_SIZE + commentLength === tail.length) return i;
  }
  return -1;
}

interface CentralDirectory {
  entryCount: number;
  offset: number;
  size: number;
  /** First byte after the area the directory may occupy */
  limit: number;
}

async function locateCentralDirectory(handle: FileHandle, fileSize: number): Promise<CentralDirectory> {
  const tailLength = Math.min(fileSize, EOCD_SIZE + MAX_COMMENT_SIZE);
  const tailStart = fileSize - tailLength;
  const tail = await readAt(handle, tailStart, tailLength);

  const eocdInTail = findEndOfCentralDirectory(tail);
  if (eocdInTail === -1) {
    throw new InvalidArchive("end of central directory not found");
  }
  const eocdOffset = tailStart + eocdInTail;

  const entryCount = tail.readUInt16LE(eocdInTail + 10);
  const size = tail.readUInt32LE(eocdInTail + 12);
  const offset = tail.readUInt32LE(eocdInTail + 16);

  if (entryCount !== U16_MAX && size !== U32_MAX && offset !== U32_MAX) {
    return { entryCount, offset, size, limit: eocdOffset };
  }

  // ZIP64: the real values live in a separate record found via the locator
  const locatorOffset = eocdOffset - ZIP64_LOCATOR_SIZE;
  if (locatorOffset < 0) {
    throw new InvalidArchive("ZIP64 locator missing");
  }
  const locator = await readAt(handle, locatorOffset, ZIP64_LOCATOR_SIZE);
  if (locator.readUInt32LE(0) !== SIG.ZIP64_EOCD_LOCATOR) {
    throw new InvalidArchive("ZIP64 locator missing");
  }

  const zip64Offset = Number(locator.readBigUInt64LE(8));
  if (zip64Offset + ZIP64_EOCD_SIZE > locatorOffset) {
    throw new InvalidArchive("ZIP64 end of central directory out of range");
  }
  const zip64 = await readAt(handle, zip64Offset, ZIP64_EOCD_SIZE);
  if (zip64.readUInt32LE(0) !== SIG.ZIP64_EOCD) {
    throw new InvalidArchive("ZIP64 end of central directory signature mismatch");
  }

  return {
    entryCount: Number(zip64.readBigUInt64LE(32)),
    size: Number(zip64.readBigUInt64LE(40)),
    offset: Number(zip64.readBigUInt64LE(48)),
    limit: zip64Offset,
  };
}

/**
 * Walk every central directory header. Returns the local header offset of
 * the first entry (or undefined for an empty archive or a ZIP64 offset).
 */
function walkEntries(directory: Buffer, entryCount: number): number | undefined {
  let firstLocalOffset: number | undefined;
  let position = 0;

  for (let n = 0; n < entryCount; n++) {
    if (position + CD_HEADER_SIZE > directory.length) {
      throw new InvalidArchive(`central directory truncated at entry ${n}`);
    }
    if (directory.readUInt32LE(position) !== SIG.CD_FILE_HEADER) {
      throw new InvalidArchive(`bad central directory header at entry ${n}`);
    }

    const nameLength = directory.readUInt16LE(position + 28);
    const extraLength = directory.readUInt16LE(position + 30);
    const commentLength = directory.readUInt16LE(position + 32);
    const localOffset = directory.readUInt32LE(position + 42);

    if (n === 0 && localOffset !== U32_MAX) {
      firstLocalOffset = localOffset;
    }

    position += CD_HEADER_SIZE + nameLength + extraLength + commentLength;
    if (position > directory.length) {
      throw new InvalidArchive(`central directory entry ${n} overruns the directory`);
    }
  }

  return firstLocalOffset;
}

async function inspectZip(handle: FileHandle, sizeBytes: number): Promise<ArchiveInspection> {
  const cd = await locateCentralDirectory(handle, sizeBytes);

  if (cd.offset + cd.size > cd.limit) {
    throw new InvalidArchive("central directory lies outside the file");
  }

  const directory = await readAt(handle, cd.offset, cd.size);
  const firstLocalOffset = walkEntries(directory, cd.entryCount);

  if (firstLocalOffset !== undefined) {
    if (firstLocalOffset + 4 > cd.offset) {
      throw new InvalidArchive("first entry offset lies outside the file data");
    }
    const signature = await readAt(handle, firstLocalOffset, 4);
    if (signature.readUInt32LE(0) !== SIG.LOCAL_FILE_HEADER) {
      throw new InvalidArchive("first entry has no local file header");
    }
  }

  return { valid: true, sizeBytes, entryCount: cd.entryCount };
}

// ---------------------------------------------------------------------------
// Validator
// ---------------------------------------------------------------------------

/**
 * Create a validator that tells a real zip archive from an error or login
 * page saved under an archive's name. Reading the complete entry list
 * without error counts as valid; contents are not decompressed.
 */
export function createArchiveValidator(options: ArchiveValidatorOptions = {}): ArchiveValidator {
  const minBytes = options.minBytes ?? DEFAULT_MIN_ARCHIVE_BYTES;

  async function inspect(path: string): Promise<ArchiveInspection> {
    let handle: FileHandle;
    try {
      handle = await open(path, "r");
    } catch (error) {
      return { valid: false, sizeBytes: 0, reason: (error as Error).message };
    }

    let sizeBytes = 0;
    try {
      sizeBytes = (await handle.stat()).size;
      if (sizeBytes < minBytes) {
        return {
          valid: false,
          sizeBytes,
          reason: `${sizeBytes} bytes is below the ${minBytes}-byte minimum`,
        };
      }
      if (sizeBytes < EOCD_SIZE) {
        return { valid: false, sizeBytes, reason: "too small to be a zip archive" };
      }
      return await inspectZip(handle, sizeBytes);
    } catch (error) {
      return { valid: false, sizeBytes, reason: (error as Error).message };
    } finally {
      await handle.close();
    }
  }

  return {
    inspect,
    async isValid(path: string): Promise<boolean> {
      return (await inspect(path)).valid;
    },
  };
}
