/**
 * Minimal zip writer for tests: stored (uncompressed) entries, no ZIP64.
 */

export interface ZipEntryFixture {
  name: string;
  data?: Uint8Array | string;
}

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

const DOS_DATE_1980_01_01 = 0x21;

/**
 * Build a zip archive. One entry named "a" with no data is exactly
 * 100 bytes (31 local + 47 central + 22 end record).
 */
export function buildZip(entries: ZipEntryFixture[], comment = ""): Buffer {
  const locals: Buffer[] = [];
  const centrals: Buffer[] = [];
  let offset = 0;

  for (const entry of entries) {
    const name = Buffer.from(entry.name, "utf-8");
    const data = typeof entry.data === "string"
      ? Buffer.from(entry.data, "utf-8")
      : Buffer.from(entry.data ?? new Uint8Array(0));
    const crc = crc32(data);

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(DOS_DATE_1980_01_01, 12);
    local.writeUInt32LE(crc, 14);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(data.length, 22);
    local.writeUInt16LE(name.length, 26);
    locals.push(local, name, data);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    central.writeUInt16LE(20, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt16LE(DOS_DATE_1980_01_01, 14);
    central.writeUInt32LE(crc, 16);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(data.length, 24);
    central.writeUInt16LE(name.length, 28);
    central.writeUInt32LE(offset, 42);
    centrals.push(central, name);

    offset += local.length + name.length + data.length;
  }

  const directory = Buffer.concat(centrals);
  const commentBytes = Buffer.from(comment, "utf-8");
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(entries.length, 8);
  end.writeUInt16LE(entries.length, 10);
  end.writeUInt32LE(directory.length, 12);
  end.writeUInt32LE(offset, 16);
  end.writeUInt16LE(commentBytes.length, 20);

  return Buffer.concat([...locals, directory, end, commentBytes]);
}

/** A valid archive of at least `minBytes` bytes (one padded entry). */
export function buildZipOfAtLeast(minBytes: number): Buffer {
  const overhead = buildZip([{ name: "data.bin" }]).length;
  const padding = Math.max(0, minBytes - overhead);
  return buildZip([{ name: "data.bin", data: new Uint8Array(padding).fill(7) }]);
}

/** An HTML page of exactly `size` bytes, like a sign-in redirect target. */
export function htmlPage(size: number): Buffer {
  const head = "<!DOCTYPE html><html><body>Sign in to continue";
  const tail = "</body></html>";
  const filler = Math.max(0, size - head.length - tail.length);
  return Buffer.from(head + " ".repeat(filler) + tail, "utf-8");
}
