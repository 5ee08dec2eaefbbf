import { describe, it, expect } from "vitest";
import { deriveFilename, disambiguateFilename, formatTimestamp, urlHash } from "./filename.js";

const NOW = new Date(2024, 0, 2, 3, 4, 5);

describe("deriveFilename", () => {
  it("uses the last path segment when it is a zip", () => {
    expect(deriveFilename("https://storage.example.com/exports/takeout-001.zip?sig=abc", NOW)).toBe("takeout-001.zip");
  });

  it("decodes percent-encoding in the path", () => {
    expect(deriveFilename("https://storage.example.com/files/my%20archive.zip", NOW)).toBe("my archive.zip");
  });

  it("replaces characters a filesystem would reject", () => {
    expect(deriveFilename("https://storage.example.com/files/a%3Ab.zip", NOW)).toBe("a_b.zip");
  });

  it("finds an archive name in the query string", () => {
    const url = "https://storage.example.com/download?name=takeout-20240101T000000Z-001.zip&id=7";

    expect(deriveFilename(url, NOW)).toBe("takeout-20240101T000000Z-001.zip");
  });

  it("falls back to a timestamp and hash", () => {
    const url = "https://storage.example.com/download?id=7";

    expect(deriveFilename(url, NOW)).toBe(`archive_20240102_030405_${urlHash(url)}.zip`);
  });

  it("does not take a bare .zip segment as a name", () => {
    const url = "https://storage.example.com/.zip";

    expect(deriveFilename(url, NOW)).toBe(`archive_20240102_030405_${urlHash(url)}.zip`);
  });

  it("falls back for text that is not a URL", () => {
    expect(deriveFilename("not a url", NOW)).toBe(`archive_20240102_030405_${urlHash("not a url")}.zip`);
  });
});

describe("formatTimestamp", () => {
  it("pads every field", () => {
    expect(formatTimestamp(new Date(2024, 8, 9, 7, 6, 5))).toBe("20240909_070605");
  });
});

describe("urlHash", () => {
  it("is eight stable hex characters", () => {
    const hash = urlHash("https://storage.example.com/a.zip");

    expect(hash).toMatch(/^[0-9a-f]{8}$/);
    expect(urlHash("https://storage.example.com/a.zip")).toBe(hash);
    expect(urlHash("https://storage.example.com/b.zip")).not.toBe(hash);
  });
});

describe("disambiguateFilename", () => {
  const url = "https://b.example.com/takeout-001.zip";

  it("adds the URL hash before the extension", () => {
    expect(disambiguateFilename("takeout-001.zip", url)).toBe(`takeout-001-${urlHash(url)}.zip`);
  });

  it("appends the hash when there is no extension", () => {
    expect(disambiguateFilename("archive", url)).toBe(`archive-${urlHash(url)}`);
  });
});
