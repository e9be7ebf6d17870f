import { describe, it, expect } from "vitest";
import { toDiffResult } from "./diff-result";
import { parseManifest, serializeManifest } from "./sync-manifest";
import { normalizeTagName } from "./tag";
import { BACKUP_POINTER_FILE, SYNC_MANIFEST_FILE } from "../value-objects/reserved-names";

describe("toDiffResult", () => {
  it("drops reserved names and duplicates, sorted by name", () => {
    const diff = toDiffResult(["b.txt", BACKUP_POINTER_FILE, "a.txt", "b.txt", SYNC_MANIFEST_FILE]);
    expect(diff).toEqual(["a.txt", "b.txt"]);
  });
});

describe("sync manifest text", () => {
  it("writes one path per line", () => {
    expect(serializeManifest(["/src/one", "/src/two"])).toBe("/src/one\n/src/two\n");
  });

  it("ignores blank lines and CRLF endings", () => {
    expect(parseManifest("/src/one\r\n\r\n  /src/two  \n")).toEqual(["/src/one", "/src/two"]);
  });

  it("yields nothing for whitespace-only content", () => {
    expect(parseManifest(" \n\n")).toEqual([]);
  });
});

describe("normalizeTagName", () => {
  it("trims and rejects empty names", () => {
    expect(normalizeTagName("  v1 ")).toBe("v1");
    expect(normalizeTagName("   ")).toBeNull();
  });
});
