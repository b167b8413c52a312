import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { KeySourceError } from "../../src/errors.ts";
import {
  hashContent,
  parseKeyLine,
  parseKeySource,
  readKeySource,
} from "../../src/keys/key-source.ts";

describe("parseKeyLine", () => {
  it("should default the weight to 1", () => {
    expect(parseKeyLine("  key-a  ")).toEqual({ value: "key-a", weight: 1 });
  });

  it("should read a numeric weight suffix", () => {
    expect(parseKeyLine("key-b:2.5")).toEqual({ value: "key-b", weight: 2.5 });
    expect(parseKeyLine("key-c : 3")).toEqual({ value: "key-c", weight: 3 });
    expect(parseKeyLine("key-d:.5")).toEqual({ value: "key-d", weight: 0.5 });
  });

  it("should keep colons that are not followed by a weight", () => {
    expect(parseKeyLine("scheme:token")).toEqual({ value: "scheme:token", weight: 1 });
    expect(parseKeyLine("scheme:token:4")).toEqual({ value: "scheme:token", weight: 4 });
    expect(parseKeyLine("key-e:")).toEqual({ value: "key-e:", weight: 1 });
    expect(parseKeyLine(":5")).toEqual({ value: ":5", weight: 1 });
  });

  it("should skip blank lines and comments", () => {
    expect(parseKeyLine("")).toBeNull();
    expect(parseKeyLine("   ")).toBeNull();
    expect(parseKeyLine("# retired keys")).toBeNull();
  });
});

describe("parseKeySource", () => {
  it("should keep the first position and the last weight of a repeated key", () => {
    const entries = parseKeySource("key-a:1\r\nkey-b\n\n# note\nkey-a:3\n");

    expect(entries).toEqual([
      { value: "key-a", weight: 3 },
      { value: "key-b", weight: 1 },
    ]);
  });
});

describe("readKeySource", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "key-source-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should return the absolute path, content hash and entries", () => {
    const path = join(dir, "keys.txt");
    const text = "key-a:2\nkey-b\n";
    writeFileSync(path, text);

    const source = readKeySource(path);

    expect(source.path).toBe(path);
    expect(source.hash).toBe(hashContent(text));
    expect(source.entries).toEqual([
      { value: "key-a", weight: 2 },
      { value: "key-b", weight: 1 },
    ]);
  });

  it("should wrap read failures in a KeySourceError", () => {
    const path = join(dir, "missing.txt");

    expect(() => readKeySource(path)).toThrow(KeySourceError);
    expect(() => readKeySource(path)).toThrow(`Unable to read key source: ${path}`);
  });
});
