/**
 * Tests for in-place overwrite and insert
 */

import { appendFileSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileNotFoundError, GapError, ValidationError } from "../../src/errors";
import { insertAt, overwriteAt } from "../../src/io/mutator";

const CONTENT = "Hello, world";

let workDir: string;
let target: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "fastfile-mutator-"));
  target = join(workDir, "target.txt");
  writeFileSync(target, CONTENT);
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

const contentOf = (path: string): string => readFileSync(path, "utf8");

describe("overwriteAt", () => {
  test("replaces bytes in place and leaves the rest untouched", async () => {
    await overwriteAt(target, 7, "there");
    expect(contentOf(target)).toBe("Hello, there");
  });

  test("replaces only the bytes it covers", async () => {
    await overwriteAt(target, 0, "J");
    expect(contentOf(target)).toBe("Jello, world");
  });

  test("grows the file when the replacement runs past the end", async () => {
    await overwriteAt(target, 10, "LD and more");
    expect(contentOf(target)).toBe("Hello, worLD and more");
  });

  test("behaves like append at the current end of file", async () => {
    const appended = join(workDir, "appended.txt");
    writeFileSync(appended, CONTENT);
    appendFileSync(appended, "!!\n");

    await overwriteAt(target, CONTENT.length, "!!\n");

    expect(readFileSync(target)).toEqual(readFileSync(appended));
  });

  test("refuses to leave a gap past the end of file", async () => {
    const error = await overwriteAt(target, CONTENT.length + 1, "x").then(
      () => expect.unreachable("overwrite should have failed"),
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(GapError);
    if (error instanceof GapError) {
      expect(error.fromByte).toBe(13);
      expect(error.fileSize).toBe(12);
      expect(error.message).toBe("Gap not allowed: offset 13 is beyond end of file (12 bytes)");
    }
    expect(contentOf(target)).toBe(CONTENT);
  });

  test("leaves the file unchanged for an empty replacement", async () => {
    await overwriteAt(target, 1, "");
    await overwriteAt(target, CONTENT.length, new Uint8Array(0));
    expect(contentOf(target)).toBe(CONTENT);
  });

  test("writes binary data", async () => {
    await overwriteAt(target, 5, Uint8Array.from([0x00, 0xff]));
    const bytes = readFileSync(target);

    expect(bytes.length).toBe(12);
    expect(bytes[5]).toBe(0x00);
    expect(bytes[6]).toBe(0xff);
    expect(bytes.subarray(7).toString("utf8")).toBe("world");
  });

  test("rejects negative and fractional offsets", async () => {
    await expect(overwriteAt(target, -1, "x")).rejects.toBeInstanceOf(ValidationError);
    await expect(overwriteAt(target, 1.5, "x")).rejects.toBeInstanceOf(ValidationError);
    expect(contentOf(target)).toBe(CONTENT);
  });

  test("fails with FileNotFoundError for a missing file", async () => {
    await expect(overwriteAt(join(workDir, "missing.txt"), 0, "x")).rejects.toBeInstanceOf(
      FileNotFoundError
    );
  });
});

describe("insertAt", () => {
  const insertion = "[X]";

  test.each([
    { offset: 0, expected: "[X]Hello, world" },
    { offset: 5, expected: "Hello[X], world" },
    { offset: 12, expected: "Hello, world[X]" },
  ])("inserts at offset $offset", async ({ offset, expected }) => {
    await insertAt(target, offset, insertion);
    expect(contentOf(target)).toBe(expected);
  });

  test("inserts lines between existing lines", async () => {
    writeFileSync(target, "Line 1\nLine 2\nLine 3\nLine 4\nLine 5\n");

    await insertAt(target, "Line 1\nLine 2\n".length, "inserted A\ninserted B\n");

    expect(contentOf(target)).toBe(
      "Line 1\nLine 2\ninserted A\ninserted B\nLine 3\nLine 4\nLine 5\n"
    );
  });

  test("inserts into an empty file", async () => {
    writeFileSync(target, "");
    await insertAt(target, 0, "first");
    expect(contentOf(target)).toBe("first");
  });

  test("appends at the end of file, where there is no tail to shift", async () => {
    writeFileSync(target, "abc");
    await insertAt(target, 3, "X");
    expect(contentOf(target)).toBe("abcX");
  });

  test("leaves the file unchanged for an empty insertion", async () => {
    await insertAt(target, 5, "");
    await insertAt(target, CONTENT.length, new Uint8Array(0));
    expect(contentOf(target)).toBe(CONTENT);
  });

  test("shifts a tail larger than one read", async () => {
    const tail = "t".repeat(200_000);
    writeFileSync(target, `head${tail}`);

    await insertAt(target, 4, "-mid-");

    expect(contentOf(target)).toBe(`head-mid-${tail}`);
  });

  test("inserts binary data", async () => {
    await insertAt(target, 5, Uint8Array.from([0x01, 0x02]));
    const bytes = readFileSync(target);

    expect(bytes.length).toBe(14);
    expect([...bytes.subarray(4, 8)]).toEqual([0x6f, 0x01, 0x02, 0x2c]);
  });

  test("refuses to leave a gap past the end of file", async () => {
    await expect(insertAt(target, 13, insertion)).rejects.toBeInstanceOf(GapError);
    expect(contentOf(target)).toBe(CONTENT);
  });

  test("fails with FileNotFoundError for a missing file", async () => {
    await expect(insertAt(join(workDir, "missing.txt"), 0, "x")).rejects.toBeInstanceOf(
      FileNotFoundError
    );
  });
});
