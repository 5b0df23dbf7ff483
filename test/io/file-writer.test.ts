/**
 * Tests for whole-string and buffered writes
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, FileNotFoundError, PathError, ValidationError } from "../../src/errors";
import { openBufferedWriter, putContents } from "../../src/io/file-writer";

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "fastfile-writer-"));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

const contentOf = (path: string): string => readFileSync(path, "utf8");

describe("putContents", () => {
  test("OVERWRITE replaces previous content", async () => {
    const path = join(workDir, "overwrite.txt");

    await putContents(path, "first version\n", "OVERWRITE");
    await putContents(path, "second\n", "OVERWRITE");

    expect(contentOf(path)).toBe("second\n");
  });

  test("APPEND adds to previous content and creates missing files", async () => {
    const path = join(workDir, "append.txt");

    await putContents(path, "one\n", "APPEND");
    await putContents(path, "two\n", "APPEND");

    expect(contentOf(path)).toBe("one\ntwo\n");
  });

  test("creates missing parent directories on request", async () => {
    const path = join(workDir, "related", "to", "output", "nested.txt");

    await putContents(path, "HELLO WORLD\n", "APPEND", true);

    expect(contentOf(path)).toBe("HELLO WORLD\n");
  });

  test("fails when parent directories are missing and not requested", async () => {
    const path = join(workDir, "not", "existing", "file.txt");

    await expect(putContents(path, "HELLO WORLD\n", "APPEND")).rejects.toBeInstanceOf(FileError);
    expect(existsSync(join(workDir, "not"))).toBe(false);
  });

  test("OVERWRITE with an empty string leaves an empty file", async () => {
    const path = join(workDir, "emptied.txt");
    writeFileSync(path, "old");

    await putContents(path, "", "OVERWRITE");

    expect(contentOf(path)).toBe("");
  });

  test("APPEND with an empty string creates the file and keeps content", async () => {
    const created = join(workDir, "created.txt");
    const kept = join(workDir, "kept.txt");
    writeFileSync(kept, "old");

    await putContents(created, "", "APPEND");
    await putContents(kept, "", "APPEND");

    expect(contentOf(created)).toBe("");
    expect(contentOf(kept)).toBe("old");
  });

  test("reports the system error when the target is a directory", async () => {
    const path = join(workDir, "a-directory");
    mkdirSync(path);

    const error = await putContents(path, "x", "OVERWRITE").then(
      () => expect.unreachable("write should have failed"),
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(FileError);
    expect(error).not.toBeInstanceOf(FileNotFoundError);
    if (error instanceof FileError) {
      expect(error.operation).toBe("open");
      expect(error.filePath).toBe(path);
      expect(error.message).toMatch(/^open operation failed: .*EISDIR/);
      expect(error.message).toMatch(/\. Path points to a directory, not a file$/);
      expect(error.context).not.toContain("[object Object]");
    }
  });

  test("rejects paths ending in a separator", async () => {
    await expect(putContents(`${workDir}/`, "x", "OVERWRITE")).rejects.toBeInstanceOf(PathError);
    await expect(putContents("", "x", "OVERWRITE")).rejects.toBeInstanceOf(PathError);
  });
});

describe("openBufferedWriter", () => {
  test("writes everything and returns the callback result", async () => {
    const path = join(workDir, "buffered.txt");

    const count = await openBufferedWriter(path, "OVERWRITE", async (writer) => {
      for (let i = 1; i <= 3; i++) {
        await writer.write(`Data line ${i}\n`);
      }
      return 3;
    });

    expect(count).toBe(3);
    expect(contentOf(path)).toBe("Data line 1\nData line 2\nData line 3\n");
  });

  test("flushes when the buffer fills and once more at the end", async () => {
    const path = join(workDir, "flush.txt");

    await openBufferedWriter(
      path,
      "OVERWRITE",
      async (writer) => {
        await writer.write("abc");
        expect(writer.bufferedBytes).toBe(3);
        expect(contentOf(path)).toBe("");

        await writer.write("defgh");
        expect(writer.bufferedBytes).toBe(0);
        expect(contentOf(path)).toBe("abcdefgh");

        await writer.write("ij");
        expect(writer.bufferedBytes).toBe(2);
        expect(contentOf(path)).toBe("abcdefgh");
      },
      { bufferSize: 8 }
    );

    expect(contentOf(path)).toBe("abcdefghij");
  });

  test("flushes pending data before a write that would overflow the buffer", async () => {
    const path = join(workDir, "overflow.txt");

    await openBufferedWriter(
      path,
      "OVERWRITE",
      async (writer) => {
        await writer.write("abcdef");
        await writer.write("ghi");
        expect(contentOf(path)).toBe("abcdef");
        expect(writer.bufferedBytes).toBe(3);
      },
      { bufferSize: 8 }
    );

    expect(contentOf(path)).toBe("abcdefghi");
  });

  test("flushes on demand", async () => {
    const path = join(workDir, "manual.txt");

    await openBufferedWriter(path, "OVERWRITE", async (writer) => {
      await writer.write(Uint8Array.from([0x41, 0x42]));
      await writer.flush();
      expect(contentOf(path)).toBe("AB");
    });
  });

  test("appends in APPEND mode", async () => {
    const path = join(workDir, "existing.txt");
    writeFileSync(path, "kept\n");

    await openBufferedWriter(path, "APPEND", async (writer) => {
      await writer.write("added\n");
    });

    expect(contentOf(path)).toBe("kept\nadded\n");
  });

  test("rethrows the callback error and discards unflushed data", async () => {
    const path = join(workDir, "failed.txt");

    await expect(
      openBufferedWriter(path, "OVERWRITE", async (writer) => {
        await writer.write("never flushed");
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(contentOf(path)).toBe("");
  });

  test("creates parent directories on request", async () => {
    const path = join(workDir, "deep", "dir", "out.txt");

    await openBufferedWriter(
      path,
      "OVERWRITE",
      async (writer) => {
        await writer.write("ok");
      },
      { createParents: true }
    );

    expect(contentOf(path)).toBe("ok");
  });

  test("rejects a buffer size below one byte", async () => {
    await expect(
      openBufferedWriter(join(workDir, "x.txt"), "OVERWRITE", async () => undefined, {
        bufferSize: 0,
      })
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
