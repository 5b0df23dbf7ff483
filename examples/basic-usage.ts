#!/usr/bin/env tsx
/**
 * Walkthrough of the fastfile API
 *
 * Writes a few files under a temporary directory, loads them back in
 * parallel and edits one of them in place.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  fastLoadLines,
  insertAt,
  isFileEmpty,
  isFileNotFound,
  openBufferedWriter,
  overwriteAt,
  putContents,
  readContents,
} from "../src";

const workDir = mkdtempSync(join(tmpdir(), "fastfile-example-"));

// ============================================================================
// Example 1: Writing whole strings, creating directories on the way
// ============================================================================

async function example1_putContents() {
  console.log("\n=== Example 1: APPEND and OVERWRITE ===\n");

  const appendable = join(workDir, "related", "to", "example", "appendable.txt");
  await putContents(appendable, "This text is appended on each run\n", "APPEND", true);
  await putContents(appendable, "This text is appended on each run\n", "APPEND", true);

  const overwritable = join(workDir, "overwritable.txt");
  await putContents(overwritable, "This text always replaces the previous one\n", "OVERWRITE");

  console.log(await readContents(appendable));
  console.log(await readContents(overwritable));
}

// ============================================================================
// Example 2: Buffered sequential writes
// ============================================================================

async function example2_bufferedWriter() {
  console.log("\n=== Example 2: Buffered writer ===\n");

  const path = join(workDir, "buffered.txt");
  await openBufferedWriter(path, "OVERWRITE", async (writer) => {
    for (let i = 1; i <= 6; i++) {
      await writer.write(`Data line ${i}\n`);
    }
  });

  const lines = await fastLoadLines(path, false, false);
  console.log(`Loaded ${lines.length} lines:`, lines);
}

// ============================================================================
// Example 3: Missing and empty files are checkable conditions
// ============================================================================

async function example3_sentinels() {
  console.log("\n=== Example 3: Missing and empty files ===\n");

  const cache = join(workDir, "cache.txt");
  for (const attempt of [1, 2]) {
    try {
      const entries = await fastLoadLines(cache, false, true);
      console.log(`Attempt ${attempt}: ${entries.length} cached entries`);
    } catch (error) {
      if (isFileNotFound(error)) {
        console.log(`Attempt ${attempt}: no cache yet, creating an empty one`);
        await putContents(cache, "", "OVERWRITE");
      } else if (isFileEmpty(error)) {
        console.log(`Attempt ${attempt}: cache is empty`);
      } else {
        throw error;
      }
    }
  }
}

// ============================================================================
// Example 4: In-place edits
// ============================================================================

async function example4_mutations() {
  console.log("\n=== Example 4: Insert and overwrite ===\n");

  const path = join(workDir, "insert-test.txt");
  await putContents(path, "Line 1\nLine 2\nLine 3\nLine 4\nLine 5\n", "OVERWRITE");

  const head = new TextEncoder().encode("Line 1\nLine 2\n");
  await insertAt(path, head.length, "This piece of text\nis inserted\nbetween lines 2 and 3\n");
  await overwriteAt(path, 0, "LINE 1");

  console.log(await readContents(path));
}

async function main() {
  try {
    await example1_putContents();
    await example2_bufferedWriter();
    await example3_sentinels();
    await example4_mutations();
  } finally {
    rmSync(workDir, { recursive: true, force: true });
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
