/**
 * Splitting an assembled byte buffer into trimmed text lines
 *
 * @module line-splitter
 */

const LINE_FEED = 0x0a;

/**
 * Count line-feed bytes in a buffer
 */
export function countLineFeeds(buffer: Uint8Array): number {
  let count = 0;
  let position = buffer.indexOf(LINE_FEED);
  while (position !== -1) {
    count++;
    position = buffer.indexOf(LINE_FEED, position + 1);
  }
  return count;
}

/**
 * Split a UTF-8 buffer on "\n" into lines trimmed of surrounding whitespace
 *
 * Trimming removes the "\r" of CRLF endings. Lines that are empty after
 * trimming are dropped unless `allowEmptyLines` is set. A last line without a
 * trailing "\n" is still returned, but the empty remainder after a trailing
 * "\n" is not a line.
 *
 * @example
 * ```typescript
 * const bytes = new TextEncoder().encode("a\n\nb\n");
 * splitLines(bytes, false); // ["a", "b"]
 * splitLines(bytes, true);  // ["a", "", "b"]
 * ```
 */
export function splitLines(buffer: Uint8Array, allowEmptyLines: boolean): string[] {
  const decoder = new TextDecoder("utf-8");
  const lines = new Array<string>(countLineFeeds(buffer) + 1);
  let lineCount = 0;
  let lineStart = 0;

  const emit = (end: number): void => {
    const trimmed = decoder.decode(buffer.subarray(lineStart, end)).trim();
    if (allowEmptyLines || trimmed !== "") {
      lines[lineCount++] = trimmed;
    }
  };

  let position = buffer.indexOf(LINE_FEED);
  while (position !== -1) {
    emit(position);
    lineStart = position + 1;
    position = buffer.indexOf(LINE_FEED, lineStart);
  }

  if (lineStart < buffer.length) {
    emit(buffer.length);
  }

  lines.length = lineCount;
  return lines;
}
