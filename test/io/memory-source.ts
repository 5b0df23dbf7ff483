/**
 * In-memory PositionedSource for exercising the parallel reader without disk I/O
 */

import type { PositionedSource } from "../../src/types";

export interface MemorySourceOptions {
  /** Start positions at which a read throws */
  readonly failAt?: readonly number[];
  /** Upper bound on bytes returned by a single read */
  readonly maxBytesPerRead?: number;
}

export class MemorySource implements PositionedSource {
  readonly positions: number[] = [];

  constructor(
    private readonly data: Uint8Array,
    private readonly options: MemorySourceOptions = {}
  ) {}

  async read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number
  ): Promise<{ bytesRead: number }> {
    this.positions.push(position);
    await Promise.resolve();

    if (this.options.failAt?.includes(position)) {
      throw new Error(`EIO: i/o error at ${position}`);
    }

    const available = Math.max(
      0,
      Math.min(length, this.options.maxBytesPerRead ?? length, this.data.length - position)
    );
    buffer.set(this.data.subarray(position, position + available), offset);
    return { bytesRead: available };
  }
}

/**
 * MemorySource whose reads block until `expected` of them are in flight at
 * once, or until `releaseAfterMs` passes; `peakInFlight` records the most
 * reads ever pending together
 */
export class GatedSource extends MemorySource {
  peakInFlight = 0;
  private inFlight = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(
    data: Uint8Array,
    private readonly expected: number,
    private readonly releaseAfterMs = 200
  ) {
    super(data);
  }

  override async read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number
  ): Promise<{ bytesRead: number }> {
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
      if (this.inFlight >= this.expected) {
        this.releaseAll();
      } else {
        setTimeout(() => this.releaseAll(), this.releaseAfterMs);
      }
    });

    this.inFlight--;
    return super.read(buffer, offset, length, position);
  }

  private releaseAll(): void {
    for (const release of this.waiters.splice(0)) {
      release();
    }
  }
}

export const bytesOf = (text: string): Uint8Array => new TextEncoder().encode(text);
