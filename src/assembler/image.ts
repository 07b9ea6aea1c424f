const INITIAL_CAPACITY = 0x100;

/**
 * Growable byte buffer with positional writes.
 *
 * Every offset that was never written reads as `0x00`, including the gap left by a write
 * past the current end.
 */
export class ImageBuffer {
  private bytes = new Uint8Array(INITIAL_CAPACITY);
  private size = 0;

  /** Number of bytes from offset 0 up to the end of the furthest write. */
  get length(): number {
    return this.size;
  }

  write(offset: number, data: readonly number[]): void {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`Invalid image offset ${offset}.`);
    }
    // An empty write places nothing, so it cannot extend the image.
    if (data.length === 0) return;
    const end = offset + data.length;
    this.ensureCapacity(end);
    for (let i = 0; i < data.length; i++) {
      this.bytes[offset + i] = (data[i] ?? 0) & 0xff;
    }
    this.size = Math.max(this.size, end);
  }

  /** Byte at `offset`, or `0` for offsets never written. */
  at(offset: number): number {
    return offset < this.size ? (this.bytes[offset] ?? 0) : 0;
  }

  /** Copy of bytes `[0, length)`. */
  toBytes(): Uint8Array {
    return this.bytes.slice(0, this.size);
  }

  private ensureCapacity(needed: number): void {
    if (needed <= this.bytes.length) return;
    let capacity = this.bytes.length;
    while (capacity < needed) capacity *= 2;
    // New Uint8Array storage is zero-initialized, which covers any gap.
    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this.size));
    this.bytes = grown;
  }
}
