/**
 * Single-writer/single-reader snapshot of one float64 angle.
 *
 * The value is stored as its 64-bit pattern in a BigInt64Array and moved with
 * Atomics.store / Atomics.load, so a reader attached to the same
 * SharedArrayBuffer from another thread always sees a complete value.
 * Each instance keeps its own scratch conversion buffer; share the
 * SharedArrayBuffer between threads, not the instance.
 */
export class AngleCell {
  readonly buffer: SharedArrayBuffer;
  private readonly bits: BigInt64Array;
  private readonly scratch = new Float64Array(1);
  private readonly scratchBits = new BigInt64Array(this.scratch.buffer);

  constructor(initial: number = 0, buffer?: SharedArrayBuffer) {
    this.buffer = buffer ?? new SharedArrayBuffer(BigInt64Array.BYTES_PER_ELEMENT);
    if (this.buffer.byteLength < BigInt64Array.BYTES_PER_ELEMENT) {
      throw new Error(
        `AngleCell needs at least ${BigInt64Array.BYTES_PER_ELEMENT} bytes, got ${this.buffer.byteLength}`,
      );
    }
    this.bits = new BigInt64Array(this.buffer, 0, 1);
    if (!buffer) {
      this.store(initial);
    }
  }

  /** Reader view over a cell created elsewhere, e.g. passed to a worker thread. */
  static attach(buffer: SharedArrayBuffer): AngleCell {
    return new AngleCell(0, buffer);
  }

  store(value: number): void {
    this.scratch[0] = value;
    Atomics.store(this.bits, 0, this.scratchBits[0]);
  }

  load(): number {
    this.scratchBits[0] = Atomics.load(this.bits, 0);
    return this.scratch[0];
  }
}
