/**
 * @fileoverview Synchronous memory with a one-step read latency and write-first consistency.
 * Used for both the program store and the data tape.
 */

export interface LatchedMemoryOptions {
  depth: number;
  /** Contents restored on reset. Shorter images are padded with zero. */
  init?: Uint8Array;
}

/**
 * One clock step of this memory is: any number of `requestRead`/`commitWrite` calls,
 * then `clock()`. The requested read becomes observable after the clock edge.
 */
export class LatchedMemory {
  readonly depth: number;
  private cells: Uint8Array;
  private init: Uint8Array;
  private pendingRead: number | undefined;
  private pendingWrite: { addr: number; value: number } | undefined;
  private output = 0;

  constructor(options: LatchedMemoryOptions) {
    if (!Number.isInteger(options.depth) || options.depth < 1) {
      throw new RangeError(`Memory depth must be a positive integer, got ${options.depth}`);
    }
    this.depth = options.depth;
    this.init = new Uint8Array(this.depth);
    this.cells = new Uint8Array(this.depth);
    this.setInitImage(options.init ?? new Uint8Array(0));
    this.reset();
  }

  /** Replaces the image restored by `reset()`; does not touch current contents. */
  setInitImage(image: Uint8Array): void {
    this.init.fill(0);
    this.init.set(image.subarray(0, this.depth));
  }

  requestRead(addr: number): void {
    this.pendingRead = this.wrap(addr);
  }

  commitWrite(addr: number, value: number): void {
    this.pendingWrite = { addr: this.wrap(addr), value: value & 0xff };
  }

  /** Registered read port: the value latched at the last clock edge that carried a read. */
  observe(): number {
    return this.output;
  }

  clock(): void {
    const write = this.pendingWrite;
    if (write) {
      this.cells[write.addr] = write.value;
    }
    if (this.pendingRead !== undefined) {
      const addr = this.pendingRead;
      this.output = write && write.addr === addr ? write.value : (this.cells[addr] ?? 0);
    }
    this.pendingRead = undefined;
    this.pendingWrite = undefined;
  }

  reset(): void {
    this.cells.set(this.init);
    this.output = 0;
    this.pendingRead = undefined;
    this.pendingWrite = undefined;
  }

  /** Side-effect-free inspection for debuggers and tests. */
  peek(addr: number): number {
    return this.cells[this.wrap(addr)] ?? 0;
  }

  snapshot(): Uint8Array {
    return this.cells.slice();
  }

  /** Host-side load that bypasses the clocked ports. */
  load(image: Uint8Array): void {
    this.cells.fill(0);
    this.cells.set(image.subarray(0, this.depth));
  }

  private wrap(addr: number): number {
    const r = addr % this.depth;
    return r < 0 ? r + this.depth : r;
  }
}
