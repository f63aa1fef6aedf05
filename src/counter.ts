/**
 * Integer counter backed by a shared Int32Array so every read-and-increment goes
 * through `Atomics`. The buffer can be handed to worker threads without losing updates.
 */
export class AtomicCounter {
  private readonly cell: Int32Array;

  constructor(initial = 0) {
    this.cell = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    Atomics.store(this.cell, 0, initial);
  }

  /** Returns the value before the increment. */
  getAndIncrement(): number {
    return Atomics.add(this.cell, 0, 1);
  }

  get(): number {
    return Atomics.load(this.cell, 0);
  }
}
