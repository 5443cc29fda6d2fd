import type { ScratchBufferPool } from './types';

/**
 * Keeps released Float32Array buffers, bucketed by length, for reuse by later
 * sweeps. A buffer is owned by exactly one caller between `acquire` and
 * `release` and comes back zero-filled.
 */
export class ScratchPool implements ScratchBufferPool {
  private readonly free = new Map<number, Float32Array[]>();
  private readonly checkedOut = new Set<Float32Array>();
  private readonly maxPerLength: number;

  constructor(maxPerLength = 8) {
    this.maxPerLength = Math.max(1, maxPerLength);
  }

  acquire(length: number): Float32Array {
    const bucket = this.free.get(length);
    const reused = bucket?.pop();
    const buffer = reused ?? new Float32Array(length);
    if (reused) {
      reused.fill(0);
    }
    this.checkedOut.add(buffer);
    return buffer;
  }

  release(buffer: Float32Array): void {
    if (!this.checkedOut.delete(buffer)) {
      throw new Error('Scratch buffer was not acquired from this pool or was already released.');
    }

    const bucket = this.free.get(buffer.length) ?? [];
    if (bucket.length < this.maxPerLength) {
      bucket.push(buffer);
    }
    this.free.set(buffer.length, bucket);
  }

  get inUse(): number {
    return this.checkedOut.size;
  }

  get available(): number {
    let total = 0;
    for (const bucket of this.free.values()) {
      total += bucket.length;
    }
    return total;
  }

  clear(): void {
    this.free.clear();
  }
}
