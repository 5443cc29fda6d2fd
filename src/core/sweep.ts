import { assertGridShape, assertSourceInBounds, clamp01 } from './decayGrid';
import type { AttenuationGrid, DecayGrid, ScratchBufferPool, SweepOptions } from './types';

/**
 * Sweep-and-merge light attenuation.
 *
 * Each scan walks the grid in one raster order and relaxes every cell against
 * the four 8-neighbours that order has already visited:
 *
 *   att[cell] = max(att[cell], att[neighbour] * transmittance(cell, step))
 *
 * A pass runs all four scans over one buffer, which covers every octant of
 * straight-plus-diagonal paths out of the source. The reverse pass runs the
 * point-reflected scan sequence from the opposite corner and the two results
 * are merged with an elementwise max, so a point-reflected grid yields a
 * point-reflected result.
 */

export const DEFAULT_DECAY_RATE = 0.5;
export const DEFAULT_DIAGONAL_DISTANCE = Math.SQRT2;

type Scan = (
  att: Float32Array,
  orth: Float32Array,
  diag: Float32Array,
  width: number,
  height: number,
) => void;

interface ResolvedSweepOptions {
  decayRate: number;
  diagonalDistance: number;
  pool: ScratchBufferPool | null;
}

function resolveOptions(options: SweepOptions): ResolvedSweepOptions {
  const diagonalDistance = options.diagonalDistance ?? DEFAULT_DIAGONAL_DISTANCE;
  return {
    decayRate: clamp01(options.decayRate ?? DEFAULT_DECAY_RATE),
    diagonalDistance:
      Number.isFinite(diagonalDistance) && diagonalDistance > 1 ? diagonalDistance : 1,
    pool: options.pool ?? null,
  };
}

function acquire(pool: ScratchBufferPool | null, length: number): Float32Array {
  return pool ? pool.acquire(length) : new Float32Array(length);
}

function release(pool: ScratchBufferPool | null, buffer: Float32Array): void {
  pool?.release(buffer);
}

/** Per-cell fraction of light kept when entering the cell by one orthogonal / diagonal step. */
export function fillTransmittance(
  decay: ArrayLike<number>,
  decayRate: number,
  diagonalDistance: number,
  orth: Float32Array,
  diag: Float32Array,
): void {
  for (let i = 0; i < decay.length; i += 1) {
    const kept = 1 - clamp01(decay[i]) * decayRate;
    orth[i] = kept;
    diag[i] = Math.pow(kept, diagonalDistance);
  }
}

/** Rows top to bottom, left to right; reads left, up, up-left, up-right. */
export const scanRowsForward: Scan = (att, orth, diag, w, h) => {
  for (let y = 0; y < h; y += 1) {
    const row = y * w;
    for (let x = 0; x < w; x += 1) {
      const idx = row + x;
      const o = orth[idx];
      const d = diag[idx];
      let best = att[idx];
      if (x > 0) {
        best = Math.max(best, att[idx - 1] * o);
      }
      if (y > 0) {
        best = Math.max(best, att[idx - w] * o);
        if (x > 0) {
          best = Math.max(best, att[idx - w - 1] * d);
        }
        if (x + 1 < w) {
          best = Math.max(best, att[idx - w + 1] * d);
        }
      }
      att[idx] = best;
    }
  }
};

/** Rows bottom to top, right to left; reads right, down, down-right, down-left. */
export const scanRowsReverse: Scan = (att, orth, diag, w, h) => {
  for (let y = h - 1; y >= 0; y -= 1) {
    const row = y * w;
    for (let x = w - 1; x >= 0; x -= 1) {
      const idx = row + x;
      const o = orth[idx];
      const d = diag[idx];
      let best = att[idx];
      if (x + 1 < w) {
        best = Math.max(best, att[idx + 1] * o);
      }
      if (y + 1 < h) {
        best = Math.max(best, att[idx + w] * o);
        if (x + 1 < w) {
          best = Math.max(best, att[idx + w + 1] * d);
        }
        if (x > 0) {
          best = Math.max(best, att[idx + w - 1] * d);
        }
      }
      att[idx] = best;
    }
  }
};

/** Columns left to right, top to bottom; reads up, left, left-up, left-down. */
export const scanColumnsForward: Scan = (att, orth, diag, w, h) => {
  for (let x = 0; x < w; x += 1) {
    for (let y = 0; y < h; y += 1) {
      const idx = y * w + x;
      const o = orth[idx];
      const d = diag[idx];
      let best = att[idx];
      if (y > 0) {
        best = Math.max(best, att[idx - w] * o);
      }
      if (x > 0) {
        best = Math.max(best, att[idx - 1] * o);
        if (y > 0) {
          best = Math.max(best, att[idx - w - 1] * d);
        }
        if (y + 1 < h) {
          best = Math.max(best, att[idx + w - 1] * d);
        }
      }
      att[idx] = best;
    }
  }
};

/** Columns right to left, bottom to top; reads down, right, right-down, right-up. */
export const scanColumnsReverse: Scan = (att, orth, diag, w, h) => {
  for (let x = w - 1; x >= 0; x -= 1) {
    for (let y = h - 1; y >= 0; y -= 1) {
      const idx = y * w + x;
      const o = orth[idx];
      const d = diag[idx];
      let best = att[idx];
      if (y + 1 < h) {
        best = Math.max(best, att[idx + w] * o);
      }
      if (x + 1 < w) {
        best = Math.max(best, att[idx + 1] * o);
        if (y + 1 < h) {
          best = Math.max(best, att[idx + w + 1] * d);
        }
        if (y > 0) {
          best = Math.max(best, att[idx - w + 1] * d);
        }
      }
      att[idx] = best;
    }
  }
};

export const FORWARD_PASS: readonly Scan[] = [
  scanRowsForward,
  scanRowsReverse,
  scanColumnsForward,
  scanColumnsReverse,
];

// Point reflection of FORWARD_PASS, scan for scan.
export const REVERSE_PASS: readonly Scan[] = [
  scanRowsReverse,
  scanRowsForward,
  scanColumnsReverse,
  scanColumnsForward,
];

export function runPass(
  scans: readonly Scan[],
  att: Float32Array,
  orth: Float32Array,
  diag: Float32Array,
  width: number,
  height: number,
  sourceIndex: number,
): Float32Array {
  for (const scan of scans) {
    att[sourceIndex] = 1;
    scan(att, orth, diag, width, height);
  }
  return att;
}

export function mergeMax(target: Float32Array, other: Float32Array): Float32Array {
  for (let i = 0; i < target.length; i += 1) {
    if (other[i] > target[i]) {
      target[i] = other[i];
    }
  }
  return target;
}

export function calculateAttenuationFlat(
  decay: ArrayLike<number>,
  width: number,
  height: number,
  sourceX: number,
  sourceY: number,
  options: SweepOptions = {},
): Float32Array {
  assertGridShape(width, height, decay.length);
  assertSourceInBounds(width, height, sourceX, sourceY);

  const { decayRate, diagonalDistance, pool } = resolveOptions(options);
  const size = width * height;
  const sourceIndex = sourceY * width + sourceX;

  const orth = acquire(pool, size);
  const diag = acquire(pool, size);
  const reverse = acquire(pool, size);
  try {
    fillTransmittance(decay, decayRate, diagonalDistance, orth, diag);

    const forward = runPass(FORWARD_PASS, new Float32Array(size), orth, diag, width, height, sourceIndex);
    runPass(REVERSE_PASS, reverse, orth, diag, width, height, sourceIndex);
    return mergeMax(forward, reverse);
  } finally {
    release(pool, reverse);
    release(pool, diag);
    release(pool, orth);
  }
}

export function calculateAttenuation(
  grid: DecayGrid,
  sourceX: number,
  sourceY: number,
  options: SweepOptions = {},
): AttenuationGrid {
  const data = calculateAttenuationFlat(
    grid.data,
    grid.width,
    grid.height,
    sourceX,
    sourceY,
    options,
  );
  return { width: grid.width, height: grid.height, data };
}
