import { OutOfBoundsError } from './errors';
import { assertGridShape } from './decayGrid';
import { calculateAttenuationFlat } from './sweep';
import type { AttenuationGrid, BilinearCorner, DecayGrid, SweepOptions } from './types';

function clampPosition(value: number, max: number): number {
  return Math.min(Math.max(value, 0), max);
}

/**
 * Lattice corners around a fractional position, in the order
 * (x0,y0), (x1,y0), (x0,y1), (x1,y1). Corners past the last column or row
 * collapse onto it.
 */
export function bilinearCorners(
  sourceX: number,
  sourceY: number,
  width: number,
  height: number,
): BilinearCorner[] {
  if (!Number.isFinite(sourceX) || !Number.isFinite(sourceY)) {
    throw new OutOfBoundsError(`Light position ${sourceX},${sourceY} is not finite.`);
  }
  assertGridShape(width, height, width * height);

  const sx = clampPosition(sourceX, width - 1);
  const sy = clampPosition(sourceY, height - 1);
  const x0 = Math.floor(sx);
  const y0 = Math.floor(sy);
  const x1 = Math.min(x0 + 1, width - 1);
  const y1 = Math.min(y0 + 1, height - 1);
  const fx = sx - x0;
  const fy = sy - y0;

  return [
    { x: x0, y: y0, weight: (1 - fx) * (1 - fy) },
    { x: x1, y: y0, weight: fx * (1 - fy) },
    { x: x0, y: y1, weight: (1 - fx) * fy },
    { x: x1, y: y1, weight: fx * fy },
  ];
}

export function isLatticePosition(sourceX: number, sourceY: number): boolean {
  return Number.isInteger(sourceX) && Number.isInteger(sourceY);
}

/** Weighted sum of per-corner grids; corners with zero weight are not read. */
export function blendCornerGrids(
  grids: readonly Float32Array[],
  weights: readonly number[],
  size: number,
): Float32Array {
  const result = new Float32Array(size);
  grids.forEach((grid, index) => {
    const weight = weights[index];
    if (weight === 0) {
      return;
    }
    for (let i = 0; i < size; i += 1) {
      result[i] += grid[i] * weight;
    }
  });
  return result;
}

/**
 * Attenuation for a light at a fractional position: the bilinear blend of the
 * sweeps at the four surrounding cells. Moving the light continuously moves
 * the result continuously.
 */
export function calculateSubpixelAttenuation(
  grid: DecayGrid,
  sourceX: number,
  sourceY: number,
  options: SweepOptions = {},
): AttenuationGrid {
  const { width, height } = grid;
  const corners = bilinearCorners(sourceX, sourceY, width, height);
  const first = corners[0];

  if (first.weight === 1) {
    const data = calculateAttenuationFlat(grid.data, width, height, first.x, first.y, options);
    return { width, height, data };
  }

  const active = corners.filter((corner) => corner.weight !== 0);
  const grids = active.map((corner) =>
    calculateAttenuationFlat(grid.data, width, height, corner.x, corner.y, options),
  );
  const data = blendCornerGrids(
    grids,
    active.map((corner) => corner.weight),
    width * height,
  );
  return { width, height, data };
}
