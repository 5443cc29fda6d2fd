import { InvalidDimensionsError, OutOfBoundsError } from './errors';
import type { AttenuationGrid, DecayGrid, GridShape, RgbGrid, WallMask } from './types';

export interface WallDecayOptions {
  baseDecay: number;
  wallDecay: number;
}

export interface ParsedDecayMap {
  grid: DecayGrid;
  walls: WallMask;
}

const DEFAULT_WALL_DECAY: WallDecayOptions = {
  baseDecay: 0.1,
  wallDecay: 0.6,
};

const VALID_MAP_TILE_RE = /^[#. 0-9]$/;

export function clamp01(value: number): number {
  if (!(value > 0)) {
    return 0;
  }
  if (value > 1) {
    return 1;
  }
  return value;
}

export function assertGridShape(width: number, height: number, length: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidDimensionsError(
      `Grid dimensions must be positive integers, got ${width}x${height}.`,
    );
  }
  if (length !== width * height) {
    throw new InvalidDimensionsError(
      `Grid buffer length ${length} does not match ${width}x${height}.`,
    );
  }
}

export function assertSourceInBounds(
  width: number,
  height: number,
  sourceX: number,
  sourceY: number,
): void {
  if (!Number.isInteger(sourceX) || !Number.isInteger(sourceY)) {
    throw new OutOfBoundsError(`Light source ${sourceX},${sourceY} is not a grid cell.`);
  }
  if (sourceX < 0 || sourceX >= width || sourceY < 0 || sourceY >= height) {
    throw new OutOfBoundsError(
      `Light source ${sourceX},${sourceY} is outside the ${width}x${height} grid.`,
    );
  }
}

export function sameShape(a: GridShape, b: GridShape): boolean {
  return a.width === b.width && a.height === b.height;
}

export function createDecayGrid(width: number, height: number, fill = 0): DecayGrid {
  assertGridShape(width, height, width * height);
  const data = new Float32Array(width * height);
  data.fill(clamp01(fill));
  return { width, height, data, version: 0 };
}

/** Builds a grid from `rows[y][x]`. */
export function decayGridFromRows(rows: number[][]): DecayGrid {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  assertGridShape(width, height, width * height);

  const data = new Float32Array(width * height);
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new InvalidDimensionsError(
        `Decay rows are ragged at row ${y}. Expected width ${width}, got ${row.length}.`,
      );
    }
    for (let x = 0; x < width; x += 1) {
      data[y * width + x] = clamp01(row[x]);
    }
  });

  return { width, height, data, version: 0 };
}

/** Flattens column-major nested input (`columns[x][y]`) to row-major order. */
export function flattenColumns(columns: number[][]): Float32Array {
  const width = columns.length;
  const height = width > 0 ? columns[0].length : 0;
  assertGridShape(width, height, width * height);

  const flat = new Float32Array(width * height);
  for (let x = 0; x < width; x += 1) {
    if (columns[x].length !== height) {
      throw new InvalidDimensionsError(
        `Decay columns are ragged at column ${x}. Expected height ${height}, got ${columns[x].length}.`,
      );
    }
    for (let y = 0; y < height; y += 1) {
      flat[y * width + x] = columns[x][y];
    }
  }
  return flat;
}

/**
 * Parses an ASCII opacity map. `#` is a wall (opacity `wallDecay`), `.` and
 * space are open floor (`baseDecay`), and a digit `n` is opacity `n / 9`.
 */
export function parseDecayMap(
  raw: string,
  options: Partial<WallDecayOptions> = {},
): ParsedDecayMap {
  const merged: WallDecayOptions = { ...DEFAULT_WALL_DECAY, ...options };
  const lines = raw.replace(/\r/g, '').split('\n');

  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  if (lines.length === 0) {
    throw new InvalidDimensionsError('Decay map is empty.');
  }

  const width = lines[0].length;
  if (width === 0) {
    throw new InvalidDimensionsError('Decay map has zero width.');
  }

  const height = lines.length;
  const data = new Float32Array(width * height);
  const walls = new Uint8Array(width * height);

  lines.forEach((line, y) => {
    if (line.length !== width) {
      throw new InvalidDimensionsError(
        `Decay map is ragged at row ${y}. Expected width ${width}, got ${line.length}.`,
      );
    }

    for (let x = 0; x < width; x += 1) {
      const tile = line[x];
      if (!VALID_MAP_TILE_RE.test(tile)) {
        throw new InvalidDimensionsError(`Decay map contains invalid tile '${tile}' at ${x},${y}.`);
      }

      const idx = y * width + x;
      if (tile === '#') {
        walls[idx] = 1;
        data[idx] = clamp01(merged.wallDecay);
      } else if (tile === '.' || tile === ' ') {
        data[idx] = clamp01(merged.baseDecay);
      } else {
        data[idx] = Number.parseInt(tile, 10) / 9;
      }
    }
  });

  return { grid: { width, height, data, version: 0 }, walls };
}

export function decayGridFromWalls(
  walls: WallMask,
  width: number,
  height: number,
  options: Partial<WallDecayOptions> = {},
): DecayGrid {
  assertGridShape(width, height, walls.length);
  const merged: WallDecayOptions = { ...DEFAULT_WALL_DECAY, ...options };
  const base = clamp01(merged.baseDecay);
  const wall = clamp01(merged.wallDecay);

  const data = new Float32Array(width * height);
  for (let i = 0; i < data.length; i += 1) {
    data[i] = walls[i] !== 0 ? wall : base;
  }
  return { width, height, data, version: 0 };
}

export function getCellDecay(grid: DecayGrid, x: number, y: number): number {
  assertSourceInBounds(grid.width, grid.height, x, y);
  return grid.data[y * grid.width + x];
}

/** Writes one cell and bumps the grid version so cached lighting is invalidated. */
export function setCellDecay(grid: DecayGrid, x: number, y: number, value: number): void {
  assertSourceInBounds(grid.width, grid.height, x, y);
  grid.data[y * grid.width + x] = clamp01(value);
  grid.version += 1;
}

export function cloneDecayGrid(grid: DecayGrid): DecayGrid {
  return {
    width: grid.width,
    height: grid.height,
    data: grid.data.slice(),
    version: grid.version,
  };
}

export function formatAttenuation(grid: AttenuationGrid): string {
  const lines: string[] = [];
  for (let y = 0; y < grid.height; y += 1) {
    const cells: string[] = [];
    for (let x = 0; x < grid.width; x += 1) {
      cells.push(grid.data[y * grid.width + x].toFixed(2).padStart(5, ' '));
    }
    lines.push(cells.join(' '));
  }
  return lines.join('\n');
}

export function formatRgb(grid: RgbGrid): string {
  const lines: string[] = [];
  for (let y = 0; y < grid.height; y += 1) {
    const cells: string[] = [];
    for (let x = 0; x < grid.width; x += 1) {
      const base = (y * grid.width + x) * 3;
      const [r, g, b] = [grid.data[base], grid.data[base + 1], grid.data[base + 2]];
      cells.push(`(${r.toFixed(1)},${g.toFixed(1)},${b.toFixed(1)})`);
    }
    lines.push(cells.join(' '));
  }
  return lines.join('\n');
}
