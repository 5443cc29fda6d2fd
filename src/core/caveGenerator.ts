import { assertGridShape, decayGridFromWalls } from './decayGrid';
import type { WallDecayOptions } from './decayGrid';
import type { DecayGrid, WallMask } from './types';

export interface CaveOptions {
  seed: string;
  fillRatio?: number;
  iterations?: number;
}

export interface GeneratedCave {
  walls: WallMask;
  grid: DecayGrid;
}

const DEFAULT_FILL_RATIO = 0.45;
const DEFAULT_ITERATIONS = 5;
// A cell becomes wall when at least this many cells of its 3x3 block are walls.
const WALL_NEIGHBOUR_THRESHOLD = 5;

function xmur3(input: string): () => number {
  let hash = 1779033703 ^ input.length;
  for (let index = 0; index < input.length; index += 1) {
    hash = Math.imul(hash ^ input.charCodeAt(index), 3432918353);
    hash = (hash << 13) | (hash >>> 19);
  }

  return function nextSeed() {
    hash = Math.imul(hash ^ (hash >>> 16), 2246822507);
    hash = Math.imul(hash ^ (hash >>> 13), 3266489909);
    return (hash ^= hash >>> 16) >>> 0;
  };
}

function mulberry32(seed: number): () => number {
  let value = seed >>> 0;
  return function next() {
    value += 0x6d2b79f5;
    let candidate = Math.imul(value ^ (value >>> 15), 1 | value);
    candidate ^= candidate + Math.imul(candidate ^ (candidate >>> 7), 61 | candidate);
    return ((candidate ^ (candidate >>> 14)) >>> 0) / 4294967296;
  };
}

function countWallBlock(walls: WallMask, width: number, height: number, x: number, y: number): number {
  let count = 0;
  for (let dy = -1; dy <= 1; dy += 1) {
    for (let dx = -1; dx <= 1; dx += 1) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || nx >= width || ny < 0 || ny >= height) {
        count += 1;
      } else if (walls[ny * width + nx] !== 0) {
        count += 1;
      }
    }
  }
  return count;
}

function smooth(walls: WallMask, width: number, height: number): WallMask {
  const next = new Uint8Array(walls.length);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      next[y * width + x] =
        countWallBlock(walls, width, height, x, y) >= WALL_NEIGHBOUR_THRESHOLD ? 1 : 0;
    }
  }
  return next;
}

function sealBorders(walls: WallMask, width: number, height: number): void {
  for (let x = 0; x < width; x += 1) {
    walls[x] = 1;
    walls[(height - 1) * width + x] = 1;
  }
  for (let y = 0; y < height; y += 1) {
    walls[y * width] = 1;
    walls[y * width + width - 1] = 1;
  }
}

/** Seeded cave layout: random fill, cellular smoothing, solid border. */
export function generateCaveWalls(width: number, height: number, options: CaveOptions): WallMask {
  assertGridShape(width, height, width * height);
  const fillRatio = options.fillRatio ?? DEFAULT_FILL_RATIO;
  const iterations = Math.max(0, Math.floor(options.iterations ?? DEFAULT_ITERATIONS));
  const random = mulberry32(xmur3(options.seed)());

  let walls: WallMask = new Uint8Array(width * height);
  for (let i = 0; i < walls.length; i += 1) {
    walls[i] = random() < fillRatio ? 1 : 0;
  }

  for (let round = 0; round < iterations; round += 1) {
    walls = smooth(walls, width, height);
  }

  sealBorders(walls, width, height);
  return walls;
}

export function generateCave(
  width: number,
  height: number,
  options: CaveOptions & Partial<WallDecayOptions>,
): GeneratedCave {
  const walls = generateCaveWalls(width, height, options);
  const decay: Partial<WallDecayOptions> = {};
  if (options.baseDecay !== undefined) {
    decay.baseDecay = options.baseDecay;
  }
  if (options.wallDecay !== undefined) {
    decay.wallDecay = options.wallDecay;
  }
  return { walls, grid: decayGridFromWalls(walls, width, height, decay) };
}
