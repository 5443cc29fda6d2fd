export interface Vec2 {
  x: number;
  y: number;
}

export interface GridShape {
  width: number;
  height: number;
}

/** Per-cell opacity in [0, 1], row-major (`y * width + x`). */
export interface DecayGrid extends GridShape {
  data: Float32Array;
  /** Bumped whenever geometry changes; cached attenuation keys on it. */
  version: number;
}

/** Fraction of source intensity left at each cell. */
export interface AttenuationGrid extends GridShape {
  data: Float32Array;
}

/** Linear RGB, interleaved `r, g, b` at `3 * (y * width + x)`. */
export interface RgbGrid extends GridShape {
  data: Float64Array;
}

/** Non-zero entries mark wall cells. */
export type WallMask = Uint8Array;

/** One bit per cell, 32 cells per word, bit `index % 32` of word `index >> 5`. */
export type PackedWallMask = Uint32Array;

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface LightSource extends Vec2 {
  color: Rgba;
  intensity: number;
  /** Overrides the engine default absorption scale for this light. */
  decayRate?: number;
}

/** A computed attenuation grid paired with the light that produced it. */
export interface LightContribution {
  attenuation: AttenuationGrid;
  color: Rgba;
  intensity: number;
}

export type NormalizationMode = 'standard' | 'brightness-limited' | 'perceptual';

export interface NormalizeOptions {
  mode: NormalizationMode;
  /** Luminance ceiling used by `perceptual`. */
  perceptualThreshold?: number;
  walls?: WallMask | null;
  wallMinimum?: number;
  /** Exponent applied after tone mapping; `null` or omitted leaves values linear. */
  gamma?: number | null;
}

export interface SweepOptions {
  decayRate?: number;
  diagonalDistance?: number;
  pool?: ScratchBufferPool;
}

export interface ScratchBufferPool {
  acquire(length: number): Float32Array;
  release(buffer: Float32Array): void;
}

export interface BilinearCorner extends Vec2 {
  weight: number;
}
