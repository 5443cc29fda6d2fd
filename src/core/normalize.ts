import { InvalidDimensionsError } from './errors';
import { clamp01 } from './decayGrid';
import { maxChannel } from './colorBlend';
import type { NormalizeOptions, PackedWallMask, RgbGrid, WallMask } from './types';

export const LUMINANCE_WEIGHTS = { r: 0.2126, g: 0.7152, b: 0.0722 } as const;
export const DEFAULT_PERCEPTUAL_THRESHOLD = 1;
export const DEFAULT_WALL_MINIMUM = 0.12;

export function luminance(r: number, g: number, b: number): number {
  return LUMINANCE_WEIGHTS.r * r + LUMINANCE_WEIGHTS.g * g + LUMINANCE_WEIGHTS.b * b;
}

function clampChannels(data: Float64Array): void {
  for (let i = 0; i < data.length; i += 1) {
    data[i] = clamp01(data[i]);
  }
}

function limitFrameBrightness(data: Float64Array, frameMax: number): void {
  if (frameMax > 1) {
    const scale = 1 / frameMax;
    for (let i = 0; i < data.length; i += 1) {
      data[i] *= scale;
    }
  }
  clampChannels(data);
}

// Both scale steps multiply all three channels by one factor, so hue survives.
function limitCellLuminance(data: Float64Array, threshold: number): void {
  for (let base = 0; base < data.length; base += 3) {
    let r = Math.max(0, data[base]);
    let g = Math.max(0, data[base + 1]);
    let b = Math.max(0, data[base + 2]);

    const lum = luminance(r, g, b);
    if (lum > threshold) {
      const scale = threshold / lum;
      r *= scale;
      g *= scale;
      b *= scale;
    }

    const peak = Math.max(r, g, b);
    if (peak > 1) {
      r /= peak;
      g /= peak;
      b /= peak;
    }

    data[base] = r;
    data[base + 1] = g;
    data[base + 2] = b;
  }
}

function applyGamma(data: Float64Array, gamma: number): void {
  for (let i = 0; i < data.length; i += 1) {
    data[i] = Math.pow(data[i], gamma);
  }
}

function applyWallMinimum(data: Float64Array, walls: WallMask, minimum: number): void {
  for (let i = 0; i < walls.length; i += 1) {
    if (walls[i] === 0) {
      continue;
    }
    const base = i * 3;
    data[base] = Math.max(data[base], minimum);
    data[base + 1] = Math.max(data[base + 1], minimum);
    data[base + 2] = Math.max(data[base + 2], minimum);
  }
}

/**
 * Maps linear light to [0, 1] under the selected policy:
 *
 * - `standard` clamps each channel. Cells near bright sources saturate.
 * - `brightness-limited` divides the whole frame by its brightest channel when
 *   that exceeds 1, keeping the falloff shape at the cost of overall level.
 * - `perceptual` scales each cell whose luminance exceeds the threshold down to
 *   it, per cell, keeping its r:g:b ratio.
 *
 * Optional gamma runs next. Walls are lifted to `wallMinimum` last so neither
 * scaling nor gamma can hide them.
 */
export function normalizeFrame(rgb: RgbGrid, options: NormalizeOptions): RgbGrid {
  const data = rgb.data.slice();

  switch (options.mode) {
    case 'standard':
      clampChannels(data);
      break;
    case 'brightness-limited':
      limitFrameBrightness(data, maxChannel(rgb));
      break;
    case 'perceptual': {
      const threshold = options.perceptualThreshold ?? DEFAULT_PERCEPTUAL_THRESHOLD;
      limitCellLuminance(data, threshold > 0 ? threshold : DEFAULT_PERCEPTUAL_THRESHOLD);
      break;
    }
  }

  const gamma = options.gamma ?? null;
  if (gamma !== null && Number.isFinite(gamma) && gamma > 0 && gamma !== 1) {
    applyGamma(data, gamma);
  }

  const walls = options.walls ?? null;
  if (walls) {
    if (walls.length * 3 !== data.length) {
      throw new InvalidDimensionsError(
        `Wall mask length ${walls.length} does not match frame ${rgb.width}x${rgb.height}.`,
      );
    }
    applyWallMinimum(data, walls, clamp01(options.wallMinimum ?? DEFAULT_WALL_MINIMUM));
  }

  return { width: rgb.width, height: rgb.height, data };
}

/** Packs a normalized frame into RGBA bytes (`floor(channel * 255)`, opaque alpha). */
export function toRgba8(rgb: RgbGrid): Uint8ClampedArray {
  const cells = rgb.width * rgb.height;
  const pixels = new Uint8ClampedArray(cells * 4);
  for (let i = 0; i < cells; i += 1) {
    const src = i * 3;
    const dst = i * 4;
    pixels[dst] = Math.floor(clamp01(rgb.data[src]) * 255);
    pixels[dst + 1] = Math.floor(clamp01(rgb.data[src + 1]) * 255);
    pixels[dst + 2] = Math.floor(clamp01(rgb.data[src + 2]) * 255);
    pixels[dst + 3] = 255;
  }
  return pixels;
}

/** Bit layout consumed by the GPU compositor: cell `i` is bit `i % 32` of word `i >> 5`. */
export function packWallMask(walls: WallMask): PackedWallMask {
  const packed = new Uint32Array(Math.ceil(walls.length / 32));
  for (let i = 0; i < walls.length; i += 1) {
    if (walls[i] !== 0) {
      packed[i >>> 5] |= 1 << (i & 31);
    }
  }
  return packed;
}

export function isWallBitSet(packed: PackedWallMask, index: number): boolean {
  const word = packed[index >>> 5] ?? 0;
  return ((word >>> (index & 31)) & 1) === 1;
}
