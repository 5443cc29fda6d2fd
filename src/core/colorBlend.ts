import { InvalidDimensionsError } from './errors';
import { assertGridShape, clamp01, sameShape } from './decayGrid';
import type { AttenuationGrid, GridShape, LightContribution, Rgba, RgbGrid } from './types';

export function createRgbGrid(shape: GridShape): RgbGrid {
  assertGridShape(shape.width, shape.height, shape.width * shape.height);
  return {
    width: shape.width,
    height: shape.height,
    data: new Float64Array(shape.width * shape.height * 3),
  };
}

export function rgba(r: number, g: number, b: number, a = 1): Rgba {
  return { r: clamp01(r), g: clamp01(g), b: clamp01(b), a: clamp01(a) };
}

/** Converts 0-255 channel values to the unit range the engine works in. */
export function rgbaFromBytes(r: number, g: number, b: number, a = 255): Rgba {
  return rgba(r / 255, g / 255, b / 255, a / 255);
}

function clampIntensity(intensity: number): number {
  return Number.isFinite(intensity) && intensity > 0 ? intensity : 0;
}

function accumulate(target: RgbGrid, light: LightContribution): void {
  const { attenuation } = light;
  if (!sameShape(target, attenuation) || attenuation.data.length !== attenuation.width * attenuation.height) {
    throw new InvalidDimensionsError(
      `Light grid ${attenuation.width}x${attenuation.height} does not match frame ${target.width}x${target.height}.`,
    );
  }

  const intensity = clampIntensity(light.intensity);
  const r = clamp01(light.color.r) * intensity;
  const g = clamp01(light.color.g) * intensity;
  const b = clamp01(light.color.b) * intensity;
  const out = target.data;
  const att = attenuation.data;

  for (let i = 0; i < att.length; i += 1) {
    const value = att[i];
    const base = i * 3;
    out[base] += value * r;
    out[base + 1] += value * g;
    out[base + 2] += value * b;
  }
}

/** One light's colored, intensity-scaled contribution. */
export function applyLightColor(
  attenuation: AttenuationGrid,
  color: Rgba,
  intensity: number,
): RgbGrid {
  const result = createRgbGrid(attenuation);
  accumulate(result, { attenuation, color, intensity });
  return result;
}

/**
 * Additive blend: every channel is the sum over lights of
 * attenuation * color * intensity. Values are left unclamped for the normalizer.
 */
export function blendLights(lights: readonly LightContribution[], shape: GridShape): RgbGrid {
  const result = createRgbGrid(shape);
  for (const light of lights) {
    accumulate(result, light);
  }
  return result;
}

export function maxChannel(grid: RgbGrid): number {
  let max = 0;
  for (let i = 0; i < grid.data.length; i += 1) {
    if (grid.data[i] > max) {
      max = grid.data[i];
    }
  }
  return max;
}
