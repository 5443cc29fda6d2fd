import { blendLights } from './colorBlend';
import { normalizeFrame } from './normalize';
import { calculateSubpixelAttenuation, isLatticePosition } from './subpixel';
import { calculateAttenuation } from './sweep';
import type {
  AttenuationGrid,
  DecayGrid,
  LightContribution,
  LightSource,
  NormalizeOptions,
  RgbGrid,
  SweepOptions,
} from './types';

export interface FrameOptions {
  sweep?: SweepOptions;
  normalize: NormalizeOptions;
}

export function sweepOptionsForLight(light: LightSource, base: SweepOptions = {}): SweepOptions {
  return light.decayRate === undefined ? base : { ...base, decayRate: light.decayRate };
}

/**
 * Cell-aligned lights take one sweep and must sit inside the grid; lights
 * between cells are interpolated from the surrounding cells.
 */
export function attenuationForLight(
  grid: DecayGrid,
  light: LightSource,
  options: SweepOptions = {},
): AttenuationGrid {
  const sweep = sweepOptionsForLight(light, options);
  if (isLatticePosition(light.x, light.y)) {
    return calculateAttenuation(grid, light.x, light.y, sweep);
  }
  return calculateSubpixelAttenuation(grid, light.x, light.y, sweep);
}

export function contributionsFor(
  lights: readonly LightSource[],
  attenuate: (light: LightSource) => AttenuationGrid,
): LightContribution[] {
  return lights.map((light) => ({
    attenuation: attenuate(light),
    color: light.color,
    intensity: light.intensity,
  }));
}

/** Linear (unnormalized) light for a frame. */
export function blendFrame(
  grid: DecayGrid,
  lights: readonly LightSource[],
  options: SweepOptions = {},
): RgbGrid {
  const contributions = contributionsFor(lights, (light) =>
    attenuationForLight(grid, light, options),
  );
  return blendLights(contributions, grid);
}

export function renderFrame(
  grid: DecayGrid,
  lights: readonly LightSource[],
  options: FrameOptions,
): RgbGrid {
  return normalizeFrame(blendFrame(grid, lights, options.sweep), options.normalize);
}
