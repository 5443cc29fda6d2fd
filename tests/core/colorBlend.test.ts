import { describe, expect, it } from 'vitest';
import {
  applyLightColor,
  blendLights,
  createRgbGrid,
  maxChannel,
  rgba,
  rgbaFromBytes,
} from '../../src/core/colorBlend';
import { InvalidDimensionsError } from '../../src/core/errors';
import type { AttenuationGrid } from '../../src/core/types';

function attenuation(width: number, height: number, values: number[]): AttenuationGrid {
  return { width, height, data: new Float32Array(values) };
}

function cell(data: Float64Array, index: number): number[] {
  return Array.from(data.slice(index * 3, index * 3 + 3));
}

describe('color blending', () => {
  it('scales one light by attenuation, color and intensity', () => {
    const grid = attenuation(2, 2, [1, 0, 0.5, 0.25]);
    const result = applyLightColor(grid, rgba(1, 0.5, 0), 10);

    expect(result.width).toBe(2);
    expect(result.height).toBe(2);
    expect(cell(result.data, 0)).toEqual([10, 5, 0]);
    expect(cell(result.data, 1)).toEqual([0, 0, 0]);
    expect(cell(result.data, 2)).toEqual([5, 2.5, 0]);
    expect(cell(result.data, 3)).toEqual([2.5, 1.25, 0]);
  });

  it('adds overlapping lights channel by channel', () => {
    const full = attenuation(1, 1, [1]);
    const blended = blendLights(
      [
        { attenuation: full, color: rgba(1, 0, 0), intensity: 5 },
        { attenuation: full, color: rgba(0, 0, 1), intensity: 5 },
      ],
      full,
    );

    expect(cell(blended.data, 0)).toEqual([5, 0, 5]);
  });

  it('does not depend on light order', () => {
    const shape = { width: 3, height: 1 };
    const lights = [
      { attenuation: attenuation(3, 1, [1, 0.3, 0.1]), color: rgba(0.9, 0.2, 0.1), intensity: 1.7 },
      { attenuation: attenuation(3, 1, [0.2, 1, 0.6]), color: rgba(0.1, 0.7, 0.3), intensity: 3.1 },
      { attenuation: attenuation(3, 1, [0.05, 0.4, 1]), color: rgba(0.3, 0.3, 1), intensity: 0.4 },
    ];
    const forward = blendLights(lights, shape).data;
    const backward = blendLights(lights.slice().reverse(), shape).data;

    for (let i = 0; i < forward.length; i += 1) {
      expect(backward[i]).toBeCloseTo(forward[i], 12);
    }
  });

  it('returns a black frame when there are no lights', () => {
    const blended = blendLights([], { width: 3, height: 2 });
    expect(blended.data).toHaveLength(18);
    expect(maxChannel(blended)).toBe(0);
  });

  it('ignores alpha and treats non-positive intensity as zero', () => {
    const full = attenuation(1, 1, [1]);
    const transparent = applyLightColor(full, rgba(1, 1, 1, 0), 2);
    const negative = applyLightColor(full, rgba(1, 1, 1), -4);
    const notANumber = applyLightColor(full, rgba(1, 1, 1), Number.NaN);

    expect(cell(transparent.data, 0)).toEqual([2, 2, 2]);
    expect(cell(negative.data, 0)).toEqual([0, 0, 0]);
    expect(cell(notANumber.data, 0)).toEqual([0, 0, 0]);
  });

  it('clamps color channels to the unit range', () => {
    const full = attenuation(1, 1, [1]);
    const result = applyLightColor(full, { r: 2, g: -1, b: 0.5, a: 1 }, 4);

    expect(cell(result.data, 0)).toEqual([4, 0, 2]);
  });

  it('reports the brightest channel of a frame', () => {
    const grid = attenuation(2, 1, [1, 0.5]);
    expect(maxChannel(applyLightColor(grid, rgba(0.25, 1, 0), 6))).toBe(6);
  });

  it('rejects lights computed on a different grid', () => {
    const small = attenuation(1, 1, [1]);
    expect(() =>
      blendLights([{ attenuation: small, color: rgba(1, 1, 1), intensity: 1 }], { width: 2, height: 1 }),
    ).toThrow(InvalidDimensionsError);
    expect(() =>
      blendLights([{ attenuation: small, color: rgba(1, 1, 1), intensity: 1 }], { width: 2, height: 1 }),
    ).toThrow('Light grid 1x1 does not match frame 2x1.');
  });

  it('rejects empty frames', () => {
    expect(() => createRgbGrid({ width: 0, height: 4 })).toThrow(InvalidDimensionsError);
  });
});

describe('rgba helpers', () => {
  it('clamps unit channels', () => {
    expect(rgba(1.5, -0.5, 0.25)).toEqual({ r: 1, g: 0, b: 0.25, a: 1 });
  });

  it('converts byte channels', () => {
    expect(rgbaFromBytes(255, 0, 51)).toEqual({ r: 1, g: 0, b: 0.2, a: 1 });
  });
});
