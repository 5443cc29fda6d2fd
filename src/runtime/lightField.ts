import { generateCave } from '../core/caveGenerator';
import type { CaveOptions, GeneratedCave } from '../core/caveGenerator';
import { blendLights } from '../core/colorBlend';
import { decayGridFromWalls, parseDecayMap } from '../core/decayGrid';
import type { ParsedDecayMap, WallDecayOptions } from '../core/decayGrid';
import { attenuationForLight, contributionsFor, sweepOptionsForLight } from '../core/frame';
import { normalizeFrame, toRgba8 } from '../core/normalize';
import { ScratchPool } from '../core/scratchPool';
import type {
  AttenuationGrid,
  DecayGrid,
  LightSource,
  NormalizeOptions,
  RgbGrid,
  SweepOptions,
  WallMask,
} from '../core/types';
import { resolveLightingConfig } from './lightingConfig';
import type { LightingConfig } from './lightingConfig';
import { Logger } from './logger';
import { LRUCache } from './lruCache';

export interface LightFieldStats {
  hits: number;
  misses: number;
  cached: number;
}

const log = new Logger('light-field');

/**
 * Frame renderer that remembers attenuation per (grid, grid version, light
 * position, decay settings), so static lights cost one sweep until the
 * geometry changes. Grids handed to callers are copies of the cached ones.
 */
export class LightField {
  readonly config: LightingConfig;

  private readonly cache: LRUCache<string, AttenuationGrid>;
  private readonly pool = new ScratchPool();
  private readonly gridIds = new WeakMap<DecayGrid, number>();
  private nextGridId = 1;
  private hits = 0;
  private misses = 0;

  constructor(config: Partial<LightingConfig> = {}) {
    this.config = resolveLightingConfig(config);
    this.cache = new LRUCache(this.config.cacheSize);
  }

  private gridId(grid: DecayGrid): number {
    const known = this.gridIds.get(grid);
    if (known !== undefined) {
      return known;
    }
    const id = this.nextGridId;
    this.nextGridId += 1;
    this.gridIds.set(grid, id);
    return id;
  }

  private sweepOptions(light: LightSource): SweepOptions {
    return sweepOptionsForLight(light, {
      decayRate: this.config.decayRate,
      diagonalDistance: this.config.diagonalDistance,
      pool: this.pool,
    });
  }

  private wallDecay(): WallDecayOptions {
    return { baseDecay: this.config.baseDecay, wallDecay: this.config.wallDecay };
  }

  /** Parses an ASCII map with the configured floor and wall decay. */
  parseMap(raw: string): ParsedDecayMap {
    return parseDecayMap(raw, this.wallDecay());
  }

  gridFromWalls(walls: WallMask, width: number, height: number): DecayGrid {
    return decayGridFromWalls(walls, width, height, this.wallDecay());
  }

  generateCave(width: number, height: number, options: CaveOptions): GeneratedCave {
    return generateCave(width, height, { ...options, ...this.wallDecay() });
  }

  attenuationFor(grid: DecayGrid, light: LightSource): AttenuationGrid {
    const cached = this.cachedAttenuation(grid, light);
    return { width: cached.width, height: cached.height, data: cached.data.slice() };
  }

  private cachedAttenuation(grid: DecayGrid, light: LightSource): AttenuationGrid {
    const options = this.sweepOptions(light);
    const key = [
      this.gridId(grid),
      grid.version,
      light.x,
      light.y,
      options.decayRate,
      options.diagonalDistance,
    ].join('|');

    const cached = this.cache.get(key);
    if (cached) {
      this.hits += 1;
      return cached;
    }

    this.misses += 1;
    const attenuation = attenuationForLight(grid, light, options);
    this.cache.set(key, attenuation);
    log.debug(`Swept light at ${light.x},${light.y} (grid version ${grid.version}).`);
    return attenuation;
  }

  blend(grid: DecayGrid, lights: readonly LightSource[]): RgbGrid {
    const contributions = contributionsFor(lights, (light) => this.cachedAttenuation(grid, light));
    return blendLights(contributions, grid);
  }

  normalizeOptions(walls: WallMask | null = null): NormalizeOptions {
    return {
      mode: this.config.normalization,
      perceptualThreshold: this.config.perceptualThreshold,
      walls,
      wallMinimum: this.config.wallMinimum,
      gamma: this.config.gamma,
    };
  }

  render(grid: DecayGrid, lights: readonly LightSource[], walls: WallMask | null = null): RgbGrid {
    return normalizeFrame(this.blend(grid, lights), this.normalizeOptions(walls));
  }

  renderRgba8(
    grid: DecayGrid,
    lights: readonly LightSource[],
    walls: WallMask | null = null,
  ): Uint8ClampedArray {
    return toRgba8(this.render(grid, lights, walls));
  }

  stats(): LightFieldStats {
    return { hits: this.hits, misses: this.misses, cached: this.cache.size };
  }

  clear(): void {
    this.cache.clear();
    this.pool.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
