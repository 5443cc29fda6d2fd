import { readFileSync } from 'node:fs';
import { ConfigError } from '../core/errors';
import type { NormalizationMode } from '../core/types';
import { Logger } from './logger';

export interface LightingConfig {
  decayRate: number;
  diagonalDistance: number;
  normalization: NormalizationMode;
  perceptualThreshold: number;
  wallMinimum: number;
  /** Display exponent applied after tone mapping; `null` keeps output linear. */
  gamma: number | null;
  baseDecay: number;
  wallDecay: number;
  cacheSize: number;
}

const NORMALIZATION_MODES: readonly NormalizationMode[] = [
  'standard',
  'brightness-limited',
  'perceptual',
];

const DEFAULT_CONFIG: LightingConfig = {
  decayRate: 0.5,
  diagonalDistance: Math.SQRT2,
  normalization: 'perceptual',
  perceptualThreshold: 1,
  wallMinimum: 0.12,
  gamma: null,
  baseDecay: 0.1,
  wallDecay: 0.6,
  cacheSize: 64,
};

const log = new Logger('lighting-config');

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNormalizationMode(value: unknown): value is NormalizationMode {
  return NORMALIZATION_MODES.some((mode) => mode === value);
}

function readNumber(
  source: Record<string, unknown>,
  key: keyof LightingConfig,
  fallback: number,
  min: number,
  max: number,
): number {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    log.warn(`Ignoring non-numeric ${key}; using ${fallback}.`, value);
    return fallback;
  }
  return clamp(value, min, max);
}

export function getDefaultLightingConfig(): LightingConfig {
  return { ...DEFAULT_CONFIG };
}

/**
 * Fills in defaults and clamps every field. Fields of the wrong type fall back
 * to their default with a warning rather than failing.
 */
export function resolveLightingConfig(input: unknown = {}): LightingConfig {
  if (!isRecord(input)) {
    throw new ConfigError('Lighting config must be an object.');
  }

  const normalization = isNormalizationMode(input.normalization)
    ? input.normalization
    : DEFAULT_CONFIG.normalization;
  if (input.normalization !== undefined && normalization !== input.normalization) {
    log.warn(`Unknown normalization mode; using ${normalization}.`, input.normalization);
  }

  let gamma = DEFAULT_CONFIG.gamma;
  if (typeof input.gamma === 'number' && Number.isFinite(input.gamma)) {
    gamma = clamp(input.gamma, 0.1, 8);
  } else if (input.gamma !== undefined && input.gamma !== null) {
    log.warn('Ignoring non-numeric gamma; output stays linear.', input.gamma);
  }

  return {
    decayRate: readNumber(input, 'decayRate', DEFAULT_CONFIG.decayRate, 0, 1),
    diagonalDistance: readNumber(input, 'diagonalDistance', DEFAULT_CONFIG.diagonalDistance, 1, 4),
    normalization,
    perceptualThreshold: readNumber(
      input,
      'perceptualThreshold',
      DEFAULT_CONFIG.perceptualThreshold,
      0.01,
      100,
    ),
    wallMinimum: readNumber(input, 'wallMinimum', DEFAULT_CONFIG.wallMinimum, 0, 1),
    gamma,
    baseDecay: readNumber(input, 'baseDecay', DEFAULT_CONFIG.baseDecay, 0, 1),
    wallDecay: readNumber(input, 'wallDecay', DEFAULT_CONFIG.wallDecay, 0, 1),
    cacheSize: Math.round(readNumber(input, 'cacheSize', DEFAULT_CONFIG.cacheSize, 1, 4096)),
  };
}

export function parseLightingConfig(raw: string): LightingConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Lighting config is not valid JSON: ${detail}`);
  }
  return resolveLightingConfig(parsed);
}

export function loadLightingConfig(path: string): LightingConfig {
  const config = parseLightingConfig(readFileSync(path, 'utf8'));
  log.debug(`Loaded lighting config from ${path}.`);
  return config;
}
