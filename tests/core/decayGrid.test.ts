import { describe, expect, it } from 'vitest';
import {
  cloneDecayGrid,
  createDecayGrid,
  decayGridFromRows,
  decayGridFromWalls,
  flattenColumns,
  formatAttenuation,
  formatRgb,
  getCellDecay,
  parseDecayMap,
  setCellDecay,
} from '../../src/core/decayGrid';
import { InvalidDimensionsError, LightingError, OutOfBoundsError } from '../../src/core/errors';

describe('decay grid construction', () => {
  it('fills a new grid with a clamped value', () => {
    const grid = createDecayGrid(3, 2, 4);
    expect(grid.width).toBe(3);
    expect(grid.height).toBe(2);
    expect(grid.version).toBe(0);
    expect(Array.from(grid.data)).toEqual([1, 1, 1, 1, 1, 1]);
  });

  it('rejects empty and fractional dimensions', () => {
    expect(() => createDecayGrid(0, 3)).toThrow(InvalidDimensionsError);
    expect(() => createDecayGrid(2, 1.5)).toThrow('Grid dimensions must be positive integers, got 2x1.5.');
  });

  it('reads rows as y-major and clamps each cell', () => {
    const grid = decayGridFromRows([
      [0, 0.5],
      [-2, 3],
    ]);
    expect(Array.from(grid.data)).toEqual([0, 0.5, 0, 1]);
  });

  it('rejects ragged rows', () => {
    expect(() => decayGridFromRows([[0, 0], [0]])).toThrow(/ragged at row 1/);
    expect(() => decayGridFromRows([])).toThrow(InvalidDimensionsError);
  });

  it('flattens column-major input to row-major order', () => {
    expect(Array.from(flattenColumns([[1, 2], [3, 4]]))).toEqual([1, 3, 2, 4]);
    expect(Array.from(flattenColumns([[1, 2, 3]]))).toEqual([1, 2, 3]);
  });

  it('rejects ragged columns', () => {
    expect(() => flattenColumns([[1, 2], [3]])).toThrow(/ragged at column 1/);
  });

  it('builds decay from a wall mask', () => {
    const grid = decayGridFromWalls(new Uint8Array([1, 0, 0, 1]), 2, 2);
    expect(Array.from(grid.data)).toEqual([Math.fround(0.6), Math.fround(0.1), Math.fround(0.1), Math.fround(0.6)]);

    const custom = decayGridFromWalls(new Uint8Array([1, 0]), 2, 1, { baseDecay: 0, wallDecay: 1 });
    expect(Array.from(custom.data)).toEqual([1, 0]);
  });

  it('rejects a wall mask that does not fit the dimensions', () => {
    expect(() => decayGridFromWalls(new Uint8Array(5), 2, 2)).toThrow(InvalidDimensionsError);
  });
});

describe('decay map parsing', () => {
  it('maps walls, floor and digit tiles', () => {
    const { grid, walls } = parseDecayMap('#.\n 9\n');

    expect(grid.width).toBe(2);
    expect(grid.height).toBe(2);
    expect(Array.from(walls)).toEqual([1, 0, 0, 0]);
    expect(Array.from(grid.data)).toEqual([Math.fround(0.6), Math.fround(0.1), Math.fround(0.1), 1]);
  });

  it('honours custom wall and floor decay', () => {
    const { grid } = parseDecayMap('#.', { baseDecay: 0.25, wallDecay: 0.75 });
    expect(Array.from(grid.data)).toEqual([0.75, 0.25]);
  });

  it('scales digit tiles to ninths', () => {
    const { grid } = parseDecayMap('0369');
    expect(Array.from(grid.data)).toEqual([0, Math.fround(3 / 9), Math.fround(6 / 9), 1]);
  });

  it('accepts Windows line endings', () => {
    const { grid } = parseDecayMap('..\r\n##\r\n');
    expect(grid.height).toBe(2);
  });

  it('reports malformed maps', () => {
    expect(() => parseDecayMap('')).toThrow('Decay map is empty.');
    expect(() => parseDecayMap('\n..')).toThrow('Decay map has zero width.');
    expect(() => parseDecayMap('...\n..')).toThrow(/ragged at row 1/);
    expect(() => parseDecayMap('.@')).toThrow("Decay map contains invalid tile '@' at 1,0.");
  });
});

describe('cell access', () => {
  it('reads and writes single cells', () => {
    const grid = createDecayGrid(3, 3);
    setCellDecay(grid, 2, 1, 0.5);

    expect(getCellDecay(grid, 2, 1)).toBe(0.5);
    expect(grid.data[5]).toBe(0.5);
    expect(grid.version).toBe(1);
  });

  it('clamps written values', () => {
    const grid = createDecayGrid(1, 1);
    setCellDecay(grid, 0, 0, 9);
    expect(getCellDecay(grid, 0, 0)).toBe(1);
  });

  it('rejects cells outside the grid', () => {
    const grid = createDecayGrid(2, 2);
    expect(() => getCellDecay(grid, 2, 0)).toThrow(OutOfBoundsError);
    expect(() => setCellDecay(grid, 0, -1, 0)).toThrow(LightingError);
    expect(grid.version).toBe(0);
  });

  it('clones without sharing storage', () => {
    const grid = createDecayGrid(2, 1, 0.5);
    const copy = cloneDecayGrid(grid);
    setCellDecay(copy, 0, 0, 1);

    expect(grid.data[0]).toBe(0.5);
    expect(copy.data[0]).toBe(1);
    expect(copy.version).toBe(1);
    expect(grid.version).toBe(0);
  });
});

describe('text formatting', () => {
  it('prints attenuation with two decimals in five columns', () => {
    const text = formatAttenuation({ width: 2, height: 2, data: new Float32Array([1, 0.5, 0.25, 0]) });
    expect(text).toBe(' 1.00  0.50\n 0.25  0.00');
  });

  it('prints rgb cells as tuples', () => {
    const text = formatRgb({ width: 2, height: 1, data: new Float64Array([1, 0.5, 0, 10, 0, 2.25]) });
    expect(text).toBe('(1.0,0.5,0.0) (10.0,0.0,2.3)');
  });
});
