import { describe, expect, it } from 'vitest';
import type { ShapeParameters } from '../../types';
import { createShapeParameters } from '../params';
import {
  assertThumbColumns,
  createLayoutContext,
  enumerateKeyAddresses,
  innerRows,
  isKeyPresent,
  isWideKey,
  range,
  widePinkyRange,
} from './layout';

const layout = (overrides: Partial<ShapeParameters> = {}) => createLayoutContext(createShapeParameters(overrides));

describe('computeMetrics', () => {
  it('derives row and column indices from the matrix size', () => {
    const { metrics } = layout();
    expect(metrics.lastRow).toBe(4);
    expect(metrics.cornerRow).toBe(3);
    expect(metrics.lastCol).toBe(6);
    expect(metrics.extraCornerRow).toBe(3);
    expect(metrics.innerColOffset).toBe(1);
  });

  it('moves the outer corner row down with the extra row', () => {
    expect(layout({ extraRow: true }).metrics.extraCornerRow).toBe(4);
  });

  it('derives the orthographic column spacing from the column radius', () => {
    const { metrics, params } = layout();
    expect(metrics.columnXDelta).toBeCloseTo(-1 - metrics.columnRadius * Math.sin(params.beta), 12);
  });
});

describe('key presence', () => {
  it('enumerates 29 keys for the default layout', () => {
    expect(enumerateKeyAddresses(layout())).toHaveLength(29);
  });

  it('adds two outer bottom keys with the extra row', () => {
    const addresses = enumerateKeyAddresses(layout({ extraRow: true }));
    expect(addresses).toHaveLength(31);
    expect(addresses).toContainEqual({ column: 6, row: 4 });
  });

  it('shortens the inner column by two rows', () => {
    const ctx = layout();
    expect(innerRows(ctx)).toEqual([0, 1, 2]);
    expect(isKeyPresent(ctx, 0, 2)).toBe(true);
    expect(isKeyPresent(ctx, 0, 3)).toBe(false);
  });

  it('keeps only the two home columns on the bottom row', () => {
    const ctx = layout();
    const bottom = enumerateKeyAddresses(ctx).filter(({ row }) => row === 4);
    expect(bottom).toEqual([
      { column: 3, row: 4 },
      { column: 4, row: 4 },
    ]);
  });

  it('rejects addresses outside the matrix', () => {
    const ctx = layout();
    expect(isKeyPresent(ctx, 7, 0)).toBe(false);
    expect(isKeyPresent(ctx, 1, -1)).toBe(false);
  });
});

describe('widePinkyRange', () => {
  it('covers rows 0..3 by default', () => {
    expect(widePinkyRange(layout())).toEqual({ first: 0, last: 3 });
  });

  it('is null for an empty or out-of-column range', () => {
    expect(widePinkyRange(layout({ first15uRow: 3, last15uRow: 1 }))).toBeNull();
    expect(widePinkyRange(layout({ last15uRow: 4 }))).toBeNull();
    expect(widePinkyRange(layout({ pinky15u: false }))).toBeNull();
  });

  it('reaches the extra row when it exists', () => {
    expect(widePinkyRange(layout({ extraRow: true, last15uRow: 4 }))).toEqual({ first: 0, last: 4 });
  });

  it('marks only outer-column keys inside the range as wide', () => {
    const ctx = layout({ first15uRow: 1, last15uRow: 2 });
    expect(isWideKey(ctx, 6, 1)).toBe(true);
    expect(isWideKey(ctx, 6, 0)).toBe(false);
    expect(isWideKey(ctx, 5, 1)).toBe(false);
  });
});

describe('assertThumbColumns', () => {
  it('needs five columns right of the inner column', () => {
    expect(() => assertThumbColumns(layout({ ncols: 5 }), 'wall tracer')).toThrow(
      'wall tracer: the thumb cluster needs at least 6 columns, got 5'
    );
    expect(() => assertThumbColumns(layout({ ncols: 5, innerColumn: false }), 'wall tracer')).not.toThrow();
  });
});

describe('range', () => {
  it('is half open and empty when reversed', () => {
    expect(range(2, 5)).toEqual([2, 3, 4]);
    expect(range(3, 3)).toEqual([]);
    expect(range(4, 1)).toEqual([]);
  });
});
