import { describe, expect, it } from 'vitest';
import { DEFAULT_PARAMS } from '../types';
import { ConfigurationError } from './errors';
import { createShapeParameters, defaultColumnOffsets, parseShapeOverrides } from './params';

describe('createShapeParameters', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(createShapeParameters()).toEqual(DEFAULT_PARAMS);
  });

  it('derives centerRow from nrows unless it is given', () => {
    expect(createShapeParameters({ nrows: 6 }).centerRow).toBe(3);
    expect(createShapeParameters({ nrows: 6, centerRow: 1 }).centerRow).toBe(1);
  });

  it('derives column offsets from the inner column toggle', () => {
    const params = createShapeParameters({ innerColumn: false });
    expect(params.columnOffsets[2]).toEqual([0, 2.82, -4.5]);
    expect(params.columnOffsets[4]).toEqual([0, -12, 5.64]);
    expect(params.columnOffsets).toHaveLength(7);
  });

  it('keeps explicit column offsets', () => {
    const offsets = defaultColumnOffsets(true, 7).map((): [number, number, number] => [1, 2, 3]);
    expect(createShapeParameters({ columnOffsets: offsets }).columnOffsets[0]).toEqual([1, 2, 3]);
  });

  it('freezes the record and its nested values', () => {
    const params = createShapeParameters();
    expect(Object.isFrozen(params)).toBe(true);
    expect(Object.isFrozen(params.columnOffsets[0])).toBe(true);
    expect(Object.isFrozen(params.thumbKeys[2])).toBe(true);
  });

  it('rejects a zero curvature angle', () => {
    expect(() => createShapeParameters({ alpha: 0 })).toThrow(
      'parameters: alpha alpha and beta must be non-zero (the curvature radii divide by them)'
    );
  });

  it('rejects too few rows and fractional counts', () => {
    expect(() => createShapeParameters({ nrows: 2 })).toThrow(ConfigurationError);
    expect(() => createShapeParameters({ ncols: 6.5 })).toThrow(/ncols/);
  });

  it('requires exactly four thumb keys', () => {
    expect(() => createShapeParameters({ thumbKeys: DEFAULT_PARAMS.thumbKeys.slice(0, 3) })).toThrow(/thumbKeys/);
  });
});

describe('parseShapeOverrides', () => {
  it('accepts a partial record', () => {
    expect(parseShapeOverrides({ nrows: 6, extraRow: true })).toEqual({ nrows: 6, extraRow: true });
  });

  it('rejects unknown keys', () => {
    expect(() => parseShapeOverrides({ rows: 6 })).toThrow(ConfigurationError);
    expect(() => parseShapeOverrides({ rows: 6 })).toThrow(/rows/);
  });

  it('names the offending path', () => {
    expect(() => parseShapeOverrides({ columnStyle: 'curved' })).toThrow(/^parameters: columnStyle /);
  });
});
