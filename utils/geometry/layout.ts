/**
 * LAYOUT MODULE
 *
 * Derived metrics and the pure predicates that decide which key addresses exist.
 * The matrix is a set of (column, row) addresses generated on demand; nothing here
 * stores a grid.
 */

import type { ShapeParameters } from '../../types';
import { ConfigurationError } from '../errors';
import { CAP_TOP_HEIGHT, MOUNT_HEIGHT, MOUNT_WIDTH } from './constants';

export interface KeyAddress {
  column: number;
  row: number;
}

export interface KeyboardMetrics {
  lastRow: number;
  cornerRow: number;
  lastCol: number;
  extraCornerRow: number; // Bottom row of the outer columns
  innerColOffset: number; // 1 when the inner column is present
  rowRadius: number;      // Radius of the arc rows are tilted around
  columnRadius: number;   // Radius of the arc columns are tilted around
  columnXDelta: number;   // Column spacing of the orthographic style
}

export interface LayoutContext {
  params: ShapeParameters;
  metrics: KeyboardMetrics;
}

export const computeMetrics = (params: ShapeParameters): KeyboardMetrics => {
  const { nrows, ncols, alpha, beta, extraHeight, extraWidth, extraRow, innerColumn } = params;
  const lastRow = nrows - 1;
  const cornerRow = lastRow - 1;
  // Mount edges stay tangent to the arc: radius = half pitch / sin(angle / 2) + cap height
  const rowRadius = (MOUNT_HEIGHT + extraHeight) / 2 / Math.sin(alpha / 2) + CAP_TOP_HEIGHT;
  const columnRadius = (MOUNT_WIDTH + extraWidth) / 2 / Math.sin(beta / 2) + CAP_TOP_HEIGHT;

  return {
    lastRow,
    cornerRow,
    lastCol: ncols - 1,
    extraCornerRow: extraRow ? lastRow : cornerRow,
    innerColOffset: innerColumn ? 1 : 0,
    rowRadius,
    columnRadius,
    columnXDelta: -1 - columnRadius * Math.sin(beta),
  };
};

export const createLayoutContext = (params: ShapeParameters): LayoutContext => ({
  params,
  metrics: computeMetrics(params),
});

export const range = (start: number, end: number): number[] =>
  end > start ? Array.from({ length: end - start }, (_, i) => start + i) : [];

/**
 * Rows of the inner column (two shorter than the rest).
 */
export const innerRows = ({ params }: LayoutContext): number[] =>
  params.innerColumn ? range(0, params.nrows - 2) : [];

/**
 * Rows that carry a key at the bottom of a column.
 * The two home columns always do; with the extra row the outer columns do too.
 */
export const hasBottomRowKey = ({ params, metrics }: LayoutContext, column: number): boolean => {
  const io = metrics.innerColOffset;
  if (column === io + 2 || column === io + 3) return true;
  if (!params.extraRow) return false;
  if (params.ncols === io + 6) return column === io + 4 || column === io + 5;
  if (params.ncols === io + 5) return column === io + 4;
  return false;
};

export const isKeyPresent = (ctx: LayoutContext, column: number, row: number): boolean => {
  const { params, metrics } = ctx;
  if (column < 0 || column >= params.ncols || row < 0 || row >= params.nrows) return false;
  if (params.innerColumn && column === 0) return row < params.nrows - 2;
  if (row !== metrics.lastRow) return true;
  return hasBottomRowKey(ctx, column);
};

/**
 * Every key address of the main matrix, column-major.
 */
export const enumerateKeyAddresses = (ctx: LayoutContext): KeyAddress[] => {
  const addresses: KeyAddress[] = [];
  for (const column of range(0, ctx.params.ncols)) {
    for (const row of range(0, ctx.params.nrows)) {
      if (isKeyPresent(ctx, column, row)) addresses.push({ column, row });
    }
  }
  return addresses;
};

/**
 * The 1.5u row range of the outer column, or null when the toggle is off or the range
 * is empty or falls outside the column. A null range means the baseline layout.
 */
export const widePinkyRange = ({ params, metrics }: LayoutContext): { first: number; last: number } | null => {
  const { pinky15u, first15uRow: first, last15uRow: last } = params;
  if (!pinky15u) return null;
  if (first < 0 || first > last || last > metrics.extraCornerRow) return null;
  return { first, last };
};

export const isWideKey = (ctx: LayoutContext, column: number, row: number): boolean => {
  const wide = widePinkyRange(ctx);
  return wide !== null && column === ctx.metrics.lastCol && row >= wide.first && row <= wide.last;
};

/**
 * The thumb cluster hangs off columns innerColOffset..innerColOffset + 4.
 */
export const assertThumbColumns = ({ params, metrics }: LayoutContext, component: string): void => {
  const needed = metrics.innerColOffset + 5;
  if (params.ncols < needed) {
    throw new ConfigurationError(component, `the thumb cluster needs at least ${needed} columns, got ${params.ncols}`);
  }
};
