/**
 * CURVATURE MODULE
 *
 * Maps a (column, row) key address to a Pose on one of three surfaces:
 * - standard:     two intersecting cylinders (row arc about X, column arc about Y)
 * - orthographic: row arc only; columns stay parallel with a height correction
 * - fixed:        per-column lookup tables for tilt, X and Z (Maltron-like)
 *
 * Every style ends with the global tenting rotation and the height offset.
 * The fixed style reproduces its tables literally; it is known not to produce
 * quite the intended profile and is kept that way.
 */

import type { ColumnStyle, Vec3 } from '../../types';
import { ConfigurationError } from '../errors';
import { WIDE_KEY_SHIFT } from './constants';
import { isWideKey, type LayoutContext } from './layout';
import type { Pose, TransformStep } from './transform';

const lookup = <T>(table: readonly T[], column: number, name: string): T => {
  if (!Number.isInteger(column) || column < 0 || column >= table.length) {
    throw new ConfigurationError(
      'curvature model',
      `${name} has ${table.length} entries, column ${column} is out of range`
    );
  }
  return table[column];
};

export const columnOffset = ({ params }: LayoutContext, column: number): Vec3 =>
  lookup(params.columnOffsets, column, 'columnOffsets');

const translate = (offset: Vec3): TransformStep => ({ op: 'translate', offset });
const rotateX = (angle: number): TransformStep => ({ op: 'rotateX', angle });
const rotateY = (angle: number): TransformStep => ({ op: 'rotateY', angle });

const standardSteps = (ctx: LayoutContext, column: number, row: number): TransformStep[] => {
  const { params, metrics } = ctx;
  const { rowRadius, columnRadius } = metrics;
  const shift = isWideKey(ctx, column, row) ? WIDE_KEY_SHIFT : 0;

  return [
    translate([shift, 0, -rowRadius]),
    rotateX(params.alpha * (params.centerRow - row)),
    translate([0, 0, rowRadius]),
    translate([0, 0, -columnRadius]),
    rotateY(params.beta * (params.centerCol - column)),
    translate([0, 0, columnRadius]),
    translate(columnOffset(ctx, column)),
  ];
};

const orthographicSteps = (ctx: LayoutContext, column: number, row: number): TransformStep[] => {
  const { params, metrics } = ctx;
  const { rowRadius, columnRadius, columnXDelta } = metrics;
  const columnAngle = params.beta * (params.centerCol - column);
  const columnZDelta = columnRadius * (1 - Math.cos(columnAngle));

  return [
    translate([0, 0, -rowRadius]),
    rotateX(params.alpha * (params.centerRow - row)),
    translate([0, 0, rowRadius]),
    rotateY(columnAngle),
    translate([-(column - params.centerCol) * columnXDelta, 0, columnZDelta]),
    translate(columnOffset(ctx, column)),
  ];
};

const fixedSteps = (ctx: LayoutContext, column: number, row: number): TransformStep[] => {
  const { params, metrics } = ctx;
  const angle = lookup(params.fixedAngles, column, 'fixedAngles');
  const x = lookup(params.fixedX, column, 'fixedX');
  const z = lookup(params.fixedZ, column, 'fixedZ');

  return [
    rotateY(angle),
    translate([x, 0, z]),
    translate([0, 0, -(metrics.rowRadius + z)]),
    rotateX(params.alpha * (params.centerRow - row)),
    translate([0, 0, metrics.rowRadius + z]),
    rotateY(params.fixedTenting),
    // Fixed-z overrides the Z of the column offsets; only Y is kept
    translate([0, columnOffset(ctx, column)[1], 0]),
  ];
};

export const keyPose = (
  ctx: LayoutContext,
  column: number,
  row: number,
  style: ColumnStyle = ctx.params.columnStyle
): Pose => {
  let steps: TransformStep[];
  switch (style) {
    case 'orthographic':
      steps = orthographicSteps(ctx, column, row);
      break;
    case 'fixed':
      steps = fixedSteps(ctx, column, row);
      break;
    default:
      steps = standardSteps(ctx, column, row);
  }

  return [...steps, rotateY(ctx.params.tentingAngle), translate([0, 0, ctx.params.keyboardZOffset])];
};
