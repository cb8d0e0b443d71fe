/**
 * PARAMETER MODULE
 *
 * Builds the immutable ShapeParameters record that every generator receives.
 * Overrides are merged over DEFAULT_PARAMS, dependent defaults are derived,
 * and the result is validated and frozen.
 */

import { z } from 'zod';
import { DEFAULT_PARAMS, type ShapeParameters, type Vec3 } from '../types';
import { ConfigurationError } from './errors';

const vec3 = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()]);
const angle = z.number().finite();
const index = z.number().int().nonnegative();

const shapeParametersObject = z
  .object({
    nrows: z.number().int().min(3),
    ncols: z.number().int().min(2),

    alpha: angle,
    beta: angle,
    centerRow: z.number().int(),
    centerCol: z.number().int(),
    tentingAngle: angle,
    columnStyle: z.enum(['standard', 'orthographic', 'fixed']),
    columnOffsets: z.array(vec3),

    pinky15u: z.boolean(),
    first15uRow: z.number().int(),
    last15uRow: z.number().int(),
    extraRow: z.boolean(),
    innerColumn: z.boolean(),
    createSideNubs: z.boolean(),

    fixedAngles: z.array(angle),
    fixedX: z.array(z.number().finite()),
    fixedZ: z.array(z.number().finite()),
    fixedTenting: angle,

    thumbOffsets: vec3,
    thumbKeys: z
      .array(
        z
          .object({
            size: z.enum(['1u', '2u']),
            lift: z.number().finite(),
            rotation: vec3,
            offset: vec3,
          })
          .strict()
      )
      .length(4),

    keyboardZOffset: z.number().finite(),
    extraWidth: z.number().finite().nonnegative(),
    extraHeight: z.number().finite().nonnegative(),

    wallZOffset: z.number().finite(),
    wallXyOffset: z.number().finite(),
    wallThickness: z.number().finite().positive(),
    leftWallXOffset: z.number().finite(),
    leftWallZOffset: z.number().finite(),

    screwInserts: z.array(
      z
        .object({
          column: z.union([index, z.literal('last')]),
          row: z.union([index, z.literal('last')]),
          offset: vec3,
        })
        .strict()
    ),
    basePlateThickness: z.number().finite().positive(),
    controllerOffset: vec3,
    controllerOrientation: angle,
  })
  .strict();

export const ShapeParametersSchema = shapeParametersObject.refine((p) => p.alpha !== 0 && p.beta !== 0, {
  message: 'alpha and beta must be non-zero (the curvature radii divide by them)',
  path: ['alpha'],
});

/**
 * Hand-tuned column stagger. The inner column shifts every named column one to the right.
 */
export const defaultColumnOffsets = (innerColumn: boolean, ncols: number): Vec3[] => {
  const offsetFor = (column: number): Vec3 => {
    if (innerColumn) {
      if (column <= 1) return [0, -2, 0];
      if (column === 3) return [0, 2.82, -4.5];
      if (column >= 5) return [0, -12, 5.64];
      return [0, 0, 0];
    }
    if (column === 2) return [0, 2.82, -4.5];
    if (column >= 4) return [0, -12, 5.64];
    return [0, 0, 0];
  };
  return Array.from({ length: ncols }, (_, column) => offsetFor(column));
};

/**
 * Partial record, as read from a configuration file. Unknown keys are rejected.
 */
export const ShapeParameterOverridesSchema = shapeParametersObject.partial();

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`).join('; ');

export const parseShapeOverrides = (input: unknown): Partial<ShapeParameters> => {
  const result = ShapeParameterOverridesSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('parameters', describeIssues(result.error));
  }
  return result.data;
};

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
};

/**
 * Merge overrides over the defaults and validate.
 * centerRow follows nrows and columnOffsets follow innerColumn/ncols unless given explicitly.
 */
export const createShapeParameters = (overrides: Partial<ShapeParameters> = {}): ShapeParameters => {
  const merged: ShapeParameters = { ...DEFAULT_PARAMS, ...overrides };

  if (overrides.centerRow === undefined && overrides.nrows !== undefined) {
    merged.centerRow = merged.nrows - 3;
  }
  if (overrides.columnOffsets === undefined) {
    merged.columnOffsets = defaultColumnOffsets(merged.innerColumn, merged.ncols);
  }

  const result = ShapeParametersSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError('parameters', describeIssues(result.error));
  }
  return deepFreeze(result.data);
};
