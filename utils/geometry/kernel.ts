/**
 * SHAPE KERNEL
 *
 * The solid-modelling capability every generator is written against.
 * Generators never import a CSG library directly; they receive a kernel and
 * build values of its opaque shape type S.
 *
 * Two implementations ship:
 * - jscadKernel.ts      : exact CSG on @jscad/modeling Geom3 (used for export)
 * - pointCloudKernel.ts : convex vertex clouds (fast bounds, used in tests and summaries)
 */

import type { Vec2, Vec3 } from '../../types';
import type { TransformOps } from './transform';

export interface Bounds {
  min: Vec3;
  max: Vec3;
}

export interface ShapeKernel<S> extends TransformOps<S> {
  readonly name: string;

  empty: () => S;
  /** Box of the given size centred on `center` (origin by default). */
  cuboid: (size: Vec3, center?: Vec3) => S;
  /** Cylinder or truncated cone along Z, centred on the origin. */
  cylinder: (bottomRadius: number, topRadius: number, height: number, segments?: number) => S;
  /** Outline in the XY plane extruded from z = 0 to z = height. */
  prism: (outline: readonly Vec2[], height: number) => S;
  /**
   * Shadow of the pieces on the XY plane, extruded from z = 0 to z = height.
   * Each piece contributes the convex hull of its own shadow.
   */
  extrudeFootprint: (pieces: readonly S[], height: number) => S;

  union: (shapes: readonly S[]) => S;
  difference: (base: S, cutters: readonly S[]) => S;
  intersection: (a: S, b: S) => S;
  hull: (shapes: readonly S[]) => S;
  mirror: (normal: Vec3, shape: S) => S;

  /** Axis-aligned bounds, or null for an empty shape. */
  bounds: (shape: S) => Bounds | null;
}

/**
 * Box with one corner on the origin, extending along +X, +Y, +Z.
 */
export const cornerBox = <S>(kernel: ShapeKernel<S>, size: Vec3): S =>
  kernel.cuboid(size, [size[0] / 2, size[1] / 2, size[2] / 2]);

/**
 * Signed area of a closed outline (positive when counter-clockwise).
 */
export const signedArea = (outline: readonly Vec2[]): number => {
  let area = 0;
  for (let i = 0; i < outline.length; i++) {
    const [x1, y1] = outline[i];
    const [x2, y2] = outline[(i + 1) % outline.length];
    area += x1 * y2 - x2 * y1;
  }
  return area / 2;
};

export const counterClockwise = (outline: readonly Vec2[]): Vec2[] =>
  signedArea(outline) < 0 ? [...outline].reverse() : [...outline];
