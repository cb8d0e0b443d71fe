import { booleans, extrusions, geometries, hulls, measurements, primitives, transforms } from '@jscad/modeling';
import type { Geom3 } from '@jscad/modeling/src/geometries/types';
import type { Vec2, Vec3 } from '../../types';
import { CYLINDER_SEGMENTS } from './constants';
import { counterClockwise, signedArea, type Bounds, type ShapeKernel } from './kernel';

const { cuboid, cylinder, cylinderElliptic, polygon } = primitives;
const { union, subtract, intersect } = booleans;
const { extrudeLinear } = extrusions;
const { hull, hullPoints2 } = hulls;
const { translate, rotateX, rotateY, rotateZ, mirror } = transforms;
const { measureBoundingBox } = measurements;

/**
 * Convex hull of the shape's vertices dropped onto the XY plane.
 */
const shadowOutline = (shape: Geom3): Vec2[] => {
  const unique = new Map<string, Vec2>();
  for (const face of geometries.geom3.toPoints(shape)) {
    for (const [x, y] of face) {
      unique.set(`${x.toFixed(6)},${y.toFixed(6)}`, [x, y]);
    }
  }
  if (unique.size < 3) return [];
  const outline = hullPoints2([...unique.values()]);
  return outline.length < 3 || Math.abs(signedArea(outline)) < 1e-9 ? [] : outline;
};

const isEmpty = (shape: Geom3): boolean => geometries.geom3.toPolygons(shape).length === 0;

/**
 * Exact kernel on @jscad/modeling solids.
 */
export const jscadKernel: ShapeKernel<Geom3> = {
  name: 'jscad',

  translate: (offset, shape) => translate(offset, shape),
  rotateX: (angle, shape) => rotateX(angle, shape),
  rotateY: (angle, shape) => rotateY(angle, shape),
  rotateZ: (angle, shape) => rotateZ(angle, shape),

  empty: () => geometries.geom3.create(),

  cuboid: (size, center = [0, 0, 0]) => cuboid({ size, center }),

  cylinder: (bottomRadius, topRadius, height, segments = CYLINDER_SEGMENTS) =>
    bottomRadius === topRadius
      ? cylinder({ radius: bottomRadius, height, segments })
      : cylinderElliptic({
          height,
          startRadius: [bottomRadius, bottomRadius],
          endRadius: [topRadius, topRadius],
          segments,
        }),

  prism: (outline, height) => extrudeLinear({ height }, polygon({ points: counterClockwise(outline) })),

  // Outlines are never unioned in 2D; the prisms are joined as solids.
  extrudeFootprint: (pieces, height) => {
    const prisms = pieces.flatMap((piece) => {
      const outline = shadowOutline(piece);
      return outline.length === 0 ? [] : [extrudeLinear({ height }, polygon({ points: counterClockwise(outline) }))];
    });
    if (prisms.length === 0) return geometries.geom3.create();
    return prisms.length === 1 ? prisms[0] : union(...prisms);
  },

  union: (shapes) => {
    const solid = shapes.filter((shape) => !isEmpty(shape));
    if (solid.length === 0) return geometries.geom3.create();
    return solid.length === 1 ? solid[0] : union(...solid);
  },

  difference: (base, cutters) => {
    const solid = cutters.filter((shape) => !isEmpty(shape));
    return solid.length === 0 ? base : subtract(base, ...solid);
  },

  intersection: (a, b) => intersect(a, b),

  hull: (shapes) => {
    const solid = shapes.filter((shape) => !isEmpty(shape));
    if (solid.length === 0) return geometries.geom3.create();
    return hull(...solid);
  },

  mirror: (normal, shape) => mirror({ normal }, shape),

  bounds: (shape): Bounds | null => {
    if (isEmpty(shape)) return null;
    const [min, max] = measureBoundingBox(shape);
    const toVec = (v: readonly number[]): Vec3 => [v[0], v[1], v[2]];
    return { min: toVec(min), max: toVec(max) };
  },
};
