/**
 * POINT CLOUD KERNEL
 *
 * Approximates every shape by the vertices of its convex hull.
 * Unions and hulls are exact in bounds, while differences and intersections keep
 * the base shape unchanged. That is enough for bounding-box summaries and for
 * exercising the generators without a CSG engine.
 */

import type { Vec3 } from '../../types';
import { CYLINDER_SEGMENTS } from './constants';
import type { Bounds, ShapeKernel } from './kernel';
import { pointOps } from './transform';

export interface PointCloud {
  points: readonly Vec3[];
}

const cloud = (points: readonly Vec3[]): PointCloud => ({ points });

const mapPoints = (shape: PointCloud, fn: (p: Vec3) => Vec3): PointCloud => cloud(shape.points.map(fn));

const ring = (radius: number, z: number, segments: number): Vec3[] =>
  Array.from({ length: segments }, (_, i) => {
    const a = (2 * Math.PI * i) / segments;
    return [radius * Math.cos(a), radius * Math.sin(a), z];
  });

export const pointCloudKernel: ShapeKernel<PointCloud> = {
  name: 'point-cloud',

  translate: (offset, shape) => mapPoints(shape, (p) => pointOps.translate(offset, p)),
  rotateX: (angle, shape) => mapPoints(shape, (p) => pointOps.rotateX(angle, p)),
  rotateY: (angle, shape) => mapPoints(shape, (p) => pointOps.rotateY(angle, p)),
  rotateZ: (angle, shape) => mapPoints(shape, (p) => pointOps.rotateZ(angle, p)),

  empty: () => cloud([]),

  cuboid: (size, center = [0, 0, 0]) => {
    const points: Vec3[] = [];
    for (const sx of [-0.5, 0.5]) {
      for (const sy of [-0.5, 0.5]) {
        for (const sz of [-0.5, 0.5]) {
          points.push([center[0] + sx * size[0], center[1] + sy * size[1], center[2] + sz * size[2]]);
        }
      }
    }
    return cloud(points);
  },

  cylinder: (bottomRadius, topRadius, height, segments = CYLINDER_SEGMENTS) =>
    cloud([...ring(bottomRadius, -height / 2, segments), ...ring(topRadius, height / 2, segments)]),

  prism: (outline, height) =>
    cloud([
      ...outline.map(([x, y]): Vec3 => [x, y, 0]),
      ...outline.map(([x, y]): Vec3 => [x, y, height]),
    ]),

  extrudeFootprint: (pieces, height) => {
    const points = pieces.flatMap((piece) => piece.points);
    return cloud([
      ...points.map(([x, y]): Vec3 => [x, y, 0]),
      ...points.map(([x, y]): Vec3 => [x, y, height]),
    ]);
  },

  union: (shapes) => cloud(shapes.flatMap((shape) => shape.points)),
  difference: (base) => base,
  intersection: (a) => a,
  hull: (shapes) => cloud(shapes.flatMap((shape) => shape.points)),

  mirror: (normal, shape) => {
    const n = Math.hypot(normal[0], normal[1], normal[2]);
    const [nx, ny, nz] = [normal[0] / n, normal[1] / n, normal[2] / n];
    return mapPoints(shape, ([x, y, z]) => {
      const d = 2 * (x * nx + y * ny + z * nz);
      return [x - d * nx, y - d * ny, z - d * nz];
    });
  },

  bounds: (shape): Bounds | null => {
    if (shape.points.length === 0) return null;
    const min: Vec3 = [Infinity, Infinity, Infinity];
    const max: Vec3 = [-Infinity, -Infinity, -Infinity];
    for (const p of shape.points) {
      for (let axis = 0; axis < 3; axis++) {
        min[axis] = Math.min(min[axis], p[axis]);
        max[axis] = Math.max(max[axis], p[axis]);
      }
    }
    return { min, max };
  },
};
