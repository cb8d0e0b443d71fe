import { describe, expect, it } from 'vitest';
import type { Vec2, Vec3 } from '../../types';
import { jscadKernel } from './jscadKernel';
import { counterClockwise, cornerBox, signedArea, type Bounds, type ShapeKernel } from './kernel';
import { pointCloudKernel } from './pointCloudKernel';

const expectBounds = (actual: Bounds | null, min: Vec3, max: Vec3) => {
  expect(actual).not.toBeNull();
  if (actual === null) return;
  actual.min.forEach((value, axis) => expect(value).toBeCloseTo(min[axis], 6));
  actual.max.forEach((value, axis) => expect(value).toBeCloseTo(max[axis], 6));
};

const triangle: Vec2[] = [
  [0, 0],
  [0, 3],
  [4, 0],
];

describe('outline helpers', () => {
  it('measures signed area', () => {
    expect(signedArea(triangle)).toBe(-6);
    expect(signedArea(counterClockwise(triangle))).toBe(6);
  });

  it('leaves counter-clockwise outlines alone', () => {
    const ccw: Vec2[] = [
      [0, 0],
      [4, 0],
      [0, 3],
    ];
    expect(counterClockwise(ccw)).toEqual(ccw);
  });
});

const sharedBehaviour = <S>(kernel: ShapeKernel<S>) => {
  it('builds centred and corner-anchored boxes', () => {
    expectBounds(kernel.bounds(kernel.cuboid([2, 4, 6], [1, 1, 1])), [0, -1, -2], [2, 3, 4]);
    expectBounds(kernel.bounds(cornerBox(kernel, [1, 2, 3])), [0, 0, 0], [1, 2, 3]);
  });

  it('centres cylinders on the origin', () => {
    const bounds = kernel.bounds(kernel.cylinder(2, 1, 10));
    expect(bounds?.min[2]).toBeCloseTo(-5, 9);
    expect(bounds?.max[2]).toBeCloseTo(5, 9);
    expect(bounds?.max[0]).toBeCloseTo(2, 9);
  });

  it('extrudes an outline from the floor up, whatever its winding', () => {
    expectBounds(kernel.bounds(kernel.prism(triangle, 2)), [0, 0, 0], [4, 3, 2]);
  });

  it('extrudes the footprint of a raised solid', () => {
    const raised = kernel.cuboid([2, 2, 2], [0, 0, 5]);
    expectBounds(kernel.bounds(kernel.extrudeFootprint([raised], 1)), [-1, -1, 0], [1, 1, 1]);
  });

  it('joins the footprints of separate pieces', () => {
    const tilted = kernel.rotateX(Math.PI / 4, kernel.cuboid([2, 2, 2], [0, 0, 5]));
    const apart = kernel.cuboid([1, 1, 1], [6, 0, 3]);
    const bounds = kernel.bounds(kernel.extrudeFootprint([tilted, apart], 2));
    expect(bounds?.min[2]).toBeCloseTo(0, 6);
    expect(bounds?.max[2]).toBeCloseTo(2, 6);
    expect(bounds?.min[0]).toBeCloseTo(-1, 6);
    expect(bounds?.max[0]).toBeCloseTo(6.5, 6);
  });

  it('extrudes nothing from no pieces', () => {
    expect(kernel.bounds(kernel.extrudeFootprint([], 1))).toBeNull();
  });

  it('hulls separate solids', () => {
    const a = kernel.cuboid([1, 1, 1], [0, 0, 0]);
    const b = kernel.cuboid([1, 1, 1], [5, 3, 0]);
    expectBounds(kernel.bounds(kernel.hull([a, b])), [-0.5, -0.5, -0.5], [5.5, 3.5, 0.5]);
  });

  it('mirrors across a plane through the origin', () => {
    expectBounds(kernel.bounds(kernel.mirror([1, 0, 0], kernel.cuboid([2, 2, 2], [5, 0, 0]))), [-6, -1, -1], [-4, 1, 1]);
  });

  it('reports no bounds for an empty shape', () => {
    expect(kernel.bounds(kernel.empty())).toBeNull();
    expect(kernel.bounds(kernel.union([]))).toBeNull();
  });
};

describe('jscadKernel', () => {
  sharedBehaviour(jscadKernel);

  it('subtracts cutters', () => {
    const cube = jscadKernel.cuboid([10, 10, 10]);
    const top = jscadKernel.cuboid([20, 20, 10], [0, 0, 5]);
    expectBounds(jscadKernel.bounds(jscadKernel.difference(cube, [top])), [-5, -5, -5], [5, 5, 0]);
  });

  it('skips empty operands', () => {
    const cube = jscadKernel.cuboid([2, 2, 2]);
    expect(jscadKernel.difference(cube, [jscadKernel.empty()])).toBe(cube);
    expect(jscadKernel.union([jscadKernel.empty(), cube])).toBe(cube);
  });
});

describe('pointCloudKernel', () => {
  sharedBehaviour(pointCloudKernel);

  it('keeps the base of a difference', () => {
    const cube = pointCloudKernel.cuboid([10, 10, 10]);
    expect(pointCloudKernel.difference(cube, [pointCloudKernel.cuboid([1, 1, 1])])).toBe(cube);
  });

  it('collects every point of a union', () => {
    const cube = pointCloudKernel.cuboid([1, 1, 1]);
    expect(pointCloudKernel.union([cube, cube]).points).toHaveLength(16);
  });
});
