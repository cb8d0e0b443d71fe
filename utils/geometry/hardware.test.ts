import { describe, expect, it } from 'vitest';
import type { Vec3 } from '../../types';
import { createShapeParameters } from '../params';
import { MOUNT_HEIGHT, MOUNT_WIDTH } from './constants';
import {
  CONTROLLER_BOUNDING_BOX,
  controlSwitchPositions,
  controllerHolder,
  palmRest,
  palmRestOutline,
  resolveScrewInsert,
  screwInsertOuters,
  screwInsertPosition,
} from './hardware';
import { signedArea } from './kernel';
import { createBuildContext, keyPosition, leftKeyPosition } from './placement';
import { pointCloudKernel } from './pointCloudKernel';

const ctx = createBuildContext(createShapeParameters(), pointCloudKernel);

const expectClose = (actual: readonly number[], expected: readonly number[], digits = 9) => {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((value, axis) => expect(value).toBeCloseTo(expected[axis], digits));
};

const floor = ([x, y]: Vec3, [dx, dy]: [number, number]): Vec3 => [x + dx, y + dy, 0];

describe('screw inserts', () => {
  it('resolves "last" against the matrix size', () => {
    expect(resolveScrewInsert(ctx, { column: 'last', row: 'last', offset: [0, 0, 0] })).toEqual({
      column: 6,
      row: 4,
      offset: [0, 0, 0],
    });
  });

  it('sits behind the right wall on the outer column', () => {
    const wall = keyPosition(ctx, 6, 0, [0.5 + MOUNT_WIDTH / 2, 0, -2]);
    expectClose(screwInsertPosition(ctx, { column: 'last', row: 0, offset: [4.5, 5, 0] }), floor(wall, [4.5, 5]));
  });

  it('sits behind the left wall on the inner column', () => {
    const wall = leftKeyPosition(ctx, 0, 0);
    expectClose(screwInsertPosition(ctx, { column: 0, row: 0, offset: [7, 5, 0] }), floor(wall, [7 - 2.5, 5]));
  });

  it('sits behind the back wall on the top row', () => {
    const wall = keyPosition(ctx, 2, 0, [0, 0.5 + MOUNT_HEIGHT / 2, -2]);
    expectClose(screwInsertPosition(ctx, { column: 2, row: 0, offset: [0, 0, 0] }), floor(wall, [0, 0]));
  });

  it('sits in front of the bottom row', () => {
    const wall = keyPosition(ctx, 3, 4, [0, -1.25 - MOUNT_HEIGHT / 2, -2]);
    expectClose(screwInsertPosition(ctx, { column: 3, row: 'last', offset: [1, 1, 0] }), floor(wall, [1, 1]));
  });

  it('stands the outers on the print bed', () => {
    const bounds = pointCloudKernel.bounds(screwInsertOuters(ctx));
    expect(bounds?.min[2]).toBeCloseTo(0, 9);
    expect(bounds?.max[2]).toBeCloseTo(7, 9);
  });
});

describe('controllerHolder', () => {
  it('derives its bounding box from the board', () => {
    expectClose(CONTROLLER_BOUNDING_BOX, [22.4, 35.7, 6.6]);
  });

  it('hangs the holder behind the USB opening', () => {
    const { holder } = controllerHolder(pointCloudKernel, [0, 0, 0], 0);
    const bounds = pointCloudKernel.bounds(holder);
    expectClose(bounds?.min ?? [], [-11.2, -35.7, 0]);
    expectClose(bounds?.max ?? [], [11.2, 0, 6.6]);
  });

  it('turns about the opening', () => {
    const { holder } = controllerHolder(pointCloudKernel, [10, 20, 0], 180);
    const bounds = pointCloudKernel.bounds(holder);
    expectClose(bounds?.min ?? [], [-1.2, -15.7, 0]);
    expectClose(bounds?.max ?? [], [21.2, 20, 6.6]);
  });
});

describe('control switches', () => {
  it('punches two holes through the back wall', () => {
    const positions = controlSwitchPositions(ctx);
    expect(positions).toHaveLength(2);
    expect(positions.map(([, , z]) => z)).toEqual([8.75, 8.75]);
    expect(positions[0][0]).toBeCloseTo(keyPosition(ctx, 2, 0, [1.75, 0, 0])[0], 9);
  });
});

describe('palm rest', () => {
  it('has seven corners', () => {
    const outline = palmRestOutline();
    expect(outline).toHaveLength(7);
    const diagonal = 63.5 / Math.SQRT2;
    expectClose(outline[0], [-51.5458 + diagonal + 7.5, -103.431 - diagonal + 10]);
    expectClose(outline[3], [61.5737, -51.3762 - 63.5]);
    expect(Math.abs(signedArea(outline))).toBeGreaterThan(0);
  });

  it('is as thick as the base plate', () => {
    const bounds = pointCloudKernel.bounds(palmRest(ctx));
    expect(bounds?.min[2]).toBe(0);
    expect(bounds?.max[2]).toBe(2.6);
  });
});
