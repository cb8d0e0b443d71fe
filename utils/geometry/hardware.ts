/**
 * HARDWARE MODULE
 *
 * Independently computed solids unioned into or cut out of the case:
 * - heat-set screw inserts (holes, outers) and base plate countersinks
 * - nice!nano controller holder with its USB-C cutout and retainer lip
 * - control switch holes in the back wall
 * - palm rest outline extruded into the base plate
 *
 * None of these take part in connector meshing or wall tracing.
 */

import type { ScrewInsertAnchor, Vec2, Vec3 } from '../../types';
import { MOUNT_HEIGHT, MOUNT_WIDTH, POST_ADJ } from './constants';
import { cornerBox, type ShapeKernel } from './kernel';
import type { LayoutContext } from './layout';
import { keyPosition, leftKeyPosition, type BuildContext } from './placement';
import { addVec, deg2rad, subVec } from './transform';
import { wallLocate2, wallLocate3 } from './walls';

// 1. Screw inserts

export const SCREW_INSERT_HEIGHT = 6;
export const SCREW_INSERT_BOTTOM_RADIUS = 4.0 / 2;
export const SCREW_INSERT_TOP_RADIUS = 3.9 / 2;
export const SCREW_INSERT_WALL = 1.65;

export interface ResolvedScrewInsert {
  column: number;
  row: number;
  offset: Vec3;
}

export const resolveScrewInsert = ({ metrics }: LayoutContext, anchor: ScrewInsertAnchor): ResolvedScrewInsert => ({
  column: anchor.column === 'last' ? metrics.lastCol : anchor.column,
  row: anchor.row === 'last' ? metrics.lastRow : anchor.row,
  offset: anchor.offset,
});

/**
 * Floor position (x, y) of an insert. Inserts on the outer columns sit behind the
 * side walls, the rest behind the back or front wall.
 */
export const screwInsertPosition = (ctx: LayoutContext, anchor: ScrewInsertAnchor): Vec3 => {
  const { column, row, offset } = resolveScrewInsert(ctx, anchor);
  const onRight = column === ctx.metrics.lastCol;
  const onLeft = column === 0;
  const sides = onRight || onLeft;

  let position: Vec3;
  if (!sides && row === 0) {
    position = keyPosition(ctx, column, row, addVec(wallLocate2(ctx, [0, 1]), [0, MOUNT_HEIGHT / 2, 0]));
  } else if (!sides && row >= ctx.metrics.lastRow) {
    position = keyPosition(ctx, column, row, subVec(wallLocate2(ctx, [0, -2.5]), [0, MOUNT_HEIGHT / 2, 0]));
  } else if (onLeft) {
    position = addVec(leftKeyPosition(ctx, row, 0), wallLocate3(ctx, [-1, 0]));
  } else {
    position = keyPosition(ctx, column, row, addVec(wallLocate2(ctx, [1, 0]), [MOUNT_WIDTH / 2, 0, 0]));
  }
  return addVec(offset, [position[0], position[1], 0]);
};

/**
 * One cone per configured insert, standing on the print bed.
 */
export const screwInsertCones = <S>(ctx: BuildContext<S>, bottomRadius: number, topRadius: number, height: number): S[] => {
  const { kernel } = ctx;
  const cone = kernel.cylinder(bottomRadius, topRadius, height);
  return ctx.params.screwInserts.map((anchor) =>
    kernel.translate(addVec(screwInsertPosition(ctx, anchor), [0, 0, height / 2]), cone)
  );
};

export const screwInsertShapes = <S>(ctx: BuildContext<S>, bottomRadius: number, topRadius: number, height: number): S =>
  ctx.kernel.union(screwInsertCones(ctx, bottomRadius, topRadius, height));

export const screwInsertHoles = <S>(ctx: BuildContext<S>): S =>
  screwInsertShapes(ctx, SCREW_INSERT_BOTTOM_RADIUS, SCREW_INSERT_TOP_RADIUS, SCREW_INSERT_HEIGHT);

export const screwInsertOuterPieces = <S>(ctx: BuildContext<S>): S[] =>
  screwInsertCones(
    ctx,
    SCREW_INSERT_BOTTOM_RADIUS + SCREW_INSERT_WALL,
    SCREW_INSERT_TOP_RADIUS + SCREW_INSERT_WALL,
    SCREW_INSERT_HEIGHT + 1
  );

export const screwInsertOuters = <S>(ctx: BuildContext<S>): S => ctx.kernel.union(screwInsertOuterPieces(ctx));

// 2. Controller holder

const NICENANO_DIMS: Vec3 = [18.4, 33.7, 2];
const PIN_CLEARANCE: Vec3 = [4, NICENANO_DIMS[1], 2.5];
const SUPPORT_EXTENT = 25;
const RETAINER_EXTENT = 1;
const HOLDER_WALL = 2;
const HOLDER_WALL_HEIGHT = 2.1; // Above the board

export const CONTROLLER_BOUNDING_BOX: Vec3 = [
  NICENANO_DIMS[0] + HOLDER_WALL * 2,
  NICENANO_DIMS[1] + HOLDER_WALL,
  NICENANO_DIMS[2] + PIN_CLEARANCE[2] + HOLDER_WALL_HEIGHT,
];

export interface ControllerHolder<S> {
  holder: S;     // Stands on the base plate
  usbCutout: S;  // Cut out of the walls
  retainer: S;   // Lip unioned into the walls above the connector
}

/**
 * @param position middle of the USB-C opening, on the base plate
 * @param orientation rotation about Z in degrees
 */
export const controllerHolder = <S>(kernel: ShapeKernel<S>, position: Vec3, orientation: number): ControllerHolder<S> => {
  const box = CONTROLLER_BOUNDING_BOX;
  const place = (shape: S): S =>
    kernel.translate(
      position,
      kernel.translate(
        [0, -box[1] / 2, box[2] / 2],
        kernel.rotateZ(deg2rad(orientation), kernel.translate([-box[0] / 2, -box[1] / 2, -box[2] / 2], shape))
      )
    );

  const boardWidth = NICENANO_DIMS[0] - 2 * PIN_CLEARANCE[0];
  const holder = kernel.union([
    kernel.difference(cornerBox(kernel, box), [
      kernel.translate([HOLDER_WALL, 0, 0], cornerBox(kernel, [NICENANO_DIMS[0], NICENANO_DIMS[1], NICENANO_DIMS[2] + box[2]])),
    ]),
    kernel.translate([HOLDER_WALL + PIN_CLEARANCE[0], 0, 0], cornerBox(kernel, [boardWidth, SUPPORT_EXTENT, PIN_CLEARANCE[2]])),
    kernel.translate(
      [HOLDER_WALL + PIN_CLEARANCE[0], NICENANO_DIMS[1] - RETAINER_EXTENT, PIN_CLEARANCE[2] + NICENANO_DIMS[2]],
      cornerBox(kernel, [boardWidth, RETAINER_EXTENT, RETAINER_EXTENT])
    ),
  ]);

  const jackWidth = 9.525;
  const jackHeight = 3.5;
  const jackRadius = jackHeight / 2;
  const jackWallThickness = 1;
  const clearanceBuffer = 2.75;
  const clearanceWidth = jackWidth + clearanceBuffer * 2;
  const clearanceHeight = jackHeight + clearanceBuffer * 2;

  const jackRod = (x: number) =>
    kernel.translate(
      [x, HOLDER_WALL, jackRadius],
      kernel.rotateX(Math.PI / 2, kernel.cylinder(jackRadius, jackRadius, 2 * HOLDER_WALL))
    );
  const jack = kernel.translate(
    [(box[0] - jackWidth) / 2, -0.1, PIN_CLEARANCE[2]],
    kernel.union([
      jackRod(jackRadius),
      jackRod(jackWidth - jackRadius),
      kernel.translate([jackRadius, 0, 0], cornerBox(kernel, [jackWidth - 2 * jackRadius, 2 * HOLDER_WALL, jackHeight])),
    ])
  );
  const clearance = kernel.translate(
    [(box[0] - clearanceWidth) / 2, jackWallThickness, PIN_CLEARANCE[2] + jackHeight / 2 - clearanceHeight / 2],
    cornerBox(kernel, [clearanceWidth, 2 * HOLDER_WALL, clearanceHeight])
  );
  const usbCutout = kernel.union([kernel.mirror([0, -1, 0], jack), kernel.mirror([0, -1, 0], clearance)]);

  const retainer = kernel.translate(
    [(box[0] - jackWidth) / 2, 0, PIN_CLEARANCE[2] + jackHeight],
    cornerBox(kernel, [jackWidth, RETAINER_EXTENT, RETAINER_EXTENT])
  );

  return { holder: place(holder), usbCutout: place(usbCutout), retainer: place(retainer) };
};

/**
 * Middle of the back edge of key (1, 0), on the floor, before the configured nudge.
 */
export const controllerReferencePosition = (ctx: LayoutContext): Vec3 => {
  const [x, y] = keyPosition(ctx, 1, 0, [0, 0, 0]);
  return [x, y + MOUNT_HEIGHT / 2 + POST_ADJ, 0];
};

export const caseControllerHolder = <S>(ctx: BuildContext<S>): ControllerHolder<S> =>
  controllerHolder(
    ctx.kernel,
    addVec(controllerReferencePosition(ctx), ctx.params.controllerOffset),
    ctx.params.controllerOrientation
  );

// 3. Control switches

export const CONTROL_SWITCH_RADIUS = 6.1;
const CONTROL_SWITCH_COLUMNS = [2, 3];

export const controlSwitchPositions = (ctx: LayoutContext): Vec3[] =>
  CONTROL_SWITCH_COLUMNS.map((column) => [
    keyPosition(ctx, column, 0, [1.75, 0, 0])[0],
    keyPosition(ctx, column, 0, [0, 2, 0])[1],
    8.75,
  ]);

export const controlSwitchHoles = <S>(ctx: BuildContext<S>): S => {
  const { kernel } = ctx;
  const hole = kernel.rotateX(Math.PI / 2, kernel.cylinder(CONTROL_SWITCH_RADIUS, CONTROL_SWITCH_RADIUS, 20));
  return kernel.union(controlSwitchPositions(ctx).map((position) => kernel.translate(position, hole)));
};

// 4. Palm rest

const OUTSIDE_CASE_CONTACT: Vec2 = [61.5737, -51.3762];
const THUMB_CASE_CONTACT: Vec2 = [-51.5458, -103.431];
const INTERNAL_CORNER: Vec2 = [-51.5458, -46.3762];
const REST_LENGTH = 63.5;

const add2 = (a: Vec2, b: Vec2): Vec2 => [a[0] + b[0], a[1] + b[1]];

export const palmRestOutline = (): Vec2[] => {
  const lowerRightOne = add2(OUTSIDE_CASE_CONTACT, [0, -REST_LENGTH]);
  const lowerRightTwo = add2(lowerRightOne, [25.4 * -Math.sqrt(0.1), 25.4 * -2 * Math.sqrt(0.1)]);
  const diagonal = Math.sqrt((REST_LENGTH * REST_LENGTH) / 2);
  const lowerLeftOne = add2(add2(THUMB_CASE_CONTACT, [diagonal, -diagonal]), [7.5, 10]);
  const bend = Math.PI / 4 - Math.atan(0.5);
  const lowerLeftTwo = add2(lowerLeftOne, [
    25.4 * Math.sqrt(0.5) * Math.cos(bend),
    -25.4 * Math.sqrt(0.5) * Math.sin(bend),
  ]);

  return [
    lowerLeftOne,
    lowerLeftTwo,
    lowerRightTwo,
    lowerRightOne,
    add2(OUTSIDE_CASE_CONTACT, [4.0963, 9.8962]),
    INTERNAL_CORNER,
    add2(THUMB_CASE_CONTACT, [-30.8642, 14.441]),
  ];
};

export const PALM_SCREWS: readonly Vec2[] = [
  add2(OUTSIDE_CASE_CONTACT, [-15, -25.4]),
  add2(OUTSIDE_CASE_CONTACT, [-83, -53]),
  add2(OUTSIDE_CASE_CONTACT, [-34.1, -67.15]),
];

export const palmRest = <S>(ctx: BuildContext<S>): S =>
  ctx.kernel.prism(palmRestOutline(), ctx.params.basePlateThickness);

// 5. Base plate screw holes

const SCREW_HEAD_RADIUS = 5.7 / 2;
const SCREW_HEAD_BASE_RADIUS = 3.2 / 2;
const SCREW_HEAD_HEIGHT = 2.3;

export const plateScrewHoles = <S>(ctx: BuildContext<S>, plateThickness: number): S => {
  const { kernel } = ctx;
  // Countersink from the plate underside, plus the shaft
  const countersink = kernel.translate(
    [0, 0, SCREW_HEAD_HEIGHT / 2],
    kernel.cylinder(SCREW_HEAD_RADIUS, SCREW_HEAD_BASE_RADIUS, SCREW_HEAD_HEIGHT)
  );
  const shaft = kernel.translate([0, 0, 5], kernel.cylinder(SCREW_HEAD_BASE_RADIUS, SCREW_HEAD_BASE_RADIUS, 10));

  return kernel.union([
    screwInsertShapes(ctx, SCREW_HEAD_RADIUS, SCREW_HEAD_BASE_RADIUS, SCREW_HEAD_HEIGHT),
    screwInsertShapes(ctx, SCREW_HEAD_BASE_RADIUS, SCREW_HEAD_BASE_RADIUS, plateThickness),
    ...PALM_SCREWS.flatMap(([x, y]) => [kernel.translate([x, y, 0], countersink), kernel.translate([x, y, 0], shaft)]),
  ]);
};
