/**
 * KEY PLATE MODULE
 *
 * Local (unplaced) solids for a single key position:
 * - 1u switch plate with optional retention side nubs
 * - 2u plate (rotated 1u plate with extension plates)
 * - Cherry 2u stabilizer cutout
 * - SA keycaps (preview only)
 *
 * Every solid is built around the mount origin with the plate top at z = PLATE_THICKNESS.
 */

import type { Vec2 } from '../../types';
import {
  KEYSWITCH_HEIGHT,
  KEYSWITCH_WIDTH,
  MOUNT_HEIGHT,
  MOUNT_WIDTH,
  PLATE_THICKNESS,
  RETENTION_TAB_HOLE_THICKNESS,
  SA_DOUBLE_LENGTH,
  SA_LENGTH,
  SIDE_NUB_SEGMENTS,
  SIDE_NUB_THICKNESS,
  WEB_THICKNESS,
  inchesToMm,
} from './constants';
import type { ShapeKernel } from './kernel';

export type CapSize = 1 | 1.5 | 2;

const PLATE_2U_HEIGHT_OFFSET = -0.2;

const mirrorX = <S>(kernel: ShapeKernel<S>, shape: S): S => kernel.mirror([1, 0, 0], shape);
const mirrorY = <S>(kernel: ShapeKernel<S>, shape: S): S => kernel.mirror([0, 1, 0], shape);

// 1. Switch plates

export const plate1u = <S>(kernel: ShapeKernel<S>, sideNubs: boolean, heightOffset = 0): S => {
  const switchHeight = KEYSWITCH_HEIGHT + heightOffset;
  const wallZ = PLATE_THICKNESS / 2 - 0.25;

  const topWall = kernel.cuboid(
    [KEYSWITCH_WIDTH + 3, 1.5, PLATE_THICKNESS + 0.5],
    [0, 1.5 / 2 + switchHeight / 2, wallZ]
  );
  const leftWall = kernel.cuboid(
    [1.8, switchHeight + 3, PLATE_THICKNESS + 0.5],
    [1.8 / 2 + KEYSWITCH_WIDTH / 2, 0, wallZ]
  );

  const parts = [topWall, leftWall];
  if (sideNubs) {
    const nubRod = kernel.translate(
      [KEYSWITCH_WIDTH / 2, 0, 1],
      kernel.rotateX(Math.PI / 2, kernel.cylinder(1, 1, 2.75, SIDE_NUB_SEGMENTS))
    );
    const nubBlock = kernel.cuboid(
      [1.5, 2.75, SIDE_NUB_THICKNESS],
      [1.5 / 2 + KEYSWITCH_WIDTH / 2, 0, SIDE_NUB_THICKNESS / 2]
    );
    parts.push(kernel.translate([0, 0, PLATE_THICKNESS - SIDE_NUB_THICKNESS], kernel.hull([nubRod, nubBlock])));
  }
  const half = kernel.union(parts);

  // Relief for the switch retention tabs
  const tab = kernel.cuboid(
    [5, 5, RETENTION_TAB_HOLE_THICKNESS],
    [KEYSWITCH_WIDTH / 2.5, 0, RETENTION_TAB_HOLE_THICKNESS / 2 - 0.5]
  );
  const tabPair = kernel.union([tab, mirrorY(kernel, mirrorX(kernel, tab))]);

  return kernel.difference(kernel.union([half, mirrorY(kernel, mirrorX(kernel, half))]), [
    kernel.rotateZ(Math.PI / 2, tabPair),
  ]);
};

export const plate2u = <S>(kernel: ShapeKernel<S>, sideNubs: boolean): S => {
  const plateZ = PLATE_THICKNESS - WEB_THICKNESS / 2;
  const extensionHeight = (SA_DOUBLE_LENGTH - MOUNT_HEIGHT) / 2;
  const topPlate = kernel.cuboid(
    [MOUNT_WIDTH, extensionHeight, WEB_THICKNESS],
    [0, (extensionHeight + MOUNT_HEIGHT) / 2, plateZ]
  );

  const sideWidth = (MOUNT_WIDTH - (KEYSWITCH_HEIGHT + 3 + PLATE_2U_HEIGHT_OFFSET)) / 2;
  const sidePlate = kernel.cuboid(
    [sideWidth, MOUNT_HEIGHT, WEB_THICKNESS],
    [MOUNT_WIDTH / 2 - sideWidth / 2, 0, plateZ]
  );

  return kernel.union([
    kernel.rotateZ(Math.PI / 2, plate1u(kernel, sideNubs, PLATE_2U_HEIGHT_OFFSET)),
    topPlate,
    mirrorY(kernel, kernel.union([topPlate, sidePlate, mirrorX(kernel, sidePlate)])),
  ]);
};

/**
 * Cherry plate-mount stabilizer cutout for a given wire spacing (2u, 2.25u, 2.75u).
 * Dimensions follow the MX datasheet.
 */
export const stabilizerCutout = <S>(kernel: ShapeKernel<S>, spacing: number): S => {
  const plateZ = PLATE_THICKNESS - WEB_THICKNESS / 2;
  const switchHeight = KEYSWITCH_HEIGHT + PLATE_2U_HEIGHT_OFFSET;

  const mainHeight = inchesToMm(0.484);
  const mainWidth = inchesToMm(0.262);
  const main = kernel.cuboid(
    [mainHeight, mainWidth, WEB_THICKNESS],
    [mainHeight - inchesToMm(0.26) - mainHeight / 2, spacing / 2, plateZ]
  );

  const secondaryHeight = inchesToMm(0.26) + (inchesToMm(0.53) - mainHeight);
  const secondary = kernel.cuboid(
    [secondaryHeight, inchesToMm(0.12), WEB_THICKNESS],
    [-secondaryHeight / 2, spacing / 2, plateZ]
  );

  const side = kernel.cuboid([2.8, spacing + 0.8 * 2 + mainWidth, WEB_THICKNESS], [0.9, 0, plateZ]);
  const connector = kernel.cuboid([10.7, spacing, WEB_THICKNESS], [10.7 / 2 - 5.97, 0, plateZ]);

  const barHeight = (MOUNT_WIDTH + 3) / 2;
  const barClearance = kernel.cuboid(
    [barHeight, spacing + mainWidth, WEB_THICKNESS],
    [-barHeight / 2, 0, RETENTION_TAB_HOLE_THICKNESS / 2 - 0.5]
  );

  const mainTabDepth = (MOUNT_WIDTH - switchHeight) / 2;
  const mainTab = kernel.cuboid(
    [mainTabDepth, spacing - mainWidth, PLATE_THICKNESS - RETENTION_TAB_HOLE_THICKNESS],
    [-(switchHeight + mainTabDepth) / 2, 0, WEB_THICKNESS - RETENTION_TAB_HOLE_THICKNESS / 2]
  );

  const retentionTab = kernel.cuboid(
    [3.2, 3, RETENTION_TAB_HOLE_THICKNESS],
    [5.53, spacing / 2, RETENTION_TAB_HOLE_THICKNESS / 2 - 0.5]
  );

  const cutout = kernel.union([
    main,
    secondary,
    side,
    connector,
    kernel.difference(barClearance, [mainTab]),
    retentionTab,
  ]);
  return kernel.union([cutout, mirrorY(kernel, cutout)]);
};

export const stabilizerCutout2u = <S>(kernel: ShapeKernel<S>): S => stabilizerCutout(kernel, inchesToMm(0.94));

// 2. Keycaps

const rectangle = (halfX: number, halfY: number): Vec2[] => [
  [halfX, halfY],
  [halfX, -halfY],
  [-halfX, -halfY],
  [-halfX, halfY],
];

// Thin slice of a cap outline centred at height z
const capLayer = <S>(kernel: ShapeKernel<S>, halfX: number, halfY: number, z: number): S =>
  kernel.translate([0, 0, z - 0.05], kernel.prism(rectangle(halfX, halfY), 0.1));

export const saCap = <S>(kernel: ShapeKernel<S>, size: CapSize): S => {
  let layers: S[];
  switch (size) {
    case 2:
      layers = [capLayer(kernel, SA_LENGTH / 2, SA_LENGTH, 0.05), capLayer(kernel, 6, 16, 12)];
      break;
    case 1.5:
      layers = [capLayer(kernel, 27.94 / 2, SA_LENGTH / 2, 0.05), capLayer(kernel, 11, 6, 12)];
      break;
    default:
      layers = [
        capLayer(kernel, 18.5 / 2, 18.5 / 2, 0.05),
        capLayer(kernel, 17 / 2, 17 / 2, 6),
        capLayer(kernel, 6, 6, 12),
      ];
  }
  return kernel.translate([0, 0, 5 + PLATE_THICKNESS], kernel.hull(layers));
};
