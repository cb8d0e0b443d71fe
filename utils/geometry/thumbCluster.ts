/**
 * THUMB CLUSTER
 *
 * Four rigid placements around thumbOrigin. 2u positions carry the 2u plate,
 * a rotated 2u cap and the stabilizer cutout; 1u positions carry the 1u plate.
 */

import type { ThumbKeySize } from '../../types';
import { plate1u, plate2u, saCap, stabilizerCutout2u } from './keyPlate';
import { placeShape, thumbMount, type BuildContext } from './placement';

const placedThumbs = <S>(ctx: BuildContext<S>, shapeFor: (size: ThumbKeySize) => S | null): S[] =>
  ctx.params.thumbKeys.flatMap(({ size }, index) => {
    const shape = shapeFor(size);
    return shape === null ? [] : [placeShape(ctx, thumbMount(index), shape)];
  });

const placeThumbs = <S>(ctx: BuildContext<S>, shapeFor: (size: ThumbKeySize) => S | null): S =>
  ctx.kernel.union(placedThumbs(ctx, shapeFor));

export const thumbPlatePieces = <S>(ctx: BuildContext<S>): S[] => {
  const { kernel, params } = ctx;
  const oneU = plate1u(kernel, params.createSideNubs);
  const twoU = plate2u(kernel, params.createSideNubs);
  return placedThumbs(ctx, (size) => (size === '2u' ? twoU : oneU));
};

export const thumbPlates = <S>(ctx: BuildContext<S>): S => ctx.kernel.union(thumbPlatePieces(ctx));

export const thumbCaps = <S>(ctx: BuildContext<S>): S => {
  const { kernel } = ctx;
  const oneU = saCap(kernel, 1);
  const twoU = kernel.rotateZ(Math.PI / 2, saCap(kernel, 2));
  return placeThumbs(ctx, (size) => (size === '2u' ? twoU : oneU));
};

/**
 * Subtracted after everything else is unioned: the bar clearance reaches past the plate.
 */
export const thumbStabilizerCutouts = <S>(ctx: BuildContext<S>): S => {
  const cutout = stabilizerCutout2u(ctx.kernel);
  return placeThumbs(ctx, (size) => (size === '2u' ? cutout : null));
};
