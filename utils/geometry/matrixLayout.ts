/**
 * MATRIX LAYOUT
 *
 * Instantiates one local solid per present key address of the main matrix.
 */

import { isWideKey, enumerateKeyAddresses, type KeyAddress } from './layout';
import { plate1u, saCap } from './keyPlate';
import { keyMount, placeShape, type BuildContext } from './placement';

const placedAtEveryKey = <S>(ctx: BuildContext<S>, shapeFor: (address: KeyAddress) => S): S[] =>
  enumerateKeyAddresses(ctx).map((address) => placeShape(ctx, keyMount(address.column, address.row), shapeFor(address)));

const placeAtEveryKey = <S>(ctx: BuildContext<S>, shapeFor: (address: KeyAddress) => S): S =>
  ctx.kernel.union(placedAtEveryKey(ctx, shapeFor));

/**
 * Placed switch plates, one per key address.
 */
export const keyHolePieces = <S>(ctx: BuildContext<S>): S[] => {
  const plate = plate1u(ctx.kernel, ctx.params.createSideNubs);
  return placedAtEveryKey(ctx, () => plate);
};

export const keyHoles = <S>(ctx: BuildContext<S>): S => ctx.kernel.union(keyHolePieces(ctx));

export const keyCaps = <S>(ctx: BuildContext<S>): S => {
  const regular = saCap(ctx.kernel, 1);
  const wide = saCap(ctx.kernel, 1.5);
  return placeAtEveryKey(ctx, ({ column, row }) => (isWideKey(ctx, column, row) ? wide : regular));
};
