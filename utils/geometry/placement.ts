/**
 * PLACEMENT PIPELINE
 *
 * Resolves a mount (main-matrix key or thumb key) to its Pose and applies it
 * to either a shape (through the kernel) or a bare point (through pointOps).
 * Both go through applyPose with the same step list.
 */

import type { ShapeParameters, ThumbKeyPlacement, Vec3 } from '../../types';
import { ConfigurationError } from '../errors';
import { MOUNT_HEIGHT, MOUNT_WIDTH } from './constants';
import { keyPose } from './curvature';
import type { ShapeKernel } from './kernel';
import { createLayoutContext, type LayoutContext } from './layout';
import { postLabel, postOffset, postShape, type Corner, type CornerPost } from './posts';
import { addVec, applyPose, deg2rad, pointOps, subVec, type Pose } from './transform';

export interface BuildContext<S> extends LayoutContext {
  kernel: ShapeKernel<S>;
}

export const createBuildContext = <S>(params: ShapeParameters, kernel: ShapeKernel<S>): BuildContext<S> => ({
  ...createLayoutContext(params),
  kernel,
});

export type MountRef = { kind: 'key'; column: number; row: number } | { kind: 'thumb'; index: number };

export const keyMount = (column: number, row: number): MountRef => ({ kind: 'key', column, row });
export const thumbMount = (index: number): MountRef => ({ kind: 'thumb', index });

export const mountLabel = (mount: MountRef): string =>
  mount.kind === 'key' ? `K(${mount.column},${mount.row})` : `T${mount.index}`;

// 1. Main matrix

export const keyPosition = (ctx: LayoutContext, column: number, row: number, point: Vec3): Vec3 =>
  applyPose(pointOps, keyPose(ctx, column, row), point);

/**
 * Outer-left corner of an inner-column key, pulled in by the left wall offsets.
 */
export const leftKeyPosition = (ctx: LayoutContext, row: number, direction: number): Vec3 =>
  subVec(keyPosition(ctx, 0, row, [MOUNT_WIDTH * -0.5, direction * MOUNT_HEIGHT * 0.5, 0]), [
    ctx.params.leftWallXOffset,
    0,
    ctx.params.leftWallZOffset,
  ]);

// 2. Thumb cluster

/**
 * Anchor of the thumb cluster: bottom-right corner of the key right of the
 * first full column on the corner row, nudged by thumbOffsets.
 */
export const thumbOrigin = (ctx: LayoutContext): Vec3 => {
  const { metrics, params } = ctx;
  const anchor = keyPosition(ctx, metrics.innerColOffset + 1, metrics.cornerRow, [
    MOUNT_WIDTH / 2,
    -MOUNT_HEIGHT / 2,
    0,
  ]);
  return addVec(anchor, params.thumbOffsets);
};

export const thumbPlacement = ({ params }: LayoutContext, index: number): ThumbKeyPlacement => {
  const placement = params.thumbKeys[index];
  if (placement === undefined) {
    throw new ConfigurationError('thumb cluster', `no placement for thumb key ${index}`);
  }
  return placement;
};

export const thumbPose = (ctx: LayoutContext, index: number): Pose => {
  const { lift, rotation, offset } = thumbPlacement(ctx, index);
  return [
    { op: 'translate', offset: [0, 0, lift] },
    { op: 'rotateX', angle: deg2rad(rotation[0]) },
    { op: 'rotateY', angle: deg2rad(rotation[1]) },
    { op: 'rotateZ', angle: deg2rad(rotation[2]) },
    { op: 'translate', offset: thumbOrigin(ctx) },
    { op: 'translate', offset },
  ];
};

// 3. Generic placement

export const mountPose = (ctx: LayoutContext, mount: MountRef): Pose =>
  mount.kind === 'key' ? keyPose(ctx, mount.column, mount.row) : thumbPose(ctx, mount.index);

export const placeShape = <S>(ctx: BuildContext<S>, mount: MountRef, shape: S): S =>
  applyPose(ctx.kernel, mountPose(ctx, mount), shape);

export const placePoint = (ctx: LayoutContext, mount: MountRef, point: Vec3): Vec3 =>
  applyPose(pointOps, mountPose(ctx, mount), point);

// 4. Placed posts

export interface PlacedPost {
  mount: MountRef;
  post: CornerPost;
  offset?: Vec3; // Local nudge applied before placing (wall lips)
}

export const keyPost = (
  column: number,
  row: number,
  corner: Corner,
  variant: CornerPost['variant'] = 'web'
): PlacedPost => ({
  mount: keyMount(column, row),
  post: { corner, variant },
});

/**
 * Thumb keys pick the 2u footprint from their size.
 */
export const thumbPost = (ctx: LayoutContext, index: number, corner: Corner): PlacedPost => ({
  mount: thumbMount(index),
  post: { corner, variant: thumbPlacement(ctx, index).size === '2u' ? 'thumb' : 'web' },
});

export const withOffset = (placed: PlacedPost, offset: Vec3): PlacedPost => ({ ...placed, offset });

export const placedPostPoint = (ctx: LayoutContext, { mount, post, offset }: PlacedPost): Vec3 =>
  placePoint(ctx, mount, addVec(postOffset(post), offset ?? [0, 0, 0]));

export const placedPostShape = <S>(ctx: BuildContext<S>, { mount, post, offset }: PlacedPost): S => {
  const local = postShape(ctx.kernel, post);
  return placeShape(ctx, mount, offset ? ctx.kernel.translate(offset, local) : local);
};

export const placedPostLabel = ({ mount, post }: PlacedPost): string => `${mountLabel(mount)}.${postLabel(post)}`;
