/**
 * CORNER POSTS
 *
 * Thin vertical posts at the four corners of a mount. Connectors and walls are
 * hulls of placed posts; the mount solids themselves are never hulled.
 *
 * Variants:
 * - web:   regular 1u footprint
 * - wide:  1.5u footprint on the outer column (X spread by mountWidth / 1.2)
 * - thumb: 2u thumb footprint (Y spread by mountHeight / 0.9)
 */

import type { Vec3 } from '../../types';
import { MOUNT_HEIGHT, MOUNT_WIDTH, PLATE_THICKNESS, POST_ADJ, POST_SIZE, WEB_THICKNESS } from './constants';
import type { ShapeKernel } from './kernel';

export type Corner = 'tl' | 'tr' | 'bl' | 'br';
export type PostVariant = 'web' | 'wide' | 'thumb';

export interface CornerPost {
  corner: Corner;
  variant: PostVariant;
}

// Posts hang from the top of the plate
export const POST_CENTER_Z = PLATE_THICKNESS - WEB_THICKNESS / 2;

export const cornerPost = (corner: Corner, variant: PostVariant = 'web'): CornerPost => ({ corner, variant });

const cornerSigns = (corner: Corner): [number, number] => {
  switch (corner) {
    case 'tl':
      return [-1, 1];
    case 'tr':
      return [1, 1];
    case 'bl':
      return [-1, -1];
    case 'br':
      return [1, -1];
  }
};

/**
 * Centre of the post relative to the mount origin.
 */
export const postOffset = ({ corner, variant }: CornerPost): Vec3 => {
  const [sx, sy] = cornerSigns(corner);
  const halfWidth = variant === 'wide' ? MOUNT_WIDTH / 1.2 : MOUNT_WIDTH / 2;
  const halfHeight = variant === 'thumb' ? MOUNT_HEIGHT / 0.9 : MOUNT_HEIGHT / 2;
  return [sx * (halfWidth - POST_ADJ), sy * (halfHeight - POST_ADJ), POST_CENTER_Z];
};

export const webPost = <S>(kernel: ShapeKernel<S>): S =>
  kernel.cuboid([POST_SIZE, POST_SIZE, WEB_THICKNESS], [0, 0, POST_CENTER_Z]);

export const postShape = <S>(kernel: ShapeKernel<S>, post: CornerPost): S => {
  const [x, y] = postOffset(post);
  return kernel.translate([x, y, 0], webPost(kernel));
};

export const postLabel = ({ corner, variant }: CornerPost): string =>
  variant === 'web' ? corner : `${corner}:${variant}`;
