/**
 * WALL TRACER
 *
 * The case wall is an explicit, cyclic list of stations (a placed corner post
 * plus the outward direction of the wall at that post), grouped by side:
 *
 *   back (left → right) → right (top → bottom) → front (right → left)
 *   → thumb (clockwise) → left (bottom → top) → back again
 *
 * Every pair of consecutive stations becomes one segment. Segments are braces
 * (sloped panel + floor projection), except the thumb → left join, which is a
 * bridge: a single floor-projected hull, since a regular brace folds over there.
 */

import type { Vec3 } from '../../types';
import { ConfigurationError } from '../errors';
import { FLOOR_PROJECTION_HEIGHT, FLOOR_PROJECTION_Z } from './constants';
import { assertThumbColumns, range, widePinkyRange, type LayoutContext } from './layout';
import {
  keyPost,
  placedPostLabel,
  placedPostPoint,
  placedPostShape,
  thumbPost,
  withOffset,
  type BuildContext,
  type PlacedPost,
} from './placement';
import { distance, spansPlane } from './transform';

export type WallSide = 'back' | 'right' | 'front' | 'thumb' | 'left';
export type Direction = [number, number];

export const WALL_SIDES: readonly WallSide[] = ['back', 'right', 'front', 'thumb', 'left'];

export interface WallStation {
  side: WallSide;
  anchor: PlacedPost;
  direction: Direction;
}

export interface WallSegment {
  kind: 'brace' | 'bridge';
  from: WallStation;
  to: WallStation;
}

const NORTH: Direction = [0, 1];
const EAST: Direction = [1, 0];
const SOUTH: Direction = [0, -1];
const WEST: Direction = [-1, 0];

// 1. Lip offsets, in the mount's local frame

/** Inner lip: wall thickness straight out. */
export const wallLocate1 = ({ params }: LayoutContext, [dx, dy]: Direction): Vec3 => [
  dx * params.wallThickness,
  dy * params.wallThickness,
  0,
];

/** Sloped lip: out by the xy offset and down by the z offset. */
export const wallLocate2 = ({ params }: LayoutContext, [dx, dy]: Direction): Vec3 => [
  dx * params.wallXyOffset,
  dy * params.wallXyOffset,
  params.wallZOffset,
];

/** Outer lip: sloped lip plus wall thickness. */
export const wallLocate3 = ({ params }: LayoutContext, [dx, dy]: Direction): Vec3 => [
  dx * (params.wallXyOffset + params.wallThickness),
  dy * (params.wallXyOffset + params.wallThickness),
  params.wallZOffset,
];

// 2. Stations per side

const backStations = (ctx: LayoutContext): PlacedPost[] => {
  const { lastCol } = ctx.metrics;
  const posts = range(0, ctx.params.ncols).flatMap((x) => [keyPost(x, 0, 'tl'), keyPost(x, 0, 'tr')]);
  if (widePinkyRange(ctx)?.first === 0) posts.push(keyPost(lastCol, 0, 'tr', 'wide'));
  return posts;
};

const rightStations = (ctx: LayoutContext): PlacedPost[] => {
  const { lastCol: col, extraCornerRow } = ctx.metrics;
  const wide = widePinkyRange(ctx);

  if (wide === null) {
    return range(0, extraCornerRow + 1).flatMap((y) => [keyPost(col, y, 'tr'), keyPost(col, y, 'br')]);
  }

  const { first, last } = wide;
  const posts: PlacedPost[] = [];
  // Narrow rows above the 1.5u range; the last of them meets the wide keys at its top corner
  for (const y of range(0, first - 1)) posts.push(keyPost(col, y, 'tr'), keyPost(col, y, 'br'));
  if (first >= 1) posts.push(keyPost(col, first - 1, 'tr'));
  for (const y of range(first, last + 1)) posts.push(keyPost(col, y, 'tr', 'wide'), keyPost(col, y, 'br', 'wide'));
  // Narrow rows below the range; the first of them is entered at its bottom corner
  if (last < extraCornerRow) posts.push(keyPost(col, last + 1, 'br'));
  for (const y of range(last + 2, extraCornerRow + 1)) posts.push(keyPost(col, y, 'tr'), keyPost(col, y, 'br'));
  return posts;
};

const frontStations = (ctx: LayoutContext): PlacedPost[] => {
  const { lastCol, lastRow, extraCornerRow, innerColOffset: io } = ctx.metrics;
  const posts: PlacedPost[] = [];
  if (widePinkyRange(ctx)?.last === extraCornerRow) posts.push(keyPost(lastCol, extraCornerRow, 'br', 'wide'));
  for (const x of range(io + 4, lastCol + 1).reverse()) {
    posts.push(keyPost(x, extraCornerRow, 'br'), keyPost(x, extraCornerRow, 'bl'));
  }
  posts.push(keyPost(io + 3, lastRow, 'br'), keyPost(io + 3, lastRow, 'bl'));
  return posts;
};

const thumbStations = (ctx: LayoutContext): Array<[PlacedPost, Direction]> => [
  [thumbPost(ctx, 0, 'br'), SOUTH],
  [thumbPost(ctx, 0, 'bl'), SOUTH],
  [thumbPost(ctx, 1, 'br'), SOUTH],
  [thumbPost(ctx, 1, 'bl'), SOUTH],
  [thumbPost(ctx, 3, 'br'), SOUTH],
  [thumbPost(ctx, 3, 'bl'), SOUTH],
  [thumbPost(ctx, 3, 'bl'), WEST],
  [thumbPost(ctx, 3, 'tl'), WEST],
  [thumbPost(ctx, 2, 'bl'), WEST],
  [thumbPost(ctx, 2, 'tl'), WEST],
  [thumbPost(ctx, 2, 'tl'), NORTH],
  [thumbPost(ctx, 2, 'tr'), NORTH],
  [thumbPost(ctx, 1, 'tl'), WEST],
];

/**
 * Bottom row of the left wall: the inner column is shorter than the rest.
 */
export const leftWallBottomRow = ({ metrics }: LayoutContext): number => metrics.lastRow - metrics.innerColOffset - 1;

const leftStations = (ctx: LayoutContext): PlacedPost[] =>
  range(0, leftWallBottomRow(ctx) + 1)
    .reverse()
    .flatMap((y) => [keyPost(0, y, 'bl'), keyPost(0, y, 'tl')]);

export const perimeterStations = (ctx: LayoutContext): WallStation[] => {
  assertThumbColumns(ctx, 'wall tracer');

  const along = (side: WallSide, posts: PlacedPost[], direction: Direction): WallStation[] =>
    posts.map((anchor) => ({ side, anchor, direction }));

  const sides: Record<WallSide, WallStation[]> = {
    back: along('back', backStations(ctx), NORTH),
    right: along('right', rightStations(ctx), EAST),
    front: along('front', frontStations(ctx), SOUTH),
    thumb: thumbStations(ctx).map(([anchor, direction]) => ({ side: 'thumb', anchor, direction })),
    left: along('left', leftStations(ctx), WEST),
  };

  WALL_SIDES.forEach((side, i) => {
    if (sides[side].length === 0) {
      const before = WALL_SIDES[(i + WALL_SIDES.length - 1) % WALL_SIDES.length];
      const after = WALL_SIDES[(i + 1) % WALL_SIDES.length];
      throw new ConfigurationError('wall tracer', `empty perimeter range on side ${side} (between ${before} and ${after})`);
    }
  });

  return WALL_SIDES.flatMap((side) => sides[side]);
};

// 3. Segments

export const wallSegments = (ctx: LayoutContext): WallSegment[] => {
  const stations = perimeterStations(ctx);
  return stations.map((from, i) => {
    const to = stations[(i + 1) % stations.length];
    return { kind: from.side === 'thumb' && to.side === 'left' ? 'bridge' : 'brace', from, to };
  });
};

const stationLabel = ({ side, anchor, direction }: WallStation): string =>
  `${side}:${placedPostLabel(anchor)}[${direction.join(',')}]`;

/**
 * Verifies that each segment ends where the next one starts and the last returns to the first.
 */
export const checkPerimeterClosure = (ctx: LayoutContext, segments: readonly WallSegment[], tolerance = 1e-9): void => {
  if (segments.length === 0) {
    throw new ConfigurationError('wall tracer', 'perimeter has no segments');
  }
  segments.forEach((segment, i) => {
    const next = segments[(i + 1) % segments.length];
    const end = placedPostPoint(ctx, segment.to.anchor);
    const start = placedPostPoint(ctx, next.from.anchor);
    const sameDirection =
      segment.to.direction[0] === next.from.direction[0] && segment.to.direction[1] === next.from.direction[1];
    if (distance(end, start) > tolerance || !sameDirection) {
      throw new ConfigurationError(
        'wall tracer',
        `perimeter does not close between ${stationLabel(segment.to)} and ${stationLabel(next.from)}`
      );
    }
  });
};

const lips = (ctx: LayoutContext, { anchor, direction }: WallStation) => ({
  post: anchor,
  inner: withOffset(anchor, wallLocate1(ctx, direction)),
  sloped: withOffset(anchor, wallLocate2(ctx, direction)),
  outer: withOffset(anchor, wallLocate3(ctx, direction)),
});

/**
 * Posts hulled into the sloped panel of a segment, and those projected to the floor.
 */
export const segmentAnchors = (
  ctx: LayoutContext,
  segment: WallSegment
): { panel: PlacedPost[]; floor: PlacedPost[] } => {
  const a = lips(ctx, segment.from);
  const b = lips(ctx, segment.to);

  if (segment.kind === 'bridge') {
    return { panel: [], floor: [b.inner, b.sloped, b.outer, a.post, a.inner, a.sloped, a.outer] };
  }
  return {
    panel: [a.post, a.inner, a.sloped, a.outer, b.post, b.inner, b.sloped, b.outer],
    floor: [a.sloped, a.outer, b.sloped, b.outer],
  };
};

const assertSpansPlane = (ctx: LayoutContext, segment: WallSegment, posts: PlacedPost[]): void => {
  if (posts.length > 0 && !spansPlane(posts.map((post) => placedPostPoint(ctx, post)))) {
    throw new ConfigurationError(
      'wall tracer',
      `degenerate ${segment.kind} between ${stationLabel(segment.from)} and ${stationLabel(segment.to)}`
    );
  }
};

// 4. Solids

/**
 * Hull of the shapes and their shadow on a thin slab below the print bed.
 */
export const bottomHull = <S>(ctx: BuildContext<S>, shapes: readonly S[]): S => {
  const { kernel } = ctx;
  const floor = kernel.translate(
    [0, 0, FLOOR_PROJECTION_Z],
    kernel.extrudeFootprint([kernel.hull(shapes)], FLOOR_PROJECTION_HEIGHT)
  );
  return kernel.hull([...shapes, floor]);
};

export const buildWallSegment = <S>(ctx: BuildContext<S>, segment: WallSegment): S => {
  const { panel, floor } = segmentAnchors(ctx, segment);
  assertSpansPlane(ctx, segment, panel);
  assertSpansPlane(ctx, segment, floor);

  const shapes = (posts: PlacedPost[]) => posts.map((post) => placedPostShape(ctx, post));
  const floorHull = bottomHull(ctx, shapes(floor));
  return panel.length === 0 ? floorHull : ctx.kernel.union([ctx.kernel.hull(shapes(panel)), floorHull]);
};

/**
 * Wall solids in perimeter order, one per segment.
 */
export const wallPieces = <S>(ctx: BuildContext<S>): S[] => {
  const segments = wallSegments(ctx);
  checkPerimeterClosure(ctx, segments);
  return segments.map((segment) => buildWallSegment(ctx, segment));
};

export const buildWalls = <S>(ctx: BuildContext<S>): S => ctx.kernel.union(wallPieces(ctx));
