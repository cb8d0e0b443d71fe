/**
 * CONNECTOR MESHING
 *
 * Webs between neighbouring mounts, described as data before any solid is built.
 *
 * A ConnectorGroup is either
 * - a strip: posts hulled three at a time over a sliding window, or
 * - a hull:  all posts hulled together.
 *
 * Strip windows that repeat a post (fewer than three distinct points) are skipped;
 * the neighbouring windows of the same strip already cover them.
 */

import type { Vec3 } from '../../types';
import { ConfigurationError } from '../errors';
import { assertThumbColumns, isKeyPresent, range, widePinkyRange, type LayoutContext } from './layout';
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
import { leftWallBottomRow, wallLocate1 } from './walls';

export type ConnectorComponent = 'main matrix' | 'inner column' | 'extra row' | 'pinky column' | 'thumb cluster';

export interface ConnectorGroup {
  component: ConnectorComponent;
  mode: 'strip' | 'hull';
  posts: PlacedPost[];
}

const strip = (component: ConnectorComponent, posts: PlacedPost[]): ConnectorGroup => ({
  component,
  mode: 'strip',
  posts,
});

const hull = (component: ConnectorComponent, posts: PlacedPost[]): ConnectorGroup => ({
  component,
  mode: 'hull',
  posts,
});

// Patterns between key (column, row) and its right / lower / lower-right neighbours

const rowStrip = (component: ConnectorComponent, column: number, row: number): ConnectorGroup =>
  strip(component, [
    keyPost(column + 1, row, 'tl'),
    keyPost(column, row, 'tr'),
    keyPost(column + 1, row, 'bl'),
    keyPost(column, row, 'br'),
  ]);

const columnStrip = (component: ConnectorComponent, column: number, row: number): ConnectorGroup =>
  strip(component, [
    keyPost(column, row, 'bl'),
    keyPost(column, row, 'br'),
    keyPost(column, row + 1, 'tl'),
    keyPost(column, row + 1, 'tr'),
  ]);

const diagonalStrip = (component: ConnectorComponent, column: number, row: number): ConnectorGroup =>
  strip(component, [
    keyPost(column, row, 'br'),
    keyPost(column, row + 1, 'tr'),
    keyPost(column + 1, row, 'bl'),
    keyPost(column + 1, row + 1, 'tl'),
  ]);

// 1. Groups per component

export const mainConnectorGroups = ({ params, metrics }: LayoutContext): ConnectorGroup[] => {
  const { ncols } = params;
  const { innerColOffset: io, lastRow, cornerRow } = metrics;
  const c = 'main matrix';

  const rows = range(io, ncols - 1).flatMap((column) => range(0, lastRow).map((row) => rowStrip(c, column, row)));
  const columns = range(io, ncols).flatMap((column) => range(0, cornerRow).map((row) => columnStrip(c, column, row)));
  // Diagonals start at column 0 so the inner column is covered as well
  const diagonals = range(0, ncols - 1).flatMap((column) =>
    range(0, cornerRow).map((row) => diagonalStrip(c, column, row))
  );
  return [...rows, ...columns, ...diagonals];
};

export const innerConnectorGroups = ({ params, metrics }: LayoutContext): ConnectorGroup[] => {
  if (!params.innerColumn) return [];
  const c = 'inner column';
  return [
    ...range(0, params.nrows - 2).map((row) => rowStrip(c, 0, row)),
    ...range(0, metrics.cornerRow - 1).map((row) => columnStrip(c, 0, row)),
  ];
};

export const extraRowConnectorGroups = (ctx: LayoutContext): ConnectorGroup[] => {
  const { params, metrics } = ctx;
  if (!params.extraRow) return [];
  const { ncols } = params;
  const { innerColOffset: io, cornerRow, lastRow } = metrics;
  const c = 'extra row';

  const groups = [
    ...range(io + 2, ncols).map((column) => columnStrip(c, column, cornerRow)),
    ...range(io + 2, ncols - 1).map((column) => diagonalStrip(c, column, cornerRow)),
    ...range(io + 3, ncols - 1).map((column) => rowStrip(c, column, lastRow)),
  ];
  // Outer columns only carry a bottom key for some column counts
  return groups.filter((group) =>
    group.posts.every(({ mount }) => mount.kind !== 'key' || isKeyPresent(ctx, mount.column, mount.row))
  );
};

/**
 * Blends the narrow posts of the outer column into the wide 1.5u posts the right wall follows.
 */
export const pinkyConnectorGroups = (ctx: LayoutContext): ConnectorGroup[] => {
  const wide = widePinkyRange(ctx);
  if (wide === null) return [];
  const { first, last } = wide;
  const { lastCol: col, extraCornerRow } = ctx.metrics;
  const c = 'pinky column';
  const groups: ConnectorGroup[] = [];

  // Row direction: narrow edge to wide edge of the same key
  for (const row of range(first, last + 1)) {
    groups.push(
      strip(c, [
        keyPost(col, row, 'tr'),
        keyPost(col, row, 'tr', 'wide'),
        keyPost(col, row, 'br'),
        keyPost(col, row, 'br', 'wide'),
      ])
    );
  }
  if (last !== extraCornerRow) {
    groups.push(strip(c, [keyPost(col, last + 1, 'tr'), keyPost(col, last, 'br', 'wide'), keyPost(col, last + 1, 'br')]));
  }
  if (first !== 0) {
    groups.push(strip(c, [keyPost(col, first - 1, 'tr'), keyPost(col, first, 'tr', 'wide'), keyPost(col, first - 1, 'br')]));
  }

  // Column direction: the gap between vertically adjacent keys
  for (const row of range(first, last)) {
    groups.push(
      strip(c, [
        keyPost(col, row, 'br'),
        keyPost(col, row, 'br', 'wide'),
        keyPost(col, row + 1, 'tr'),
        keyPost(col, row + 1, 'tr', 'wide'),
      ])
    );
  }
  if (last !== extraCornerRow) {
    groups.push(strip(c, [keyPost(col, last, 'br'), keyPost(col, last, 'br', 'wide'), keyPost(col, last + 1, 'tr')]));
  }
  if (first !== 0) {
    groups.push(strip(c, [keyPost(col, first - 1, 'br'), keyPost(col, first, 'tr', 'wide'), keyPost(col, first, 'tr')]));
  }
  return groups;
};

export const thumbConnectorGroups = (ctx: LayoutContext): ConnectorGroup[] => {
  assertThumbColumns(ctx, 'connector meshing');
  const { params, metrics } = ctx;
  const { innerColOffset: io, cornerRow: cr, lastRow: lr } = metrics;
  const t = (index: number, corner: 'tl' | 'tr' | 'bl' | 'br') => thumbPost(ctx, index, corner);
  const c = 'thumb cluster';

  const groups: ConnectorGroup[] = [
    // Between the two 2u keys
    strip(c, [t(1, 'tr'), t(1, 'br'), t(0, 'tl'), t(0, 'bl')]),
    // Fan between the second 2u key and the two 1u keys
    hull(c, [t(3, 'br'), t(3, 'tr'), t(1, 'bl')]),
    hull(c, [t(1, 'bl'), t(1, 'tl'), t(3, 'tr')]),
    hull(c, [t(3, 'tr'), t(1, 'tl'), t(2, 'br')]),
    hull(c, [t(3, 'tr'), t(2, 'br'), t(2, 'tr')]),
    hull(c, [t(2, 'br'), t(2, 'tr'), t(1, 'tl')]),
    hull(c, [t(1, 'tl'), t(2, 'tr'), t(3, 'tr')]),
    // Between the two 1u keys
    strip(c, [t(3, 'tr'), t(3, 'tl'), t(2, 'br'), t(2, 'bl')]),
    // Top of the cluster to the main matrix, left to right
    strip(c, [
      t(1, 'tl'),
      keyPost(io, cr, 'bl'),
      t(1, 'tr'),
      keyPost(io, cr, 'br'),
      t(0, 'tl'),
      keyPost(io + 1, cr, 'bl'),
      t(0, 'tr'),
      keyPost(io + 1, cr, 'br'),
      keyPost(io + 2, lr, 'tl'),
      keyPost(io + 2, lr, 'bl'),
      t(0, 'tr'),
      keyPost(io + 2, lr, 'bl'),
      t(0, 'br'),
      keyPost(io + 2, lr, 'br'),
      keyPost(io + 3, lr, 'bl'),
      keyPost(io + 2, lr, 'tr'),
      keyPost(io + 3, lr, 'tl'),
      keyPost(io + 3, cr, 'bl'),
      keyPost(io + 3, lr, 'tr'),
      keyPost(io + 3, cr, 'br'),
    ]),
    strip(c, [
      keyPost(io + 1, cr, 'br'),
      keyPost(io + 2, lr, 'tl'),
      keyPost(io + 2, cr, 'bl'),
      keyPost(io + 2, lr, 'tr'),
      keyPost(io + 2, cr, 'br'),
      keyPost(io + 3, cr, 'bl'),
    ]),
  ];

  if (params.extraRow) {
    groups.push(
      strip(c, [keyPost(io + 3, lr, 'tr'), keyPost(io + 3, lr, 'br'), keyPost(io + 4, lr, 'tl'), keyPost(io + 4, lr, 'bl')]),
      strip(c, [keyPost(io + 3, lr, 'tr'), keyPost(io + 3, cr, 'br'), keyPost(io + 4, lr, 'tl'), keyPost(io + 4, cr, 'bl')])
    );
  } else {
    groups.push(
      strip(c, [keyPost(io + 3, lr, 'tr'), keyPost(io + 3, lr, 'br'), keyPost(io + 4, cr, 'bl')]),
      strip(c, [keyPost(io + 3, lr, 'tr'), keyPost(io + 3, cr, 'br'), keyPost(io + 4, cr, 'bl')])
    );
  }

  // Fill below the shorter inner column, down to the first 2u key
  if (params.innerColumn) {
    const corner = keyPost(0, cr, 'tr');
    const above = cr - 1;
    groups.push(
      hull(c, [keyPost(0, above, 'bl'), keyPost(0, above, 'br'), corner]),
      hull(c, [corner, keyPost(1, cr, 'tl'), keyPost(1, cr, 'bl')]),
      hull(c, [keyPost(0, above, 'bl'), corner, keyPost(1, cr, 'bl')]),
      hull(c, [
        withOffset(keyPost(0, leftWallBottomRow(ctx), 'bl'), wallLocate1(ctx, [-1, 0])),
        keyPost(0, above, 'bl'),
        keyPost(1, cr, 'bl'),
        t(1, 'tl'),
      ])
    );
  }

  return groups;
};

export const connectorGroups = (ctx: LayoutContext): ConnectorGroup[] => [
  ...mainConnectorGroups(ctx),
  ...innerConnectorGroups(ctx),
  ...extraRowConnectorGroups(ctx),
  ...pinkyConnectorGroups(ctx),
  ...thumbConnectorGroups(ctx),
];

// 2. Hull sets

const distinctCount = (points: readonly Vec3[], tolerance: number): number =>
  points.filter((p, i) => points.slice(0, i).every((q) => distance(p, q) > tolerance)).length;

const describe = (group: ConnectorGroup, posts: readonly PlacedPost[]): string =>
  `${group.component} ${group.mode} [${posts.map(placedPostLabel).join(' ')}]`;

/**
 * The post sets a group hulls, validated: every set spans at least a plane.
 */
export const groupHullSets = (ctx: LayoutContext, group: ConnectorGroup, tolerance = 1e-9): PlacedPost[][] => {
  const candidates =
    group.mode === 'hull'
      ? [group.posts]
      : range(0, group.posts.length - 2).map((i) => group.posts.slice(i, i + 3));

  const sets: PlacedPost[][] = [];
  for (const posts of candidates) {
    const points = posts.map((post) => placedPostPoint(ctx, post));
    if (group.mode === 'strip' && distinctCount(points, tolerance) < 3) continue;
    if (!spansPlane(points, tolerance)) {
      throw new ConfigurationError('connector meshing', `degenerate hull in ${describe(group, posts)}`);
    }
    sets.push(posts);
  }

  if (sets.length === 0) {
    throw new ConfigurationError('connector meshing', `no hull with three distinct posts in ${describe(group, group.posts)}`);
  }
  return sets;
};

export const connectorHullSets = (ctx: LayoutContext, groups = connectorGroups(ctx)): PlacedPost[][] =>
  groups.flatMap((group) => groupHullSets(ctx, group));

// 3. Solids

/**
 * One convex web per hull set.
 */
export const connectorHulls = <S>(ctx: BuildContext<S>, groups: ConnectorGroup[] = connectorGroups(ctx)): S[] =>
  connectorHullSets(ctx, groups).map((posts) => ctx.kernel.hull(posts.map((post) => placedPostShape(ctx, post))));

export const buildConnectors = <S>(ctx: BuildContext<S>, groups: ConnectorGroup[] = connectorGroups(ctx)): S =>
  ctx.kernel.union(connectorHulls(ctx, groups));
