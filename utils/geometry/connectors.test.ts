import { describe, expect, it } from 'vitest';
import type { ShapeParameters } from '../../types';
import { createShapeParameters } from '../params';
import {
  connectorGroups,
  connectorHullSets,
  extraRowConnectorGroups,
  groupHullSets,
  innerConnectorGroups,
  mainConnectorGroups,
  pinkyConnectorGroups,
  thumbConnectorGroups,
  type ConnectorGroup,
} from './connectors';
import { createLayoutContext, enumerateKeyAddresses } from './layout';
import { keyPost, mountLabel, placedPostPoint, withOffset } from './placement';
import { spansPlane } from './transform';

const layout = (overrides: Partial<ShapeParameters> = {}) => createLayoutContext(createShapeParameters(overrides));

const variants: Array<[string, Partial<ShapeParameters>]> = [
  ['default', {}],
  ['extra row', { extraRow: true }],
  ['extra row with 1.5u bottom key', { extraRow: true, last15uRow: 4 }],
  ['no inner column', { innerColumn: false }],
  ['no 1.5u keys', { pinky15u: false }],
  ['1.5u rows 1..2', { first15uRow: 1, last15uRow: 2 }],
  ['six rows', { nrows: 6 }],
  ['orthographic', { columnStyle: 'orthographic' }],
  ['fixed', { columnStyle: 'fixed' }],
];

describe('connector groups', () => {
  it('has the expected group counts for the default layout', () => {
    const ctx = layout();
    expect(mainConnectorGroups(ctx)).toHaveLength(56);
    expect(innerConnectorGroups(ctx)).toHaveLength(5);
    expect(extraRowConnectorGroups(ctx)).toHaveLength(0);
    expect(pinkyConnectorGroups(ctx)).toHaveLength(7);
    expect(thumbConnectorGroups(ctx)).toHaveLength(16);
    expect(connectorGroups(ctx)).toHaveLength(84);
  });

  it('skips strip windows that repeat a post', () => {
    expect(connectorHullSets(layout())).toHaveLength(173);
  });

  it('adds pinky blends on both sides of an inner 1.5u range', () => {
    const groups = pinkyConnectorGroups(layout({ first15uRow: 1, last15uRow: 2 }));
    // Two rows of blends, the gap between them, and a cap above and below in each direction
    expect(groups).toHaveLength(2 + 1 + 4);
  });

  it('falls back to the baseline mesh for an empty 1.5u range', () => {
    expect(pinkyConnectorGroups(layout({ first15uRow: 3, last15uRow: 1 }))).toEqual([]);
    expect(connectorGroups(layout({ first15uRow: 3, last15uRow: 1 }))).toEqual(
      connectorGroups(layout({ pinky15u: false }))
    );
  });

  it('only meshes bottom-row keys that exist', () => {
    const ctx = layout({ extraRow: true });
    const present = new Set(enumerateKeyAddresses(ctx).map(({ column, row }) => `K(${column},${row})`));
    for (const group of extraRowConnectorGroups(ctx)) {
      for (const { mount } of group.posts) expect(present.has(mountLabel(mount))).toBe(true);
    }
  });

  it('needs enough columns for the thumb cluster', () => {
    expect(() => thumbConnectorGroups(layout({ ncols: 5 }))).toThrow(
      'connector meshing: the thumb cluster needs at least 6 columns, got 5'
    );
  });
});

describe.each(variants)('hull sets (%s)', (_name, overrides) => {
  const ctx = layout(overrides);
  const sets = connectorHullSets(ctx);

  it('hulls at least three posts spanning a plane', () => {
    for (const posts of sets) {
      expect(posts.length).toBeGreaterThanOrEqual(3);
      expect(spansPlane(posts.map((post) => placedPostPoint(ctx, post)))).toBe(true);
    }
  });

  it('joins every key and thumb mount into one web', () => {
    const parent = new Map<string, string>();
    const find = (label: string): string => {
      const up = parent.get(label) ?? label;
      if (up === label) return label;
      const root = find(up);
      parent.set(label, root);
      return root;
    };
    for (const posts of sets) {
      const [first, ...rest] = posts.map(({ mount }) => find(mountLabel(mount)));
      for (const label of rest) if (label !== first) parent.set(label, first);
    }

    const mounts = [
      ...enumerateKeyAddresses(ctx).map(({ column, row }) => `K(${column},${row})`),
      'T0',
      'T1',
      'T2',
      'T3',
    ];
    const roots = new Set(mounts.map(find));
    expect(roots.size).toBe(1);
  });
});

describe('groupHullSets', () => {
  const ctx = layout();

  it('rejects a strip without three distinct posts', () => {
    const group: ConnectorGroup = {
      component: 'main matrix',
      mode: 'strip',
      posts: [keyPost(1, 0, 'tl'), keyPost(1, 0, 'tl'), keyPost(1, 0, 'tr')],
    };
    expect(() => groupHullSets(ctx, group)).toThrow(
      'connector meshing: no hull with three distinct posts in main matrix strip [K(1,0).tl K(1,0).tl K(1,0).tr]'
    );
  });

  it('rejects a collinear hull', () => {
    const post = keyPost(1, 0, 'tl');
    const group: ConnectorGroup = {
      component: 'thumb cluster',
      mode: 'hull',
      posts: [post, withOffset(post, [1, 0, 0]), withOffset(post, [2, 0, 0])],
    };
    expect(() => groupHullSets(ctx, group)).toThrow(/^connector meshing: degenerate hull in thumb cluster hull/);
  });

  it('slides a window of three over a strip', () => {
    const [rowStrip] = mainConnectorGroups(ctx);
    expect(groupHullSets(ctx, rowStrip)).toEqual([rowStrip.posts.slice(0, 3), rowStrip.posts.slice(1, 4)]);
  });
});
