/**
 * ASSEMBLY
 *
 * Combines the generated pieces into the printable parts:
 * - right case:  mounts + webs + walls + hardware, minus cutouts, trimmed at the print bed
 * - base plate:  convex shadows of the case pieces extruded to a thin plate, plus the
 *                palm rest, minus countersinks, plus the controller holder
 * - left halves: mirror images of the right parts
 * - preview:     keycaps over the mounts
 */

import { connectorHulls } from './connectors';
import {
  caseControllerHolder,
  controlSwitchHoles,
  palmRest,
  plateScrewHoles,
  screwInsertHoles,
  screwInsertOuterPieces,
} from './hardware';
import { keyCaps, keyHolePieces } from './matrixLayout';
import type { BuildContext } from './placement';
import { thumbCaps, thumbPlatePieces, thumbStabilizerCutouts } from './thumbCluster';
import { wallPieces } from './walls';

export type BuildStage = 'key mounts' | 'thumb cluster' | 'connectors' | 'walls' | 'hardware' | 'trim';

export interface BuildOptions {
  left?: boolean;     // Also produce the mirrored left halves
  preview?: boolean;  // Also produce the keycap preview
  onProgress?: (stage: BuildStage) => void;
}

export interface CaseParts<S> {
  right: S;
  plate: S;
  left?: S;
  leftPlate?: S;
  preview?: S;
}

/**
 * Everything below z = 0 is removed from the case.
 */
export const trimSlab = <S>(ctx: BuildContext<S>): S => ctx.kernel.cuboid([350, 350, 40], [0, 0, -20]);

export const buildCase = <S>(ctx: BuildContext<S>, options: BuildOptions = {}): CaseParts<S> => {
  const { kernel, params } = ctx;
  const report = options.onProgress ?? (() => undefined);

  report('key mounts');
  const mountPieces = keyHolePieces(ctx);

  report('thumb cluster');
  const thumbPieces = thumbPlatePieces(ctx);

  report('connectors');
  const connectorPieces = connectorHulls(ctx);

  report('walls');
  const walls = wallPieces(ctx);

  report('hardware');
  const insertOuters = screwInsertOuterPieces(ctx);
  const controller = caseControllerHolder(ctx);
  const shell = kernel.difference(kernel.union([...walls, ...insertOuters, controller.retainer]), [
    controlSwitchHoles(ctx),
    screwInsertHoles(ctx),
    controller.usbCutout,
  ]);

  report('trim');
  const body = kernel.union([...mountPieces, ...connectorPieces, ...thumbPieces, shell]);
  // Stabilizer bar clearance reaches past the plate, so it is cut last
  const right = kernel.difference(body, [thumbStabilizerCutouts(ctx), trimSlab(ctx)]);

  // Each plate, web, wall segment and insert casts its own convex shadow, which also
  // covers the switch holes
  const plateThickness = params.basePlateThickness;
  const footprint = kernel.extrudeFootprint(
    [...mountPieces, ...thumbPieces, ...connectorPieces, ...walls, ...insertOuters],
    plateThickness
  );
  const plate = kernel.union([
    kernel.difference(kernel.union([footprint, palmRest(ctx)]), [plateScrewHoles(ctx, plateThickness)]),
    kernel.translate([0, 0, plateThickness], controller.holder),
  ]);

  const parts: CaseParts<S> = { right, plate };
  if (options.left) {
    parts.left = kernel.mirror([1, 0, 0], right);
    parts.leftPlate = kernel.mirror([1, 0, 0], plate);
  }
  if (options.preview) {
    parts.preview = kernel.union([keyCaps(ctx), thumbCaps(ctx)]);
  }
  return parts;
};
