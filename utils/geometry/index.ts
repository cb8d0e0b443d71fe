/**
 * GEOMETRY MODULE INDEX
 *
 * Re-exports the case generators. Import from here for the public surface.
 *
 * Structure:
 * - transform.ts       : Pose steps, point interpreter, vector helpers
 * - curvature.ts       : Key poses for the standard / orthographic / fixed styles
 * - layout.ts          : Derived metrics and key-presence predicates
 * - placement.ts       : Mount poses (keys and thumbs), placed corner posts
 * - kernel.ts          : ShapeKernel interface (jscadKernel, pointCloudKernel)
 * - keyPlate.ts        : Switch plates, stabilizer cutout, caps
 * - matrixLayout.ts    : Solids at every key address
 * - thumbCluster.ts    : Solids at the four thumb positions
 * - connectors.ts      : Web connector groups and hull sets
 * - walls.ts           : Perimeter stations, braces, bridge
 * - hardware.ts        : Screw inserts, controller holder, palm rest
 * - assembly.ts        : Right / left case, base plate, keycap preview
 */

// Math and layout
export { applyPose, pointOps, poseMatrix, decomposePose, type Pose, type TransformStep, type TransformOps } from './transform';
export { keyPose, columnOffset } from './curvature';
export {
  createLayoutContext,
  enumerateKeyAddresses,
  isKeyPresent,
  isWideKey,
  widePinkyRange,
  type KeyAddress,
  type KeyboardMetrics,
  type LayoutContext,
} from './layout';
export {
  createBuildContext,
  keyPosition,
  leftKeyPosition,
  mountPose,
  placePoint,
  placeShape,
  thumbOrigin,
  thumbPose,
  type BuildContext,
  type MountRef,
  type PlacedPost,
} from './placement';

// Kernels
export type { Bounds, ShapeKernel } from './kernel';
export { jscadKernel } from './jscadKernel';
export { pointCloudKernel, type PointCloud } from './pointCloudKernel';

// Generators
export { connectorGroups, connectorHullSets, buildConnectors, type ConnectorGroup } from './connectors';
export { wallSegments, perimeterStations, checkPerimeterClosure, buildWalls, type WallSegment, type WallStation } from './walls';
export { screwInsertPosition, controllerHolder, palmRestOutline } from './hardware';
export { buildCase, type BuildOptions, type BuildStage, type CaseParts } from './assembly';
