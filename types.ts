export type Vec2 = [number, number];
export type Vec3 = [number, number, number];

export type ColumnStyle = 'standard' | 'orthographic' | 'fixed';
export type ThumbKeySize = '1u' | '2u';

export interface ThumbKeyPlacement {
  size: ThumbKeySize;
  lift: number;          // Z shift applied before rotating (mm)
  rotation: Vec3;        // Rotation about X, then Y, then Z (degrees)
  offset: Vec3;          // Translation relative to the thumb origin (mm)
}

export interface ScrewInsertAnchor {
  column: number | 'last';
  row: number | 'last';
  offset: Vec3;          // Nudge applied after the wall-relative position (mm)
}

export interface ShapeParameters {
  // Matrix
  nrows: number;
  ncols: number;

  // Curvature
  alpha: number;         // Row-to-row tilt about X (radians)
  beta: number;          // Column-to-column tilt about Y (radians)
  centerRow: number;     // Row with zero front-back tilt
  centerCol: number;     // Column with zero left-right tilt
  tentingAngle: number;  // Global rotation about Y (radians)
  columnStyle: ColumnStyle;
  columnOffsets: Vec3[]; // Hand-tuned per-column stagger, indexed by column (mm)

  // Toggles
  pinky15u: boolean;     // Outer column uses 1.5u keys
  first15uRow: number;   // First row with a 1.5u key on the outer column
  last15uRow: number;    // Last row with a 1.5u key on the outer column
  extraRow: boolean;     // Adds a bottom row to the outer columns
  innerColumn: boolean;  // Adds an inner column (two rows shorter)
  createSideNubs: boolean; // Cherry MX / Gateron retention nubs

  // Fixed column style tables (indexed by column)
  fixedAngles: number[]; // Column tilt about Y (radians)
  fixedX: number[];      // Column X position relative to the middle finger (mm)
  fixedZ: number[];      // Column height (mm)
  fixedTenting: number;  // Tenting applied inside the fixed style (radians)

  // Thumb cluster
  thumbOffsets: Vec3;    // Thumb origin nudge from the anchor key corner (mm)
  thumbKeys: ThumbKeyPlacement[];

  // Spacing
  keyboardZOffset: number; // Overall height (mm)
  extraWidth: number;    // Extra space between columns (mm)
  extraHeight: number;   // Extra space between rows (mm)

  // Walls
  wallZOffset: number;   // Length of the first downward-sloping part of the wall (negative, mm)
  wallXyOffset: number;  // Horizontal offset of the first sloping part (mm)
  wallThickness: number; // Wall thickness (mm)
  leftWallXOffset: number;
  leftWallZOffset: number;

  // Hardware
  screwInserts: ScrewInsertAnchor[];
  basePlateThickness: number; // Bottom plate thickness (mm)
  controllerOffset: Vec3;     // Controller holder nudge from its reference point (mm)
  controllerOrientation: number; // Controller holder rotation about Z (degrees)
}

const deg = (d: number) => (d * Math.PI) / 180;

export const DEFAULT_PARAMS: ShapeParameters = {
  nrows: 5,
  ncols: 7,

  alpha: Math.PI / 12,
  beta: Math.PI / 36,
  centerRow: 2,
  centerCol: 4,
  tentingAngle: Math.PI / 12,
  columnStyle: 'standard',
  columnOffsets: [
    [0, -2, 0],
    [0, -2, 0],
    [0, 0, 0],
    [0, 2.82, -4.5],
    [0, 0, 0],
    [0, -12, 5.64],
    [0, -12, 5.64],
  ],

  pinky15u: true,
  first15uRow: 0,
  last15uRow: 3,
  extraRow: false,
  innerColumn: true,
  createSideNubs: true,

  // Roughly Maltron
  fixedAngles: [deg(10), deg(10), 0, 0, 0, deg(-15), deg(-15)],
  fixedX: [-41.5, -22.5, 0, 20.3, 41.4, 65.5, 89.6],
  fixedZ: [12.1, 8.3, 0, 5, 10.7, 14.5, 17.5],
  fixedTenting: 0,

  thumbOffsets: [6, -3, 7],
  thumbKeys: [
    { size: '2u', lift: 0, rotation: [10, -23, 10], offset: [-9, -16, 3] },
    { size: '2u', lift: 0, rotation: [10, -2, 12.5], offset: [-30.5, -25, -2] },
    { size: '1u', lift: 1.5, rotation: [10, 15, 15.5], offset: [-52.75, -26.4, 3] },
    { size: '1u', lift: -1.5, rotation: [10, 15, 15.5], offset: [-48.7, -45.25, -1.5] },
  ],

  keyboardZOffset: 10,
  extraWidth: 2.5,
  extraHeight: 1.0,

  wallZOffset: -2,
  wallXyOffset: 0.5,
  wallThickness: 2,
  leftWallXOffset: 0,
  leftWallZOffset: 0.5,

  screwInserts: [
    { column: 'last', row: 0, offset: [4.5, 5, 0] },
    { column: 'last', row: 'last', offset: [7.5, 14.5, 0] },
    { column: 0, row: 'last', offset: [3, -42, 0] },
    { column: 0, row: 2, offset: [4, -7, 0] },
    { column: 0, row: 0, offset: [7, 5, 0] },
  ],
  basePlateThickness: 2.6,
  controllerOffset: [-2, -1.7375, 0],
  controllerOrientation: 180,
};
