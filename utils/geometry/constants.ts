/**
 * Switch, plate and post dimensions (mm). These describe hardware, not shape,
 * so they are not part of ShapeParameters.
 */

export const KEYSWITCH_HEIGHT = 14.15;
export const KEYSWITCH_WIDTH = 14.15;
export const SA_PROFILE_KEY_HEIGHT = 12.7;

export const PLATE_THICKNESS = 4;
export const SIDE_NUB_THICKNESS = 4;
export const RETENTION_TAB_THICKNESS = 1.5;
export const RETENTION_TAB_HOLE_THICKNESS = PLATE_THICKNESS + 0.5 - RETENTION_TAB_THICKNESS;

export const CAP_TOP_HEIGHT = PLATE_THICKNESS + SA_PROFILE_KEY_HEIGHT;

export const MOUNT_WIDTH = KEYSWITCH_WIDTH + 3.2;
export const MOUNT_HEIGHT = KEYSWITCH_HEIGHT + 2.7;

export const SA_LENGTH = 18.25;
export const SA_DOUBLE_LENGTH = 37.5;

export const WEB_THICKNESS = 4.5;
export const POST_SIZE = 0.1;
export const POST_ADJ = POST_SIZE / 2;

// Key offset on the outer column when it carries 1.5u keys (standard style only)
export const WIDE_KEY_SHIFT = 4.7625;

// The bottom hull projects lips onto a slab this far below the print bed
export const FLOOR_PROJECTION_Z = -10;
export const FLOOR_PROJECTION_HEIGHT = 0.001;

export const CYLINDER_SEGMENTS = 30;
export const SIDE_NUB_SEGMENTS = 100;

export const inchesToMm = (inches: number): number => inches * 25.4;
