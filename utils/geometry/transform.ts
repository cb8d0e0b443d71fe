/**
 * TRANSFORM MODULE
 *
 * One description of a rigid placement, two interpreters.
 *
 * A Pose is an ordered list of translate / rotate steps. applyPose() walks the
 * list against any TransformOps implementation: pointOps moves a bare Vec3,
 * a ShapeKernel moves a solid. Because both paths consume the same step list,
 * a corner post placed as a solid lands exactly where its reference point lands.
 */

import * as THREE from 'three';
import type { Vec3 } from '../../types';

export type TransformStep =
  | { op: 'translate'; offset: Vec3 }
  | { op: 'rotateX'; angle: number }
  | { op: 'rotateY'; angle: number }
  | { op: 'rotateZ'; angle: number };

export type Pose = readonly TransformStep[];

/**
 * The capability a value needs in order to be placed.
 */
export interface TransformOps<T> {
  translate: (offset: Vec3, target: T) => T;
  rotateX: (angle: number, target: T) => T;
  rotateY: (angle: number, target: T) => T;
  rotateZ: (angle: number, target: T) => T;
}

const AXIS_X = new THREE.Vector3(1, 0, 0);
const AXIS_Y = new THREE.Vector3(0, 1, 0);
const AXIS_Z = new THREE.Vector3(0, 0, 1);

const rotatePoint = (axis: THREE.Vector3, angle: number, p: Vec3): Vec3 => {
  const v = new THREE.Vector3(p[0], p[1], p[2]).applyAxisAngle(axis, angle);
  return [v.x, v.y, v.z];
};

export const pointOps: TransformOps<Vec3> = {
  translate: (offset, p) => addVec(p, offset),
  rotateX: (angle, p) => rotatePoint(AXIS_X, angle, p),
  rotateY: (angle, p) => rotatePoint(AXIS_Y, angle, p),
  rotateZ: (angle, p) => rotatePoint(AXIS_Z, angle, p),
};

export const applyPose = <T>(ops: TransformOps<T>, pose: Pose, target: T): T =>
  pose.reduce<T>((acc, step) => {
    switch (step.op) {
      case 'translate':
        return ops.translate(step.offset, acc);
      case 'rotateX':
        return ops.rotateX(step.angle, acc);
      case 'rotateY':
        return ops.rotateY(step.angle, acc);
      case 'rotateZ':
        return ops.rotateZ(step.angle, acc);
    }
  }, target);

const stepMatrix = (step: TransformStep): THREE.Matrix4 => {
  switch (step.op) {
    case 'translate':
      return new THREE.Matrix4().makeTranslation(step.offset[0], step.offset[1], step.offset[2]);
    case 'rotateX':
      return new THREE.Matrix4().makeRotationX(step.angle);
    case 'rotateY':
      return new THREE.Matrix4().makeRotationY(step.angle);
    case 'rotateZ':
      return new THREE.Matrix4().makeRotationZ(step.angle);
  }
};

/**
 * Collapse a pose into a single rigid matrix (later steps multiply on the left).
 */
export const poseMatrix = (pose: Pose): THREE.Matrix4 =>
  pose.reduce((m, step) => m.premultiply(stepMatrix(step)), new THREE.Matrix4());

/**
 * Rotation + translation form of a pose.
 */
export const decomposePose = (pose: Pose): { rotation: THREE.Quaternion; translation: Vec3 } => {
  const position = new THREE.Vector3();
  const rotation = new THREE.Quaternion();
  const scale = new THREE.Vector3();
  poseMatrix(pose).decompose(position, rotation, scale);
  return { rotation, translation: [position.x, position.y, position.z] };
};

// Vec3 helpers

export const addVec = (a: Vec3, b: Vec3): Vec3 => [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
export const subVec = (a: Vec3, b: Vec3): Vec3 => [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
export const scaleVec = (v: Vec3, k: number): Vec3 => [v[0] * k, v[1] * k, v[2] * k];

export const cross = (a: Vec3, b: Vec3): Vec3 => [
  a[1] * b[2] - a[2] * b[1],
  a[2] * b[0] - a[0] * b[2],
  a[0] * b[1] - a[1] * b[0],
];

export const length = (v: Vec3): number => Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);

export const distance = (a: Vec3, b: Vec3): number => length(subVec(a, b));

export const deg2rad = (degrees: number): number => (degrees / 180) * Math.PI;

/**
 * True when the points span at least a plane (three of them are not collinear).
 */
export const spansPlane = (points: readonly Vec3[], tolerance = 1e-9): boolean => {
  for (let i = 0; i < points.length; i++) {
    for (let j = i + 1; j < points.length; j++) {
      const ab = subVec(points[j], points[i]);
      if (length(ab) <= tolerance) continue;
      for (let k = j + 1; k < points.length; k++) {
        const ac = subVec(points[k], points[i]);
        if (length(cross(ab, ac)) > tolerance) return true;
      }
    }
  }
  return false;
};
