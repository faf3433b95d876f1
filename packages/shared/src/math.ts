import { quat, vec3 } from 'gl-matrix';
import type { Pose, Quat, Region, Vec3 } from './types';

export function copyVec3(v: Vec3): Vec3 {
  return [v[0], v[1], v[2]];
}

export function copyPose(pose: Pose): Pose {
  return {
    position: copyVec3(pose.position),
    orientation: [pose.orientation[0], pose.orientation[1], pose.orientation[2], pose.orientation[3]],
  };
}

// Bit-for-bit comparisons; a speculative write either took or it did not
export function sameVec3(a: Vec3, b: Vec3): boolean {
  return vec3.exactEquals(a, b);
}

export function samePose(a: Pose, b: Pose): boolean {
  return vec3.exactEquals(a.position, b.position) && quat.exactEquals(a.orientation, b.orientation);
}

export function addVec3(a: Vec3, b: readonly [number, number, number]): Vec3 {
  const out: Vec3 = [0, 0, 0];
  vec3.add(out, a, b);
  return out;
}

export function scaleVec3(a: Vec3, s: number): Vec3 {
  const out: Vec3 = [0, 0, 0];
  vec3.scale(out, a, s);
  return out;
}

export function distance(a: Vec3, b: Vec3): number {
  return vec3.distance(a, b);
}

export function magnitude(v: Vec3): number {
  return vec3.length(v);
}

/** Rotates `orientation` about its local X axis. */
export function rotateAboutX(orientation: Quat, radians: number): Quat {
  const out: Quat = [0, 0, 0, 1];
  quat.rotateX(out, orientation, radians);
  return out;
}

export function insideRegion(point: Vec3, region: Region): boolean {
  for (let i = 0; i < 3; i++) {
    const lo = Math.min(region.min[i], region.max[i]);
    const hi = Math.max(region.min[i], region.max[i]);
    if (point[i] < lo || point[i] > hi) return false;
  }
  return true;
}
