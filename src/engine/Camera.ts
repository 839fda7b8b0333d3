// Camera - the per-frame camera record and primary ray generation.
//
// The record carries an explicit orthonormal basis (FlyCamera derives it from
// angles) plus the integrator settings that travel with it.

import { vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";
import type { Ray } from "./Ray";

export interface Camera {
  position: ReadonlyVec4;
  forward: ReadonlyVec4;
  right: ReadonlyVec4;
  up: ReadonlyVec4;
  /** Full field of view in radians, measured vertically. */
  fov: number;
  minDistance: number;
  maxDistance: number;
  bounceCount: number;
  sampleCount: number;
}

/**
 * Maps pixel (x, y) of a width x height image to a world-space ray.
 * Pixel rows grow downwards; the camera's up axis points to row 0.
 */
export function primaryRay(x: number, y: number, width: number, height: number, camera: Camera): Ray {
  const aspect = width / height;
  const scale = Math.tan(camera.fov / 2);

  const u = ((x / width) * 2 - 1) * aspect * scale;
  const v = ((1 - y / height) * 2 - 1) * scale;

  const direction = vec4.clone(camera.forward);
  vec4.scaleAndAdd(direction, direction, camera.right, u);
  vec4.scaleAndAdd(direction, direction, camera.up, v);
  vec4.normalize(direction, direction);

  return { origin: vec4.clone(camera.position), direction };
}
