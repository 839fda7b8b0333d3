import { vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";

export interface Ray {
  origin: vec4;
  /** Unit length. Every ray producer normalizes before handing the ray on. */
  direction: vec4;
}

export function createRay(origin: ReadonlyVec4, direction: ReadonlyVec4): Ray {
  return { origin: vec4.clone(origin), direction: vec4.clone(direction) };
}

/** Point along the ray at parametric distance `t`. */
export function rayAt(out: vec4, ray: Ray, t: number): vec4 {
  return vec4.scaleAndAdd(out, ray.origin, ray.direction, t);
}
