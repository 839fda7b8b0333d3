// HyperPlane - infinite 3-dimensional plane in 4D, given by a point and a unit normal.

import { vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";
import type { Ray } from "../Ray";
import { rayAt } from "../Ray";
import type { Hit } from "../Hit";
import { noHit } from "../Hit";

export interface HyperPlane {
  name?: string;
  point: ReadonlyVec4;
  normal: ReadonlyVec4;
  material: number;
}

export function intersectHyperPlane(
  ray: Ray,
  plane: HyperPlane,
  minDistance: number,
  maxDistance: number,
): Hit {
  const denominator = vec4.dot(ray.direction, plane.normal);
  if (denominator === 0) return noHit();

  const toPlane = vec4.subtract(vec4.create(), plane.point, ray.origin);
  const distance = vec4.dot(toPlane, plane.normal) / denominator;
  if (distance < minDistance || distance > maxDistance) return noHit();

  const position = rayAt(vec4.create(), ray, distance);
  const normal = vec4.clone(plane.normal);
  if (denominator > 0) {
    vec4.negate(normal, normal);
  }

  return { hit: true, distance, position, normal, material: plane.material };
}
