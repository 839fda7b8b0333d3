// HyperSphere - the set of 4D points at `radius` from `center`.
//
// The quadratic uses full 4-component dot products; w participates like any
// other axis.

import { vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";
import type { Ray } from "../Ray";
import { rayAt } from "../Ray";
import type { Hit } from "../Hit";
import { noHit } from "../Hit";

export interface HyperSphere {
  name?: string;
  center: ReadonlyVec4;
  radius: number;
  material: number;
}

export function intersectHyperSphere(
  ray: Ray,
  sphere: HyperSphere,
  minDistance: number,
  maxDistance: number,
): Hit {
  const oc = vec4.subtract(vec4.create(), ray.origin, sphere.center);
  const a = vec4.dot(ray.direction, ray.direction);
  const halfB = vec4.dot(oc, ray.direction);
  const c = vec4.dot(oc, oc) - sphere.radius * sphere.radius;

  const discriminant = halfB * halfB - a * c;
  if (discriminant < 0) return noHit();

  const sqrtD = Math.sqrt(discriminant);
  const near = (-halfB - sqrtD) / a;
  const far = (-halfB + sqrtD) / a;

  // Each root is range-checked on its own, so a ray starting inside the
  // sphere still finds the far side.
  let distance: number;
  if (near >= minDistance && near <= maxDistance) {
    distance = near;
  } else if (far >= minDistance && far <= maxDistance) {
    distance = far;
  } else {
    return noHit();
  }

  const position = rayAt(vec4.create(), ray, distance);
  const normal = vec4.subtract(vec4.create(), position, sphere.center);
  vec4.normalize(normal, normal);

  const toOrigin = vec4.subtract(vec4.create(), ray.origin, position);
  if (vec4.dot(normal, toOrigin) < 0) {
    vec4.negate(normal, normal);
  }

  return { hit: true, distance, position, normal, material: sphere.material };
}
