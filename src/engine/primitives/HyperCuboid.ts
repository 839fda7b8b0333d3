// HyperCuboid - axis-aligned 4D box given by a center and per-axis half-extents.
//
// Slab test over x, y, z and w. The entry distance is the largest per-axis
// entry, the exit distance the smallest per-axis exit; the box is hit when the
// entry does not come after the exit.

import { vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";
import type { Ray } from "../Ray";
import { rayAt } from "../Ray";
import type { Hit } from "../Hit";
import { noHit } from "../Hit";

export interface HyperCuboid {
  name?: string;
  center: ReadonlyVec4;
  halfExtents: ReadonlyVec4;
  material: number;
}

export function intersectHyperCuboid(
  ray: Ray,
  cuboid: HyperCuboid,
  minDistance: number,
  maxDistance: number,
): Hit {
  let entry = -Infinity;
  let exit = Infinity;
  let entryAxis = -1;
  let exitAxis = -1;

  for (let axis = 0; axis < 4; axis++) {
    const origin = ray.origin[axis];
    const direction = ray.direction[axis];
    const lo = cuboid.center[axis] - cuboid.halfExtents[axis];
    const hi = cuboid.center[axis] + cuboid.halfExtents[axis];

    if (direction === 0) {
      // Parallel to this slab: either always inside it or never.
      if (origin < lo || origin > hi) return noHit();
      continue;
    }

    const t0 = (lo - origin) / direction;
    const t1 = (hi - origin) / direction;
    const near = Math.min(t0, t1);
    const far = Math.max(t0, t1);

    if (near > entry) {
      entry = near;
      entryAxis = axis;
    }
    if (far < exit) {
      exit = far;
      exitAxis = axis;
    }
  }

  if (entry > exit) return noHit();

  let distance: number;
  let axis: number;
  if (entry >= minDistance && entry <= maxDistance) {
    distance = entry;
    axis = entryAxis;
  } else if (exit >= minDistance && exit <= maxDistance) {
    // Origin inside the box (or entry closer than minDistance): leave through the far face.
    distance = exit;
    axis = exitAxis;
  } else {
    return noHit();
  }
  if (axis < 0) return noHit();

  const position = rayAt(vec4.create(), ray, distance);
  const normal = vec4.create();
  normal[axis] = ray.direction[axis] > 0 ? -1 : 1;

  return { hit: true, distance, position, normal, material: cuboid.material };
}
