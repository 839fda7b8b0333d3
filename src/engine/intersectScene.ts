// Brute-force closest-hit query: every primitive is tested for every ray.

import type { Ray } from "./Ray";
import type { Hit } from "./Hit";
import { noHit } from "./Hit";
import type { SceneData } from "./SceneData";
import { intersectHyperSphere, intersectHyperCuboid, intersectHyperPlane } from "./primitives";

export function intersectScene(ray: Ray, scene: SceneData): Hit {
  const { minDistance, maxDistance } = scene.camera;
  let closest = noHit(maxDistance);

  const consider = (hit: Hit) => {
    if (hit.hit && hit.distance < closest.distance) closest = hit;
  };

  for (const sphere of scene.hyperSpheres) {
    consider(intersectHyperSphere(ray, sphere, minDistance, maxDistance));
  }
  for (const cuboid of scene.hyperCuboids) {
    consider(intersectHyperCuboid(ray, cuboid, minDistance, maxDistance));
  }
  for (const plane of scene.hyperPlanes) {
    consider(intersectHyperPlane(ray, plane, minDistance, maxDistance));
  }

  return closest;
}
