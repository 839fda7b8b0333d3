import type { Camera } from "./Camera";
import type { Material } from "./Material";
import type { HyperSphere, HyperCuboid, HyperPlane } from "./primitives";

/**
 * Everything one render reads. Built once per frame by the host and never
 * mutated while a frame is in flight; every `material` index must be valid
 * for `materials`.
 */
export interface SceneData {
  camera: Camera;
  hyperSpheres: readonly HyperSphere[];
  hyperCuboids: readonly HyperCuboid[];
  hyperPlanes: readonly HyperPlane[];
  materials: readonly Material[];
}
