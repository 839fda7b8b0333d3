import { vec3 } from "gl-matrix";
import type { ReadonlyVec3 } from "gl-matrix";

export interface Material {
  /** Albedo, each channel in [0, 1]. */
  baseColor: ReadonlyVec3;
  emissiveColor: ReadonlyVec3;
  emissionStrength: number;
}

/** Light grey, non-emissive. Used when a primitive is added without a material. */
export function defaultMaterial(): Material {
  return {
    baseColor: vec3.fromValues(0.9, 0.9, 0.9),
    emissiveColor: vec3.fromValues(0, 0, 0),
    emissionStrength: 0,
  };
}
