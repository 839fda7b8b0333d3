import { vec4 } from "gl-matrix";

export interface Hit {
  hit: boolean;
  /** Only meaningful when `hit` is true, except on the scene intersector's sentinel. */
  distance: number;
  position: vec4;
  /** Unit normal, always facing the incoming ray. */
  normal: vec4;
  material: number;
}

export function noHit(distance = Infinity): Hit {
  return {
    hit: false,
    distance,
    position: vec4.create(),
    normal: vec4.create(),
    material: 0,
  };
}
