export { intersectHyperSphere } from "./HyperSphere";
export type { HyperSphere } from "./HyperSphere";
export { intersectHyperCuboid } from "./HyperCuboid";
export type { HyperCuboid } from "./HyperCuboid";
export { intersectHyperPlane } from "./HyperPlane";
export type { HyperPlane } from "./HyperPlane";
