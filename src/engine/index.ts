export type { Camera } from "./Camera";
export { primaryRay } from "./Camera";
export type { Ray } from "./Ray";
export { createRay, rayAt } from "./Ray";
export type { Hit } from "./Hit";
export { noHit } from "./Hit";
export type { Material } from "./Material";
export { defaultMaterial } from "./Material";
export type { RngState } from "./Rng";
export { createRng, pixelSeed, nextUniform, nextNormal, nextDirection4, nextHemisphereDirection4 } from "./Rng";
export type { HyperSphere, HyperCuboid, HyperPlane } from "./primitives";
export { intersectHyperSphere, intersectHyperCuboid, intersectHyperPlane } from "./primitives";
export type { SceneData } from "./SceneData";
export { intersectScene } from "./intersectScene";
export { skyGradient, traceSample, renderPixel, SKY_DOWN, SKY_UP } from "./PathTracer";
export { Framebuffer } from "./Framebuffer";
export type { Tile } from "./tiles";
export { DEFAULT_TILE_SIZE, splitTiles, renderTile } from "./tiles";
export type { Renderer, RenderOptions } from "./Renderer";
export { CpuRenderer } from "./CpuRenderer";
export { BiVector4 } from "./BiVector4";
export { Rotor4 } from "./Rotor4";
export type { FlyInput } from "./FlyCamera";
export { FlyCamera, wrapAngle } from "./FlyCamera";
export { Scene, assertMaterialIndices } from "./Scene";
export type { SceneFile } from "./sceneFile";
export { parseSceneFile, parseSceneJson, sceneFromFile, SceneFileError, sceneFileSchema } from "./sceneFile";
export type { FrameStats } from "./Engine";
export { Engine } from "./Engine";
