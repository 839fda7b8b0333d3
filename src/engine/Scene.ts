// Scene - holds the camera, the primitive lists and the materials; builds a
// SceneData snapshot each frame.
//
// The host edits a Scene freely between frames. Renderers never see it
// directly, only the snapshot from buildFrame(), which is also where material
// indices are checked: the kernel itself assumes they are valid.

import { vec3, vec4 } from "gl-matrix";
import type { Material } from "./Material";
import { defaultMaterial } from "./Material";
import type { HyperSphere, HyperCuboid, HyperPlane } from "./primitives";
import type { SceneData } from "./SceneData";
import { FlyCamera } from "./FlyCamera";

type WithoutMaterial<T> = Omit<T, "material">;

export class Scene {
  camera: FlyCamera;
  hyperSpheres: HyperSphere[] = [];
  hyperCuboids: HyperCuboid[] = [];
  hyperPlanes: HyperPlane[] = [];
  materials: Material[] = [];

  constructor(camera: FlyCamera = new FlyCamera()) {
    this.camera = camera;
  }

  /** Appends a material and returns its index. */
  addMaterial(material: Material): number {
    this.materials.push(material);
    return this.materials.length - 1;
  }

  /**
   * Adds a hypersphere. Pass a material index to share an existing material;
   * without one the sphere gets a fresh default material of its own.
   */
  addHyperSphere(sphere: WithoutMaterial<HyperSphere>, material?: number): number {
    this.hyperSpheres.push({ ...sphere, material: material ?? this.addMaterial(defaultMaterial()) });
    return this.hyperSpheres.length - 1;
  }

  addHyperCuboid(cuboid: WithoutMaterial<HyperCuboid>, material?: number): number {
    this.hyperCuboids.push({ ...cuboid, material: material ?? this.addMaterial(defaultMaterial()) });
    return this.hyperCuboids.length - 1;
  }

  /** The normal is stored normalized, in a vector of its own. */
  addHyperPlane(plane: WithoutMaterial<HyperPlane>, material?: number): number {
    const normal = vec4.normalize(vec4.create(), plane.normal);
    this.hyperPlanes.push({ ...plane, normal, material: material ?? this.addMaterial(defaultMaterial()) });
    return this.hyperPlanes.length - 1;
  }

  removeHyperSphere(index: number): void {
    this.hyperSpheres.splice(index, 1);
  }

  removeHyperCuboid(index: number): void {
    this.hyperCuboids.splice(index, 1);
  }

  removeHyperPlane(index: number): void {
    this.hyperPlanes.splice(index, 1);
  }

  /** Advance per-frame state (camera movement) by `dt` seconds. */
  update(dt: number): void {
    this.camera.update(dt);
  }

  /** Immutable snapshot for one render. Throws if a primitive names a missing material. */
  buildFrame(): SceneData {
    const frame: SceneData = {
      camera: this.camera.toCamera(),
      hyperSpheres: this.hyperSpheres.map((s) => ({ ...s, center: vec4.clone(s.center) })),
      hyperCuboids: this.hyperCuboids.map((c) => ({
        ...c,
        center: vec4.clone(c.center),
        halfExtents: vec4.clone(c.halfExtents),
      })),
      hyperPlanes: this.hyperPlanes.map((p) => ({ ...p, point: vec4.clone(p.point), normal: vec4.clone(p.normal) })),
      materials: this.materials.map((m) => ({
        baseColor: vec3.clone(m.baseColor),
        emissiveColor: vec3.clone(m.emissiveColor),
        emissionStrength: m.emissionStrength,
      })),
    };
    assertMaterialIndices(frame);
    return frame;
  }
}

export function assertMaterialIndices(scene: SceneData): void {
  const count = scene.materials.length;
  const check = (kind: string, index: number, material: number) => {
    if (!Number.isInteger(material) || material < 0 || material >= count) {
      throw new Error(`${kind} ${index} references material ${material}, but the scene has ${count} materials`);
    }
  };
  scene.hyperSpheres.forEach((s, i) => check("Hypersphere", i, s.material));
  scene.hyperCuboids.forEach((c, i) => check("Hypercuboid", i, c.material));
  scene.hyperPlanes.forEach((p, i) => check("Hyperplane", i, p.material));
}
