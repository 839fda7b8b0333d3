// Scene files - JSON description of a scene, validated with zod.
//
// Angles in the file are degrees; everything else is in scene units. The
// schema enforces the invariants the kernel relies on but never checks
// (positive sizes, valid material indices, min < max distance), so a scene
// that parses here is safe to render.

import { z } from "zod";
import { vec3, vec4 } from "gl-matrix";
import { Scene } from "./Scene";
import { FlyCamera } from "./FlyCamera";

const DEG_TO_RAD = Math.PI / 180;

const finite = z.number().finite();
const positive = finite.positive();
const unit = finite.min(0).max(1);

// Vector components end up in Float32Arrays, so they are checked after rounding.
const float32 = finite.refine((v) => Number.isFinite(Math.fround(v)), "Number must fit in a 32-bit float");
const positiveFloat32 = positive.refine(
  (v) => v <= 0 || Math.fround(v) > 0,
  "Number must stay greater than 0 as a 32-bit float",
);
const vec4Schema = z.tuple([float32, float32, float32, float32]);
const positiveVec4Schema = z.tuple([positiveFloat32, positiveFloat32, positiveFloat32, positiveFloat32]);
const colorSchema = z.tuple([unit, unit, unit]);
const emissiveSchema = z.tuple([finite.min(0), finite.min(0), finite.min(0)]);
const materialIndex = z.number().int().min(0);

export const cameraSchema = z
  .object({
    position: vec4Schema.default([0, 1, -3, 0]),
    pitch: finite.default(0),
    yaw: finite.default(0),
    pitch4: finite.default(0),
    yaw4: finite.default(0),
    fov: finite.gt(0).lt(180).default(90),
    minDistance: finite.min(0).default(0.01),
    maxDistance: finite.default(1000),
    bounceCount: z.number().int().min(0).default(5),
    sampleCount: z.number().int().min(1).default(1),
  })
  .superRefine((camera, ctx) => {
    if (camera.minDistance >= camera.maxDistance) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["maxDistance"],
        message: `maxDistance (${camera.maxDistance}) must be greater than minDistance (${camera.minDistance})`,
      });
    }
  });

export const materialSchema = z.object({
  baseColor: colorSchema,
  emissiveColor: emissiveSchema.default([0, 0, 0]),
  emissionStrength: finite.min(0).default(0),
});

export const hyperSphereSchema = z.object({
  name: z.string().optional(),
  center: vec4Schema,
  radius: positive,
  material: materialIndex,
});

export const hyperCuboidSchema = z.object({
  name: z.string().optional(),
  center: vec4Schema,
  halfExtents: positiveVec4Schema,
  material: materialIndex,
});

export const hyperPlaneSchema = z.object({
  name: z.string().optional(),
  point: vec4Schema,
  normal: vec4Schema.refine((n) => n.some((c) => Math.fround(c) !== 0), "normal must not be the zero vector"),
  material: materialIndex,
});

export const sceneFileSchema = z
  .object({
    camera: cameraSchema.default({}),
    materials: z.array(materialSchema).default([]),
    hyperSpheres: z.array(hyperSphereSchema).default([]),
    hyperCuboids: z.array(hyperCuboidSchema).default([]),
    hyperPlanes: z.array(hyperPlaneSchema).default([]),
  })
  .superRefine((scene, ctx) => {
    const count = scene.materials.length;
    const lists: [string, readonly { material: number }[]][] = [
      ["hyperSpheres", scene.hyperSpheres],
      ["hyperCuboids", scene.hyperCuboids],
      ["hyperPlanes", scene.hyperPlanes],
    ];
    for (const [key, list] of lists) {
      list.forEach((primitive, i) => {
        if (primitive.material >= count) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key, i, "material"],
            message: `material ${primitive.material} does not exist (scene has ${count} materials)`,
          });
        }
      });
    }
  });

export type SceneFile = z.infer<typeof sceneFileSchema>;

export class SceneFileError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid scene file ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "SceneFileError";
    this.issues = issues;
  }
}

/** Validates parsed JSON. Throws SceneFileError listing every problem. */
export function parseSceneFile(input: unknown, source = "<input>"): SceneFile {
  const result = sceneFileSchema.safeParse(input);
  if (!result.success) {
    throw new SceneFileError(
      source,
      result.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

/** Parses and validates JSON text. */
export function parseSceneJson(text: string, source = "<input>"): SceneFile {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new SceneFileError(source, [`(root): ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseSceneFile(json, source);
}

/** Builds the editable host-side Scene from a validated file. */
export function sceneFromFile(file: SceneFile): Scene {
  const camera = new FlyCamera();
  vec4.set(camera.position, ...file.camera.position);
  camera.pitch = file.camera.pitch * DEG_TO_RAD;
  camera.yaw = file.camera.yaw * DEG_TO_RAD;
  camera.pitch4 = file.camera.pitch4 * DEG_TO_RAD;
  camera.yaw4 = file.camera.yaw4 * DEG_TO_RAD;
  camera.fov = file.camera.fov * DEG_TO_RAD;
  camera.minDistance = file.camera.minDistance;
  camera.maxDistance = file.camera.maxDistance;
  camera.bounceCount = file.camera.bounceCount;
  camera.sampleCount = file.camera.sampleCount;

  const scene = new Scene(camera);
  for (const m of file.materials) {
    scene.addMaterial({
      baseColor: vec3.fromValues(...m.baseColor),
      emissiveColor: vec3.fromValues(...m.emissiveColor),
      emissionStrength: m.emissionStrength,
    });
  }
  for (const s of file.hyperSpheres) {
    scene.addHyperSphere({ name: s.name, center: vec4.fromValues(...s.center), radius: s.radius }, s.material);
  }
  for (const c of file.hyperCuboids) {
    scene.addHyperCuboid(
      { name: c.name, center: vec4.fromValues(...c.center), halfExtents: vec4.fromValues(...c.halfExtents) },
      c.material,
    );
  }
  for (const p of file.hyperPlanes) {
    scene.addHyperPlane(
      { name: p.name, point: vec4.fromValues(...p.point), normal: vec4.fromValues(...p.normal) },
      p.material,
    );
  }
  return scene;
}
