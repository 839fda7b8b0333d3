import { describe, it, expect } from "vitest";
import { parseSceneFile, parseSceneJson, sceneFromFile, SceneFileError } from "./sceneFile";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof SceneFileError) return err.issues;
    throw err;
  }
  throw new Error("expected a SceneFileError");
}

describe("parseSceneFile", () => {
  it("should fill in defaults for an empty object", () => {
    const file = parseSceneFile({});
    expect(file.camera).toEqual({
      position: [0, 1, -3, 0],
      pitch: 0,
      yaw: 0,
      pitch4: 0,
      yaw4: 0,
      fov: 90,
      minDistance: 0.01,
      maxDistance: 1000,
      bounceCount: 5,
      sampleCount: 1,
    });
    expect(file.materials).toEqual([]);
    expect(file.hyperSpheres).toEqual([]);
    expect(file.hyperCuboids).toEqual([]);
    expect(file.hyperPlanes).toEqual([]);
  });

  it("should default a material's emission to none", () => {
    const file = parseSceneFile({ materials: [{ baseColor: [0.2, 0.4, 0.6] }] });
    expect(file.materials[0]).toEqual({ baseColor: [0.2, 0.4, 0.6], emissiveColor: [0, 0, 0], emissionStrength: 0 });
  });

  it("should reject material indices past the end of the list", () => {
    const issues = issuesOf(() =>
      parseSceneFile({
        materials: [{ baseColor: [1, 1, 1] }],
        hyperSpheres: [{ center: [0, 0, 0, 0], radius: 1, material: 1 }],
      }),
    );
    expect(issues).toEqual(["hyperSpheres.0.material: material 1 does not exist (scene has 1 materials)"]);
  });

  it("should reject non-positive sizes", () => {
    const issues = issuesOf(() =>
      parseSceneFile({
        materials: [{ baseColor: [1, 1, 1] }],
        hyperSpheres: [{ center: [0, 0, 0, 0], radius: -1, material: 0 }],
      }),
    );
    expect(issues).toEqual(["hyperSpheres.0.radius: Number must be greater than 0"]);
  });

  it("should reject a camera whose near distance is not below its far distance", () => {
    const issues = issuesOf(() => parseSceneFile({ camera: { minDistance: 5, maxDistance: 1 } }));
    expect(issues).toEqual(["camera.maxDistance: maxDistance (1) must be greater than minDistance (5)"]);
  });

  it("should reject a zero plane normal", () => {
    const issues = issuesOf(() =>
      parseSceneFile({
        materials: [{ baseColor: [1, 1, 1] }],
        hyperPlanes: [{ point: [0, 0, 0, 0], normal: [0, 0, 0, 0], material: 0 }],
      }),
    );
    expect(issues).toEqual(["hyperPlanes.0.normal: normal must not be the zero vector"]);
  });

  it("should reject a normal that rounds to zero in 32-bit floats", () => {
    const issues = issuesOf(() =>
      parseSceneFile({
        materials: [{ baseColor: [1, 1, 1] }],
        hyperPlanes: [{ point: [0, 0, 0, 0], normal: [1e-50, 0, 0, 0], material: 0 }],
      }),
    );
    expect(issues).toEqual(["hyperPlanes.0.normal: normal must not be the zero vector"]);
  });

  it("should reject half-extents that round to zero in 32-bit floats", () => {
    const issues = issuesOf(() =>
      parseSceneFile({
        materials: [{ baseColor: [1, 1, 1] }],
        hyperCuboids: [{ center: [0, 0, 0, 0], halfExtents: [1e-50, 1, 1, 1], material: 0 }],
      }),
    );
    expect(issues).toEqual(["hyperCuboids.0.halfExtents.0: Number must stay greater than 0 as a 32-bit float"]);
  });

  it("should report a negative half-extent once", () => {
    const issues = issuesOf(() =>
      parseSceneFile({
        materials: [{ baseColor: [1, 1, 1] }],
        hyperCuboids: [{ center: [0, 0, 0, 0], halfExtents: [1, -1, 1, 1], material: 0 }],
      }),
    );
    expect(issues).toEqual(["hyperCuboids.0.halfExtents.1: Number must be greater than 0"]);
  });

  it("should reject coordinates that overflow 32-bit floats", () => {
    const issues = issuesOf(() =>
      parseSceneFile({
        materials: [{ baseColor: [1, 1, 1] }],
        hyperSpheres: [{ center: [0, 0, 1e39, 0], radius: 1, material: 0 }],
      }),
    );
    expect(issues).toEqual(["hyperSpheres.0.center.2: Number must fit in a 32-bit float"]);
  });

  it("should name the source in the error message", () => {
    expect(() => parseSceneFile({ camera: { minDistance: 5, maxDistance: 1 } }, "test.json")).toThrow(
      "Invalid scene file test.json:\n  camera.maxDistance: maxDistance (1) must be greater than minDistance (5)",
    );
  });
});

describe("parseSceneJson", () => {
  it("should turn malformed JSON into a SceneFileError", () => {
    const issues = issuesOf(() => parseSceneJson("{", "broken.json"));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^\(root\): /);
  });

  it("should parse valid JSON text", () => {
    const file = parseSceneJson('{"camera": {"sampleCount": 16}}');
    expect(file.camera.sampleCount).toBe(16);
  });
});

describe("sceneFromFile", () => {
  it("should convert angles to radians and normalize plane normals", () => {
    const scene = sceneFromFile(
      parseSceneFile({
        camera: { position: [1, 2, 3, 4], yaw: 90, pitch4: 180, fov: 60, bounceCount: 2 },
        materials: [{ baseColor: [1, 1, 1] }, { baseColor: [0, 0, 0], emissiveColor: [1, 1, 1], emissionStrength: 3 }],
        hyperSpheres: [{ name: "ball", center: [0, 0, 0, 0], radius: 2, material: 1 }],
        hyperCuboids: [{ center: [0, 0, 0, 0], halfExtents: [1, 2, 3, 4], material: 0 }],
        hyperPlanes: [{ point: [0, 0, 0, 0], normal: [0, 2, 0, 0], material: 0 }],
      }),
    );

    expect(Array.from(scene.camera.position)).toEqual([1, 2, 3, 4]);
    expect(scene.camera.yaw).toBeCloseTo(Math.PI / 2, 12);
    expect(scene.camera.pitch4).toBeCloseTo(Math.PI, 12);
    expect(scene.camera.fov).toBeCloseTo(Math.PI / 3, 12);
    expect(scene.camera.bounceCount).toBe(2);

    expect(scene.materials).toHaveLength(2);
    expect(scene.materials[1].emissionStrength).toBe(3);
    expect(scene.hyperSpheres[0].name).toBe("ball");
    expect(scene.hyperSpheres[0].material).toBe(1);
    expect(Array.from(scene.hyperCuboids[0].halfExtents)).toEqual([1, 2, 3, 4]);
    expect(Array.from(scene.hyperPlanes[0].normal)).toEqual([0, 1, 0, 0]);
  });
});
