import { describe, it, expect } from "vitest";
import { vec4 } from "gl-matrix";
import { CpuRenderer } from "./CpuRenderer";
import { Engine } from "./Engine";
import { Scene } from "./Scene";

function smallScene(): Scene {
  const scene = new Scene();
  scene.camera.bounceCount = 2;
  scene.addHyperSphere({ center: vec4.fromValues(0, 1, 0, 0), radius: 1 });
  scene.addHyperPlane({ point: vec4.fromValues(0, 0, 0, 0), normal: vec4.fromValues(0, 1, 0, 0) });
  return scene;
}

describe("Engine", () => {
  it("should render a frame into its framebuffer", async () => {
    const engine = new Engine(new CpuRenderer({ tileSize: 4 }), smallScene(), 6, 4);
    const stats = await engine.renderFrame();
    expect(stats.width).toBe(6);
    expect(stats.height).toBe(4);
    expect(stats.renderMs).toBeGreaterThanOrEqual(0);
    for (let i = 3; i < engine.framebuffer.data.length; i += 4) {
      expect(engine.framebuffer.data[i]).toBe(1);
    }
  });

  it("should only reallocate the framebuffer when the size changes", () => {
    const engine = new Engine(new CpuRenderer(), smallScene(), 6, 4);
    const original = engine.framebuffer;
    engine.resize(6, 4);
    expect(engine.framebuffer).toBe(original);
    engine.resize(3, 2);
    expect(engine.framebuffer).not.toBe(original);
    expect(engine.framebuffer.width).toBe(3);
    expect(engine.framebuffer.height).toBe(2);
  });

  it("should reject a frame whose scene names a missing material", async () => {
    const scene = smallScene();
    scene.hyperSpheres[0].material = 7;
    const engine = new Engine(new CpuRenderer(), scene, 2, 2);
    await expect(engine.renderFrame()).rejects.toThrow("Hypersphere 0 references material 7, but the scene has 2 materials");
  });
});
