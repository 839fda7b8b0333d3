import { describe, it, expect } from "vitest";
import { vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";
import { FlyCamera, MOVE_SPEED, ROTATION_SPEED, wrapAngle } from "./FlyCamera";

function expectVec(actual: ReadonlyVec4, expected: readonly number[]): void {
  for (let i = 0; i < 4; i++) {
    expect(actual[i]).toBeCloseTo(expected[i], 5);
  }
}

const input = (keys: string[], shift = false) => ({ keys: new Set(keys), shift });

describe("FlyCamera", () => {
  it("should look down +z with +x right and +y up by default", () => {
    const { forward, right, up } = new FlyCamera().basis();
    expectVec(forward, [0, 0, 1, 0]);
    expectVec(right, [1, 0, 0, 0]);
    expectVec(up, [0, 1, 0, 0]);
  });

  it("should turn forward towards +x with a quarter yaw", () => {
    const camera = new FlyCamera();
    camera.yaw = Math.PI / 2;
    const { forward, right, up } = camera.basis();
    expectVec(forward, [1, 0, 0, 0]);
    expectVec(right, [0, 0, -1, 0]);
    expectVec(up, [0, 1, 0, 0]);
  });

  it("should look straight up with a quarter pitch", () => {
    const camera = new FlyCamera();
    camera.pitch = Math.PI / 2;
    const { forward, up } = camera.basis();
    expectVec(forward, [0, 1, 0, 0]);
    expectVec(up, [0, 0, -1, 0]);
  });

  it("should look along +w with a quarter pitch4", () => {
    const camera = new FlyCamera();
    camera.pitch4 = Math.PI / 2;
    expectVec(camera.basis().forward, [0, 0, 0, 1]);
  });

  it("should keep the basis orthonormal for arbitrary angles", () => {
    const camera = new FlyCamera();
    camera.yaw = 0.4;
    camera.pitch = 1.1;
    camera.yaw4 = 2.3;
    camera.pitch4 = 5.9;
    const { forward, right, up } = camera.basis();
    for (const v of [forward, right, up]) {
      expect(vec4.length(v)).toBeCloseTo(1, 5);
    }
    expect(vec4.dot(forward, right)).toBeCloseTo(0, 5);
    expect(vec4.dot(forward, up)).toBeCloseTo(0, 5);
    expect(vec4.dot(right, up)).toBeCloseTo(0, 5);
  });

  it("should move along its own axes", () => {
    const camera = new FlyCamera();
    camera.applyInput(input(["w", "d"]), 0.5);
    const step = MOVE_SPEED * 0.5;
    expectVec(camera.position, [step, 1, -3 + step, 0]);

    camera.applyInput(input(["q"]), 0.5);
    expectVec(camera.position, [step, 1 - step, -3 + step, 0]);
  });

  it("should turn in 3D without shift and in 4D with it", () => {
    const camera = new FlyCamera();
    const dt = 0.1;
    camera.applyInput(input(["ArrowRight"]), dt);
    expect(camera.yaw).toBeCloseTo(ROTATION_SPEED * dt, 10);
    expect(camera.yaw4).toBe(0);

    camera.applyInput(input(["ArrowUp"], true), dt);
    expect(camera.pitch4).toBeCloseTo(ROTATION_SPEED * dt, 10);
    expect(camera.pitch).toBe(0);

    camera.applyInput(input(["ArrowLeft"], true), dt);
    expect(camera.yaw4).toBeCloseTo(Math.PI * 2 - ROTATION_SPEED * dt, 10);
  });

  it("should snapshot its state as a camera record", () => {
    const camera = new FlyCamera();
    camera.sampleCount = 8;
    const record = camera.toCamera();
    camera.position[0] = 42;
    expect(record.position[0]).toBe(0);
    expect(record.sampleCount).toBe(8);
    expect(record.bounceCount).toBe(5);
    expectVec(record.forward, [0, 0, 1, 0]);
  });
});

describe("wrapAngle", () => {
  it("should map angles into [0, 2π)", () => {
    expect(wrapAngle(0)).toBe(0);
    expect(wrapAngle(1)).toBe(1);
    expect(wrapAngle(-Math.PI / 2)).toBeCloseTo(1.5 * Math.PI, 10);
    expect(wrapAngle(5 * Math.PI)).toBeCloseTo(Math.PI, 10);
  });
});
