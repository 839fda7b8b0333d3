import { describe, it, expect } from "vitest";
import { vec4 } from "gl-matrix";
import {
  createRng,
  pixelSeed,
  nextUniform,
  nextNormal,
  nextDirection4,
  nextHemisphereDirection4,
} from "./Rng";

describe("Rng", () => {
  it("should advance the state with the multiply-add step", () => {
    const rng = createRng(0);
    nextUniform(rng);
    expect(rng.state).toBe(2891336453);
    nextUniform(rng);
    expect(rng.state).toBe(1192405134);
  });

  it("should produce the known sequence for seed 0", () => {
    const rng = createRng(0);
    expect(nextUniform(rng)).toBeCloseTo(0.030199997599748896, 12);
    expect(nextUniform(rng)).toBeCloseTo(0.13560049145845707, 12);
    expect(nextUniform(rng)).toBeCloseTo(0.23423580481536588, 12);
  });

  it("should produce the known sequence for seed 12345", () => {
    const rng = createRng(12345);
    expect(nextUniform(rng)).toBeCloseTo(0.9545696412573033, 12);
    expect(nextUniform(rng)).toBeCloseTo(0.10012158241591453, 12);
    expect(rng.state).toBe(2661444863);
  });

  it("should be reproducible for identical seeds and call order", () => {
    const a = createRng(987654321);
    const b = createRng(987654321);
    const dirA = vec4.create();
    const dirB = vec4.create();
    for (let i = 0; i < 200; i++) {
      expect(nextUniform(a)).toBe(nextUniform(b));
      expect(nextNormal(a)).toBe(nextNormal(b));
      nextDirection4(dirA, a);
      nextDirection4(dirB, b);
      expect(Array.from(dirA)).toEqual(Array.from(dirB));
    }
    expect(a.state).toBe(b.state);
  });

  it("should keep uniform draws in [0, 1)", () => {
    const rng = createRng(42);
    for (let i = 0; i < 10000; i++) {
      const u = nextUniform(rng);
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
    }
  });

  it("should draw standard normals", () => {
    const rng = createRng(7);
    const n = 20000;
    let sum = 0;
    let sumSq = 0;
    for (let i = 0; i < n; i++) {
      const x = nextNormal(rng);
      sum += x;
      sumSq += x * x;
    }
    const mean = sum / n;
    const variance = sumSq / n - mean * mean;
    expect(Math.abs(mean)).toBeLessThan(0.05);
    expect(variance).toBeGreaterThan(0.9);
    expect(variance).toBeLessThan(1.1);
  });

  it("should draw unit-length 4D directions", () => {
    const rng = createRng(3);
    const dir = vec4.create();
    for (let i = 0; i < 1000; i++) {
      nextDirection4(dir, rng);
      expect(vec4.length(dir)).toBeCloseTo(1, 5);
    }
  });

  it("should spread directions evenly over the 16 orthants", () => {
    const rng = createRng(2024);
    const dir = vec4.create();
    const counts = new Array<number>(16).fill(0);
    const draws = 16000;
    for (let i = 0; i < draws; i++) {
      nextDirection4(dir, rng);
      const orthant = (dir[0] > 0 ? 1 : 0) | (dir[1] > 0 ? 2 : 0) | (dir[2] > 0 ? 4 : 0) | (dir[3] > 0 ? 8 : 0);
      counts[orthant]++;
    }
    for (const count of counts) {
      expect(count).toBeGreaterThan(850);
      expect(count).toBeLessThan(1150);
    }
  });

  it("should keep hemisphere directions on the normal's side", () => {
    const rng = createRng(11);
    const normal = vec4.fromValues(0, 0, 0, 1);
    const dir = vec4.create();
    for (let i = 0; i < 2000; i++) {
      nextHemisphereDirection4(dir, rng, normal);
      expect(vec4.dot(dir, normal)).toBeGreaterThanOrEqual(0);
      expect(vec4.length(dir)).toBeCloseTo(1, 5);
    }
  });

  it("should consume the same draws as nextDirection4 for hemisphere sampling", () => {
    const a = createRng(99);
    const b = createRng(99);
    const normal = vec4.fromValues(1, 0, 0, 0);
    const plain = nextDirection4(vec4.create(), a);
    const hemi = nextHemisphereDirection4(vec4.create(), b, normal);
    const sign = plain[0] < 0 ? -1 : 1;
    for (let i = 0; i < 4; i++) {
      expect(hemi[i]).toBe(plain[i] * sign);
    }
    expect(a.state).toBe(b.state);
  });

  it("should seed pixels row-major", () => {
    expect(pixelSeed(0, 0, 10)).toBe(0);
    expect(pixelSeed(3, 2, 10)).toBe(23);
  });
});
