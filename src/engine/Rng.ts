// Rng - per-pixel PCG-style hash generator.
//
// The generator state is a single unsigned 32-bit integer held in an RngState
// record. Each pixel task creates its own record and passes it explicitly to
// every draw; nothing here keeps hidden state, so identical seeds and call
// orders always reproduce the same sequence.

import { vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";

export interface RngState {
  /** Unsigned 32-bit state word. */
  state: number;
}

const MULTIPLIER = 747796405;
const INCREMENT = 2891336453;
const OUTPUT_MULTIPLIER = 277803737;
const U32_MAX = 4294967295;

export function createRng(seed: number): RngState {
  return { state: seed >>> 0 };
}

/** Seed for the pixel at (x, y) in an image `width` pixels wide. */
export function pixelSeed(x: number, y: number, width: number): number {
  return (y * width + x) >>> 0;
}

/** Advances the state and returns a uniform value in [0, 1). */
export function nextUniform(rng: RngState): number {
  const state = (Math.imul(rng.state, MULTIPLIER) + INCREMENT) >>> 0;
  rng.state = state;
  let word = Math.imul((state >>> ((state >>> 28) + 4)) ^ state, OUTPUT_MULTIPLIER);
  word = ((word >>> 22) ^ word) >>> 0;
  return word / U32_MAX;
}

/** Box-Muller transform; keeps only the cosine branch. */
export function nextNormal(rng: RngState): number {
  const u1 = nextUniform(rng);
  const u2 = nextUniform(rng);
  return Math.sqrt(-2 * Math.log(u2)) * Math.cos(2 * Math.PI * u1);
}

/** Uniformly distributed point on the unit 3-sphere in 4D. */
export function nextDirection4(out: vec4, rng: RngState): vec4 {
  const x = nextNormal(rng);
  const y = nextNormal(rng);
  const z = nextNormal(rng);
  const w = nextNormal(rng);
  vec4.set(out, x, y, z, w);
  return vec4.normalize(out, out);
}

/**
 * Uniform direction on the hemisphere around `normal`. This mirrors the
 * sphere sample into the hemisphere; it is not cosine-weighted.
 */
export function nextHemisphereDirection4(out: vec4, rng: RngState, normal: ReadonlyVec4): vec4 {
  nextDirection4(out, rng);
  if (vec4.dot(out, normal) < 0) {
    vec4.negate(out, out);
  }
  return out;
}
