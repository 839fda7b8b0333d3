// PathTracer - the Monte Carlo light-transport estimator and the per-pixel routine.
//
// Each bounce:
//   1. Closest hit over the whole scene
//   2. Miss  -> add the sky gradient, end the path
//   3. Hit   -> add emission, tint throughput by albedo, scatter diffusely
//
// The scatter direction is normalize(normal + uniform 4D direction). There is
// no Russian roulette: a path runs for bounceCount bounces or until it misses.

import { vec3, vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";
import type { Ray } from "./Ray";
import type { RngState } from "./Rng";
import { createRng, pixelSeed, nextDirection4 } from "./Rng";
import type { SceneData } from "./SceneData";
import { intersectScene } from "./intersectScene";
import { primaryRay } from "./Camera";

export const SKY_DOWN = vec3.fromValues(1.0, 1.0, 1.0);
export const SKY_UP = vec3.fromValues(0.5, 0.7, 1.0);

/** Background radiance, blended on the direction's y component. */
export function skyGradient(out: vec3, direction: ReadonlyVec4): vec3 {
  const t = direction[1] * 0.5 + 0.5;
  return vec3.lerp(out, SKY_DOWN, SKY_UP, t);
}

/** Radiance carried back along `ray` by one path sample. */
export function traceSample(ray: Ray, rng: RngState, scene: SceneData): vec3 {
  const { bounceCount, minDistance } = scene.camera;
  const radiance = vec3.create();
  const throughput = vec3.fromValues(1, 1, 1);
  const term = vec3.create();
  const scatter = vec4.create();

  let current: Ray = { origin: vec4.clone(ray.origin), direction: vec4.clone(ray.direction) };

  for (let bounce = 0; bounce < bounceCount; bounce++) {
    const hit = intersectScene(current, scene);

    if (!hit.hit) {
      skyGradient(term, current.direction);
      vec3.multiply(term, throughput, term);
      vec3.add(radiance, radiance, term);
      break;
    }

    const material = scene.materials[hit.material];
    vec3.multiply(term, throughput, material.emissiveColor);
    vec3.scaleAndAdd(radiance, radiance, term, material.emissionStrength);
    vec3.multiply(throughput, throughput, material.baseColor);

    // Offset along the normal so the next ray does not re-hit this surface.
    const origin = vec4.scaleAndAdd(vec4.create(), hit.position, hit.normal, minDistance);
    nextDirection4(scatter, rng);
    const direction = vec4.add(vec4.create(), hit.normal, scatter);
    vec4.normalize(direction, direction);
    current = { origin, direction };
  }

  return radiance;
}

/**
 * Computes the final color of pixel (x, y): sampleCount samples from the same
 * evolving generator, averaged and clamped to [0, 1]. Returns false and leaves
 * `out` untouched for pixels outside the image.
 */
export function renderPixel(
  out: vec3,
  x: number,
  y: number,
  width: number,
  height: number,
  scene: SceneData,
): boolean {
  if (x < 0 || y < 0 || x >= width || y >= height) return false;

  const { sampleCount } = scene.camera;
  const rng = createRng(pixelSeed(x, y, width));
  const ray = primaryRay(x, y, width, height, scene.camera);
  // Accumulate in doubles; a Float32Array sum drifts from the exact average.
  let r = 0;
  let g = 0;
  let b = 0;

  for (let i = 0; i < sampleCount; i++) {
    const sample = traceSample(ray, rng, scene);
    r += sample[0];
    g += sample[1];
    b += sample[2];
  }

  out[0] = clamp01(r / sampleCount);
  out[1] = clamp01(g / sampleCount);
  out[2] = clamp01(b / sampleCount);
  return true;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
