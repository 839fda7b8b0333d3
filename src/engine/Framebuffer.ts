// Framebuffer - the render target: a width x height grid of RGBA floats in [0, 1].
// Writes outside the grid are dropped.

import type { ReadonlyVec3 } from "gl-matrix";

export class Framebuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid framebuffer size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Float32Array(width * height * 4);
  }

  contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  /** Stores an opaque color. Returns false (and writes nothing) out of bounds. */
  writePixel(x: number, y: number, color: ReadonlyVec3): boolean {
    if (!this.contains(x, y)) return false;
    const i = (y * this.width + x) * 4;
    this.data[i] = color[0];
    this.data[i + 1] = color[1];
    this.data[i + 2] = color[2];
    this.data[i + 3] = 1;
    return true;
  }

  readPixel(x: number, y: number): [number, number, number, number] {
    if (!this.contains(x, y)) {
      throw new Error(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} framebuffer`);
    }
    const i = (y * this.width + x) * 4;
    return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
  }

  /** Copies a block of RGBA floats (row-major, `w` pixels wide) to (x, y). */
  writeBlock(x: number, y: number, w: number, h: number, rgba: Float32Array): void {
    for (let row = 0; row < h; row++) {
      const dstY = y + row;
      if (dstY < 0 || dstY >= this.height) continue;
      for (let col = 0; col < w; col++) {
        const dstX = x + col;
        if (dstX < 0 || dstX >= this.width) continue;
        const src = (row * w + col) * 4;
        const dst = (dstY * this.width + dstX) * 4;
        this.data.set(rgba.subarray(src, src + 4), dst);
      }
    }
  }

  clear(): void {
    this.data.fill(0);
  }

  /** 8-bit RGBA, as expected by ImageData and raw image encoders. */
  toRgba8() {
    const out = new Uint8ClampedArray(this.data.length);
    for (let i = 0; i < this.data.length; i++) {
      out[i] = Math.round(this.data[i] * 255);
    }
    return out;
  }
}
