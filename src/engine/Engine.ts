// Engine - owns the frame loop: update the scene, snapshot it, render, present.
//
// renderFrame() is one blocking frame (the CLI calls it once). start() runs
// frames back to back on requestAnimationFrame for the browser viewer; a new
// frame is never started while the previous render is still in flight.

import type { Renderer } from "./Renderer";
import type { Scene } from "./Scene";
import { Framebuffer } from "./Framebuffer";

export interface FrameStats {
  width: number;
  height: number;
  /** Wall-clock render time in milliseconds. */
  renderMs: number;
}

export class Engine {
  renderer: Renderer;
  scene: Scene;
  framebuffer: Framebuffer;
  /** Called after each frame started by start(). */
  onFrame: ((framebuffer: Framebuffer, stats: FrameStats) => void) | null = null;

  private _rafId = 0;
  private _running = false;

  constructor(renderer: Renderer, scene: Scene, width: number, height: number) {
    this.renderer = renderer;
    this.scene = scene;
    this.framebuffer = new Framebuffer(width, height);
  }

  /** Reallocate the framebuffer when the output size changes. */
  resize(width: number, height: number): void {
    if (width === this.framebuffer.width && height === this.framebuffer.height) return;
    this.framebuffer = new Framebuffer(width, height);
  }

  /** Render one frame of the scene as it is now. */
  async renderFrame(): Promise<FrameStats> {
    const frame = this.scene.buildFrame();
    const start = performance.now();
    await this.renderer.render(frame, this.framebuffer);
    return {
      width: this.framebuffer.width,
      height: this.framebuffer.height,
      renderMs: performance.now() - start,
    };
  }

  start(): void {
    this._running = true;
    let previous = performance.now();
    const loop = (time: DOMHighResTimeStamp) => {
      if (!this._running) return;
      this.scene.update(Math.max(0, time - previous) / 1000);
      previous = time;
      this.renderFrame()
        .then((stats) => {
          if (this.onFrame) this.onFrame(this.framebuffer, stats);
          if (this._running) this._rafId = requestAnimationFrame(loop);
        })
        .catch((err: unknown) => {
          this._running = false;
          console.error("Frame failed:", err);
        });
    };
    this._rafId = requestAnimationFrame(loop);
  }

  stop(): void {
    this._running = false;
    cancelAnimationFrame(this._rafId);
  }
}
