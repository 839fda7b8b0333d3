// Renderer - the backend-agnostic interface the Engine programs against.
// Each backend (CPU, worker pool) implements this interface.
//
// A backend receives an immutable SceneData snapshot and fills a Framebuffer.
// How the tiles are scheduled is the backend's business; the pixels it writes
// must not depend on that schedule.

import type { SceneData } from "./SceneData";
import type { Framebuffer } from "./Framebuffer";

export interface RenderOptions {
  /** Edge length of the square tiles handed out as units of work. */
  tileSize: number;
}

export interface Renderer {
  /** Human-readable backend name, used in logs. */
  readonly name: string;

  /** Render one frame of `scene` into `target`. Resolves when every pixel is written. */
  render(scene: SceneData, target: Framebuffer): Promise<void>;

  /** Release threads or other backend resources. */
  dispose(): Promise<void>;
}
