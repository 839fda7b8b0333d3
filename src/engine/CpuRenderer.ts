// CpuRenderer - renders every tile in order on the calling thread.
// Used by the browser viewer, by tests, and by the CLI with --workers 0.

import type { Renderer, RenderOptions } from "./Renderer";
import type { SceneData } from "./SceneData";
import type { Framebuffer } from "./Framebuffer";
import { DEFAULT_TILE_SIZE, splitTiles, renderTile } from "./tiles";

export class CpuRenderer implements Renderer {
  readonly name = "cpu";
  options: RenderOptions;

  constructor(options: Partial<RenderOptions> = {}) {
    this.options = { tileSize: options.tileSize ?? DEFAULT_TILE_SIZE };
  }

  async render(scene: SceneData, target: Framebuffer): Promise<void> {
    const { width, height } = target;
    for (const tile of splitTiles(width, height, this.options.tileSize)) {
      target.writeBlock(tile.x, tile.y, tile.width, tile.height, renderTile(scene, tile, width, height));
    }
  }

  async dispose(): Promise<void> {
    // Nothing to release.
  }
}
