// Tiles - splits the image into square blocks of independent pixels.
//
// A tile is the unit of scheduling for both backends. Rendering a tile is a
// pure function of the scene and the image size, so tiles can run in any order
// and on any thread.

import { vec3 } from "gl-matrix";
import type { SceneData } from "./SceneData";
import { renderPixel } from "./PathTracer";

export const DEFAULT_TILE_SIZE = 16;

export interface Tile {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Row-major tiles covering a width x height image; edge tiles are clipped. */
export function splitTiles(width: number, height: number, tileSize = DEFAULT_TILE_SIZE): Tile[] {
  if (!Number.isInteger(tileSize) || tileSize <= 0) {
    throw new Error(`Tile size must be a positive integer, got ${tileSize}`);
  }
  const tiles: Tile[] = [];
  for (let y = 0; y < height; y += tileSize) {
    for (let x = 0; x < width; x += tileSize) {
      tiles.push({
        x,
        y,
        width: Math.min(tileSize, width - x),
        height: Math.min(tileSize, height - y),
      });
    }
  }
  return tiles;
}

/** RGBA floats for every pixel of `tile`, row-major within the tile. */
export function renderTile(scene: SceneData, tile: Tile, width: number, height: number): Float32Array {
  const out = new Float32Array(tile.width * tile.height * 4);
  const color = vec3.create();

  for (let row = 0; row < tile.height; row++) {
    for (let col = 0; col < tile.width; col++) {
      if (!renderPixel(color, tile.x + col, tile.y + row, width, height, scene)) continue;
      const i = (row * tile.width + col) * 4;
      out[i] = color[0];
      out[i + 1] = color[1];
      out[i + 2] = color[2];
      out[i + 3] = 1;
    }
  }

  return out;
}
