// Messages exchanged between WorkerRenderer and its render workers.
//
// The scene travels once per frame; tile requests then refer to it by frame
// number. Tile results come back as transferable Float32Arrays.

import type { SceneData } from "../engine/SceneData";
import type { Tile } from "../engine/tiles";
import { renderTile } from "../engine/tiles";

export type WorkerRequest =
  | { kind: "scene"; frame: number; scene: SceneData }
  | { kind: "tile"; id: number; frame: number; tile: Tile; width: number; height: number };

export type WorkerResponse =
  | { id: number; frame: number; ok: true; tile: Tile; rgba: Float32Array }
  | { id: number; frame: number; ok: false; error: string; stack?: string };

/** Worker-side state: the scene of the frame currently being rendered. */
export interface WorkerState {
  frame: number;
  scene: SceneData | null;
}

/**
 * Applies one request to the worker state. Scene messages produce no
 * response; tile messages always produce exactly one.
 */
export function handleWorkerRequest(state: WorkerState, request: WorkerRequest): WorkerResponse | null {
  if (request.kind === "scene") {
    state.frame = request.frame;
    state.scene = request.scene;
    return null;
  }

  try {
    if (!state.scene || state.frame !== request.frame) {
      throw new Error(`Tile ${request.id} belongs to frame ${request.frame}, but the worker holds frame ${state.frame}`);
    }
    const rgba = renderTile(state.scene, request.tile, request.width, request.height);
    return { id: request.id, frame: request.frame, ok: true, tile: request.tile, rgba };
  } catch (err) {
    return {
      id: request.id,
      frame: request.frame,
      ok: false,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    };
  }
}
