// WorkerRenderer - renders tiles on a pool of node:worker_threads workers.
//
// Each frame: broadcast the scene snapshot, then keep every worker busy with
// one tile at a time until the queue drains. Tiles come back in any order and
// are copied into the framebuffer as they arrive. Any worker failure rejects
// the frame; a worker that dies is replaced on the next render.

import os from "node:os";
import { Worker } from "node:worker_threads";
import type { Renderer, RenderOptions } from "../engine/Renderer";
import type { SceneData } from "../engine/SceneData";
import type { Framebuffer } from "../engine/Framebuffer";
import type { Tile } from "../engine/tiles";
import { DEFAULT_TILE_SIZE, splitTiles } from "../engine/tiles";
import type { WorkerRequest, WorkerResponse } from "./workerProtocol";

export interface WorkerRendererOptions extends RenderOptions {
  /** Pool size. */
  workers: number;
}

interface PendingFrame {
  target: Framebuffer;
  queue: { id: number; tile: Tile }[];
  remaining: number;
  resolve: () => void;
  reject: (err: Error) => void;
}

const WORKER_URL = new URL("./renderWorker.ts", import.meta.url);
// Workers load TypeScript sources through the tsx loader.
const WORKER_EXEC_ARGV = ["--import", "tsx"];

export function defaultWorkerCount(): number {
  const fromEnv = Number(process.env.HYPERPATH_WORKERS);
  if (Number.isInteger(fromEnv) && fromEnv > 0) return fromEnv;
  return os.availableParallelism();
}

export class WorkerRenderer implements Renderer {
  readonly name = "workers";
  options: WorkerRendererOptions;

  private _workers: Worker[] = [];
  private _frame = 0;
  private _pending: PendingFrame | null = null;

  constructor(options: Partial<WorkerRendererOptions> = {}) {
    const workers = options.workers ?? defaultWorkerCount();
    if (!Number.isInteger(workers) || workers <= 0) {
      throw new Error(`Worker count must be a positive integer, got ${workers}`);
    }
    this.options = { workers, tileSize: options.tileSize ?? DEFAULT_TILE_SIZE };
  }

  render(scene: SceneData, target: Framebuffer): Promise<void> {
    if (this._pending) {
      return Promise.reject(new Error("WorkerRenderer is already rendering a frame"));
    }

    const tiles = splitTiles(target.width, target.height, this.options.tileSize);
    if (tiles.length === 0) return Promise.resolve();

    this.ensureWorkers();
    const frame = ++this._frame;

    return new Promise<void>((resolve, reject) => {
      this._pending = {
        target,
        queue: tiles.map((tile, id) => ({ id, tile })),
        remaining: tiles.length,
        resolve,
        reject,
      };

      const sceneMessage: WorkerRequest = { kind: "scene", frame, scene };
      for (const worker of this._workers) {
        worker.postMessage(sceneMessage);
      }
      for (const worker of this._workers) {
        this.dispatch(worker);
      }
    });
  }

  async dispose(): Promise<void> {
    const workers = this._workers;
    this._workers = [];
    this.fail(new Error("WorkerRenderer disposed"));
    await Promise.all(workers.map((w) => w.terminate()));
  }

  private ensureWorkers(): void {
    while (this._workers.length < this.options.workers) {
      this._workers.push(this.createWorker());
    }
  }

  private createWorker(): Worker {
    const worker = new Worker(WORKER_URL, { execArgv: WORKER_EXEC_ARGV });
    worker.on("message", (message: WorkerResponse) => this.handleMessage(worker, message));
    worker.on("error", (err) => {
      this.removeWorker(worker);
      this.fail(err instanceof Error ? err : new Error(String(err)));
    });
    worker.on("exit", (code) => {
      this.removeWorker(worker);
      if (code !== 0) {
        this.fail(new Error(`Render worker exited with code ${code}`));
      }
    });
    return worker;
  }

  private removeWorker(worker: Worker): void {
    this._workers = this._workers.filter((w) => w !== worker);
  }

  /** Hand the next queued tile to `worker`, if any remain. */
  private dispatch(worker: Worker): void {
    const pending = this._pending;
    if (!pending) return;
    const next = pending.queue.shift();
    if (!next) return;
    const request: WorkerRequest = {
      kind: "tile",
      id: next.id,
      frame: this._frame,
      tile: next.tile,
      width: pending.target.width,
      height: pending.target.height,
    };
    worker.postMessage(request);
  }

  private handleMessage(worker: Worker, message: WorkerResponse): void {
    const pending = this._pending;
    if (!pending) return;
    if (message.frame !== this._frame) {
      // Left over from a frame that already failed.
      this.dispatch(worker);
      return;
    }

    if (!message.ok) {
      const err = new Error(message.error);
      if (message.stack) err.stack = message.stack;
      this.fail(err);
      return;
    }

    const { tile, rgba } = message;
    pending.target.writeBlock(tile.x, tile.y, tile.width, tile.height, rgba);
    pending.remaining--;

    if (pending.remaining === 0) {
      this._pending = null;
      pending.resolve();
      return;
    }
    this.dispatch(worker);
  }

  private fail(err: Error): void {
    const pending = this._pending;
    if (!pending) return;
    this._pending = null;
    pending.reject(err);
  }
}
