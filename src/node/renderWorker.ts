// Worker entry point: renders tiles for WorkerRenderer.

import { parentPort } from "node:worker_threads";
import type { WorkerRequest, WorkerState } from "./workerProtocol";
import { handleWorkerRequest } from "./workerProtocol";

const port = parentPort;
if (!port) {
  throw new Error("Render worker started without parentPort");
}

const state: WorkerState = { frame: -1, scene: null };

port.on("message", (message: WorkerRequest) => {
  const response = handleWorkerRequest(state, message);
  if (!response) return;
  const buffer = response.ok ? response.rgba.buffer : null;
  port.postMessage(response, buffer instanceof ArrayBuffer ? [buffer] : []);
});
