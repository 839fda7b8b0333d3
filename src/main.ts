// main.ts - browser viewer. Loads a scene file, wires up the engine and the
// scene panel, and presents each finished frame on the canvas.
//
// Query parameters:
//   ?scene=<name>   scene file under /scenes (default: "default")
//   ?scale=<n>      render at 1/n of the canvas resolution (default: 4)
//
// Rendering runs on the main thread through CpuRenderer, so keep the scale
// high enough for the frame rate to stay usable.

import { CpuRenderer, Engine, parseSceneFile, sceneFromFile } from "./engine";
import type { Framebuffer, FrameStats } from "./engine";
import { ScenePanel } from "./ui/ScenePanel";

// ---------------------------------------------------------------------------
// Canvas and configuration
// ---------------------------------------------------------------------------

const canvas = document.getElementById("canvas") as HTMLCanvasElement;
const statsEl = document.getElementById("stats") as HTMLDivElement;
const panelEl = document.getElementById("panel") as HTMLDivElement;

const params = new URLSearchParams(window.location.search);
const sceneName = params.get("scene") ?? "default";
const scale = Math.max(1, Number(params.get("scale") ?? 4) || 4);

function renderSize(): { width: number; height: number } {
  return {
    width: Math.max(1, Math.floor(canvas.clientWidth / scale)),
    height: Math.max(1, Math.floor(canvas.clientHeight / scale)),
  };
}

// ---------------------------------------------------------------------------
// Scene loading
// ---------------------------------------------------------------------------

async function loadSceneFile(name: string) {
  const url = `scenes/${name}.json`;
  const response = await fetch(url);
  if (!response.ok) throw new Error(`Failed to fetch ${url}: ${response.status}`);
  const file = parseSceneFile(await response.json(), url);
  console.log(
    `Loaded ${url}: ${file.hyperSpheres.length} hyperspheres, ` +
      `${file.hyperCuboids.length} hypercuboids, ${file.hyperPlanes.length} hyperplanes`,
  );
  return sceneFromFile(file);
}

// ---------------------------------------------------------------------------
// Presentation
// ---------------------------------------------------------------------------

function present(ctx: CanvasRenderingContext2D, framebuffer: Framebuffer, stats: FrameStats): void {
  if (canvas.width !== framebuffer.width || canvas.height !== framebuffer.height) {
    canvas.width = framebuffer.width;
    canvas.height = framebuffer.height;
  }
  const image = new ImageData(framebuffer.toRgba8(), framebuffer.width, framebuffer.height);
  ctx.putImageData(image, 0, 0);
  statsEl.textContent = `${stats.width}x${stats.height}, ${stats.renderMs.toFixed(0)} ms`;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("Canvas 2D context unavailable");

  const scene = await loadSceneFile(sceneName);
  scene.camera.attach(window);
  new ScenePanel(scene, panelEl);

  const { width, height } = renderSize();
  const engine = new Engine(new CpuRenderer(), scene, width, height);
  engine.onFrame = (framebuffer, stats) => {
    present(ctx, framebuffer, stats);
    const size = renderSize();
    engine.resize(size.width, size.height);
  };

  console.log(`Rendering at 1/${scale} resolution (${width}x${height})`);
  engine.start();
}

main().catch((err) => {
  const banner = document.createElement("h1");
  banner.style.color = "red";
  banner.style.padding = "2rem";
  banner.textContent = err instanceof Error ? err.message : String(err);
  document.body.replaceChildren(banner);
  console.error(err);
});
