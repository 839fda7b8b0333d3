#!/usr/bin/env node
// cli.ts - renders a scene file to an image.
//
//   npm run render -- --scene public/scenes/default.json --out render.png
//
// --workers 0 renders on the main thread; otherwise tiles go to a worker pool
// (default size: HYPERPATH_WORKERS, or one worker per CPU).

import path from "node:path";
import { pathToFileURL } from "node:url";
import { CpuRenderer } from "./engine/CpuRenderer";
import { DEFAULT_TILE_SIZE } from "./engine/tiles";
import { Engine } from "./engine/Engine";
import type { Renderer } from "./engine/Renderer";
import { loadScene } from "./node/loadScene";
import { writeImage } from "./node/writeImage";
import { WorkerRenderer, defaultWorkerCount } from "./node/WorkerRenderer";

export type CliArgs = {
  scene: string;
  out: string;
  width: number;
  height: number;
  samples?: number;
  bounces?: number;
  tileSize: number;
  workers: number;
  quiet: boolean;
  help: boolean;
};

const DEFAULT_SCENE = "public/scenes/default.json";
const DEFAULT_OUT = "render.png";
const DEFAULT_WIDTH = 640;
const DEFAULT_HEIGHT = 360;

export const USAGE =
  `Usage: hyperpath [--scene ${DEFAULT_SCENE}] [--out ${DEFAULT_OUT}] ` +
  `[--width ${DEFAULT_WIDTH}] [--height ${DEFAULT_HEIGHT}] [--samples n] [--bounces n] ` +
  `[--tile ${DEFAULT_TILE_SIZE}] [--workers n] [--quiet] [--help]`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const parseInteger = (flag: string, value: string | undefined, min: number): number => {
  if (value === undefined) throw new UsageError(`${flag} needs a value`);
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new UsageError(`${flag} must be an integer >= ${min}, got "${value}"`);
  }
  return n;
};

const requireValue = (flag: string, value: string | undefined): string => {
  if (value === undefined || value.startsWith("--")) throw new UsageError(`${flag} needs a value`);
  return value;
};

export function parseArgs(argv: string[], defaultWorkers = 1): CliArgs {
  const args: CliArgs = {
    scene: DEFAULT_SCENE,
    out: DEFAULT_OUT,
    width: DEFAULT_WIDTH,
    height: DEFAULT_HEIGHT,
    tileSize: DEFAULT_TILE_SIZE,
    workers: defaultWorkers,
    quiet: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    switch (flag) {
      case "--scene":
        args.scene = requireValue(flag, argv[++i]);
        break;
      case "--out":
        args.out = requireValue(flag, argv[++i]);
        break;
      case "--width":
        args.width = parseInteger(flag, argv[++i], 1);
        break;
      case "--height":
        args.height = parseInteger(flag, argv[++i], 1);
        break;
      case "--samples":
        args.samples = parseInteger(flag, argv[++i], 1);
        break;
      case "--bounces":
        args.bounces = parseInteger(flag, argv[++i], 0);
        break;
      case "--tile":
        args.tileSize = parseInteger(flag, argv[++i], 1);
        break;
      case "--workers":
        args.workers = parseInteger(flag, argv[++i], 0);
        break;
      case "--quiet":
        args.quiet = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument "${flag}"`);
    }
  }

  return args;
}

export function createRenderer(args: Pick<CliArgs, "workers" | "tileSize">): Renderer {
  return args.workers === 0
    ? new CpuRenderer({ tileSize: args.tileSize })
    : new WorkerRenderer({ workers: args.workers, tileSize: args.tileSize });
}

export async function run(args: CliArgs): Promise<void> {
  const log = (message: string) => {
    if (!args.quiet) console.log(message);
  };

  const scene = await loadScene(args.scene);
  if (args.samples !== undefined) scene.camera.sampleCount = args.samples;
  if (args.bounces !== undefined) scene.camera.bounceCount = args.bounces;

  const renderer = createRenderer(args);
  const engine = new Engine(renderer, scene, args.width, args.height);
  log(`Rendering ${path.basename(args.scene)} at ${args.width}x${args.height} ` +
    `(${scene.camera.sampleCount} samples, ${scene.camera.bounceCount} bounces, ` +
    `backend: ${renderer.name}${args.workers > 0 ? ` x${args.workers}` : ""})`);

  try {
    const stats = await engine.renderFrame();
    log(`Rendered in ${stats.renderMs.toFixed(0)} ms`);
  } finally {
    await renderer.dispose();
  }

  await writeImage(args.out, engine.framebuffer);
  log(`Wrote ${args.out}`);
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2), defaultWorkerCount());
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error(USAGE);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  if (args.help) {
    console.log(USAGE);
    return;
  }

  await run(args);
}

const isEntryPoint = process.argv[1] !== undefined && import.meta.url === pathToFileURL(path.resolve(process.argv[1])).href;
if (isEntryPoint) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
