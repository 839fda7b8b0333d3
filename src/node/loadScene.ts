import fs from "node:fs/promises";
import type { Scene } from "../engine/Scene";
import { parseSceneJson, sceneFromFile } from "../engine/sceneFile";

/** Reads, validates and builds a scene from a JSON file on disk. */
export async function loadScene(filePath: string): Promise<Scene> {
  const text = await fs.readFile(filePath, "utf8");
  return sceneFromFile(parseSceneJson(text, filePath));
}
