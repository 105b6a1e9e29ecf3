import { readFile } from "node:fs/promises";
import path from "node:path";
import "@babylonjs/loaders/glTF/index.js";
import { NullEngine } from "@babylonjs/core/Engines/nullEngine.js";
import { LoadAssetContainerAsync } from "@babylonjs/core/Loading/sceneLoader.js";
import { Mesh } from "@babylonjs/core/Meshes/mesh.js";
import { Scene } from "@babylonjs/core/scene.js";
import { SceneMetadataError } from "../errors";

export interface LoadedScene {
  scene: Scene;
  dispose: () => void;
}

/**
 * Loads a `.glb` file into a headless Babylon scene. The scene is
 * right-handed, so world positions come out in the file's own glTF frame
 * (Y up, no mirrored X).
 */
export const loadGlbScene = async (glbPath: string): Promise<LoadedScene> => {
  const engine = new NullEngine();
  const scene = new Scene(engine);
  scene.useRightHandedSystem = true;
  const dispose = (): void => {
    scene.dispose();
    engine.dispose();
  };

  try {
    const glbBytes = await readFile(glbPath);
    const container = await LoadAssetContainerAsync(new Uint8Array(glbBytes), scene, {
      pluginExtension: ".glb",
      name: path.basename(glbPath),
    });
    container.addAllToScene();

    // The loader always adds an empty `__root__` mesh.
    const hasGeometry = scene.meshes.some(
      (mesh) => mesh instanceof Mesh && mesh.getTotalVertices() > 0,
    );
    if (!hasGeometry) {
      throw new SceneMetadataError(`No meshes found in GLB scene: ${glbPath}`);
    }
  } catch (error) {
    dispose();
    throw error;
  }

  return { scene, dispose };
};
