import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NullEngine } from "@babylonjs/core/Engines/nullEngine";
import { SceneMetadataError } from "../src/errors";
import { extractLocations } from "../src/extraction/location-extractor";
import { BabylonMarkerHierarchy } from "../src/host/babylon-marker-hierarchy";
import { BabylonSelectionHost, findSelectionMesh } from "../src/host/babylon-selection-host";
import { loadGlbScene } from "../src/host/scene-loader";
import { buildGlb, type GlbFixture } from "./glb-fixture";
import { silentLogger } from "./in-memory-host";

const boardFixture: GlbFixture = {
  sceneNodes: [0, 1],
  nodes: [
    {
      name: "Map",
      mesh: 0,
      extras: { selectionGroups: [{ name: "Carthag;0", vertices: [0, 1, 2] }] },
    },
    { name: "Carthag", children: [2, 3] },
    { name: "Carthag 0", children: [4], translation: [1, 0, 0] },
    { name: "Carthag Spice", children: [5] },
    { name: "Fighter", translation: [1.5, 0, -4.25] },
    { name: "Token", translation: [7, 0, 8] },
  ],
  positions: [1, 0, 2, 3, 0, 4, 5, 0, 6],
  indices: [0, 1, 2],
};

describe("loadGlbScene", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "scene-loader-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  const writeGlb = async (fixture: GlbFixture): Promise<string> => {
    const glbPath = path.join(dir, "board.glb");
    await writeFile(glbPath, buildGlb(fixture));
    return glbPath;
  };

  it("reads selection groups from node extras", async () => {
    const { scene, dispose } = await loadGlbScene(await writeGlb(boardFixture));
    try {
      const host = new BabylonSelectionHost(findSelectionMesh(scene, "Map"));

      expect(host.listGroups()).toEqual(["Carthag;0"]);
    } finally {
      dispose();
    }
  });

  it("keeps the file's axes for vertices and markers", async () => {
    const { scene, dispose } = await loadGlbScene(await writeGlb(boardFixture));
    try {
      const { model } = extractLocations(
        new BabylonSelectionHost(findSelectionMesh(scene, "Map")),
        new BabylonMarkerHierarchy(scene),
        { logger: silentLogger },
      );
      const carthag = model.get("Carthag");

      expect(carthag?.spice).toEqual({ x: 7, y: 0, z: 8 });
      expect(carthag?.sectors.get(0)).toEqual({
        vertices: [
          { x: 1, y: 0, z: 2 },
          { x: 3, y: 0, z: 4 },
          { x: 5, y: 0, z: 6 },
        ],
        indices: [0, 1, 2],
        fighters: [{ x: 2.5, y: 0, z: -4.25 }],
      });
    } finally {
      dispose();
    }
  });

  it("rejects a file without mesh geometry and disposes the engine", async () => {
    const engineDispose = vi.spyOn(NullEngine.prototype, "dispose");
    const glbPath = await writeGlb({ sceneNodes: [0], nodes: [{ name: "Empty" }] });

    await expect(loadGlbScene(glbPath)).rejects.toThrow(SceneMetadataError);
    expect(engineDispose).toHaveBeenCalledTimes(1);
  });

  it("disposes the engine when the file cannot be read", async () => {
    const engineDispose = vi.spyOn(NullEngine.prototype, "dispose");

    await expect(loadGlbScene(path.join(dir, "missing.glb"))).rejects.toThrow("ENOENT");
    expect(engineDispose).toHaveBeenCalledTimes(1);
  });
});
