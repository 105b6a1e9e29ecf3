import { Vector3 } from "@babylonjs/core/Maths/math.vector.js";
import { Mesh } from "@babylonjs/core/Meshes/mesh.js";
import type { Scene } from "@babylonjs/core/scene.js";
import { SceneMetadataError } from "../errors";
import {
  SelectionMetadataSchema,
  findSelectionMetadata,
  type SelectionGroupDefinition,
} from "./scene-metadata";
import type { HostFace, HostVertex, SelectionHost } from "./types";

const TMP_POSITION = new Vector3();

const readSelectionGroups = (mesh: Mesh): SelectionGroupDefinition[] => {
  const sources = [mesh.metadata, mesh.parent?.metadata];
  for (const metadata of sources) {
    const candidate = findSelectionMetadata(metadata);
    if (!candidate) {
      continue;
    }
    const parsed = SelectionMetadataSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new SceneMetadataError(
        `Mesh ${mesh.name} has invalid selectionGroups: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
          .join("; ")}`,
      );
    }
    return parsed.data.selectionGroups;
  }

  throw new SceneMetadataError(
    `Mesh ${mesh.name} has no selectionGroups in its metadata or glTF extras.`,
  );
};

/**
 * Finds the mesh that carries the selection groups. glTF nodes with a single
 * primitive load as the mesh itself; multi-primitive nodes load as children
 * named `<name>_primitive<n>`, of which the first is used.
 */
export const findSelectionMesh = (scene: Scene, name: string): Mesh => {
  const candidates = scene.meshes.filter(
    (mesh): mesh is Mesh =>
      mesh instanceof Mesh &&
      mesh.getTotalVertices() > 0 &&
      (mesh.name === name || mesh.name === `${name}_primitive0`),
  );
  const [mesh] = candidates;
  if (!mesh) {
    throw new SceneMetadataError(`No mesh with geometry named "${name}" found in scene.`);
  }
  return mesh;
};

/**
 * {@link SelectionHost} over a Babylon mesh whose selection groups are stored
 * in metadata. Vertex ids are vertex buffer indices; faces are the mesh
 * triangles. A face counts as selected when all of its vertices are, or when
 * a selected group lists it explicitly.
 */
export class BabylonSelectionHost implements SelectionHost {
  private readonly groups = new Map<string, SelectionGroupDefinition>();
  private readonly positions: Float32Array;
  private readonly triangles: number[][];
  private readonly selectedVertices = new Set<number>();
  private readonly selectedFaces = new Set<number>();

  constructor(private readonly mesh: Mesh) {
    this.positions = this.readWorldPositions();
    const vertexCount = this.positions.length / 3;
    this.triangles = this.readTriangles(vertexCount);

    for (const group of readSelectionGroups(mesh)) {
      if (this.groups.has(group.name)) {
        throw new SceneMetadataError(`Mesh ${mesh.name} defines group "${group.name}" twice.`);
      }
      const badVertex = group.vertices.find((id) => id >= vertexCount);
      if (badVertex !== undefined) {
        throw new SceneMetadataError(
          `Group "${group.name}" references vertex ${badVertex}, but mesh ${mesh.name} has ${vertexCount} vertices.`,
        );
      }
      const badFace = group.faces?.find((index) => index >= this.triangles.length);
      if (badFace !== undefined) {
        throw new SceneMetadataError(
          `Group "${group.name}" references face ${badFace}, but mesh ${mesh.name} has ${this.triangles.length} faces.`,
        );
      }
      this.groups.set(group.name, group);
    }
  }

  listGroups(): readonly string[] {
    return [...this.groups.keys()];
  }

  deselectAll(): void {
    this.selectedVertices.clear();
    this.selectedFaces.clear();
  }

  selectGroup(name: string): void {
    const group = this.groups.get(name);
    if (!group) {
      throw new SceneMetadataError(`Mesh ${this.mesh.name} has no selection group "${name}".`);
    }
    for (const id of group.vertices) {
      this.selectedVertices.add(id);
    }
    for (const index of group.faces ?? []) {
      this.selectedFaces.add(index);
    }
  }

  getSelectedVertices(): HostVertex[] {
    const vertices: HostVertex[] = [];
    const vertexCount = this.positions.length / 3;
    for (let id = 0; id < vertexCount; id += 1) {
      if (!this.selectedVertices.has(id)) {
        continue;
      }
      const offset = id * 3;
      vertices.push({
        id,
        position: {
          x: this.positions[offset],
          y: this.positions[offset + 1],
          z: this.positions[offset + 2],
        },
      });
    }
    return vertices;
  }

  getFaces(): HostFace[] {
    return this.triangles.map((vertexIds, index) => ({
      index,
      vertexIds,
      selected:
        this.selectedFaces.has(index) || vertexIds.every((id) => this.selectedVertices.has(id)),
    }));
  }

  private readWorldPositions(): Float32Array {
    const data = this.mesh.getPositionData();
    if (!data || data.length === 0) {
      throw new SceneMetadataError(`Mesh ${this.mesh.name} has no geometry.`);
    }

    const worldMatrix = this.mesh.computeWorldMatrix(true);
    const positions = new Float32Array(data.length);
    for (let index = 0; index < data.length; index += 3) {
      TMP_POSITION.set(data[index], data[index + 1], data[index + 2]);
      Vector3.TransformCoordinatesToRef(TMP_POSITION, worldMatrix, TMP_POSITION);
      positions[index] = TMP_POSITION.x;
      positions[index + 1] = TMP_POSITION.y;
      positions[index + 2] = TMP_POSITION.z;
    }
    return positions;
  }

  private readTriangles(vertexCount: number): number[][] {
    const indices = this.mesh.getIndices();
    const triangles: number[][] = [];
    if (!indices || indices.length === 0) {
      for (let id = 0; id + 2 < vertexCount; id += 3) {
        triangles.push([id, id + 1, id + 2]);
      }
      return triangles;
    }

    for (let index = 0; index + 2 < indices.length; index += 3) {
      triangles.push([indices[index], indices[index + 1], indices[index + 2]]);
    }
    return triangles;
  }
}
