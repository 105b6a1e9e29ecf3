import type { Vec3 } from "@arrakis/shared";

/**
 * A mesh vertex as reported by the host: its stable global id and position.
 */
export interface HostVertex {
  id: number;
  position: Vec3;
}

/**
 * A mesh face and whether the host currently considers it selected.
 */
export interface HostFace {
  index: number;
  vertexIds: readonly number[];
  selected: boolean;
}

/**
 * The editing environment's selection surface. It holds a single global
 * selection, so callers must not interleave calls for different groups.
 */
export interface SelectionHost {
  /** Selection group names in host order. */
  listGroups(): readonly string[];
  deselectAll(): void;
  /** Adds the named group to the current selection. */
  selectGroup(name: string): void;
  /** Selected vertices in host iteration order. */
  getSelectedVertices(): HostVertex[];
  /** Every face of the mesh, in mesh order. */
  getFaces(): HostFace[];
}

/**
 * A named node of the marker hierarchy.
 */
export interface MarkerCollection {
  readonly name: string;
  /** Direct child collection with the given name, if any. */
  findChild(name: string): MarkerCollection | undefined;
  /** Positions of the objects directly contained in this collection. */
  objectPositions(): Vec3[];
}

export interface MarkerHierarchy {
  findCollection(name: string): MarkerCollection | undefined;
}
