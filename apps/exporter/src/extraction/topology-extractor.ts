import { IndexConsistencyError } from "@arrakis/shared";
import type { HostFace } from "../host/types";
import type { SelectionSnapshot } from "./selection-resolver";

/**
 * Which faces contribute triangle indices for a selection.
 *
 * - `subset`: selected faces whose vertices all belong to the vertex
 *   selection. Faces the host marks selected with a vertex outside the
 *   selection are skipped.
 * - `faithful`: every face the host marks selected. A vertex outside the
 *   vertex selection raises {@link IndexConsistencyError}.
 */
export type TopologyPolicy = "subset" | "faithful";

export const TOPOLOGY_POLICIES: readonly TopologyPolicy[] = ["subset", "faithful"];

export const DEFAULT_TOPOLOGY_POLICY: TopologyPolicy = "subset";

const isFaceIncluded = (
  face: HostFace,
  snapshot: SelectionSnapshot,
  policy: TopologyPolicy,
): boolean => {
  if (!face.selected) {
    return false;
  }
  if (policy === "faithful") {
    return true;
  }
  return face.vertexIds.every((id) => snapshot.localIndexById.has(id));
};

/**
 * Flattens the included faces into local vertex indices, face by face and
 * vertex by vertex in host order.
 */
export const extractIndices = (
  snapshot: SelectionSnapshot,
  policy: TopologyPolicy = DEFAULT_TOPOLOGY_POLICY,
): number[] => {
  const indices: number[] = [];
  for (const face of snapshot.faces) {
    if (!isFaceIncluded(face, snapshot, policy)) {
      continue;
    }
    for (const vertexId of face.vertexIds) {
      const localIndex = snapshot.localIndexById.get(vertexId);
      if (localIndex === undefined) {
        throw new IndexConsistencyError(
          `Group "${snapshot.groupName}": face ${face.index} is selected but its vertex ${vertexId} is not.`,
        );
      }
      indices.push(localIndex);
    }
  }
  return indices;
};
