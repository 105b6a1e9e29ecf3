import { SelectionConflictError } from "../errors";
import type { HostFace, HostVertex, SelectionHost } from "../host/types";

/**
 * Immutable read-back of one selection group.
 */
export interface SelectionSnapshot {
  readonly groupName: string;
  /** Selected vertices in host order; local index = array position. */
  readonly vertices: readonly HostVertex[];
  /** Global vertex id to local index. */
  readonly localIndexById: ReadonlyMap<number, number>;
  readonly faces: readonly HostFace[];
}

/**
 * Reads selection groups one at a time from a {@link SelectionHost}.
 * The host keeps one global selection, so a resolution that starts while
 * another is in flight is rejected.
 */
export class SelectionResolver {
  private activeGroup: string | undefined;

  constructor(private readonly host: SelectionHost) {}

  resolve(groupName: string): SelectionSnapshot {
    if (this.activeGroup !== undefined) {
      throw new SelectionConflictError(this.activeGroup, groupName);
    }

    this.activeGroup = groupName;
    try {
      // Deselect first so nothing from the previous group carries over.
      this.host.deselectAll();
      this.host.selectGroup(groupName);

      const vertices = this.host.getSelectedVertices().map((vertex) =>
        Object.freeze({ id: vertex.id, position: Object.freeze({ ...vertex.position }) }),
      );
      const localIndexById = new Map<number, number>();
      vertices.forEach((vertex, localIndex) => {
        if (localIndexById.has(vertex.id)) {
          throw new Error(`Host reported vertex ${vertex.id} twice for group "${groupName}".`);
        }
        localIndexById.set(vertex.id, localIndex);
      });
      const faces = this.host.getFaces().map((face) =>
        Object.freeze({
          index: face.index,
          vertexIds: Object.freeze([...face.vertexIds]),
          selected: face.selected,
        }),
      );

      return Object.freeze({
        groupName,
        vertices: Object.freeze(vertices),
        localIndexById,
        faces: Object.freeze(faces),
      });
    } finally {
      this.activeGroup = undefined;
    }
  }
}
