import type { Node } from "@babylonjs/core/node.js";
import { TransformNode } from "@babylonjs/core/Meshes/transformNode.js";
import type { Scene } from "@babylonjs/core/scene.js";
import type { Vec3 } from "@arrakis/shared";
import type { MarkerCollection, MarkerHierarchy } from "./types";

/**
 * A scene node viewed as a marker collection: its direct children are either
 * sub-collections (looked up by name) or marker objects (read by position).
 */
export class BabylonMarkerCollection implements MarkerCollection {
  constructor(private readonly node: Node) {}

  get name(): string {
    return this.node.name;
  }

  findChild(name: string): MarkerCollection | undefined {
    const [child] = this.node.getChildren((candidate) => candidate.name === name, true);
    return child ? new BabylonMarkerCollection(child) : undefined;
  }

  objectPositions(): Vec3[] {
    return this.node
      .getChildren((candidate): candidate is TransformNode => candidate instanceof TransformNode, true)
      .map((child) => {
        child.computeWorldMatrix(true);
        const { x, y, z } = child.getAbsolutePosition();
        return { x, y, z };
      });
  }
}

/**
 * {@link MarkerHierarchy} over the named nodes of a Babylon scene.
 */
export class BabylonMarkerHierarchy implements MarkerHierarchy {
  constructor(private readonly scene: Scene) {}

  findCollection(name: string): MarkerCollection | undefined {
    const node = this.scene.getNodeByName(name);
    return node ? new BabylonMarkerCollection(node) : undefined;
  }
}
