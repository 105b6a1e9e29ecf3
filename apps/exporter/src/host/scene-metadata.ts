import { z } from "zod";

const vertexIdList = z.array(z.number().int().nonnegative());

export const SelectionGroupSchema = z.object({
  name: z.string().min(1),
  vertices: vertexIdList,
  /** Faces selected independently of their vertices (face select mode). */
  faces: vertexIdList.optional(),
});

export type SelectionGroupDefinition = z.infer<typeof SelectionGroupSchema>;

export const SelectionMetadataSchema = z.object({
  selectionGroups: z.array(SelectionGroupSchema),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/**
 * Returns the object that holds `selectionGroups` on a node: the metadata
 * itself or, for nodes loaded from glTF, the node's extras.
 */
export const findSelectionMetadata = (metadata: unknown): Record<string, unknown> | undefined => {
  if (!isRecord(metadata)) {
    return undefined;
  }
  if ("selectionGroups" in metadata) {
    return metadata;
  }
  const gltf = metadata.gltf;
  if (isRecord(gltf) && isRecord(gltf.extras) && "selectionGroups" in gltf.extras) {
    return gltf.extras;
  }
  return undefined;
};
