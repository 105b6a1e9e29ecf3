import type { SectorId, Vec3 } from "@arrakis/shared";
import { LocationLookupError } from "../errors";
import type { MarkerCollection, MarkerHierarchy } from "../host/types";

export const SPICE_COLLECTION_SUFFIX = "Spice";

export const fighterCollectionName = (location: string, sector: SectorId): string =>
  `${location} ${sector}`;

export const spiceCollectionName = (location: string): string =>
  `${location} ${SPICE_COLLECTION_SUFFIX}`;

/**
 * Resolves fighter and spice markers for locations from a marker hierarchy
 * laid out as `<location>` → `<location> <sector>` / `<location> Spice`.
 * Only the location collection is required; missing sub-collections mean
 * no markers.
 */
export class MarkerCrossReferencer {
  constructor(private readonly hierarchy: MarkerHierarchy) {}

  requireLocationCollection(location: string): MarkerCollection {
    const collection = this.hierarchy.findCollection(location);
    if (!collection) {
      throw new LocationLookupError(location);
    }
    return collection;
  }

  findFighters(location: string, sector: SectorId): Vec3[] {
    const sectorCollection = this.requireLocationCollection(location).findChild(
      fighterCollectionName(location, sector),
    );
    return sectorCollection?.objectPositions() ?? [];
  }

  findSpice(location: string): Vec3 | undefined {
    const spiceCollection = this.requireLocationCollection(location).findChild(
      spiceCollectionName(location),
    );
    const [first] = spiceCollection?.objectPositions() ?? [];
    return first;
  }
}
