import { IndexConsistencyError } from "../errors.js";
import { parseGroupName, type ParsedGroupName } from "./group-name.js";
import { TerrainClassifier } from "./terrain.js";
import type { LocationModel, LocationRecord, SectorId, SectorRecord, Vec3 } from "./types.js";

export interface SectorGeometry {
  vertices: Vec3[];
  indices: number[];
}

/**
 * Checks that every index addresses one of `vertexCount` vertices.
 */
export const assertIndicesInRange = (
  indices: readonly number[],
  vertexCount: number,
  context: string,
): void => {
  for (let position = 0; position < indices.length; position += 1) {
    const index = indices[position];
    if (!Number.isInteger(index) || index < 0 || index >= vertexCount) {
      throw new IndexConsistencyError(
        `${context}: index ${index} at position ${position} is outside [0, ${vertexCount}).`,
      );
    }
  }
};

/**
 * Accumulates per-group geometry and per-location markers into a
 * {@link LocationModel}. Locations and sectors keep their first-seen order;
 * setting a sector that already exists replaces it in place.
 */
export class LocationModelBuilder {
  private readonly locations: LocationModel = new Map();
  private sealed = false;

  constructor(private readonly classifier: TerrainClassifier = new TerrainClassifier()) {}

  setSector(groupName: string, geometry: SectorGeometry): ParsedGroupName {
    this.assertOpen();
    const parsed = parseGroupName(groupName);
    assertIndicesInRange(geometry.indices, geometry.vertices.length, `Group "${groupName}"`);

    let location = this.locations.get(parsed.location);
    if (!location) {
      location = {
        name: parsed.location,
        terrain: this.classifier.classify(parsed.location),
        sectors: new Map(),
      };
      this.locations.set(parsed.location, location);
    }

    location.sectors.set(parsed.sector, {
      vertices: [...geometry.vertices],
      indices: [...geometry.indices],
      fighters: [],
    });
    return parsed;
  }

  setFighters(locationName: string, sector: SectorId, fighters: readonly Vec3[]): void {
    this.assertOpen();
    this.requireSector(locationName, sector).fighters = [...fighters];
  }

  setSpice(locationName: string, spice: Vec3 | undefined): void {
    this.assertOpen();
    const location = this.requireLocation(locationName);
    if (spice) {
      location.spice = spice;
    } else {
      delete location.spice;
    }
  }

  locationNames(): string[] {
    return [...this.locations.keys()];
  }

  sectorIds(locationName: string): SectorId[] {
    return [...this.requireLocation(locationName).sectors.keys()];
  }

  /**
   * Returns the accumulated model. The builder rejects further writes.
   */
  build(): LocationModel {
    this.sealed = true;
    return this.locations;
  }

  private requireLocation(locationName: string): LocationRecord {
    const location = this.locations.get(locationName);
    if (!location) {
      throw new Error(`Unknown location "${locationName}".`);
    }
    return location;
  }

  private requireSector(locationName: string, sector: SectorId): SectorRecord {
    const record = this.requireLocation(locationName).sectors.get(sector);
    if (!record) {
      throw new Error(`Location "${locationName}" has no sector ${sector}.`);
    }
    return record;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error("Location model has already been built.");
    }
  }
}
