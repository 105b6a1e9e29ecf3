import type { LocationModel, LocationRecord, SectorRecord, Vec3 } from "./types.js";

const vec3Equal = (a: Vec3 | undefined, b: Vec3 | undefined): boolean => {
  if (!a || !b) {
    return a === b;
  }
  return a.x === b.x && a.y === b.y && a.z === b.z;
};

const vec3ListEqual = (a: readonly Vec3[], b: readonly Vec3[]): boolean =>
  a.length === b.length && a.every((value, index) => vec3Equal(value, b[index]));

const sectorEqual = (a: SectorRecord, b: SectorRecord): boolean =>
  vec3ListEqual(a.vertices, b.vertices) &&
  a.indices.length === b.indices.length &&
  a.indices.every((index, position) => index === b.indices[position]) &&
  vec3ListEqual(a.fighters, b.fighters);

const locationEqual = (a: LocationRecord, b: LocationRecord): boolean => {
  if (a.name !== b.name || a.terrain !== b.terrain || !vec3Equal(a.spice, b.spice)) {
    return false;
  }
  const aSectors = [...a.sectors];
  const bSectors = [...b.sectors];
  return (
    aSectors.length === bSectors.length &&
    aSectors.every(([sector, record], position) => {
      const [otherSector, otherRecord] = bSectors[position];
      return sector === otherSector && sectorEqual(record, otherRecord);
    })
  );
};

/**
 * Field-for-field model comparison, including location and sector order.
 */
export const locationModelsEqual = (a: LocationModel, b: LocationModel): boolean => {
  const aLocations = [...a.values()];
  const bLocations = [...b.values()];
  return (
    aLocations.length === bLocations.length &&
    aLocations.every((location, index) => locationEqual(location, bLocations[index]))
  );
};
