/**
 * A position in scene space.
 */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Terrain classification of a location.
 */
export type Terrain = "Rock" | "Stronghold" | "Sand";

export const TERRAINS: readonly Terrain[] = ["Rock", "Stronghold", "Sand"];

/**
 * Sector identifier within a location. Non-negative for explicit sectors,
 * {@link UNGROUPED_SECTOR} when the source group name had no sector suffix.
 */
export type SectorId = number;

export const UNGROUPED_SECTOR: SectorId = -1;

/**
 * Geometry and spawn markers of one sector.
 */
export interface SectorRecord {
  /** Selected vertex positions, in host iteration order. */
  vertices: Vec3[];
  /** Flattened triangle corners as local indices into `vertices`. */
  indices: number[];
  /** Fighter spawn marker positions. */
  fighters: Vec3[];
}

export interface LocationRecord {
  name: string;
  terrain: Terrain;
  /** Spice marker position, at most one per location. */
  spice?: Vec3;
  /** Sectors in first-seen order. */
  sectors: Map<SectorId, SectorRecord>;
}

/**
 * All exported locations keyed by name, in first-seen order.
 */
export type LocationModel = Map<string, LocationRecord>;
