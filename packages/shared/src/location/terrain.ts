import { TerrainConfigError } from "../errors.js";
import type { Terrain } from "./types.js";

/**
 * Static membership sets that drive terrain classification.
 */
export interface TerrainConfig {
  strongholds: readonly string[];
  rock: readonly string[];
}

export const DEFAULT_TERRAIN_CONFIG: TerrainConfig = {
  strongholds: ["Arrakeen", "Carthag", "Sietch Tabr", "Habbanya Sietch", "Tuek's Sietch"],
  rock: [
    "False Wall South",
    "False Wall West",
    "False Wall East",
    "Pasty Mesa",
    "Shield Wall",
    "Rim Wall West",
    "Plastic Basin",
  ],
};

/**
 * Classifies location names against a fixed {@link TerrainConfig}.
 * Anything outside both sets is Sand.
 */
export class TerrainClassifier {
  private readonly strongholds: ReadonlySet<string>;
  private readonly rock: ReadonlySet<string>;

  constructor(config: TerrainConfig = DEFAULT_TERRAIN_CONFIG) {
    this.strongholds = new Set(config.strongholds);
    this.rock = new Set(config.rock);

    const overlap = [...this.strongholds].filter((name) => this.rock.has(name));
    if (overlap.length > 0) {
      throw new TerrainConfigError(
        `Locations cannot be both stronghold and rock: ${overlap.join(", ")}`,
      );
    }
  }

  classify(locationName: string): Terrain {
    if (this.strongholds.has(locationName)) {
      return "Stronghold";
    }
    if (this.rock.has(locationName)) {
      return "Rock";
    }
    return "Sand";
  }
}
