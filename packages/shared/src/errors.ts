/**
 * Raised when a group name cannot be split into a location and a sector.
 */
export class GroupNameError extends Error {
  constructor(
    public readonly groupName: string,
    message: string,
  ) {
    super(`Invalid selection group name "${groupName}": ${message}`);
    this.name = "GroupNameError";
  }
}

/**
 * Raised when triangle indices and the vertices they point into disagree.
 */
export class IndexConsistencyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IndexConsistencyError";
  }
}

/**
 * Raised when a location file cannot be written or read back.
 */
export class LocationFileError extends Error {
  constructor(
    message: string,
    public readonly offset?: number,
  ) {
    super(offset === undefined ? message : `${message} (at offset ${offset})`);
    this.name = "LocationFileError";
  }
}

/**
 * Raised when the stronghold and rock sets are not usable as a classification.
 */
export class TerrainConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TerrainConfigError";
  }
}
