/**
 * A location has no top-level collection in the marker hierarchy.
 */
export class LocationLookupError extends Error {
  constructor(public readonly location: string) {
    super(`No marker collection exists for location "${location}".`);
    this.name = "LocationLookupError";
  }
}

/**
 * A selection was requested while another one was still being read.
 */
export class SelectionConflictError extends Error {
  constructor(
    public readonly activeGroup: string,
    public readonly requestedGroup: string,
  ) {
    super(
      `Cannot select group "${requestedGroup}" while group "${activeGroup}" is still being resolved.`,
    );
    this.name = "SelectionConflictError";
  }
}

export class OutputWriteError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to write location file ${path}`, { cause });
    this.name = "OutputWriteError";
  }
}

/**
 * The scene does not carry the selection mesh or its groups in the expected shape.
 */
export class SceneMetadataError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SceneMetadataError";
  }
}

export class ExporterConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExporterConfigError";
  }
}
