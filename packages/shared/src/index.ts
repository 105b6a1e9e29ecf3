// Shared location model, terrain rules and location file grammar for @arrakis/exporter

export * from "./errors.js";

// Re-export location model, builder and file grammar
export * from "./location/index.js";

// Re-export utilities
export * from "./utils/index.js";
