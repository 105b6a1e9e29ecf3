export * from "./types.js";
export * from "./terrain.js";
export * from "./group-name.js";
export * from "./location-model-builder.js";
export * from "./location-file.js";
export * from "./location-file-parser.js";
export * from "./model-equality.js";
