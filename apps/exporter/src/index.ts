// Scene-to-location-file exporter: host adapters, extraction pipeline and output

export * from "./errors";
export * from "./config";
export * from "./logger";

export * from "./host/types";
export * from "./host/scene-metadata";
export * from "./host/babylon-selection-host";
export * from "./host/babylon-marker-hierarchy";
export * from "./host/scene-loader";

export * from "./extraction/selection-resolver";
export * from "./extraction/topology-extractor";
export * from "./extraction/marker-cross-referencer";
export * from "./extraction/location-extractor";

export * from "./output/location-file-writer";
