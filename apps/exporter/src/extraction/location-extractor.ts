import { LocationModelBuilder, TerrainClassifier, type LocationModel } from "@arrakis/shared";
import { logger as defaultLogger, type Logger } from "../logger";
import type { MarkerHierarchy, SelectionHost } from "../host/types";
import { MarkerCrossReferencer } from "./marker-cross-referencer";
import { SelectionResolver } from "./selection-resolver";
import { DEFAULT_TOPOLOGY_POLICY, extractIndices, type TopologyPolicy } from "./topology-extractor";

export interface ExtractLocationsOptions {
  policy?: TopologyPolicy;
  classifier?: TerrainClassifier;
  logger?: Logger;
}

export interface ExtractionSummary {
  groups: number;
  locations: number;
  sectors: number;
  vertices: number;
  indices: number;
  fighters: number;
  spice: number;
}

export interface ExtractionResult {
  model: LocationModel;
  summary: ExtractionSummary;
}

const summarize = (groups: number, model: LocationModel): ExtractionSummary => {
  const summary: ExtractionSummary = {
    groups,
    locations: model.size,
    sectors: 0,
    vertices: 0,
    indices: 0,
    fighters: 0,
    spice: 0,
  };
  for (const location of model.values()) {
    summary.spice += location.spice ? 1 : 0;
    for (const sector of location.sectors.values()) {
      summary.sectors += 1;
      summary.vertices += sector.vertices.length;
      summary.indices += sector.indices.length;
      summary.fighters += sector.fighters.length;
    }
  }
  return summary;
};

/**
 * Builds the location model from every selection group of the host, then
 * attaches fighter and spice markers per location.
 *
 * Groups are resolved strictly one after another. Any lookup or index
 * failure aborts the whole extraction.
 */
export const extractLocations = (
  host: SelectionHost,
  markers: MarkerHierarchy,
  options: ExtractLocationsOptions = {},
): ExtractionResult => {
  const log = options.logger ?? defaultLogger;
  const policy = options.policy ?? DEFAULT_TOPOLOGY_POLICY;
  const builder = new LocationModelBuilder(options.classifier);
  const resolver = new SelectionResolver(host);
  const crossReferencer = new MarkerCrossReferencer(markers);

  const groupNames = host.listGroups();
  for (const groupName of groupNames) {
    const snapshot = resolver.resolve(groupName);
    const indices = extractIndices(snapshot, policy);
    const { location, sector } = builder.setSector(groupName, {
      vertices: snapshot.vertices.map((vertex) => vertex.position),
      indices,
    });
    log.debug(
      {
        group: groupName,
        location,
        sector,
        vertices: snapshot.vertices.length,
        indices: indices.length,
      },
      "Resolved selection group",
    );
  }

  for (const location of builder.locationNames()) {
    crossReferencer.requireLocationCollection(location);
    for (const sector of builder.sectorIds(location)) {
      builder.setFighters(location, sector, crossReferencer.findFighters(location, sector));
    }
    builder.setSpice(location, crossReferencer.findSpice(location));
  }

  const model = builder.build();
  for (const location of model.values()) {
    log.info(
      {
        location: location.name,
        terrain: location.terrain,
        sectors: [...location.sectors.keys()],
        spice: location.spice !== undefined,
      },
      "Extracted location",
    );
  }

  return { model, summary: summarize(groupNames.length, model) };
};
