import { describe, expect, it } from "vitest";
import { GroupNameError, IndexConsistencyError } from "../errors";
import { LocationModelBuilder } from "./location-model-builder";
import { UNGROUPED_SECTOR, type Vec3 } from "./types";

const triangle: Vec3[] = [
  { x: 0, y: 0, z: 0 },
  { x: 1, y: 0, z: 0 },
  { x: 0, y: 1, z: 0 },
];

describe("LocationModelBuilder", () => {
  it("groups sectors of the same location into one record", () => {
    const builder = new LocationModelBuilder();

    builder.setSector("Arrakeen", { vertices: triangle, indices: [0, 1, 2] });
    builder.setSector("Arrakeen;2", { vertices: triangle, indices: [2, 1, 0] });

    const model = builder.build();
    expect([...model.keys()]).toEqual(["Arrakeen"]);
    expect([...(model.get("Arrakeen")?.sectors.keys() ?? [])]).toEqual([UNGROUPED_SECTOR, 2]);
  });

  it("preserves first-seen order of locations and sectors", () => {
    const builder = new LocationModelBuilder();

    builder.setSector("Sietch Tabr;3", { vertices: triangle, indices: [] });
    builder.setSector("Carthag;1", { vertices: triangle, indices: [] });
    builder.setSector("Sietch Tabr;0", { vertices: triangle, indices: [] });

    expect(builder.locationNames()).toEqual(["Sietch Tabr", "Carthag"]);
    expect(builder.sectorIds("Sietch Tabr")).toEqual([3, 0]);
  });

  it("overwrites a repeated sector in place", () => {
    const builder = new LocationModelBuilder();

    builder.setSector("Carthag;0", { vertices: triangle, indices: [0, 1, 2] });
    builder.setSector("Carthag;1", { vertices: triangle, indices: [] });
    builder.setSector("Carthag;0", { vertices: triangle.slice(0, 1), indices: [0] });

    const sectors = builder.build().get("Carthag")?.sectors;
    expect([...(sectors?.keys() ?? [])]).toEqual([0, 1]);
    expect(sectors?.get(0)).toEqual({ vertices: [{ x: 0, y: 0, z: 0 }], indices: [0], fighters: [] });
  });

  it("classifies terrain when a location is first seen", () => {
    const builder = new LocationModelBuilder();

    builder.setSector("Carthag;0", { vertices: triangle, indices: [] });
    builder.setSector("Shield Wall", { vertices: triangle, indices: [] });
    builder.setSector("Cielago North;1", { vertices: triangle, indices: [] });

    const model = builder.build();
    expect(model.get("Carthag")?.terrain).toBe("Stronghold");
    expect(model.get("Shield Wall")?.terrain).toBe("Rock");
    expect(model.get("Cielago North")?.terrain).toBe("Sand");
  });

  it("stores fighters and spice for existing entries", () => {
    const builder = new LocationModelBuilder();
    builder.setSector("Carthag;0", { vertices: triangle, indices: [] });

    builder.setFighters("Carthag", 0, [{ x: 4, y: 5, z: 6 }]);
    builder.setSpice("Carthag", { x: 7, y: 8, z: 9 });

    const location = builder.build().get("Carthag");
    expect(location?.sectors.get(0)?.fighters).toEqual([{ x: 4, y: 5, z: 6 }]);
    expect(location?.spice).toEqual({ x: 7, y: 8, z: 9 });
  });

  it("clears spice when given nothing", () => {
    const builder = new LocationModelBuilder();
    builder.setSector("Carthag;0", { vertices: triangle, indices: [] });

    builder.setSpice("Carthag", { x: 1, y: 1, z: 1 });
    builder.setSpice("Carthag", undefined);

    expect(builder.build().get("Carthag")).not.toHaveProperty("spice");
  });

  it("rejects indices outside the sector's vertices", () => {
    const builder = new LocationModelBuilder();

    expect(() => builder.setSector("Carthag;0", { vertices: triangle, indices: [0, 1, 3] })).toThrow(
      IndexConsistencyError,
    );
    expect(() => builder.setSector("Carthag;0", { vertices: triangle, indices: [-1] })).toThrow(
      IndexConsistencyError,
    );
    expect(builder.locationNames()).toEqual([]);
  });

  it("propagates malformed group names", () => {
    const builder = new LocationModelBuilder();

    expect(() => builder.setSector("Carthag;x", { vertices: triangle, indices: [] })).toThrow(
      GroupNameError,
    );
  });

  it("rejects markers for unknown locations or sectors", () => {
    const builder = new LocationModelBuilder();
    builder.setSector("Carthag;0", { vertices: triangle, indices: [] });

    expect(() => builder.setFighters("Carthag", 5, [])).toThrow('Location "Carthag" has no sector 5.');
    expect(() => builder.setSpice("Arrakeen", undefined)).toThrow('Unknown location "Arrakeen".');
  });

  it("rejects writes after the model is built", () => {
    const builder = new LocationModelBuilder();
    builder.setSector("Carthag;0", { vertices: triangle, indices: [] });
    builder.build();

    expect(() => builder.setSpice("Carthag", undefined)).toThrow("already been built");
  });
});
