import { describe, expect, it } from "vitest";
import { TerrainConfigError } from "../errors";
import { DEFAULT_TERRAIN_CONFIG, TerrainClassifier } from "./terrain";

describe("TerrainClassifier", () => {
  it("classifies the default strongholds and rock", () => {
    const classifier = new TerrainClassifier();

    expect(classifier.classify("Carthag")).toBe("Stronghold");
    expect(classifier.classify("Arrakeen")).toBe("Stronghold");
    expect(classifier.classify("Shield Wall")).toBe("Rock");
    expect(classifier.classify("Pasty Mesa")).toBe("Rock");
  });

  it("falls back to Sand for names in neither set", () => {
    const classifier = new TerrainClassifier();

    expect(classifier.classify("The Great Flat")).toBe("Sand");
    expect(classifier.classify("")).toBe("Sand");
  });

  it("matches names exactly", () => {
    const classifier = new TerrainClassifier();

    expect(classifier.classify("carthag")).toBe("Sand");
    expect(classifier.classify("Carthag ")).toBe("Sand");
  });

  it("assigns exactly one terrain to every configured name", () => {
    const classifier = new TerrainClassifier();
    const names = [...DEFAULT_TERRAIN_CONFIG.strongholds, ...DEFAULT_TERRAIN_CONFIG.rock];

    for (const name of names) {
      const inStrongholds = DEFAULT_TERRAIN_CONFIG.strongholds.includes(name);
      expect(classifier.classify(name)).toBe(inStrongholds ? "Stronghold" : "Rock");
    }
  });

  it("uses a custom configuration", () => {
    const classifier = new TerrainClassifier({ strongholds: ["Keep"], rock: ["Ridge"] });

    expect(classifier.classify("Keep")).toBe("Stronghold");
    expect(classifier.classify("Ridge")).toBe("Rock");
    expect(classifier.classify("Carthag")).toBe("Sand");
  });

  it("rejects a name listed as both stronghold and rock", () => {
    expect(() => new TerrainClassifier({ strongholds: ["Ridge"], rock: ["Ridge"] })).toThrow(
      TerrainConfigError,
    );
  });
});
