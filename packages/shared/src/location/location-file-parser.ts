import { LocationFileError } from "../errors.js";
import {
  TERRAINS,
  type LocationModel,
  type LocationRecord,
  type SectorId,
  type SectorRecord,
  type Terrain,
  type Vec3,
} from "./types.js";

const WHITESPACE = /\s*/y;
const FLOAT = /-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const INTEGER = /-?\d+/y;
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y;

const isTerrain = (value: string): value is Terrain =>
  TERRAINS.some((terrain) => terrain === value);

/**
 * Recursive-descent reader for the location file grammar. Whitespace
 * between tokens is ignored.
 */
class LocationFileReader {
  private offset = 0;

  constructor(private readonly text: string) {}

  readDocument(): LocationModel {
    const model: LocationModel = new Map();
    this.expect("[");
    while (!this.peek("]")) {
      const location = this.readLocation();
      if (model.has(location.name)) {
        throw this.error(`Duplicate location "${location.name}"`);
      }
      model.set(location.name, location);
    }
    this.expect("]");
    this.skipWhitespace();
    if (this.offset !== this.text.length) {
      throw this.error("Unexpected trailing content");
    }
    return model;
  }

  private readLocation(): LocationRecord {
    this.expect("(");
    this.readField("name");
    const name = this.readString();
    this.expect(",");

    this.readField("terrain");
    const terrain = this.readIdentifier();
    if (!isTerrain(terrain)) {
      throw this.error(`Unknown terrain "${terrain}"`);
    }
    this.expect(",");

    this.readField("spice");
    const spice = this.readSpice();
    this.expect(",");

    this.readField("sectors");
    const sectors = new Map<SectorId, SectorRecord>();
    this.expect("{");
    while (!this.peek("}")) {
      const sector = this.readInteger();
      if (sectors.has(sector)) {
        throw this.error(`Duplicate sector ${sector} in "${name}"`);
      }
      this.expect(":");
      sectors.set(sector, this.readSector());
    }
    this.expect("}");
    this.expect(",");

    this.expect(")");
    this.expect(",");

    const location: LocationRecord = { name, terrain, sectors };
    if (spice) {
      location.spice = spice;
    }
    return location;
  }

  private readSpice(): Vec3 | undefined {
    const variant = this.readIdentifier();
    if (variant === "None") {
      return undefined;
    }
    if (variant !== "Some") {
      throw this.error(`Expected None or Some, found "${variant}"`);
    }
    this.expect("(");
    const position = this.readVec3();
    this.expect(")");
    return position;
  }

  private readSector(): SectorRecord {
    this.expect("(");
    this.readField("vertices");
    const vertices = this.readVec3List();
    this.readField("indices");
    const indices: number[] = [];
    this.expect("[");
    while (!this.peek("]")) {
      indices.push(this.readInteger());
      this.expect(",");
    }
    this.expect("]");
    this.expect(",");
    this.readField("fighters");
    const fighters = this.readVec3List();
    this.expect(")");
    this.expect(",");
    return { vertices, indices, fighters };
  }

  private readVec3List(): Vec3[] {
    const values: Vec3[] = [];
    this.expect("[");
    while (!this.peek("]")) {
      values.push(this.readVec3());
      this.expect(",");
    }
    this.expect("]");
    this.expect(",");
    return values;
  }

  private readVec3(): Vec3 {
    this.expect("(");
    const x = this.readFloat();
    this.expect(",");
    const y = this.readFloat();
    this.expect(",");
    const z = this.readFloat();
    this.expect(")");
    return { x, y, z };
  }

  private readField(name: string): void {
    const identifier = this.readIdentifier();
    if (identifier !== name) {
      throw this.error(`Expected field "${name}", found "${identifier}"`);
    }
    this.expect(":");
  }

  private readString(): string {
    this.expect('"');
    let value = "";
    while (this.offset < this.text.length) {
      const char = this.text[this.offset];
      this.offset += 1;
      if (char === '"') {
        return value;
      }
      if (char === "\\") {
        const escaped = this.text[this.offset];
        if (escaped !== "\\" && escaped !== '"') {
          throw this.error(`Unsupported escape "\\${escaped ?? ""}"`);
        }
        value += escaped;
        this.offset += 1;
        continue;
      }
      value += char;
    }
    throw this.error("Unterminated string");
  }

  private readIdentifier(): string {
    return this.match(IDENTIFIER, "identifier");
  }

  private readInteger(): number {
    return Number.parseInt(this.match(INTEGER, "integer"), 10);
  }

  private readFloat(): number {
    return Number.parseFloat(this.match(FLOAT, "number"));
  }

  private match(pattern: RegExp, description: string): string {
    this.skipWhitespace();
    pattern.lastIndex = this.offset;
    const result = pattern.exec(this.text);
    if (!result) {
      throw this.error(`Expected ${description}`);
    }
    this.offset += result[0].length;
    return result[0];
  }

  private peek(token: string): boolean {
    this.skipWhitespace();
    return this.text.startsWith(token, this.offset);
  }

  private expect(token: string): void {
    if (!this.peek(token)) {
      throw this.error(`Expected "${token}"`);
    }
    this.offset += token.length;
  }

  private skipWhitespace(): void {
    WHITESPACE.lastIndex = this.offset;
    if (WHITESPACE.exec(this.text)) {
      this.offset = WHITESPACE.lastIndex;
    }
  }

  private error(message: string): LocationFileError {
    return new LocationFileError(message, this.offset);
  }
}

/**
 * Reads a location file back into a {@link LocationModel}.
 */
export const parseLocationFile = (text: string): LocationModel =>
  new LocationFileReader(text).readDocument();
