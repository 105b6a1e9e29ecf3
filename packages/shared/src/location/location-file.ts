import { LocationFileError } from "../errors.js";
import { formatFloat } from "../utils/number.js";
import type { LocationModel, LocationRecord, SectorId, SectorRecord, Vec3 } from "./types.js";

const INDENT = "\t";

/**
 * Line-oriented writer that prefixes each line with one tab per depth.
 */
class IndentedLines {
  private readonly lines: string[] = [];

  line(depth: number, text: string): void {
    this.lines.push(`${INDENT.repeat(depth)}${text}`);
  }

  toString(): string {
    return this.lines.map((text) => `${text}\n`).join("");
  }
}

const formatVec3 = (vector: Vec3): string => {
  const { x, y, z } = vector;
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    throw new LocationFileError(`Cannot write non-finite position (${x}, ${y}, ${z}).`);
  }
  return `(${formatFloat(x)}, ${formatFloat(y)}, ${formatFloat(z)})`;
};

export const escapeLocationString = (value: string): string =>
  value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');

const writeVec3List = (out: IndentedLines, depth: number, field: string, values: Vec3[]): void => {
  out.line(depth, `${field}: [`);
  for (const value of values) {
    out.line(depth + 1, `${formatVec3(value)},`);
  }
  out.line(depth, "],");
};

const writeSector = (
  out: IndentedLines,
  depth: number,
  sector: SectorId,
  record: SectorRecord,
): void => {
  out.line(depth, `${sector}: (`);
  writeVec3List(out, depth + 1, "vertices", record.vertices);
  out.line(depth + 1, `indices: [${record.indices.map((index) => `${index}, `).join("")}],`);
  writeVec3List(out, depth + 1, "fighters", record.fighters);
  out.line(depth, "),");
};

const writeLocation = (out: IndentedLines, depth: number, location: LocationRecord): void => {
  out.line(depth, "(");
  out.line(depth + 1, `name: "${escapeLocationString(location.name)}",`);
  out.line(depth + 1, `terrain: ${location.terrain},`);
  out.line(depth + 1, `spice: ${location.spice ? `Some(${formatVec3(location.spice)})` : "None"},`);
  out.line(depth + 1, "sectors: {");
  for (const [sector, record] of location.sectors) {
    writeSector(out, depth + 2, sector, record);
  }
  out.line(depth + 1, "},");
  out.line(depth, "),");
};

/**
 * Renders the model as a location file. Locations and sectors are written
 * in map order; every list entry carries a trailing comma.
 */
export const serializeLocationFile = (model: LocationModel): string => {
  const out = new IndentedLines();
  out.line(0, "[");
  for (const location of model.values()) {
    writeLocation(out, 1, location);
  }
  out.line(0, "]");
  return out.toString();
};
