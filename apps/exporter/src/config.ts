import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { TerrainConfig } from "@arrakis/shared";
import { ExporterConfigError } from "./errors";
import {
  DEFAULT_TOPOLOGY_POLICY,
  TOPOLOGY_POLICIES,
  type TopologyPolicy,
} from "./extraction/topology-extractor";

export const DEFAULT_OUTPUT_FILE = "locations.ron";
export const DEFAULT_SELECTION_MESH = "Map";

export interface ExporterCliArgs {
  scenePath?: string;
  outputPath: string;
  meshName: string;
  terrainPath?: string;
  policy: TopologyPolicy;
  verify: boolean;
  showHelp: boolean;
}

const TerrainConfigSchema = z.object({
  strongholds: z.array(z.string().min(1)),
  rock: z.array(z.string().min(1)),
});

export const printUsage = (): void => {
  console.log("Usage: npm run export --workspace @arrakis/exporter -- --scene <file.glb> [options]");
  console.log("  --scene, -s <file>     GLB scene holding the selection mesh and marker nodes");
  console.log(`  --out, -o <file>       Output location file (defaults to ${DEFAULT_OUTPUT_FILE})`);
  console.log(
    `  --mesh, -m <name>      Mesh carrying selection groups (defaults to ${DEFAULT_SELECTION_MESH})`,
  );
  console.log("  --terrain <file>       JSON file with stronghold and rock location names");
  console.log(
    `  --policy <name>        Face policy: ${TOPOLOGY_POLICIES.join(" | ")} (defaults to ${DEFAULT_TOPOLOGY_POLICY})`,
  );
  console.log("  --verify               Read the written file back and compare it to the model");
};

const isTopologyPolicy = (value: string): value is TopologyPolicy =>
  TOPOLOGY_POLICIES.some((policy) => policy === value);

const VALUE_FLAGS = {
  "--scene": "scenePath",
  "-s": "scenePath",
  "--out": "outputPath",
  "-o": "outputPath",
  "--mesh": "meshName",
  "-m": "meshName",
  "--terrain": "terrainPath",
  "--policy": "policy",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

const isValueFlag = (arg: string): arg is ValueFlag => Object.hasOwn(VALUE_FLAGS, arg);

/**
 * Parses exporter command line arguments. Flags taking a value accept both
 * `--flag value` and `--flag=value`.
 */
export const parseArgs = (argv: readonly string[], cwd: string = process.cwd()): ExporterCliArgs => {
  const values: Partial<Record<(typeof VALUE_FLAGS)[ValueFlag], string>> = {};
  let verify = false;
  let showHelp = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--help" || arg === "-h") {
      showHelp = true;
      continue;
    }
    if (arg === "--verify") {
      verify = true;
      continue;
    }

    const equalsIndex = arg.indexOf("=");
    const flag = equalsIndex === -1 ? arg : arg.slice(0, equalsIndex);
    if (!isValueFlag(flag)) {
      throw new ExporterConfigError(`Unknown argument ${arg}.`);
    }

    let value: string | undefined;
    if (equalsIndex === -1) {
      value = argv[index + 1];
      index += 1;
    } else {
      value = arg.slice(equalsIndex + 1);
    }
    if (!value || value.startsWith("-")) {
      throw new ExporterConfigError(`Expected a value after ${flag}.`);
    }
    values[VALUE_FLAGS[flag]] = value;
  }

  const policy = values.policy ?? DEFAULT_TOPOLOGY_POLICY;
  if (!isTopologyPolicy(policy)) {
    throw new ExporterConfigError(
      `Unknown policy "${policy}". Expected one of: ${TOPOLOGY_POLICIES.join(", ")}.`,
    );
  }

  return {
    scenePath: values.scenePath ? path.resolve(cwd, values.scenePath) : undefined,
    outputPath: path.resolve(cwd, values.outputPath ?? DEFAULT_OUTPUT_FILE),
    meshName: values.meshName ?? DEFAULT_SELECTION_MESH,
    terrainPath: values.terrainPath ? path.resolve(cwd, values.terrainPath) : undefined,
    policy,
    verify,
    showHelp,
  };
};

/**
 * Loads stronghold and rock names from a JSON file.
 */
export const loadTerrainConfig = async (terrainPath: string): Promise<TerrainConfig> => {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(terrainPath, "utf8"));
  } catch (error) {
    throw new ExporterConfigError(`Unable to read terrain config ${terrainPath}.`, { cause: error });
  }

  const parsed = TerrainConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExporterConfigError(
      `Invalid terrain config ${terrainPath}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
        .join("; ")}`,
    );
  }
  return parsed.data;
};
