import { TerrainClassifier } from "@arrakis/shared";
import {
  BabylonMarkerHierarchy,
  BabylonSelectionHost,
  ExporterConfigError,
  extractLocations,
  findSelectionMesh,
  loadGlbScene,
  loadTerrainConfig,
  logger,
  parseArgs,
  printUsage,
  verifyLocationFile,
  writeLocationFile,
} from "../src";

const run = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2));
  if (args.showHelp) {
    printUsage();
    return;
  }
  if (!args.scenePath) {
    printUsage();
    throw new ExporterConfigError("Missing --scene <file.glb>.");
  }

  const classifier = args.terrainPath
    ? new TerrainClassifier(await loadTerrainConfig(args.terrainPath))
    : new TerrainClassifier();

  logger.info({ scene: args.scenePath, mesh: args.meshName, policy: args.policy }, "Loading scene");
  const { scene, dispose } = await loadGlbScene(args.scenePath);

  try {
    const host = new BabylonSelectionHost(findSelectionMesh(scene, args.meshName));
    const markers = new BabylonMarkerHierarchy(scene);
    const { model, summary } = extractLocations(host, markers, {
      policy: args.policy,
      classifier,
      logger,
    });

    await writeLocationFile(args.outputPath, model);
    logger.info({ output: args.outputPath, ...summary }, "Location file written");

    if (args.verify) {
      await verifyLocationFile(args.outputPath, model);
      logger.info({ output: args.outputPath }, "Location file verified");
    }
  } finally {
    dispose();
  }
};

try {
  await run();
} catch (error) {
  logger.error({ err: error }, "Failed to export locations");
  process.exitCode = 1;
}
