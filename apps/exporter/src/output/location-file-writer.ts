import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  LocationFileError,
  locationModelsEqual,
  parseLocationFile,
  serializeLocationFile,
  type LocationModel,
} from "@arrakis/shared";
import { OutputWriteError } from "../errors";
import { logger } from "../logger";

/**
 * Writes the model to `outputPath`. The document is rendered in full first
 * and written to a sibling temporary file that is renamed into place, so the
 * destination either keeps its previous content or receives the whole file.
 *
 * @returns the written text.
 */
export const writeLocationFile = async (
  outputPath: string,
  model: LocationModel,
): Promise<string> => {
  const text = serializeLocationFile(model);
  const tempPath = path.join(
    path.dirname(outputPath),
    `.${path.basename(outputPath)}.${process.pid}.tmp`,
  );

  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(tempPath, text, "utf8");
    await rename(tempPath, outputPath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn({ err: cleanupError, tempPath }, "Failed to remove temporary location file");
    });
    throw new OutputWriteError(outputPath, error);
  }

  return text;
};

/**
 * Reads a written location file back and checks it reproduces `model`.
 */
export const verifyLocationFile = async (
  outputPath: string,
  model: LocationModel,
): Promise<void> => {
  const text = await readFile(outputPath, "utf8");
  const parsed = parseLocationFile(text);
  if (!locationModelsEqual(parsed, model)) {
    throw new LocationFileError(`Location file ${outputPath} does not read back to the exported model.`);
  }
};
