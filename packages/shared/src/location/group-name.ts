import { GroupNameError } from "../errors.js";
import { UNGROUPED_SECTOR, type SectorId } from "./types.js";

export const GROUP_NAME_SEPARATOR = ";";

export interface ParsedGroupName {
  location: string;
  sector: SectorId;
}

const SECTOR_PATTERN = /^\d+$/;

/**
 * Splits `"Location"` or `"Location;3"` into its location and sector.
 */
export const parseGroupName = (groupName: string): ParsedGroupName => {
  const separatorIndex = groupName.indexOf(GROUP_NAME_SEPARATOR);
  const location = separatorIndex === -1 ? groupName : groupName.slice(0, separatorIndex);
  if (location.length === 0) {
    throw new GroupNameError(groupName, "location name is empty");
  }

  if (separatorIndex === -1) {
    return { location, sector: UNGROUPED_SECTOR };
  }

  const suffix = groupName.slice(separatorIndex + 1);
  if (!SECTOR_PATTERN.test(suffix)) {
    throw new GroupNameError(groupName, `sector "${suffix}" is not a non-negative integer`);
  }

  const sector = Number.parseInt(suffix, 10);
  if (!Number.isSafeInteger(sector)) {
    throw new GroupNameError(groupName, `sector "${suffix}" is out of range`);
  }

  return { location, sector };
};
