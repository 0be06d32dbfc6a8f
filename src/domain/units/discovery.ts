import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import { DiscoveryError } from "../../core/errors.js";
import { logDebug } from "../../core/logging.js";
import type { Unit } from "../checks/types.js";

/**
 * Find analysis units: every immediate subdirectory of `root` that holds a
 * `manifestName` file. Sorted by path so report ordering is stable.
 *
 * Hidden directories are never units; `.global` under the output directory
 * belongs to the global checks. An empty root yields no units. An unreadable
 * root throws DiscoveryError.
 */
export async function discoverUnits(
  root: string,
  manifestName: string,
): Promise<Unit[]> {
  const absoluteRoot = path.resolve(root);

  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(absoluteRoot, { withFileTypes: true });
  } catch (err) {
    throw new DiscoveryError(absoluteRoot, err);
  }

  const units: Unit[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory() || entry.name.startsWith(".")) continue;
    const unitPath = path.join(absoluteRoot, entry.name);
    if (fs.existsSync(path.join(unitPath, manifestName))) {
      units.push({ name: entry.name, path: unitPath });
    } else {
      logDebug(`Skipping ${unitPath}: no ${manifestName}`);
    }
  }

  units.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return units;
}
