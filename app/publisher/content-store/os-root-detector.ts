import fs from "fs/promises";
import path from "path";

import { hasErrorCode } from "~/utils.server";

/**
 * Decides whether a materialized image is a full operating system root,
 * in which case bind-mount points are added to it.
 */
export type OsRootDetector = (imageDir: string) => Promise<boolean>;

/** Matches the `etc/*-release` files distributions ship, e.g. `etc/os-release`. */
export const hasOsReleaseFile: OsRootDetector = async (imageDir) => {
  let entries: string[];
  try {
    entries = await fs.readdir(path.join(imageDir, "etc"));
  } catch (err) {
    if (hasErrorCode(err, "ENOENT") || hasErrorCode(err, "ENOTDIR")) {
      return false;
    }
    throw err;
  }
  return entries.some((entry) => entry.endsWith("-release"));
};
