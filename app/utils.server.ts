import type { Stats } from "fs";
import fs from "fs/promises";

/**
 * Errors thrown by node's own modules may come from another realm (e.g. under Jest),
 * so the code is read without an `instanceof Error` check.
 */
export const hasErrorCode = (err: unknown, code: string): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === code;

/**
 * Follows symlinks, so a dangling symlink does not count as an existing file.
 */
export const doesFileExist = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return false;
    }
    throw err;
  }
};

/**
 * Like `fs.lstat` but returns `null` instead of throwing when nothing is at `filePath`.
 */
export const lstatOrNull = async (filePath: string): Promise<Stats | null> => {
  try {
    return await fs.lstat(filePath);
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return null;
    }
    throw err;
  }
};

const catchIgnore = (toIgnore: string) => (err: unknown) => {
  if (!hasErrorCode(err, toIgnore)) throw err;
};

export const catchAlreadyExists = catchIgnore("EEXIST");
