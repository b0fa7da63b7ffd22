import fs from "fs/promises";
import path from "path";

import { v4 as uuidv4 } from "uuid";
import type winston from "winston";

import { LINK_ERROR, LinkError } from "../errors";

import { Token } from "~/token";
import type { valueof } from "~/types/utils";
import { catchAlreadyExists, lstatOrNull } from "~/utils.server";

export type LINK_OUTCOME = valueof<typeof LINK_OUTCOME>;
export const LINK_OUTCOME = {
  CREATED: "Created",
  REPAIRED: "Repaired",
  ALREADY_CORRECT: "AlreadyCorrect",
} as const;

/**
 * Maintains tag symlinks. A tag path only ever holds a symlink, a tag is resolved by following
 * exactly one hop to an immutable digest directory. Every operation is safe to repeat.
 */
export class TagLinkerService {
  static inject = [Token.Logger] as const;

  constructor(private readonly logger: winston.Logger) {}

  async point(tagPath: string, target: string): Promise<LINK_OUTCOME> {
    try {
      return await this.pointUnchecked(tagPath, target);
    } catch (err) {
      if (err instanceof LinkError) {
        throw err;
      }
      throw new LinkError(LINK_ERROR.IO, `Failed to point ${tagPath} at ${target}`, tagPath, {
        cause: err,
      });
    }
  }

  private async pointUnchecked(tagPath: string, target: string): Promise<LINK_OUTCOME> {
    await fs.mkdir(path.dirname(tagPath), { recursive: true }).catch(catchAlreadyExists);

    const stat = await lstatOrNull(tagPath);
    if (stat === null) {
      await fs.symlink(target, tagPath);
      this.logger.info(`Created tag ${tagPath} -> ${target}`);
      return LINK_OUTCOME.CREATED;
    }
    if (!stat.isSymbolicLink()) {
      throw new LinkError(
        LINK_ERROR.OCCUPIED,
        `${tagPath} exists and is not a symlink, refusing to replace it`,
        tagPath,
      );
    }
    const currentTarget = await fs.readlink(tagPath);
    if (currentTarget === target) {
      return LINK_OUTCOME.ALREADY_CORRECT;
    }
    // rename(2) replaces the old link in one step, readers never see the tag missing
    const tmpPath = path.join(path.dirname(tagPath), `.${path.basename(tagPath)}.${uuidv4()}`);
    await fs.symlink(target, tmpPath);
    try {
      await fs.rename(tmpPath, tagPath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
    this.logger.info(`Repointed tag ${tagPath} from ${currentTarget} to ${target}`);
    return LINK_OUTCOME.REPAIRED;
  }
}
