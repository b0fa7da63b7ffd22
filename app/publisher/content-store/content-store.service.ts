import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";

import type winston from "winston";

import { InvalidDigestError, digestPath, formatDigest, parseDigest } from "../digest";
import type { Digest } from "../digest";
import { STORE_ERROR, StoreError } from "../errors";
import type { ImageBuilder } from "../image-builder";
import type { ImageReference } from "../image-reference";

import type { OsRootDetector } from "./os-root-detector";

import type { Config } from "~/config";
import { OrphanedBuildPolicy } from "~/config";
import { Token } from "~/token";
import { catchAlreadyExists, hasErrorCode, lstatOrNull } from "~/utils.server";
import { displayError, formatMode } from "~/utils.shared";

/** Empty marker telling the filesystem to index the directory as its own catalog. */
export const CATALOG_SENTINEL = ".cvmfscatalog";
/** Created in OS images so that the runtime can bind-mount over them. */
export const BIND_POINTS = ["srv", "cvmfs", "dev", "proc", "sys"] as const;
const IMAGE_ROOT_MODE = 0o755;

export interface EnsureResult {
  path: string;
  digest: Digest;
  /** False when the digest was already stored and the builder was not called. */
  created: boolean;
}

/**
 * Owns the write-once, digest-addressed image directories under a content root.
 * A directory that exists is assumed complete and is never modified again.
 */
export class ContentStoreService {
  static inject = [Token.Logger, Token.Config, Token.OsRootDetector] as const;
  private readonly orphanedBuildPolicy: OrphanedBuildPolicy;

  constructor(
    private readonly logger: winston.Logger,
    config: Config,
    private readonly isOsRoot: OsRootDetector,
  ) {
    this.orphanedBuildPolicy = config.publisher().orphanedBuildPolicy;
  }

  async ensure(args: {
    contentRoot: string;
    digest: string;
    imageRef: ImageReference;
    builder: ImageBuilder;
  }): Promise<EnsureResult> {
    let digest: Digest;
    try {
      digest = parseDigest(args.digest);
    } catch (err) {
      if (err instanceof InvalidDigestError) {
        throw new StoreError(STORE_ERROR.INVALID_DIGEST, err.message, { digest: args.digest });
      }
      throw err;
    }
    const imageDir = digestPath(args.contentRoot, digest);
    if ((await lstatOrNull(imageDir)) !== null) {
      this.logger.info(`${formatDigest(digest)} is already stored at ${imageDir}`);
      return { path: imageDir, digest, created: false };
    }

    await fs.mkdir(imageDir, { recursive: true });
    let built: boolean;
    let buildError: unknown = void 0;
    try {
      built = await args.builder.build(imageDir, args.imageRef);
    } catch (err) {
      built = false;
      buildError = err;
    }
    if (!built) {
      await this.handleOrphanedBuild(imageDir);
      throw new StoreError(
        STORE_ERROR.BUILD_FAILED,
        `Failed to build ${args.imageRef.name()} into ${imageDir}`,
        { digest: args.digest, path: imageDir },
        { cause: buildError },
      );
    }

    // Before anything else is written: bind points and the sentinel need write access on the root
    await fs.chmod(imageDir, IMAGE_ROOT_MODE);
    await this.normalizeModes(imageDir);
    if (await this.isOsRoot(imageDir)) {
      for (const bindPoint of BIND_POINTS) {
        await fs.mkdir(path.join(imageDir, bindPoint)).catch(catchAlreadyExists);
      }
    }
    await fs.writeFile(path.join(imageDir, CATALOG_SENTINEL), "", { flag: "a" });
    return { path: imageDir, digest, created: true };
  }

  private async handleOrphanedBuild(imageDir: string): Promise<void> {
    if (this.orphanedBuildPolicy === OrphanedBuildPolicy.Remove) {
      this.logger.warn(`Removing partially built ${imageDir}`);
      await fs.rm(imageDir, { recursive: true, force: true });
    } else {
      this.logger.warn(`Leaving partially built ${imageDir} in place`);
    }
  }

  /**
   * Walks the tree top-down so that directories are made traversable before they are entered.
   * Files with no read bit gain owner read, directories with no execute or no write bit gain the
   * owner one. Symlinks are skipped.
   */
  private async normalizeModes(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (hasErrorCode(err, "EACCES")) {
        this.logger.warn(`Cannot list ${dir}, skipping: ${displayError(err)}`);
        return;
      }
      throw err;
    }
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isFile()) {
        const { mode } = await fs.lstat(fullPath);
        if ((mode & 0o444) === 0) {
          await this.fixMode(fullPath, mode | 0o400);
        }
      } else if (entry.isDirectory()) {
        const { mode } = await fs.lstat(fullPath);
        let newMode = mode;
        if ((newMode & 0o111) === 0) {
          newMode |= 0o100;
        }
        if ((newMode & 0o222) === 0) {
          newMode |= 0o200;
        }
        if (newMode !== mode) {
          await this.fixMode(fullPath, newMode);
        }
        await this.normalizeModes(fullPath);
      }
    }
  }

  private async fixMode(filePath: string, mode: number): Promise<void> {
    this.logger.debug(`Fixing mode of ${filePath} to ${formatMode(mode)}`);
    await fs.chmod(filePath, mode & 0o7777);
  }
}
