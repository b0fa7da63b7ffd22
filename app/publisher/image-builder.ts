import type winston from "winston";

import type { ImageReference } from "./image-reference";
import { ExecCmdError, execCmd } from "./utils";

import type { Config } from "~/config";
import { Token } from "~/token";

/**
 * Materializes an image as a plain directory tree at `targetDir`.
 * Resolves to `false` when the build fails; the directory may then be partially populated.
 */
export interface ImageBuilder {
  build(targetDir: string, imageRef: ImageReference): Promise<boolean>;
}

export class SingularityImageBuilder implements ImageBuilder {
  static inject = [Token.Logger, Token.Config] as const;
  private readonly bin: string;

  constructor(private readonly logger: winston.Logger, config: Config) {
    this.bin = config.publisher().singularityBin;
  }

  async build(targetDir: string, imageRef: ImageReference): Promise<boolean> {
    const source = `docker://${imageRef.name()}`;
    this.logger.info(`Building ${source} into ${targetDir}`);
    try {
      await execCmd(this.bin, "build", "--sandbox", targetDir, source);
    } catch (err) {
      if (err instanceof ExecCmdError) {
        this.logger.error(err.message);
        return false;
      }
      throw err;
    }
    return true;
  }
}

export const factoryImageBuilder = (logger: winston.Logger, config: Config): ImageBuilder =>
  new SingularityImageBuilder(logger, config);
factoryImageBuilder.inject = [Token.Logger, Token.Config] as const;
