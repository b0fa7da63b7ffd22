import type winston from "winston";

import type { ImageReference } from "./image-reference";
import { execCmd } from "./utils";

import type { Config } from "~/config";
import { SkopeoInspectValidator } from "~/schema/skopeo-inspect.validator.server";
import { Token } from "~/token";

export interface RegistryCredentials {
  username: string;
  token: string;
}

/**
 * Looks up the content digest (`algorithm:hex`) of a remote image.
 * May be slow and is not retried by callers.
 */
export interface ImageResolver {
  resolve(imageRef: ImageReference, credentials?: RegistryCredentials): Promise<string>;
}

/**
 * Reads the digest from the registry with `skopeo inspect`, which fetches only the manifest,
 * so no local copy of the image is left behind.
 */
export class SkopeoImageResolver implements ImageResolver {
  static inject = [Token.Logger, Token.Config] as const;
  private readonly bin: string;

  constructor(private readonly logger: winston.Logger, config: Config) {
    this.bin = config.publisher().skopeoBin;
  }

  async resolve(imageRef: ImageReference, credentials?: RegistryCredentials): Promise<string> {
    this.logger.info(`Resolving digest of ${imageRef.name()}`);
    const { stdout } = await execCmd(
      this.bin,
      "inspect",
      ...(credentials !== void 0 ? ["--creds", `${credentials.username}:${credentials.token}`] : []),
      `docker://${imageRef.name()}`,
    );
    const { Digest } = SkopeoInspectValidator.Parse(JSON.parse(stdout));
    return Digest;
  }
}

export const factoryImageResolver = (logger: winston.Logger, config: Config): ImageResolver =>
  new SkopeoImageResolver(logger, config);
factoryImageResolver.inject = [Token.Logger, Token.Config] as const;
