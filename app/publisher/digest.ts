import path from "path";

import type { valueof } from "~/types/utils";

export type DigestAlgorithm = valueof<typeof DigestAlgorithm>;
export const DigestAlgorithm = {
  SHA256: "sha256",
  SHA512: "sha512",
} as const;

const HEX_LENGTH: Record<DigestAlgorithm, number> = {
  [DigestAlgorithm.SHA256]: 64,
  [DigestAlgorithm.SHA512]: 128,
};

/** Name of the directory under a content root that holds digest-addressed content. */
export const DIGESTS_DIR = ".digests";

export interface Digest {
  algorithm: DigestAlgorithm;
  hash: string;
}

export class InvalidDigestError extends Error {
  constructor(public readonly digest: string, reason: string) {
    super(`Invalid digest "${digest}": ${reason}`);
    this.name = this.constructor.name;
  }
}

const isDigestAlgorithm = (value: string): value is DigestAlgorithm =>
  Object.values<string>(DigestAlgorithm).includes(value);

export const parseDigest = (digest: string): Digest => {
  const separator = digest.indexOf(":");
  if (separator === -1) {
    throw new InvalidDigestError(digest, "expected <algorithm>:<hex>");
  }
  const algorithm = digest.slice(0, separator);
  const hash = digest.slice(separator + 1);
  if (algorithm === "" || hash === "") {
    throw new InvalidDigestError(digest, "algorithm and hash must both be non-empty");
  }
  if (!isDigestAlgorithm(algorithm)) {
    throw new InvalidDigestError(
      digest,
      `unsupported algorithm, expected one of ${Object.values(DigestAlgorithm).join(", ")}`,
    );
  }
  if (!/^[0-9a-f]+$/.test(hash) || hash.length !== HEX_LENGTH[algorithm]) {
    throw new InvalidDigestError(
      digest,
      `expected ${HEX_LENGTH[algorithm]} lowercase hex characters`,
    );
  }
  return { algorithm, hash };
};

export const formatDigest = (digest: Digest): string => `${digest.algorithm}:${digest.hash}`;

/**
 * Path of a digest's content relative to its content root: `.digests/<algorithm>/<hash[0:2]>/<hash>`.
 * The two character prefix level keeps directory sizes manageable.
 */
export const relativeDigestPath = (digest: Digest): string =>
  path.join(DIGESTS_DIR, digest.algorithm, digest.hash.substring(0, 2), digest.hash);

export const digestPath = (contentRoot: string, digest: Digest): string =>
  path.join(contentRoot, relativeDigestPath(digest));
