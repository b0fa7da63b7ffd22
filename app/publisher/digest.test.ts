import {
  InvalidDigestError,
  digestPath,
  formatDigest,
  parseDigest,
  relativeDigestPath,
} from "./digest";

const SHA256_HEX = "ab" + "0123456789abcdef".repeat(3) + "0123456789abcd";
const SHA512_HEX = "fe".repeat(64);

test.concurrent("parseDigest accepts supported algorithms", async () => {
  expect(SHA256_HEX).toHaveLength(64);
  expect(parseDigest(`sha256:${SHA256_HEX}`)).toEqual({ algorithm: "sha256", hash: SHA256_HEX });
  expect(parseDigest(`sha512:${SHA512_HEX}`)).toEqual({ algorithm: "sha512", hash: SHA512_HEX });
  expect(formatDigest(parseDigest(`sha256:${SHA256_HEX}`))).toBe(`sha256:${SHA256_HEX}`);
});

test.concurrent("parseDigest rejects malformed digests", async () => {
  const cases = [
    "",
    SHA256_HEX,
    `:${SHA256_HEX}`,
    "sha256:",
    `md5:${SHA256_HEX}`,
    `SHA256:${SHA256_HEX}`,
    `sha256:${SHA256_HEX.toUpperCase()}`,
    `sha256:${SHA256_HEX.slice(1)}`,
    `sha512:${SHA256_HEX}`,
    `sha256:${SHA256_HEX.slice(2)}zz`,
  ];
  for (const digest of cases) {
    expect(() => parseDigest(digest)).toThrow(InvalidDigestError);
  }
});

test.concurrent("digest paths are derived from the digest alone", async () => {
  const digest = parseDigest(`sha256:${SHA256_HEX}`);
  expect(relativeDigestPath(digest)).toBe(`.digests/sha256/ab/${SHA256_HEX}`);
  expect(digestPath("/cvmfs/repo/library/ubuntu", digest)).toBe(
    `/cvmfs/repo/library/ubuntu/.digests/sha256/ab/${SHA256_HEX}`,
  );
  expect(digestPath("/cvmfs/repo/library/ubuntu", parseDigest(`sha256:${SHA256_HEX}`))).toBe(
    digestPath("/cvmfs/repo/library/ubuntu", digest),
  );
});
