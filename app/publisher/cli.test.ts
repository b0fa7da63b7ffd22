import { UsageError, parsePublishArgs } from "./cli";

test.concurrent("parsePublishArgs", async () => {
  const args = parsePublishArgs([
    "--image",
    "registry.example.com/team/tools:v1",
    "--filesystem",
    "images.example.org",
    "--root-subdir",
    "containers",
  ]);
  expect(args.imageRef.name()).toBe("registry.example.com/team/tools:v1");
  expect(args.imageRef.digest).toBeUndefined();
  expect(args.filesystem).toBe("images.example.org");
  expect(args.rootSubdir).toBe("containers");

  const pinned = parsePublishArgs([
    "--image",
    "team/tools",
    "--filesystem",
    "images.example.org",
    "--digest",
    "sha256:00",
  ]);
  expect(pinned.imageRef.toString()).toBe("team/tools:latest@sha256:00");
  expect(pinned.rootSubdir).toBe("");
});

test.concurrent("parsePublishArgs rejects incomplete or unknown arguments", async () => {
  expect(() => parsePublishArgs(["--filesystem", "images.example.org"])).toThrow(UsageError);
  expect(() => parsePublishArgs(["--image", "team/tools"])).toThrow("Missing --filesystem");
  expect(() =>
    parsePublishArgs(["--image", "team/tools", "--filesystem", "x", "--force"]),
  ).toThrow(UsageError);
});

test.concurrent("parsePublishArgs reports a malformed image reference as a usage error", async () => {
  expect(() =>
    parsePublishArgs(["--image", "team/../tools", "--filesystem", "images.example.org"]),
  ).toThrow(UsageError);
  expect(() =>
    parsePublishArgs(["--image", "team/Tools", "--filesystem", "images.example.org"]),
  ).toThrow("Invalid --image team/Tools");
  expect(() =>
    parsePublishArgs(["--image", "team/tools", "--filesystem", "images.example.org", "--digest", ""]),
  ).toThrow(UsageError);
});

test.concurrent("parsePublishArgs keeps paths inside the repository", async () => {
  for (const filesystem of ["..", ".", "images.example.org/..", "../etc"]) {
    expect(() => parsePublishArgs(["--image", "team/tools", "--filesystem", filesystem])).toThrow(
      `Invalid --filesystem: ${filesystem}`,
    );
  }
  for (const rootSubdir of ["..", "containers/../..", "../other"]) {
    expect(() =>
      parsePublishArgs([
        "--image",
        "team/tools",
        "--filesystem",
        "images.example.org",
        "--root-subdir",
        rootSubdir,
      ]),
    ).toThrow(UsageError);
  }
  const nested = parsePublishArgs([
    "--image",
    "team/tools",
    "--filesystem",
    "images.example.org",
    "--root-subdir",
    "containers/v2..old",
  ]);
  expect(nested.rootSubdir).toBe("containers/v2..old");
});
