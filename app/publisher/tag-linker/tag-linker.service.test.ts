import fs from "fs/promises";
import path from "path";

import { LINK_ERROR, LinkError } from "../errors";
import { createPublisherInjector } from "../publisher-injector";

import { LINK_OUTCOME } from "./tag-linker.service";

import { TestEnvironmentBuilder } from "~/test-utils/test-environment-builder";
import { Token } from "~/token";

const testEnv = new TestEnvironmentBuilder(createPublisherInjector);
const TARGET_1 = ".digests/sha256/aa/aaaa";
const TARGET_2 = ".digests/sha256/bb/bbbb";

test.concurrent(
  "creates the tag and then leaves it alone",
  testEnv.run(async ({ injector, tmpDir }) => {
    const linker = injector.resolve(Token.TagLinkerService);
    const tagPath = path.join(tmpDir, "library", "ubuntu", "latest");

    await expect(linker.point(tagPath, TARGET_1)).resolves.toBe(LINK_OUTCOME.CREATED);
    await expect(linker.point(tagPath, TARGET_1)).resolves.toBe(LINK_OUTCOME.ALREADY_CORRECT);
    await expect(fs.readlink(tagPath)).resolves.toBe(TARGET_1);
  }),
);

test.concurrent(
  "repoints a tag at a new target",
  testEnv.run(async ({ injector, tmpDir }) => {
    const linker = injector.resolve(Token.TagLinkerService);
    const tagPath = path.join(tmpDir, "latest");

    await expect(linker.point(tagPath, TARGET_1)).resolves.toBe(LINK_OUTCOME.CREATED);
    await expect(linker.point(tagPath, TARGET_2)).resolves.toBe(LINK_OUTCOME.REPAIRED);
    await expect(fs.readlink(tagPath)).resolves.toBe(TARGET_2);
    // No temporary links are left next to the tag
    expect(await fs.readdir(tmpDir)).toEqual(["latest"]);
  }),
);

test.concurrent(
  "repairs a dangling tag",
  testEnv.run(async ({ injector, tmpDir }) => {
    const linker = injector.resolve(Token.TagLinkerService);
    const tagPath = path.join(tmpDir, "latest");
    await fs.symlink("does-not-exist", tagPath);

    await expect(linker.point(tagPath, TARGET_1)).resolves.toBe(LINK_OUTCOME.REPAIRED);
    await expect(fs.readlink(tagPath)).resolves.toBe(TARGET_1);
  }),
);

test.concurrent(
  "refuses to replace anything that is not a symlink",
  testEnv.run(async ({ injector, tmpDir }) => {
    const linker = injector.resolve(Token.TagLinkerService);
    const filePath = path.join(tmpDir, "file-tag");
    await fs.writeFile(filePath, "keep me");
    const dirPath = path.join(tmpDir, "dir-tag");
    await fs.mkdir(dirPath);

    for (const tagPath of [filePath, dirPath]) {
      const err = await linker.point(tagPath, TARGET_1).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(LinkError);
      expect(err).toMatchObject({ kind: LINK_ERROR.OCCUPIED, tagPath });
    }
    await expect(fs.readFile(filePath, "utf-8")).resolves.toBe("keep me");
    await expect(fs.readdir(dirPath)).resolves.toEqual([]);
  }),
);

test.concurrent(
  "reports filesystem failures as I/O errors",
  testEnv.run(async ({ injector, tmpDir }) => {
    const linker = injector.resolve(Token.TagLinkerService);
    const blocker = path.join(tmpDir, "project");
    await fs.writeFile(blocker, "");

    const err = await linker.point(path.join(blocker, "latest"), TARGET_1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LinkError);
    expect(err).toMatchObject({ kind: LINK_ERROR.IO, tagPath: path.join(blocker, "latest") });
  }),
);
