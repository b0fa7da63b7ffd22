import fs from "fs/promises";
import path from "path";

import { createPublisherInjector } from "../publisher-injector";

import { CvmfsTransactionBackend, TRANSACTION_LOCK_FILE } from "./transaction-backend";

import { TestEnvironmentBuilder } from "~/test-utils/test-environment-builder";
import { Token } from "~/token";

const testEnv = new TestEnvironmentBuilder(createPublisherInjector);

// Stands in for cvmfs_server: records its arguments and exits with the status found in a file.
const FAKE_CVMFS_SERVER = `#!/bin/sh
dir=$(dirname "$0")
echo "$@" >> "$dir/calls"
exit $(cat "$dir/status")
`;

const setupFakeServer = async (tmpDir: string, status: number): Promise<string> => {
  const binDir = path.join(tmpDir, "bin");
  await fs.mkdir(binDir);
  const bin = path.join(binDir, "cvmfs_server");
  await fs.writeFile(bin, FAKE_CVMFS_SERVER, { mode: 0o755 });
  await fs.writeFile(path.join(binDir, "status"), `${status}\n`);
  return bin;
};

const readCalls = async (bin: string): Promise<string[]> =>
  (await fs.readFile(path.join(path.dirname(bin), "calls"), "utf-8")).trim().split("\n");

// Not concurrent: executing a script while another test is still writing one can fail with ETXTBSY
test(
  "runs cvmfs_server verbs and reports their status",
  testEnv.run(async ({ injector, tmpDir }) => {
    const config = injector.resolve(Token.Config);
    const bin = await setupFakeServer(tmpDir, 0);
    const backend = new CvmfsTransactionBackend({
      ...config,
      publisher: () => ({ ...config.publisher(), cvmfsServerBin: bin }),
    });
    await expect(backend.begin("repo.example.org")).resolves.toBe(0);
    await expect(backend.commit("repo.example.org")).resolves.toBe(0);
    await expect(backend.abort("repo.example.org")).resolves.toBe(0);
    expect(await readCalls(bin)).toEqual([
      "transaction repo.example.org",
      "publish repo.example.org",
      "abort -f repo.example.org",
    ]);

    await fs.writeFile(path.join(path.dirname(bin), "status"), "17\n");
    await expect(backend.begin("repo.example.org")).resolves.toBe(17);
  }),
);

test(
  "detects the transaction lock file in the spool directory",
  testEnv.run(async ({ injector, spoolRoot }) => {
    const backend = new CvmfsTransactionBackend(injector.resolve(Token.Config));
    expect(backend.lockFilePath("repo.example.org")).toBe(
      path.join(spoolRoot, "repo.example.org", TRANSACTION_LOCK_FILE),
    );
    await expect(backend.hasOpenTransaction("repo.example.org")).resolves.toBe(false);
    await fs.mkdir(path.join(spoolRoot, "repo.example.org"), { recursive: true });
    await fs.writeFile(backend.lockFilePath("repo.example.org"), "");
    await expect(backend.hasOpenTransaction("repo.example.org")).resolves.toBe(true);
  }),
);

test(
  "fails when cvmfs_server cannot be started",
  testEnv.run(async ({ injector, tmpDir }) => {
    const config = injector.resolve(Token.Config);
    const backend = new CvmfsTransactionBackend({
      ...config,
      publisher: () => ({ ...config.publisher(), cvmfsServerBin: path.join(tmpDir, "missing") }),
    });
    await expect(backend.begin("repo.example.org")).rejects.toMatchObject({ code: "ENOENT" });
  }),
);
