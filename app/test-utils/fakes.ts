import fs from "fs/promises";
import path from "path";

import type { ImageBuilder } from "~/publisher/image-builder";
import type { ImageReference } from "~/publisher/image-reference";
import type { ImageResolver, RegistryCredentials } from "~/publisher/image-resolver";
import type { TransactionBackend } from "~/publisher/transaction/transaction-backend";

type TransactionVerb = "begin" | "commit" | "abort";

/**
 * Stands in for the filesystem's transaction commands. A successful begin leaves a marker behind,
 * a successful commit or abort clears it, like the real lock file.
 */
export class FakeTransactionBackend implements TransactionBackend {
  readonly calls: string[] = [];
  readonly statuses: Record<TransactionVerb, number> = { begin: 0, commit: 0, abort: 0 };
  readonly markers = new Set<string>();
  abortThrows = false;

  async begin(filesystem: string): Promise<number> {
    this.calls.push(`begin ${filesystem}`);
    if (this.statuses.begin === 0) {
      this.markers.add(filesystem);
    }
    return this.statuses.begin;
  }

  async commit(filesystem: string): Promise<number> {
    this.calls.push(`commit ${filesystem}`);
    if (this.statuses.commit === 0) {
      this.markers.delete(filesystem);
    }
    return this.statuses.commit;
  }

  async abort(filesystem: string): Promise<number> {
    this.calls.push(`abort ${filesystem}`);
    if (this.abortThrows) {
      throw new Error("abort exploded");
    }
    if (this.statuses.abort === 0) {
      this.markers.delete(filesystem);
    }
    return this.statuses.abort;
  }

  async hasOpenTransaction(filesystem: string): Promise<boolean> {
    return this.markers.has(filesystem);
  }
}

/**
 * Writes `files` (relative path -> content) into the target directory.
 * `populate` runs afterwards for anything the map cannot express, like file modes.
 */
export class FakeImageBuilder implements ImageBuilder {
  readonly builds: { targetDir: string; image: string }[] = [];
  files: Record<string, string> = { "bin/hello": "#!/bin/sh\necho hello\n" };
  populate: ((targetDir: string) => Promise<void>) | undefined = void 0;
  result: boolean | Error = true;

  async build(targetDir: string, imageRef: ImageReference): Promise<boolean> {
    this.builds.push({ targetDir, image: imageRef.name() });
    for (const [relativePath, content] of Object.entries(this.files)) {
      const filePath = path.join(targetDir, relativePath);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content);
    }
    if (this.populate !== void 0) {
      await this.populate(targetDir);
    }
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

export class FakeImageResolver implements ImageResolver {
  readonly calls: { image: string; credentials?: RegistryCredentials }[] = [];
  readonly digests = new Map<string, string>();

  async resolve(imageRef: ImageReference, credentials?: RegistryCredentials): Promise<string> {
    this.calls.push({ image: imageRef.name(), ...(credentials ? { credentials } : {}) });
    const digest = this.digests.get(imageRef.name());
    if (digest === void 0) {
      throw new Error(`manifest unknown: ${imageRef.name()}`);
    }
    return digest;
  }
}
