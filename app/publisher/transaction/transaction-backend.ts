import path from "path";

import { execCmdForStatus } from "../utils";

import type { Config } from "~/config";
import { Token } from "~/token";
import { doesFileExist } from "~/utils.server";

/**
 * Native transaction commands of the shared filesystem.
 * Every verb resolves to the exit status of the underlying command, 0 meaning success.
 */
export interface TransactionBackend {
  begin(filesystem: string): Promise<number>;
  commit(filesystem: string): Promise<number>;
  abort(filesystem: string): Promise<number>;
  /** Whether the filesystem has a persisted marker of an open transaction. */
  hasOpenTransaction(filesystem: string): Promise<boolean>;
}

export const TRANSACTION_LOCK_FILE = "in_transaction.lock";

export class CvmfsTransactionBackend implements TransactionBackend {
  static inject = [Token.Config] as const;
  private readonly bin: string;
  private readonly spoolRoot: string;

  constructor(config: Config) {
    const publisherConfig = config.publisher();
    this.bin = publisherConfig.cvmfsServerBin;
    this.spoolRoot = publisherConfig.spoolRoot;
  }

  lockFilePath(filesystem: string): string {
    return path.join(this.spoolRoot, filesystem, TRANSACTION_LOCK_FILE);
  }

  async begin(filesystem: string): Promise<number> {
    return await execCmdForStatus(this.bin, "transaction", filesystem);
  }

  async commit(filesystem: string): Promise<number> {
    return await execCmdForStatus(this.bin, "publish", filesystem);
  }

  async abort(filesystem: string): Promise<number> {
    // -f skips the interactive confirmation
    return await execCmdForStatus(this.bin, "abort", "-f", filesystem);
  }

  async hasOpenTransaction(filesystem: string): Promise<boolean> {
    return await doesFileExist(this.lockFilePath(filesystem));
  }
}

export const factoryTransactionBackend = (config: Config): TransactionBackend =>
  new CvmfsTransactionBackend(config);
factoryTransactionBackend.inject = [Token.Config] as const;
